import type { ApiDatabase } from "../db/types";
import type { RuntimeEnv } from "../env";
import { silentLogger, type Logger } from "../utils/logger";
import type { RandomSource } from "../utils/random";
import { createQuestionStore, type QuestionStore } from "./questionStore";

export type EngineSettings = Pick<
  RuntimeEnv,
  "sessionTtlHours" | "studyCountsTowardStreak" | "leaderboardDefaultLimit" | "leaderboardMinQuizzes"
>;

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  sessionTtlHours: 24,
  studyCountsTowardStreak: true,
  leaderboardDefaultLimit: 100,
  leaderboardMinQuizzes: 10
};

/** Everything the session, submission and ranking operations share. */
export type EngineContext = {
  db: ApiDatabase;
  questionStore: QuestionStore;
  logger: Logger;
  settings: EngineSettings;
  now: () => Date;
  random: RandomSource;
};

export const createEngineContext = ({
  db,
  settings,
  logger = silentLogger,
  questionStore = createQuestionStore(db),
  now = () => new Date(),
  random = Math.random
}: {
  db: ApiDatabase;
  settings?: Partial<EngineSettings>;
  logger?: Logger;
  questionStore?: QuestionStore;
  now?: () => Date;
  random?: RandomSource;
}): EngineContext => ({
  db,
  questionStore,
  logger,
  settings: { ...DEFAULT_ENGINE_SETTINGS, ...settings },
  now,
  random
});

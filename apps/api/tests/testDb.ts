import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { nanoid } from "nanoid";
import type { AnswerChoice, ExamType, QuizMode } from "@quizrank/shared";
import { applySchema } from "../src/db/init";
import { achievements, avatars, questions, quizAttempts, userProfiles, users } from "../src/db/schema";
import type { ApiDatabase } from "../src/db/types";
import { createEngineContext, type EngineSettings } from "../src/services/context";
import type { LogFields, Logger } from "../src/utils/logger";

export const setupDb = () => {
  const sqlite = new Database(":memory:");
  sqlite.pragma("foreign_keys = ON");
  applySchema(sqlite);
  const db = drizzle(sqlite);
  return { db, sqlite };
};

/** Noon local time, so date keys do not depend on the machine's timezone. */
export const localDay = (year: number, month: number, day: number, hour = 12) =>
  new Date(year, month - 1, day, hour, 0, 0);

export const createClock = (start: Date) => {
  let current = start;
  return {
    now: () => current,
    set: (next: Date) => {
      current = next;
    },
    advanceHours: (hours: number) => {
      current = new Date(current.getTime() + hours * 60 * 60 * 1000);
    }
  };
};

export type LoggedEvent = { level: string; event: string; fields: LogFields };

export const createMemoryLogger = (events: LoggedEvent[] = []): Logger => {
  const make = (base: LogFields): Logger => ({
    debug: (event, fields) => events.push({ level: "debug", event, fields: { ...base, ...fields } }),
    info: (event, fields) => events.push({ level: "info", event, fields: { ...base, ...fields } }),
    warn: (event, fields) => events.push({ level: "warn", event, fields: { ...base, ...fields } }),
    error: (event, fields) => events.push({ level: "error", event, fields: { ...base, ...fields } }),
    child: (fields) => make({ ...base, ...fields })
  });
  return make({});
};

export const createTestContext = (
  db: ApiDatabase,
  options: { now?: () => Date; settings?: Partial<EngineSettings>; logger?: Logger } = {}
) =>
  createEngineContext({
    db,
    settings: options.settings,
    logger: options.logger,
    now: options.now ?? (() => localDay(2024, 1, 10)),
    random: () => 0
  });

const option = (choice: AnswerChoice) => ({
  text: `Option ${choice}`,
  explanation: `Why ${choice}`
});

/** Inserts `count` questions with ids `${examType}-q1..n`; the correct answer is always A. */
export const seedQuestions = (
  db: ApiDatabase,
  examType: ExamType,
  count: number,
  domain = "General"
) => {
  const ids: string[] = [];
  for (let i = 1; i <= count; i += 1) {
    const id = `${examType}-${domain.toLowerCase()}-q${i}`;
    ids.push(id);
    db.insert(questions)
      .values({
        id,
        exam_type: examType,
        domain,
        question_text: `Question ${i} about ${domain}`,
        correct_answer: "A",
        options: { A: option("A"), B: option("B"), C: option("C"), D: option("D") },
        created_at: 0
      })
      .run();
  }
  return ids;
};

export const seedUser = (db: ApiDatabase, id: string, displayName = id) => {
  db.insert(users)
    .values({ id, email: `${id}@example.com`, display_name: displayName, created_at: 0 })
    .run();
};

export const seedProfile = (
  db: ApiDatabase,
  userId: string,
  values: Partial<typeof userProfiles.$inferInsert> = {}
) => {
  db.insert(userProfiles)
    .values({ user_id: userId, created_at: 0, updated_at: 0, ...values })
    .run();
};

export const seedAchievement = (
  db: ApiDatabase,
  values: Pick<typeof achievements.$inferInsert, "id" | "criteria_type" | "criteria_value"> &
    Partial<typeof achievements.$inferInsert>
) => {
  db.insert(achievements)
    .values({
      name: values.id,
      description: `Unlock ${values.id}`,
      icon: "*",
      xp_reward: 0,
      created_at: 0,
      ...values
    })
    .run();
};

export const seedAvatar = (
  db: ApiDatabase,
  values: Pick<typeof avatars.$inferInsert, "id"> & Partial<typeof avatars.$inferInsert>
) => {
  db.insert(avatars)
    .values({
      name: values.id,
      image_url: `/avatars/${values.id}.svg`,
      created_at: 0,
      ...values
    })
    .run();
};

export const insertAttempt = (
  db: ApiDatabase,
  values: {
    userId: string;
    examType?: ExamType;
    mode?: QuizMode;
    total?: number;
    correct?: number;
    score?: number;
    xp?: number;
    createdAt?: number;
  }
) => {
  const total = values.total ?? 10;
  const correct = values.correct ?? total;
  const id = nanoid();
  db.insert(quizAttempts)
    .values({
      id,
      user_id: values.userId,
      exam_type: values.examType ?? "security",
      mode: values.mode ?? "practice",
      total_questions: total,
      correct_answers: correct,
      score_percentage: values.score ?? (100 * correct) / total,
      time_taken_seconds: null,
      xp_earned: values.xp ?? 0,
      created_at: values.createdAt ?? 0
    })
    .run();
  return id;
};

export type EnvBindings = {
  ENV?: string;
  AUTH_JWT_SECRET?: string;
  SESSION_TTL_HOURS?: string;
  STUDY_COUNTS_TOWARD_STREAK?: string;
  LEADERBOARD_DEFAULT_LIMIT?: string;
  LEADERBOARD_MIN_QUIZZES?: string;
};

export type RuntimeEnv = {
  environment: string;
  authJwtSecret: string;
  sessionTtlHours: number;
  studyCountsTowardStreak: boolean;
  leaderboardDefaultLimit: number;
  leaderboardMinQuizzes: number;
};

export type NodeRuntimeEnv = RuntimeEnv & {
  dbPath: string;
  port: number;
};

const ACCURACY_MINIMUMS = [1, 5, 10, 20];

const parsePositiveInt = (value: string | undefined, fallback: number) => {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseFlag = (value: string | undefined, fallback: boolean) => {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const normalizeMinQuizzes = (value?: string) => {
  const parsed = parsePositiveInt(value, 10);
  return ACCURACY_MINIMUMS.includes(parsed) ? parsed : 10;
};

export const resolveEnv = (bindings: EnvBindings): RuntimeEnv => ({
  environment: bindings.ENV ?? "production",
  authJwtSecret: bindings.AUTH_JWT_SECRET ?? "",
  sessionTtlHours: parsePositiveInt(bindings.SESSION_TTL_HOURS, 24),
  studyCountsTowardStreak: parseFlag(bindings.STUDY_COUNTS_TOWARD_STREAK, true),
  leaderboardDefaultLimit: Math.min(parsePositiveInt(bindings.LEADERBOARD_DEFAULT_LIMIT, 100), 500),
  leaderboardMinQuizzes: normalizeMinQuizzes(bindings.LEADERBOARD_MIN_QUIZZES)
});

export const resolveNodeEnv = (): NodeRuntimeEnv => ({
  ...resolveEnv({
    ENV: process.env.ENV,
    AUTH_JWT_SECRET: process.env.AUTH_JWT_SECRET,
    SESSION_TTL_HOURS: process.env.SESSION_TTL_HOURS,
    STUDY_COUNTS_TOWARD_STREAK: process.env.STUDY_COUNTS_TOWARD_STREAK,
    LEADERBOARD_DEFAULT_LIMIT: process.env.LEADERBOARD_DEFAULT_LIMIT,
    LEADERBOARD_MIN_QUIZZES: process.env.LEADERBOARD_MIN_QUIZZES
  }),
  dbPath: process.env.DB_PATH ?? "./infra/local.db",
  port: parsePositiveInt(process.env.PORT, 8787)
});

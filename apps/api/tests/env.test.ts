import assert from "node:assert/strict";
import { test } from "node:test";
import { resolveEnv } from "../src/env";

test("defaults apply when bindings are empty", () => {
  assert.deepEqual(resolveEnv({}), {
    environment: "production",
    authJwtSecret: "",
    sessionTtlHours: 24,
    studyCountsTowardStreak: true,
    leaderboardDefaultLimit: 100,
    leaderboardMinQuizzes: 10
  });
});

test("bindings are parsed and clamped", () => {
  const env = resolveEnv({
    ENV: "test",
    AUTH_JWT_SECRET: "test-secret",
    SESSION_TTL_HOURS: "6",
    STUDY_COUNTS_TOWARD_STREAK: "off",
    LEADERBOARD_DEFAULT_LIMIT: "900",
    LEADERBOARD_MIN_QUIZZES: "5"
  });
  assert.equal(env.environment, "test");
  assert.equal(env.authJwtSecret, "test-secret");
  assert.equal(env.sessionTtlHours, 6);
  assert.equal(env.studyCountsTowardStreak, false);
  assert.equal(env.leaderboardDefaultLimit, 500);
  assert.equal(env.leaderboardMinQuizzes, 5);
});

test("invalid numbers fall back to defaults", () => {
  const env = resolveEnv({
    SESSION_TTL_HOURS: "-3",
    LEADERBOARD_DEFAULT_LIMIT: "many",
    LEADERBOARD_MIN_QUIZZES: "7",
    STUDY_COUNTS_TOWARD_STREAK: " "
  });
  assert.equal(env.sessionTtlHours, 24);
  assert.equal(env.leaderboardDefaultLimit, 100);
  assert.equal(env.leaderboardMinQuizzes, 10);
  assert.equal(env.studyCountsTowardStreak, true);
});

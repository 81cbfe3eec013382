import assert from "node:assert/strict";
import { test } from "node:test";
import { SubmissionValidationError } from "../src/services/errors";
import {
  accuracyMultiplier,
  advanceStreak,
  applyProgression,
  calculateLevel,
  calculateScorePercentage,
  calculateXpEarned,
  describeLevelProgress,
  previousDateKey,
  toDateKey,
  xpForLevel
} from "../src/services/progression";

test("xp rewards correct answers with accuracy tiers", () => {
  assert.equal(calculateXpEarned({ correctAnswers: 10, totalQuestions: 10, mode: "practice" }), 150);
  assert.equal(calculateXpEarned({ correctAnswers: 9, totalQuestions: 10, mode: "practice" }), 135);
  assert.equal(calculateXpEarned({ correctAnswers: 8, totalQuestions: 10, mode: "practice" }), 100);
  assert.equal(calculateXpEarned({ correctAnswers: 7, totalQuestions: 10, mode: "practice" }), 77);
  assert.equal(calculateXpEarned({ correctAnswers: 6, totalQuestions: 10, mode: "practice" }), 60);
  assert.equal(calculateXpEarned({ correctAnswers: 0, totalQuestions: 10, mode: "practice" }), 0);
});

test("study mode earns no xp", () => {
  assert.equal(calculateXpEarned({ correctAnswers: 10, totalQuestions: 10, mode: "study" }), 0);
});

test("accuracy tiers compare exact fractions", () => {
  assert.equal(accuracyMultiplier(7, 10), 1.1);
  assert.equal(accuracyMultiplier(2, 3), 1);
  assert.equal(accuracyMultiplier(4, 5), 1.25);
  assert.equal(accuracyMultiplier(9, 10), 1.5);
});

test("score percentage is stored unrounded and rejects empty attempts", () => {
  assert.equal(calculateScorePercentage(1, 3), 100 / 3);
  assert.equal(calculateScorePercentage(10, 10), 100);
  assert.throws(() => calculateScorePercentage(0, 0), SubmissionValidationError);
  assert.throws(() => calculateScorePercentage(4, 3), SubmissionValidationError);
});

test("level follows the square-root curve", () => {
  assert.equal(calculateLevel(0), 1);
  assert.equal(calculateLevel(99), 1);
  assert.equal(calculateLevel(100), 2);
  assert.equal(calculateLevel(399), 2);
  assert.equal(calculateLevel(400), 3);
  assert.equal(calculateLevel(-50), 1);
  assert.equal(xpForLevel(1), 0);
  assert.equal(xpForLevel(2), 100);
  assert.equal(xpForLevel(3), 400);
});

test("level progress reports floor, next threshold and percent", () => {
  assert.deepEqual(describeLevelProgress(150), {
    level: 2,
    current_level_xp: 100,
    next_level_xp: 400,
    progress_percentage: 16.67
  });
  assert.deepEqual(describeLevelProgress(0), {
    level: 1,
    current_level_xp: 0,
    next_level_xp: 100,
    progress_percentage: 0
  });
});

test("date keys use the local calendar", () => {
  assert.equal(toDateKey(new Date(2024, 0, 5, 23, 30)), "2024-01-05");
  assert.equal(previousDateKey("2024-03-01"), "2024-02-29");
  assert.equal(previousDateKey("2024-01-01"), "2023-12-31");
});

test("streak starts, holds, extends and resets", () => {
  const first = advanceStreak({ streak_current: 0, streak_longest: 0, last_activity_date: null }, "2024-01-10");
  assert.deepEqual(first, { streak_current: 1, streak_longest: 1, last_activity_date: "2024-01-10" });

  const sameDay = advanceStreak(first, "2024-01-10");
  assert.deepEqual(sameDay, first);

  const nextDay = advanceStreak(first, "2024-01-11");
  assert.deepEqual(nextDay, { streak_current: 2, streak_longest: 2, last_activity_date: "2024-01-11" });

  const afterGap = advanceStreak(nextDay, "2024-01-13");
  assert.deepEqual(afterGap, { streak_current: 1, streak_longest: 2, last_activity_date: "2024-01-13" });
});

test("progression without streak credit still counts the attempt", () => {
  const next = applyProgression(
    {
      xp: 90,
      level: 1,
      streak_current: 2,
      streak_longest: 4,
      last_activity_date: "2024-01-09",
      total_exams_taken: 3,
      total_questions_answered: 30
    },
    { xpEarned: 15, totalQuestions: 5, countsTowardStreak: false, today: "2024-01-10" }
  );
  assert.deepEqual(next, {
    xp: 105,
    level: 2,
    streak_current: 2,
    streak_longest: 4,
    last_activity_date: "2024-01-09",
    total_exams_taken: 4,
    total_questions_answered: 35
  });
});

import assert from "node:assert/strict";
import { test } from "node:test";
import { AttemptNotFoundError } from "../src/services/errors";
import { getAttemptDetails, getQuizHistory, getQuizStats } from "../src/services/quizHistoryService";
import { submitFullAttempt } from "../src/services/submissionService";
import { createTestContext, insertAttempt, seedQuestions, setupDb } from "./testDb";

test("history is newest first with paging and an exam filter", async () => {
  const { db } = setupDb();
  const ctx = createTestContext(db);
  const oldest = insertAttempt(db, { userId: "user-1", createdAt: 100 });
  const middle = insertAttempt(db, { userId: "user-1", createdAt: 200, examType: "network" });
  const newest = insertAttempt(db, { userId: "user-1", createdAt: 300 });
  insertAttempt(db, { userId: "user-2", createdAt: 400 });

  const firstPage = await getQuizHistory(ctx, "user-1", { limit: 2, offset: 0 });
  assert.equal(firstPage.total_attempts, 3);
  assert.deepEqual(firstPage.attempts.map((attempt) => attempt.id), [newest, middle]);

  const secondPage = await getQuizHistory(ctx, "user-1", { limit: 2, offset: 2 });
  assert.deepEqual(secondPage.attempts.map((attempt) => attempt.id), [oldest]);

  const network = await getQuizHistory(ctx, "user-1", { limit: 10, offset: 0, examType: "network" });
  assert.equal(network.total_attempts, 1);
  assert.deepEqual(network.attempts.map((attempt) => attempt.id), [middle]);
});

test("stats round averages to two decimals and break down by exam", async () => {
  const { db } = setupDb();
  const ctx = createTestContext(db);
  insertAttempt(db, { userId: "user-1", total: 10, correct: 10, xp: 150 });
  insertAttempt(db, { userId: "user-1", total: 3, correct: 1, xp: 10 });
  insertAttempt(db, { userId: "user-1", examType: "network", total: 4, correct: 2, xp: 20 });

  const stats = await getQuizStats(ctx, "user-1");
  assert.equal(stats.total_attempts, 3);
  assert.equal(stats.total_questions_answered, 17);
  // (100 + 33.33... + 50) / 3
  assert.equal(stats.average_score, 61.11);
  assert.equal(stats.best_score, 100);
  assert.equal(stats.total_xp_earned, 180);
  assert.deepEqual(stats.stats_by_exam, {
    network: { attempts: 1, questions_answered: 4, average_score: 50, best_score: 50, xp_earned: 20 },
    security: { attempts: 2, questions_answered: 13, average_score: 66.67, best_score: 100, xp_earned: 160 }
  });
});

test("stats for a new user are zero", async () => {
  const { db } = setupDb();
  assert.deepEqual(await getQuizStats(createTestContext(db), "nobody"), {
    total_attempts: 0,
    total_questions_answered: 0,
    average_score: 0,
    best_score: 0,
    total_xp_earned: 0,
    stats_by_exam: {}
  });
});

test("attempt details list answers in submission order and stay private", async () => {
  const { db } = setupDb();
  const ids = seedQuestions(db, "security", 3);
  const ctx = createTestContext(db);
  const result = await submitFullAttempt(ctx, {
    userId: "user-1",
    examType: "security",
    totalQuestions: 3,
    answers: [
      { question_id: ids[2], user_answer: "A", time_spent_seconds: 12 },
      { question_id: ids[0], user_answer: "D" },
      { question_id: ids[1], user_answer: "A" }
    ]
  });

  const details = await getAttemptDetails(ctx, "user-1", result.attempt.id);
  assert.equal(details.correct_answers, 2);
  assert.deepEqual(details.answers, [
    { question_id: ids[2], user_answer: "A", correct_answer: "A", is_correct: true, time_spent_seconds: 12 },
    { question_id: ids[0], user_answer: "D", correct_answer: "A", is_correct: false, time_spent_seconds: null },
    { question_id: ids[1], user_answer: "A", correct_answer: "A", is_correct: true, time_spent_seconds: null }
  ]);

  await assert.rejects(getAttemptDetails(ctx, "user-2", result.attempt.id), AttemptNotFoundError);
  await assert.rejects(getAttemptDetails(ctx, "user-1", "missing"), AttemptNotFoundError);
});

import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { test, type TestContext } from "node:test";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { eq } from "drizzle-orm";
import { applySchema } from "../src/db/init";
import { studySessions, userAchievements, userProfiles } from "../src/db/schema";
import { openSqlite } from "../src/db/sqlite";
import { evaluateAchievements } from "../src/services/achievementService";
import { createQuestionStore, type QuestionStore } from "../src/services/questionStore";
import { ActiveSessionConflictError } from "../src/services/errors";
import { getActiveSession, startSession } from "../src/services/sessionService";
import { submitFullAttempt, type AnswerInput } from "../src/services/submissionService";
import {
  createMemoryLogger,
  createTestContext,
  insertAttempt,
  localDay,
  seedAchievement,
  seedQuestions,
  type LoggedEvent
} from "./testDb";

/** Two connections on one database file, as two server processes would hold. */
const openPair = (t: TestContext) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quizrank-"));
  const file = path.join(dir, "engine.db");
  const first = openSqlite(file);
  applySchema(first);
  const second = openSqlite(file);
  t.after(() => {
    first.close();
    second.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return { sqliteA: first, sqliteB: second, dbA: drizzle(first), dbB: drizzle(second) };
};

const now = () => localDay(2024, 1, 10);

test("a start on one connection blocks a start on the other", async (t) => {
  const { dbA, dbB } = openPair(t);
  seedQuestions(dbA, "security", 4);
  const ctxA = createTestContext(dbA, { now });
  const ctxB = createTestContext(dbB, { now });

  const first = await startSession(ctxA, { userId: "user-1", examType: "security", mode: "study", count: 2 });
  await assert.rejects(
    startSession(ctxB, { userId: "user-1", examType: "security", mode: "study", count: 2 }),
    (error: unknown) => error instanceof ActiveSessionConflictError && error.activeSessionId === first.session_id
  );

  const other = await startSession(ctxB, { userId: "user-2", examType: "security", mode: "study", count: 2 });
  assert.equal(other.status, "created");
  assert.equal(dbB.select().from(studySessions).where(eq(studySessions.user_id, "user-1")).all().length, 1);
});

test("a session written between the check and the insert surfaces as a conflict", async (t) => {
  const { dbA } = openPair(t);
  seedQuestions(dbA, "security", 4);
  const base = createQuestionStore(dbA);
  const racingStore: QuestionStore = {
    listQuestionIds: (examType, domain) => {
      dbA.insert(studySessions)
        .values({
          id: "racing-session",
          user_id: "user-1",
          exam_type: "security",
          mode: "practice",
          domain: null,
          question_ids: ["security-general-q1"],
          responses: [],
          current_index: 0,
          status: "in_progress",
          started_at: now().getTime(),
          updated_at: now().getTime(),
          completed_at: null,
          attempt_id: null
        })
        .run();
      return base.listQuestionIds(examType, domain);
    },
    getQuestions: base.getQuestions
  };
  const ctx = { ...createTestContext(dbA, { now }), questionStore: racingStore };

  await assert.rejects(
    startSession(ctx, { userId: "user-1", examType: "security", mode: "study", count: 2 }),
    (error: unknown) => error instanceof ActiveSessionConflictError && error.activeSessionId === "racing-session"
  );
  assert.equal(await getActiveSession(createTestContext(dbA, { now }), "user-1"), null);
});

test("evaluators on two connections award an achievement once", async (t) => {
  const { dbA, dbB } = openPair(t);
  seedAchievement(dbA, { id: "first-quiz", criteria_type: "quiz_count", criteria_value: 1, xp_reward: 10 });
  insertAttempt(dbA, { userId: "user-1" });

  const first = await evaluateAchievements(createTestContext(dbA, { now }), "user-1");
  const second = await evaluateAchievements(createTestContext(dbB, { now }), "user-1");

  assert.deepEqual(first.unlocked.map((achievement) => achievement.id), ["first-quiz"]);
  assert.deepEqual(second.unlocked, []);
  assert.equal(second.profile.xp, 10);
  assert.equal(dbB.select().from(userAchievements).all().length, 1);
});

test("an award already written by another writer is skipped and logged", async (t) => {
  const { dbA, sqliteB } = openPair(t);
  seedAchievement(dbA, { id: "first-quiz", criteria_type: "quiz_count", criteria_value: 1, xp_reward: 10 });
  insertAttempt(dbA, { userId: "user-1" });
  // Lands the same row just ahead of the evaluator's own insert.
  sqliteB.exec(`
    CREATE TRIGGER award_race BEFORE INSERT ON user_achievements
    WHEN NEW.achievement_id = 'first-quiz'
    BEGIN
      INSERT INTO user_achievements (user_id, achievement_id, earned_at)
      VALUES (NEW.user_id, NEW.achievement_id, NEW.earned_at);
    END;
  `);
  const events: LoggedEvent[] = [];

  const result = await evaluateAchievements(
    createTestContext(dbA, { now, logger: createMemoryLogger(events) }),
    "user-1"
  );

  assert.deepEqual(result.unlocked, []);
  assert.equal(result.profile.xp, 0);
  assert.equal(dbA.select().from(userAchievements).all().length, 1);
  assert.deepEqual(
    events.map((event) => [event.event, event.fields.achievementId]),
    [["achievement.award_conflict", "first-quiz"]]
  );
});

test("submissions from two connections both reach the profile", async (t) => {
  const { dbA, dbB } = openPair(t);
  const ids = seedQuestions(dbA, "security", 10);
  const answers = (correct: number): AnswerInput[] =>
    ids.map((id, index) => ({ question_id: id, user_answer: index < correct ? "A" : "B" }));

  const first = await submitFullAttempt(createTestContext(dbA, { now }), {
    userId: "user-1",
    examType: "security",
    totalQuestions: 10,
    answers: answers(10)
  });
  const second = await submitFullAttempt(createTestContext(dbB, { now }), {
    userId: "user-1",
    examType: "security",
    totalQuestions: 10,
    answers: answers(5)
  });

  assert.equal(second.total_xp, first.xp_earned + second.xp_earned);
  const profile = dbA.select().from(userProfiles).where(eq(userProfiles.user_id, "user-1")).get();
  assert.equal(profile?.xp, first.xp_earned + second.xp_earned);
  assert.equal(profile?.total_exams_taken, 2);
  assert.equal(profile?.total_questions_answered, 20);
  assert.equal(profile?.streak_current, 1);
});

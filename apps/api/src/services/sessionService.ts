import { and, eq, inArray, lt } from "drizzle-orm";
import { nanoid } from "nanoid";
import type {
  AnswerChoice,
  AnswerFeedback,
  ExamType,
  Question,
  QuizMode,
  SessionStatus,
  SessionView
} from "@quizrank/shared";
import { studySessions, type SessionResponse } from "../db/schema";
import { hasDbChanges, runImmediate } from "../db/sqlite";
import type { DbExecutor } from "../db/types";
import { createSeededRandom, sampleWithoutReplacement } from "../utils/random";
import type { EngineContext } from "./context";
import {
  ActiveSessionConflictError,
  InvalidAnswerReferenceError,
  QuestionsUnavailableError,
  SessionNotFoundError,
  SubmissionValidationError,
  isUniqueConstraintError
} from "./errors";
import { completeRecordedAttempt, gradeWithStore, recordAttempt, type RecordedAttempt } from "./submissionService";
import { toQuestionView } from "./questionStore";

export type SessionRow = typeof studySessions.$inferSelect;

const ACTIVE_STATUSES: SessionStatus[] = ["created", "in_progress"];

const SESSION_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  created: ["in_progress", "completed", "abandoned"],
  in_progress: ["in_progress", "completed", "abandoned"],
  completed: [],
  abandoned: []
};

export const canTransition = (from: SessionStatus, to: SessionStatus) =>
  SESSION_TRANSITIONS[from].includes(to);

const HOUR_MS = 60 * 60 * 1000;

const isStale = (ctx: EngineContext, session: SessionRow, now: Date) =>
  now.getTime() - session.updated_at > ctx.settings.sessionTtlHours * HOUR_MS;

const expireSession = (ctx: EngineContext, tx: DbExecutor, session: SessionRow, now: Date) => {
  const result = tx
    .update(studySessions)
    .set({ status: "abandoned", updated_at: now.getTime() })
    .where(and(eq(studySessions.id, session.id), inArray(studySessions.status, ACTIVE_STATUSES)))
    .run();
  if (hasDbChanges(result)) {
    ctx.logger.info("session.expired", { sessionId: session.id, userId: session.user_id });
  }
};

const findActiveSession = (tx: DbExecutor, userId: string) =>
  tx
    .select()
    .from(studySessions)
    .where(and(eq(studySessions.user_id, userId), inArray(studySessions.status, ACTIVE_STATUSES)))
    .get();

const loadQuestion = (ctx: EngineContext, questionId: string): Question | null =>
  ctx.questionStore.getQuestions([questionId])[0] ?? null;

const toSessionView = (ctx: EngineContext, session: SessionRow): SessionView => {
  const currentId = session.question_ids[session.current_index];
  const current = currentId ? loadQuestion(ctx, currentId) : null;
  return {
    session_id: session.id,
    exam_type: session.exam_type,
    mode: session.mode,
    domain: session.domain,
    status: session.status,
    total_questions: session.question_ids.length,
    current_index: session.current_index,
    started_at: session.started_at,
    current_question: current ? toQuestionView(current) : null
  };
};

export const startSession = async (
  ctx: EngineContext,
  params: {
    userId: string;
    examType: ExamType;
    mode: QuizMode;
    count: number;
    domain?: string | null;
    seed?: string | null;
  }
): Promise<SessionView> => {
  if (!Number.isInteger(params.count) || params.count < 1) {
    throw new SubmissionValidationError("count must be a positive integer.", { count: params.count });
  }
  const now = ctx.now();
  const domain = params.domain ?? null;
  const random = params.seed ? createSeededRandom(params.seed) : ctx.random;

  const session = runImmediate(ctx.db, (tx) => {
    const active = findActiveSession(tx, params.userId);
    if (active) {
      if (!isStale(ctx, active, now)) {
        throw new ActiveSessionConflictError(active.id);
      }
      expireSession(ctx, tx, active, now);
    }

    const pool = ctx.questionStore.listQuestionIds(params.examType, domain);
    if (!pool.length) {
      throw new QuestionsUnavailableError(params.examType, domain);
    }
    const questionIds = sampleWithoutReplacement(pool, params.count, random);
    if (questionIds.length < params.count) {
      ctx.logger.warn("session.shortened", {
        userId: params.userId,
        examType: params.examType,
        domain,
        requested: params.count,
        available: questionIds.length
      });
    }

    const row: SessionRow = {
      id: nanoid(),
      user_id: params.userId,
      exam_type: params.examType,
      mode: params.mode,
      domain,
      question_ids: questionIds,
      responses: [],
      current_index: 0,
      status: "created",
      started_at: now.getTime(),
      updated_at: now.getTime(),
      completed_at: null,
      attempt_id: null
    };
    try {
      tx.insert(studySessions).values(row).run();
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new ActiveSessionConflictError(findActiveSession(tx, params.userId)?.id ?? "unknown");
      }
      throw error;
    }
    return row;
  });

  ctx.logger.info("session.started", {
    userId: params.userId,
    sessionId: session.id,
    examType: session.exam_type,
    mode: session.mode,
    totalQuestions: session.question_ids.length
  });
  return toSessionView(ctx, session);
};

export const getActiveSession = async (ctx: EngineContext, userId: string): Promise<SessionView | null> => {
  const now = ctx.now();
  const active = findActiveSession(ctx.db, userId);
  if (!active) return null;
  if (isStale(ctx, active, now)) {
    runImmediate(ctx.db, (tx) => expireSession(ctx, tx, active, now));
    return null;
  }
  return toSessionView(ctx, active);
};

/**
 * Turns a session whose last answer has just been stored into an attempt.
 * Runs in the caller's transaction so the session and the attempt commit together.
 */
export const finalizeSession = (
  ctx: EngineContext,
  tx: DbExecutor,
  session: SessionRow,
  now: Date
): RecordedAttempt => {
  if (!canTransition(session.status, "completed")) {
    throw new SessionNotFoundError(session.id, session.status === "abandoned" ? "abandoned" : "completed");
  }
  const graded = gradeWithStore(
    ctx,
    session.exam_type,
    session.responses.map((response) => ({
      question_id: response.question_id,
      user_answer: response.user_answer
    }))
  );
  const recorded = recordAttempt(ctx, tx, {
    userId: session.user_id,
    examType: session.exam_type,
    mode: session.mode,
    graded,
    timeTakenSeconds: Math.max(0, Math.round((now.getTime() - session.started_at) / 1000)),
    now
  });
  tx.update(studySessions)
    .set({
      responses: session.responses,
      current_index: session.question_ids.length,
      status: "completed",
      updated_at: now.getTime(),
      completed_at: now.getTime(),
      attempt_id: recorded.attempt.id
    })
    .where(eq(studySessions.id, session.id))
    .run();
  return recorded;
};

type AnswerOutcome =
  | { kind: "expired" }
  | {
      kind: "answered";
      question: Question;
      userAnswer: AnswerChoice;
      isCorrect: boolean;
      currentIndex: number;
      totalQuestions: number;
      nextQuestion: Question | null;
      recorded: RecordedAttempt | null;
    };

export const submitAnswer = async (
  ctx: EngineContext,
  params: {
    userId: string;
    sessionId: string;
    questionId: string;
    userAnswer: AnswerChoice;
  }
): Promise<AnswerFeedback> => {
  const now = ctx.now();

  const outcome = runImmediate<AnswerOutcome>(ctx.db, (tx) => {
    const session = tx
      .select()
      .from(studySessions)
      .where(and(eq(studySessions.id, params.sessionId), eq(studySessions.user_id, params.userId)))
      .get();
    if (!session) {
      throw new SessionNotFoundError(params.sessionId, "missing");
    }
    if (session.status === "completed" || session.status === "abandoned") {
      throw new SessionNotFoundError(params.sessionId, session.status);
    }
    if (isStale(ctx, session, now)) {
      expireSession(ctx, tx, session, now);
      return { kind: "expired" };
    }

    const expectedId = session.question_ids[session.current_index];
    if (expectedId === undefined) {
      throw new SessionNotFoundError(params.sessionId, "completed");
    }
    if (params.questionId !== expectedId) {
      throw new InvalidAnswerReferenceError({
        sessionId: params.sessionId,
        expectedQuestionId: expectedId,
        receivedQuestionId: params.questionId
      });
    }
    const question = loadQuestion(ctx, expectedId);
    if (!question) {
      throw new SubmissionValidationError(`Question ${expectedId} is no longer available.`, {
        sessionId: params.sessionId,
        questionId: expectedId
      });
    }

    const isCorrect = params.userAnswer === question.correct_answer;
    const response: SessionResponse = {
      question_id: question.id,
      user_answer: params.userAnswer,
      is_correct: isCorrect
    };
    const responses = [...session.responses, response];
    const nextIndex = session.current_index + 1;
    const totalQuestions = session.question_ids.length;

    if (nextIndex >= totalQuestions) {
      const recorded = finalizeSession(ctx, tx, { ...session, responses }, now);
      return {
        kind: "answered",
        question,
        userAnswer: params.userAnswer,
        isCorrect,
        currentIndex: totalQuestions,
        totalQuestions,
        nextQuestion: null,
        recorded
      };
    }

    if (!canTransition(session.status, "in_progress")) {
      throw new SessionNotFoundError(params.sessionId, "completed");
    }
    tx.update(studySessions)
      .set({
        responses,
        current_index: nextIndex,
        status: "in_progress",
        updated_at: now.getTime()
      })
      .where(
        and(eq(studySessions.id, session.id), eq(studySessions.current_index, session.current_index))
      )
      .run();
    const nextId = session.question_ids[nextIndex];
    return {
      kind: "answered",
      question,
      userAnswer: params.userAnswer,
      isCorrect,
      currentIndex: nextIndex,
      totalQuestions,
      nextQuestion: nextId ? loadQuestion(ctx, nextId) : null,
      recorded: null
    };
  });

  if (outcome.kind === "expired") {
    throw new SessionNotFoundError(params.sessionId, "expired");
  }

  const completion = outcome.recorded
    ? await completeRecordedAttempt(ctx, params.userId, outcome.recorded)
    : null;

  return {
    is_correct: outcome.isCorrect,
    user_answer: outcome.userAnswer,
    correct_answer: outcome.question.correct_answer,
    user_answer_explanation: outcome.question.options[outcome.userAnswer].explanation,
    correct_answer_explanation: outcome.question.options[outcome.question.correct_answer].explanation,
    current_index: outcome.currentIndex,
    total_questions: outcome.totalQuestions,
    questions_remaining: outcome.totalQuestions - outcome.currentIndex,
    session_completed: outcome.recorded !== null,
    next_question: outcome.nextQuestion ? toQuestionView(outcome.nextQuestion) : null,
    completion
  };
};

/** Idempotent: a missing or already finished session is left as it is. */
export const abandonSession = async (
  ctx: EngineContext,
  params: { userId: string; sessionId: string }
) => {
  const now = ctx.now();
  const result = ctx.db
    .update(studySessions)
    .set({ status: "abandoned", updated_at: now.getTime() })
    .where(
      and(
        eq(studySessions.id, params.sessionId),
        eq(studySessions.user_id, params.userId),
        inArray(studySessions.status, ACTIVE_STATUSES)
      )
    )
    .run();
  const abandoned = hasDbChanges(result);
  if (abandoned) {
    ctx.logger.info("session.abandoned", { userId: params.userId, sessionId: params.sessionId });
  }
  return abandoned;
};

export const expireStaleSessions = async (ctx: EngineContext) => {
  const now = ctx.now();
  const cutoff = now.getTime() - ctx.settings.sessionTtlHours * HOUR_MS;
  const result = ctx.db
    .update(studySessions)
    .set({ status: "abandoned", updated_at: now.getTime() })
    .where(and(inArray(studySessions.status, ACTIVE_STATUSES), lt(studySessions.updated_at, cutoff)))
    .run();
  const expired = Number(result.changes);
  if (expired > 0) {
    ctx.logger.info("session.expired", { count: expired });
  }
  return expired;
};

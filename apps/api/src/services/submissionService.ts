import { and, eq } from "drizzle-orm";
import { nanoid } from "nanoid";
import type {
  AchievementUnlocked,
  AnswerChoice,
  AttemptSummary,
  AvatarSummary,
  ExamType,
  Question,
  QuizMode,
  SubmissionResult
} from "@quizrank/shared";
import { attemptAnswers, quizAttempts, submissionKeys } from "../db/schema";
import { runImmediate } from "../db/sqlite";
import type { DbExecutor } from "../db/types";
import { evaluateAchievements } from "./achievementService";
import type { EngineContext } from "./context";
import { SubmissionValidationError } from "./errors";
import { loadProfile, recordProgression, type ProfileRow, type ProgressionChange } from "./profileService";
import { calculateScorePercentage, calculateXpEarned } from "./progression";
import { indexQuestions } from "./questionStore";

export type AnswerInput = {
  question_id: string;
  user_answer: AnswerChoice;
  time_spent_seconds?: number | null;
};

export type GradedAnswer = {
  question_id: string;
  user_answer: AnswerChoice;
  correct_answer: AnswerChoice;
  is_correct: boolean;
  time_spent_seconds: number | null;
};

export type AttemptRow = typeof quizAttempts.$inferSelect;

export type RecordedAttempt = {
  attempt: AttemptRow;
  progression: ProgressionChange;
};

export const toAttemptSummary = (row: AttemptRow): AttemptSummary => ({
  id: row.id,
  exam_type: row.exam_type,
  mode: row.mode,
  total_questions: row.total_questions,
  correct_answers: row.correct_answers,
  score_percentage: row.score_percentage,
  time_taken_seconds: row.time_taken_seconds,
  xp_earned: row.xp_earned,
  created_at: row.created_at
});

/**
 * Checks that every answer points at a distinct question of `examType` and grades it
 * against the stored answer key. Client-side correctness is never trusted.
 */
export const gradeAnswers = (
  examType: ExamType,
  answers: readonly AnswerInput[],
  questionsById: Map<string, Question>
): GradedAnswer[] => {
  if (!answers.length) {
    throw new SubmissionValidationError("No answers provided.");
  }
  const seen = new Set<string>();
  return answers.map((answer) => {
    if (seen.has(answer.question_id)) {
      throw new SubmissionValidationError("Each question may only be answered once.", {
        questionId: answer.question_id
      });
    }
    seen.add(answer.question_id);
    const question = questionsById.get(answer.question_id);
    if (!question || question.exam_type !== examType) {
      throw new SubmissionValidationError(`Question ${answer.question_id} is not part of ${examType}.`, {
        questionId: answer.question_id,
        examType
      });
    }
    return {
      question_id: answer.question_id,
      user_answer: answer.user_answer,
      correct_answer: question.correct_answer,
      is_correct: answer.user_answer === question.correct_answer,
      time_spent_seconds: answer.time_spent_seconds ?? null
    };
  });
};

export const gradeWithStore = (ctx: EngineContext, examType: ExamType, answers: readonly AnswerInput[]) =>
  gradeAnswers(
    examType,
    answers,
    indexQuestions(ctx.questionStore.getQuestions(answers.map((answer) => answer.question_id)))
  );

/**
 * Inserts one attempt with its answers and applies the progression update.
 * Shared by full submissions and finalized sessions; the caller owns the transaction.
 */
export const recordAttempt = (
  ctx: EngineContext,
  tx: DbExecutor,
  params: {
    userId: string;
    examType: ExamType;
    mode: QuizMode;
    graded: GradedAnswer[];
    timeTakenSeconds: number | null;
    now: Date;
  }
): RecordedAttempt => {
  const totalQuestions = params.graded.length;
  const correctAnswers = params.graded.filter((answer) => answer.is_correct).length;
  const scorePercentage = calculateScorePercentage(correctAnswers, totalQuestions);
  const xpEarned = calculateXpEarned({ correctAnswers, totalQuestions, mode: params.mode });
  const createdAt = params.now.getTime();

  const attempt: AttemptRow = {
    id: nanoid(),
    user_id: params.userId,
    exam_type: params.examType,
    mode: params.mode,
    total_questions: totalQuestions,
    correct_answers: correctAnswers,
    score_percentage: scorePercentage,
    time_taken_seconds: params.timeTakenSeconds,
    xp_earned: xpEarned,
    created_at: createdAt
  };
  tx.insert(quizAttempts).values(attempt).run();
  tx.insert(attemptAnswers)
    .values(
      params.graded.map((answer, position) => ({
        id: nanoid(),
        attempt_id: attempt.id,
        user_id: params.userId,
        question_id: answer.question_id,
        position,
        user_answer: answer.user_answer,
        correct_answer: answer.correct_answer,
        is_correct: answer.is_correct,
        time_spent_seconds: answer.time_spent_seconds,
        answered_at: createdAt
      }))
    )
    .run();

  const progression = recordProgression(tx, {
    userId: params.userId,
    xpEarned,
    totalQuestions,
    countsTowardStreak: params.mode === "practice" || ctx.settings.studyCountsTowardStreak,
    now: params.now
  });

  ctx.logger.info("attempt.recorded", {
    userId: params.userId,
    attemptId: attempt.id,
    examType: params.examType,
    mode: params.mode,
    correctAnswers,
    totalQuestions,
    xpEarned
  });
  return { attempt, progression };
};

export const buildSubmissionResult = (params: {
  attempt: AttemptRow;
  previousLevel: number;
  profile: ProfileRow;
  achievementsUnlocked: AchievementUnlocked[];
  avatarsUnlocked: AvatarSummary[];
  replayed: boolean;
}): SubmissionResult => ({
  attempt: toAttemptSummary(params.attempt),
  xp_earned: params.attempt.xp_earned,
  total_xp: params.profile.xp,
  previous_level: params.previousLevel,
  current_level: params.profile.level,
  level_up: params.profile.level > params.previousLevel,
  streak_current: params.profile.streak_current,
  streak_longest: params.profile.streak_longest,
  achievements_unlocked: params.achievementsUnlocked,
  avatars_unlocked: params.avatarsUnlocked,
  replayed: params.replayed
});

/** Evaluates achievements once the attempt has committed and assembles the caller's result. */
export const completeRecordedAttempt = async (
  ctx: EngineContext,
  userId: string,
  recorded: RecordedAttempt
): Promise<SubmissionResult> => {
  const evaluation = await evaluateAchievements(ctx, userId);
  return buildSubmissionResult({
    attempt: recorded.attempt,
    previousLevel: recorded.progression.before.level,
    profile: evaluation.profile,
    achievementsUnlocked: evaluation.unlocked,
    avatarsUnlocked: evaluation.avatars,
    replayed: false
  });
};

type SubmissionOutcome =
  | { kind: "recorded"; recorded: RecordedAttempt }
  | { kind: "replayed"; attempt: AttemptRow; profile: ProfileRow };

const findReplay = (tx: DbExecutor, userId: string, idempotencyKey: string, now: Date) => {
  const key = tx
    .select()
    .from(submissionKeys)
    .where(and(eq(submissionKeys.user_id, userId), eq(submissionKeys.idempotency_key, idempotencyKey)))
    .get();
  if (!key) return null;
  const attempt = tx.select().from(quizAttempts).where(eq(quizAttempts.id, key.attempt_id)).get();
  if (!attempt) return null;
  return { attempt, profile: loadProfile(tx, userId, now) };
};

export const submitFullAttempt = async (
  ctx: EngineContext,
  params: {
    userId: string;
    examType: ExamType;
    totalQuestions: number;
    answers: AnswerInput[];
    timeTakenSeconds?: number | null;
    idempotencyKey?: string | null;
  }
): Promise<SubmissionResult> => {
  if (!params.answers.length) {
    throw new SubmissionValidationError("No answers provided.");
  }
  if (params.totalQuestions !== params.answers.length) {
    throw new SubmissionValidationError("Number of answers must match total_questions.", {
      totalQuestions: params.totalQuestions,
      answers: params.answers.length
    });
  }
  const now = ctx.now();
  const idempotencyKey = params.idempotencyKey ?? null;

  const outcome = runImmediate<SubmissionOutcome>(ctx.db, (tx) => {
    if (idempotencyKey) {
      const replay = findReplay(tx, params.userId, idempotencyKey, now);
      if (replay) {
        return { kind: "replayed", ...replay };
      }
    }
    const graded = gradeWithStore(ctx, params.examType, params.answers);
    const recorded = recordAttempt(ctx, tx, {
      userId: params.userId,
      examType: params.examType,
      mode: "practice",
      graded,
      timeTakenSeconds: params.timeTakenSeconds ?? null,
      now
    });
    if (idempotencyKey) {
      tx.insert(submissionKeys)
        .values({
          user_id: params.userId,
          idempotency_key: idempotencyKey,
          attempt_id: recorded.attempt.id,
          created_at: now.getTime()
        })
        .run();
    }
    return { kind: "recorded", recorded };
  });

  if (outcome.kind === "replayed") {
    ctx.logger.info("attempt.replayed", {
      userId: params.userId,
      attemptId: outcome.attempt.id
    });
    return buildSubmissionResult({
      attempt: outcome.attempt,
      previousLevel: outcome.profile.level,
      profile: outcome.profile,
      achievementsUnlocked: [],
      avatarsUnlocked: [],
      replayed: true
    });
  }

  return completeRecordedAttempt(ctx, params.userId, outcome.recorded);
};

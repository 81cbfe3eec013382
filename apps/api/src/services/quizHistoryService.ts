import { and, asc, desc, eq, sql } from "drizzle-orm";
import type {
  AttemptDetails,
  ExamStats,
  ExamType,
  QuizHistoryResponse,
  QuizStats
} from "@quizrank/shared";
import { attemptAnswers, quizAttempts } from "../db/schema";
import type { EngineContext } from "./context";
import { AttemptNotFoundError } from "./errors";
import { toAttemptSummary } from "./submissionService";

const round2 = (value: number) => Math.round(value * 100) / 100;

export const getQuizHistory = async (
  ctx: EngineContext,
  userId: string,
  query: { limit: number; offset: number; examType?: ExamType | null }
): Promise<QuizHistoryResponse> => {
  const filters = [eq(quizAttempts.user_id, userId)];
  if (query.examType) {
    filters.push(eq(quizAttempts.exam_type, query.examType));
  }
  const rows = ctx.db
    .select()
    .from(quizAttempts)
    .where(and(...filters))
    .orderBy(desc(quizAttempts.created_at), desc(quizAttempts.id))
    .limit(query.limit)
    .offset(query.offset)
    .all();
  const count = ctx.db
    .select({ total: sql<number>`count(*)` })
    .from(quizAttempts)
    .where(and(...filters))
    .get();
  return {
    total_attempts: Number(count?.total ?? 0),
    attempts: rows.map(toAttemptSummary)
  };
};

export const getQuizStats = async (ctx: EngineContext, userId: string): Promise<QuizStats> => {
  const rows = ctx.db
    .select({
      exam_type: quizAttempts.exam_type,
      attempts: sql<number>`count(*)`,
      questions_answered: sql<number>`coalesce(sum(${quizAttempts.total_questions}), 0)`,
      score_sum: sql<number>`coalesce(sum(${quizAttempts.score_percentage}), 0)`,
      best_score: sql<number>`coalesce(max(${quizAttempts.score_percentage}), 0)`,
      xp_earned: sql<number>`coalesce(sum(${quizAttempts.xp_earned}), 0)`
    })
    .from(quizAttempts)
    .where(eq(quizAttempts.user_id, userId))
    .groupBy(quizAttempts.exam_type)
    .orderBy(asc(quizAttempts.exam_type))
    .all();

  const statsByExam: Partial<Record<ExamType, ExamStats>> = {};
  let totalAttempts = 0;
  let totalQuestions = 0;
  let scoreSum = 0;
  let bestScore = 0;
  let totalXp = 0;
  for (const row of rows) {
    const attempts = Number(row.attempts);
    const scoreTotal = Number(row.score_sum);
    statsByExam[row.exam_type] = {
      attempts,
      questions_answered: Number(row.questions_answered),
      average_score: attempts ? round2(scoreTotal / attempts) : 0,
      best_score: round2(Number(row.best_score)),
      xp_earned: Number(row.xp_earned)
    };
    totalAttempts += attempts;
    totalQuestions += Number(row.questions_answered);
    scoreSum += scoreTotal;
    bestScore = Math.max(bestScore, Number(row.best_score));
    totalXp += Number(row.xp_earned);
  }

  return {
    total_attempts: totalAttempts,
    total_questions_answered: totalQuestions,
    average_score: totalAttempts ? round2(scoreSum / totalAttempts) : 0,
    best_score: round2(bestScore),
    total_xp_earned: totalXp,
    stats_by_exam: statsByExam
  };
};

export const getAttemptDetails = async (
  ctx: EngineContext,
  userId: string,
  attemptId: string
): Promise<AttemptDetails> => {
  const attempt = ctx.db
    .select()
    .from(quizAttempts)
    .where(and(eq(quizAttempts.id, attemptId), eq(quizAttempts.user_id, userId)))
    .get();
  if (!attempt) {
    throw new AttemptNotFoundError(attemptId);
  }
  const answers = ctx.db
    .select({
      question_id: attemptAnswers.question_id,
      user_answer: attemptAnswers.user_answer,
      correct_answer: attemptAnswers.correct_answer,
      is_correct: attemptAnswers.is_correct,
      time_spent_seconds: attemptAnswers.time_spent_seconds
    })
    .from(attemptAnswers)
    .where(eq(attemptAnswers.attempt_id, attempt.id))
    .orderBy(asc(attemptAnswers.position))
    .all();
  return { ...toAttemptSummary(attempt), answers };
};

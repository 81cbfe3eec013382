import { z } from "zod";

const idSchema = z.string().min(1);

export const EXAM_TYPES = ["security", "network", "a1101", "a1102"] as const;
export const ANSWER_CHOICES = ["A", "B", "C", "D"] as const;
export const QUIZ_MODES = ["practice", "study"] as const;
export const SESSION_STATUSES = ["created", "in_progress", "completed", "abandoned"] as const;
export const LEADERBOARD_METRICS = ["xp", "quiz_count", "accuracy", "streak", "exam_specific"] as const;
export const LEADERBOARD_PERIODS = ["all_time", "monthly", "weekly"] as const;
export const ACCURACY_MINIMUM_OPTIONS = [1, 5, 10, 20] as const;
export const ACHIEVEMENT_RARITIES = ["common", "rare", "epic", "legendary"] as const;

export const MAX_SESSION_QUESTIONS = 100;
export const MAX_LEADERBOARD_LIMIT = 500;

export const examTypeSchema = z.enum(EXAM_TYPES);
export const answerChoiceSchema = z.enum(ANSWER_CHOICES);
export const quizModeSchema = z.enum(QUIZ_MODES);
export const leaderboardMetricSchema = z.enum(LEADERBOARD_METRICS);
export const leaderboardPeriodSchema = z.enum(LEADERBOARD_PERIODS);
export const raritySchema = z.enum(ACHIEVEMENT_RARITIES);

export const questionOptionSchema = z.object({
  text: z.string(),
  explanation: z.string()
});

export const questionSchema = z.object({
  id: idSchema,
  exam_type: examTypeSchema,
  domain: z.string(),
  question_text: z.string(),
  correct_answer: answerChoiceSchema,
  options: z.object({
    A: questionOptionSchema,
    B: questionOptionSchema,
    C: questionOptionSchema,
    D: questionOptionSchema
  })
});

export const startSessionSchema = z.object({
  exam_type: examTypeSchema,
  mode: quizModeSchema.default("study"),
  count: z.number().int().min(1).max(MAX_SESSION_QUESTIONS).default(30),
  domain: z.string().trim().min(1).optional(),
  seed: z.string().min(1).optional()
});

export const sessionAnswerSchema = z.object({
  question_id: idSchema,
  user_answer: answerChoiceSchema
});

// `is_correct` is accepted for older clients and always recomputed server-side.
export const submittedAnswerSchema = z.object({
  question_id: idSchema,
  user_answer: answerChoiceSchema,
  is_correct: z.boolean().optional(),
  time_spent_seconds: z.number().int().min(0).nullable().optional()
});

export const quizSubmissionSchema = z
  .object({
    exam_type: examTypeSchema,
    total_questions: z.number().int().positive(),
    answers: z.array(submittedAnswerSchema).min(1),
    time_taken_seconds: z.number().int().min(0).nullable().optional()
  })
  .refine((value) => value.answers.length === value.total_questions, {
    message: "Number of answers must match total_questions",
    path: ["answers"]
  });

export const selectAvatarSchema = z.object({
  avatar_id: idSchema
});

export const idempotencyKeySchema = z.string().trim().min(8).max(128);

const intFromQuery = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

export const leaderboardQuerySchema = z.object({
  period: leaderboardPeriodSchema.default("all_time"),
  limit: z.coerce.number().int().min(1).max(MAX_LEADERBOARD_LIMIT).optional(),
  minimum_quizzes: z.coerce
    .number()
    .int()
    .refine(
      (value) => ACCURACY_MINIMUM_OPTIONS.some((option) => option === value),
      { message: `minimum_quizzes must be one of ${ACCURACY_MINIMUM_OPTIONS.join(", ")}` }
    )
    .optional(),
  exam_type: examTypeSchema.optional()
});

export const quizHistoryQuerySchema = z.object({
  limit: intFromQuery(20, 1, 100),
  offset: z.coerce.number().int().min(0).default(0),
  exam_type: examTypeSchema.optional()
});

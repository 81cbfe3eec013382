import { sql } from "drizzle-orm";
import {
  index,
  integer,
  primaryKey,
  real,
  sqliteTable,
  text,
  uniqueIndex
} from "drizzle-orm/sqlite-core";
import {
  ACHIEVEMENT_RARITIES,
  ANSWER_CHOICES,
  EXAM_TYPES,
  QUIZ_MODES,
  SESSION_STATUSES,
  type QuestionOptions
} from "@quizrank/shared";

export type SessionResponse = {
  question_id: string;
  user_answer: (typeof ANSWER_CHOICES)[number];
  is_correct: boolean;
};

export const users = sqliteTable("users", {
  id: text("id").primaryKey(),
  email: text("email").notNull().unique(),
  display_name: text("display_name").notNull(),
  created_at: integer("created_at").notNull()
});

export const userProfiles = sqliteTable("user_profiles", {
  user_id: text("user_id").primaryKey(),
  xp: integer("xp").notNull().default(0),
  level: integer("level").notNull().default(1),
  streak_current: integer("streak_current").notNull().default(0),
  streak_longest: integer("streak_longest").notNull().default(0),
  last_activity_date: text("last_activity_date"),
  total_exams_taken: integer("total_exams_taken").notNull().default(0),
  total_questions_answered: integer("total_questions_answered").notNull().default(0),
  selected_avatar_id: text("selected_avatar_id"),
  created_at: integer("created_at").notNull(),
  updated_at: integer("updated_at").notNull()
});

export const questions = sqliteTable(
  "questions",
  {
    id: text("id").primaryKey(),
    exam_type: text("exam_type", { enum: EXAM_TYPES }).notNull(),
    domain: text("domain").notNull(),
    question_text: text("question_text").notNull(),
    correct_answer: text("correct_answer", { enum: ANSWER_CHOICES }).notNull(),
    options: text("options", { mode: "json" }).$type<QuestionOptions>().notNull(),
    created_at: integer("created_at").notNull()
  },
  (table) => ({
    examDomainIdx: index("questions_exam_domain_idx").on(table.exam_type, table.domain)
  })
);

export const quizAttempts = sqliteTable(
  "quiz_attempts",
  {
    id: text("id").primaryKey(),
    user_id: text("user_id").notNull(),
    exam_type: text("exam_type", { enum: EXAM_TYPES }).notNull(),
    mode: text("mode", { enum: QUIZ_MODES }).notNull(),
    total_questions: integer("total_questions").notNull(),
    correct_answers: integer("correct_answers").notNull(),
    score_percentage: real("score_percentage").notNull(),
    time_taken_seconds: integer("time_taken_seconds"),
    xp_earned: integer("xp_earned").notNull().default(0),
    created_at: integer("created_at").notNull()
  },
  (table) => ({
    userCreatedIdx: index("quiz_attempts_user_created_idx").on(table.user_id, table.created_at),
    examCreatedIdx: index("quiz_attempts_exam_created_idx").on(table.exam_type, table.created_at)
  })
);

export const attemptAnswers = sqliteTable(
  "attempt_answers",
  {
    id: text("id").primaryKey(),
    attempt_id: text("attempt_id").notNull(),
    user_id: text("user_id").notNull(),
    question_id: text("question_id").notNull(),
    position: integer("position").notNull(),
    user_answer: text("user_answer", { enum: ANSWER_CHOICES }).notNull(),
    correct_answer: text("correct_answer", { enum: ANSWER_CHOICES }).notNull(),
    is_correct: integer("is_correct", { mode: "boolean" }).notNull(),
    time_spent_seconds: integer("time_spent_seconds"),
    answered_at: integer("answered_at").notNull()
  },
  (table) => ({
    attemptIdx: index("attempt_answers_attempt_idx").on(table.attempt_id),
    userQuestionIdx: index("attempt_answers_user_question_idx").on(table.user_id, table.question_id)
  })
);

export const studySessions = sqliteTable(
  "study_sessions",
  {
    id: text("id").primaryKey(),
    user_id: text("user_id").notNull(),
    exam_type: text("exam_type", { enum: EXAM_TYPES }).notNull(),
    mode: text("mode", { enum: QUIZ_MODES }).notNull(),
    domain: text("domain"),
    question_ids: text("question_ids", { mode: "json" }).$type<string[]>().notNull(),
    responses: text("responses", { mode: "json" }).$type<SessionResponse[]>().notNull(),
    current_index: integer("current_index").notNull().default(0),
    status: text("status", { enum: SESSION_STATUSES }).notNull(),
    started_at: integer("started_at").notNull(),
    updated_at: integer("updated_at").notNull(),
    completed_at: integer("completed_at"),
    attempt_id: text("attempt_id")
  },
  (table) => ({
    oneActivePerUser: uniqueIndex("study_sessions_one_active_idx")
      .on(table.user_id)
      .where(sql`status in ('created', 'in_progress')`)
  })
);

export const achievements = sqliteTable("achievements", {
  id: text("id").primaryKey(),
  name: text("name").notNull().unique(),
  description: text("description").notNull(),
  icon: text("icon").notNull(),
  criteria_type: text("criteria_type").notNull(),
  criteria_value: integer("criteria_value").notNull(),
  criteria_exam_type: text("criteria_exam_type", { enum: EXAM_TYPES }),
  xp_reward: integer("xp_reward").notNull().default(0),
  rarity: text("rarity", { enum: ACHIEVEMENT_RARITIES }).notNull().default("common"),
  display_order: integer("display_order").notNull().default(0),
  is_hidden: integer("is_hidden", { mode: "boolean" }).notNull().default(false),
  created_at: integer("created_at").notNull()
});

export const userAchievements = sqliteTable(
  "user_achievements",
  {
    user_id: text("user_id").notNull(),
    achievement_id: text("achievement_id").notNull(),
    earned_at: integer("earned_at").notNull()
  },
  (table) => ({
    pk: primaryKey({ columns: [table.user_id, table.achievement_id] })
  })
);

export const avatars = sqliteTable("avatars", {
  id: text("id").primaryKey(),
  name: text("name").notNull().unique(),
  description: text("description"),
  image_url: text("image_url").notNull(),
  required_achievement_id: text("required_achievement_id"),
  rarity: text("rarity", { enum: ACHIEVEMENT_RARITIES }).notNull().default("common"),
  display_order: integer("display_order").notNull().default(0),
  created_at: integer("created_at").notNull()
});

export const userAvatars = sqliteTable(
  "user_avatars",
  {
    user_id: text("user_id").notNull(),
    avatar_id: text("avatar_id").notNull(),
    unlocked_at: integer("unlocked_at").notNull()
  },
  (table) => ({
    pk: primaryKey({ columns: [table.user_id, table.avatar_id] }),
    userUnlockedIdx: index("user_avatars_user_unlocked_idx").on(table.user_id, table.unlocked_at)
  })
);

export const submissionKeys = sqliteTable(
  "submission_keys",
  {
    user_id: text("user_id").notNull(),
    idempotency_key: text("idempotency_key").notNull(),
    attempt_id: text("attempt_id").notNull(),
    created_at: integer("created_at").notNull()
  },
  (table) => ({
    pk: primaryKey({ columns: [table.user_id, table.idempotency_key] })
  })
);

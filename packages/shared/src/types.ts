import type {
  ACHIEVEMENT_RARITIES,
  ANSWER_CHOICES,
  EXAM_TYPES,
  LEADERBOARD_METRICS,
  LEADERBOARD_PERIODS,
  QUIZ_MODES,
  SESSION_STATUSES
} from "./schemas";

export type ExamType = (typeof EXAM_TYPES)[number];
export type AnswerChoice = (typeof ANSWER_CHOICES)[number];
export type QuizMode = (typeof QUIZ_MODES)[number];
export type LeaderboardMetric = (typeof LEADERBOARD_METRICS)[number];
export type LeaderboardPeriod = (typeof LEADERBOARD_PERIODS)[number];
export type Rarity = (typeof ACHIEVEMENT_RARITIES)[number];

export type QuestionOption = {
  text: string;
  explanation: string;
};

export type QuestionOptions = Record<AnswerChoice, QuestionOption>;

export type Question = {
  id: string;
  exam_type: ExamType;
  domain: string;
  question_text: string;
  correct_answer: AnswerChoice;
  options: QuestionOptions;
};

/** Question as shown while it is being answered: no answer key, no explanations. */
export type QuestionView = {
  question_id: string;
  question_text: string;
  domain: string;
  options: Record<AnswerChoice, { text: string }>;
};

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export type SessionView = {
  session_id: string;
  exam_type: ExamType;
  mode: QuizMode;
  domain: string | null;
  status: SessionStatus;
  total_questions: number;
  current_index: number;
  started_at: number;
  current_question: QuestionView | null;
};

export type AchievementUnlocked = {
  id: string;
  name: string;
  description: string;
  icon: string;
  rarity: Rarity;
  xp_reward: number;
};

/** Cosmetic profile picture; unlocked by default or by earning an achievement. */
export type AvatarSummary = {
  id: string;
  name: string;
  description: string | null;
  image_url: string;
  rarity: Rarity;
};

export type AvatarView = AvatarSummary & {
  is_default: boolean;
  required_achievement_id: string | null;
  required_achievement_name: string | null;
  is_unlocked?: boolean;
  is_selected?: boolean;
  unlocked_at?: number | null;
};

export type UnlockedAvatar = AvatarSummary & {
  is_selected: boolean;
  unlocked_at: number;
};

export type AvatarStats = {
  total_avatars: number;
  unlocked_avatars: number;
  completion_percentage: number;
  selected_avatar: AvatarSummary | null;
};

export type AttemptSummary = {
  id: string;
  exam_type: ExamType;
  mode: QuizMode;
  total_questions: number;
  correct_answers: number;
  score_percentage: number;
  time_taken_seconds: number | null;
  xp_earned: number;
  created_at: number;
};

export type SubmissionResult = {
  attempt: AttemptSummary;
  xp_earned: number;
  total_xp: number;
  previous_level: number;
  current_level: number;
  level_up: boolean;
  streak_current: number;
  streak_longest: number;
  achievements_unlocked: AchievementUnlocked[];
  avatars_unlocked: AvatarSummary[];
  replayed: boolean;
};

export type AnswerFeedback = {
  is_correct: boolean;
  user_answer: AnswerChoice;
  correct_answer: AnswerChoice;
  user_answer_explanation: string;
  correct_answer_explanation: string;
  current_index: number;
  total_questions: number;
  questions_remaining: number;
  session_completed: boolean;
  next_question: QuestionView | null;
  completion: SubmissionResult | null;
};

export type LeaderboardEntry = {
  rank: number;
  user_id: string;
  display_name: string;
  score: number;
  level: number;
  is_current_user: boolean;
};

export type LeaderboardResponse = {
  metric: LeaderboardMetric;
  period: LeaderboardPeriod | "current";
  total_users: number;
  entries: LeaderboardEntry[];
  current_user_entry: LeaderboardEntry | null;
  minimum_quizzes?: number;
  exam_type?: ExamType;
};

export type UserLeaderboardRanks = {
  period: LeaderboardPeriod;
  xp_rank: number | null;
  quiz_count_rank: number | null;
  accuracy_rank: number | null;
  streak_rank: number | null;
};

export type LevelProgress = {
  level: number;
  current_level_xp: number;
  next_level_xp: number;
  progress_percentage: number;
};

export type ProfileSummary = {
  user_id: string;
  display_name: string;
  xp: number;
  level_progress: LevelProgress;
  streak_current: number;
  streak_longest: number;
  last_activity_date: string | null;
  total_exams_taken: number;
  total_questions_answered: number;
  selected_avatar_id: string | null;
};

export type ExamStats = {
  attempts: number;
  questions_answered: number;
  average_score: number;
  best_score: number;
  xp_earned: number;
};

export type QuizStats = {
  total_attempts: number;
  total_questions_answered: number;
  average_score: number;
  best_score: number;
  total_xp_earned: number;
  stats_by_exam: Partial<Record<ExamType, ExamStats>>;
};

export type QuizHistoryResponse = {
  total_attempts: number;
  attempts: AttemptSummary[];
};

export type AttemptAnswerDetail = {
  question_id: string;
  user_answer: AnswerChoice;
  correct_answer: AnswerChoice;
  is_correct: boolean;
  time_spent_seconds: number | null;
};

export type AttemptDetails = AttemptSummary & {
  answers: AttemptAnswerDetail[];
};

export type AchievementProgress = {
  id: string;
  name: string;
  description: string;
  icon: string;
  criteria_type: string;
  criteria_value: number;
  criteria_exam_type: ExamType | null;
  rarity: Rarity;
  xp_reward: number;
  is_hidden: boolean;
  is_earned?: boolean;
  progress?: number;
  progress_percentage?: number;
};

export type EarnedAchievement = AchievementUnlocked & {
  earned_at: number;
};

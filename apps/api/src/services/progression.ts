import type { LevelProgress, QuizMode } from "@quizrank/shared";
import { SubmissionValidationError } from "./errors";

export const XP_PER_CORRECT_ANSWER = 10;
export const XP_PER_LEVEL_UNIT = 100;

// Checked top-down; the first threshold reached wins.
const ACCURACY_BONUSES = [
  { minAccuracy: 90, multiplier: 1.5 },
  { minAccuracy: 80, multiplier: 1.25 },
  { minAccuracy: 70, multiplier: 1.1 }
] as const;

export type StreakState = {
  streak_current: number;
  streak_longest: number;
  last_activity_date: string | null;
};

export type ProfileCounters = StreakState & {
  xp: number;
  level: number;
  total_exams_taken: number;
  total_questions_answered: number;
};

export type ProgressionInput = {
  xpEarned: number;
  totalQuestions: number;
  countsTowardStreak: boolean;
  today: string;
};

const assertValidCounts = (correctAnswers: number, totalQuestions: number) => {
  if (!Number.isInteger(totalQuestions) || totalQuestions <= 0) {
    throw new SubmissionValidationError("A submission must contain at least one question.", {
      totalQuestions
    });
  }
  if (!Number.isInteger(correctAnswers) || correctAnswers < 0 || correctAnswers > totalQuestions) {
    throw new SubmissionValidationError("Correct answers must be between 0 and total questions.", {
      correctAnswers,
      totalQuestions
    });
  }
};

export const calculateScorePercentage = (correctAnswers: number, totalQuestions: number) => {
  assertValidCounts(correctAnswers, totalQuestions);
  return (100 * correctAnswers) / totalQuestions;
};

export const accuracyMultiplier = (correctAnswers: number, totalQuestions: number) => {
  assertValidCounts(correctAnswers, totalQuestions);
  // Integer comparison so 7/10 lands on the 70% tier exactly.
  const bonus = ACCURACY_BONUSES.find(
    (tier) => correctAnswers * 100 >= tier.minAccuracy * totalQuestions
  );
  return bonus?.multiplier ?? 1;
};

export const calculateXpEarned = (params: {
  correctAnswers: number;
  totalQuestions: number;
  mode: QuizMode;
}) => {
  const multiplier = accuracyMultiplier(params.correctAnswers, params.totalQuestions);
  if (params.mode === "study") {
    return 0;
  }
  return Math.floor(params.correctAnswers * XP_PER_CORRECT_ANSWER * multiplier);
};

export const calculateLevel = (xp: number) => {
  if (!Number.isFinite(xp) || xp < 0) {
    return 1;
  }
  return Math.floor(Math.sqrt(xp / XP_PER_LEVEL_UNIT)) + 1;
};

/** Total XP at which `level` starts. */
export const xpForLevel = (level: number) => XP_PER_LEVEL_UNIT * Math.max(0, level - 1) ** 2;

export const describeLevelProgress = (xp: number): LevelProgress => {
  const level = calculateLevel(xp);
  const currentLevelXp = xpForLevel(level);
  const nextLevelXp = xpForLevel(level + 1);
  const span = nextLevelXp - currentLevelXp;
  const progress = span > 0 ? ((Math.max(0, xp) - currentLevelXp) / span) * 100 : 0;
  return {
    level,
    current_level_xp: currentLevelXp,
    next_level_xp: nextLevelXp,
    progress_percentage: Math.round(progress * 100) / 100
  };
};

const pad = (value: number) => String(value).padStart(2, "0");

/** Server-local calendar date as YYYY-MM-DD. */
export const toDateKey = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const previousDateKey = (dateKey: string) => {
  const [year, month, day] = dateKey.split("-").map(Number);
  return toDateKey(new Date(year, month - 1, day - 1));
};

export const advanceStreak = (state: StreakState, today: string): StreakState => {
  let current: number;
  if (!state.last_activity_date) {
    current = 1;
  } else if (state.last_activity_date === today) {
    current = Math.max(state.streak_current, 1);
  } else if (state.last_activity_date === previousDateKey(today)) {
    current = state.streak_current + 1;
  } else {
    current = 1;
  }
  return {
    streak_current: current,
    streak_longest: Math.max(state.streak_longest, current),
    last_activity_date: today
  };
};

export const applyProgression = (
  profile: ProfileCounters,
  input: ProgressionInput
): ProfileCounters => {
  if (input.xpEarned < 0) {
    throw new SubmissionValidationError("XP earned cannot be negative.", { xpEarned: input.xpEarned });
  }
  const xp = profile.xp + input.xpEarned;
  const streak = input.countsTowardStreak
    ? advanceStreak(profile, input.today)
    : {
        streak_current: profile.streak_current,
        streak_longest: Math.max(profile.streak_longest, profile.streak_current),
        last_activity_date: profile.last_activity_date
      };
  return {
    ...streak,
    xp,
    level: calculateLevel(xp),
    total_exams_taken: profile.total_exams_taken + 1,
    total_questions_answered: profile.total_questions_answered + input.totalQuestions
  };
};

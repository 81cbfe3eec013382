import { asc, desc, eq, sql } from "drizzle-orm";
import type {
  AchievementProgress,
  AchievementUnlocked,
  AvatarSummary,
  EarnedAchievement,
  ExamType
} from "@quizrank/shared";
import { achievements, attemptAnswers, questions, quizAttempts, userAchievements } from "../db/schema";
import { hasDbChanges, runImmediate } from "../db/sqlite";
import type { DbExecutor } from "../db/types";
import { unlockAchievementAvatars } from "./avatarService";
import type { EngineContext } from "./context";
import { grantAchievementXp, loadProfile, type ProfileRow } from "./profileService";

export const ACHIEVEMENT_CRITERIA = [
  "quiz_count",
  "perfect_score",
  "high_score_count",
  "correct_answers",
  "streak_length",
  "level_reached",
  "exam_specific_count",
  "multi_exam",
  "domain_accuracy"
] as const;

export type AchievementCriteria = (typeof ACHIEVEMENT_CRITERIA)[number];

export const DOMAIN_ACCURACY_MIN_ANSWERS = 20;

export type AchievementRow = typeof achievements.$inferSelect;

export type ExamAggregate = {
  attempts: number;
  perfect: number;
  high: number;
  correct: number;
};

export type DomainAggregate = {
  exam_type: ExamType;
  domain: string;
  answered: number;
  correct: number;
};

export type AchievementStats = {
  byExam: Map<ExamType, ExamAggregate>;
  domains: DomainAggregate[];
  streakCurrent: number;
  level: number;
};

export type CriterionResult = {
  met: boolean;
  progress: number;
};

const EMPTY_AGGREGATE: ExamAggregate = { attempts: 0, perfect: 0, high: 0, correct: 0 };

export const isAchievementCriteria = (value: string): value is AchievementCriteria =>
  ACHIEVEMENT_CRITERIA.some((criteria) => criteria === value);

export const loadAchievementStats = (
  tx: DbExecutor,
  userId: string,
  profile: Pick<ProfileRow, "streak_current" | "level">
): AchievementStats => {
  const examRows = tx
    .select({
      exam_type: quizAttempts.exam_type,
      attempts: sql<number>`count(*)`,
      perfect: sql<number>`sum(case when ${quizAttempts.correct_answers} = ${quizAttempts.total_questions} then 1 else 0 end)`,
      high: sql<number>`sum(case when ${quizAttempts.correct_answers} * 10 >= ${quizAttempts.total_questions} * 9 then 1 else 0 end)`,
      correct: sql<number>`sum(${quizAttempts.correct_answers})`
    })
    .from(quizAttempts)
    .where(eq(quizAttempts.user_id, userId))
    .groupBy(quizAttempts.exam_type)
    .all();

  const domainRows = tx
    .select({
      exam_type: questions.exam_type,
      domain: questions.domain,
      answered: sql<number>`count(*)`,
      correct: sql<number>`sum(${attemptAnswers.is_correct})`
    })
    .from(attemptAnswers)
    .innerJoin(questions, eq(questions.id, attemptAnswers.question_id))
    .where(eq(attemptAnswers.user_id, userId))
    .groupBy(questions.exam_type, questions.domain)
    .all();

  return {
    byExam: new Map(
      examRows.map((row) => [
        row.exam_type,
        {
          attempts: Number(row.attempts ?? 0),
          perfect: Number(row.perfect ?? 0),
          high: Number(row.high ?? 0),
          correct: Number(row.correct ?? 0)
        }
      ])
    ),
    domains: domainRows.map((row) => ({
      exam_type: row.exam_type,
      domain: row.domain,
      answered: Number(row.answered ?? 0),
      correct: Number(row.correct ?? 0)
    })),
    streakCurrent: profile.streak_current,
    level: profile.level
  };
};

const aggregateFor = (stats: AchievementStats, examType: ExamType | null): ExamAggregate => {
  if (examType) {
    return stats.byExam.get(examType) ?? EMPTY_AGGREGATE;
  }
  let total = EMPTY_AGGREGATE;
  for (const aggregate of stats.byExam.values()) {
    total = {
      attempts: total.attempts + aggregate.attempts,
      perfect: total.perfect + aggregate.perfect,
      high: total.high + aggregate.high,
      correct: total.correct + aggregate.correct
    };
  }
  return total;
};

const threshold = (progress: number, value: number): CriterionResult => ({
  met: progress >= value,
  progress
});

export const evaluateCriterion = (
  achievement: Pick<AchievementRow, "criteria_type" | "criteria_value" | "criteria_exam_type">,
  stats: AchievementStats
): CriterionResult => {
  const value = achievement.criteria_value;
  const examType = achievement.criteria_exam_type;
  const criteria = achievement.criteria_type;
  if (!isAchievementCriteria(criteria)) {
    return { met: false, progress: 0 };
  }
  switch (criteria) {
    case "quiz_count":
      return threshold(aggregateFor(stats, examType).attempts, value);
    case "perfect_score":
      return threshold(aggregateFor(stats, examType).perfect, value);
    case "high_score_count":
      return threshold(aggregateFor(stats, examType).high, value);
    case "correct_answers":
      return threshold(aggregateFor(stats, examType).correct, value);
    case "streak_length":
      return threshold(stats.streakCurrent, value);
    case "level_reached":
      return threshold(stats.level, value);
    case "exam_specific_count": {
      if (examType) {
        return threshold(aggregateFor(stats, examType).attempts, value);
      }
      const best = Math.max(0, ...[...stats.byExam.values()].map((aggregate) => aggregate.attempts));
      return threshold(best, value);
    }
    case "multi_exam": {
      // Progress is the attempt count reached by the second-busiest exam type.
      const counts = [...stats.byExam.values()]
        .map((aggregate) => aggregate.attempts)
        .sort((a, b) => b - a);
      return threshold(counts[1] ?? 0, value);
    }
    case "domain_accuracy": {
      const accuracies = stats.domains
        .filter((domain) => !examType || domain.exam_type === examType)
        .filter((domain) => domain.answered >= DOMAIN_ACCURACY_MIN_ANSWERS)
        .map((domain) => (100 * domain.correct) / domain.answered);
      return threshold(Math.floor(Math.max(0, ...accuracies)), value);
    }
  }
};

export const toUnlocked = (row: AchievementRow): AchievementUnlocked => ({
  id: row.id,
  name: row.name,
  description: row.description,
  icon: row.icon,
  rarity: row.rarity,
  xp_reward: row.xp_reward
});

const loadEarnedIds = (tx: DbExecutor, userId: string) =>
  new Set(
    tx
      .select({ id: userAchievements.achievement_id })
      .from(userAchievements)
      .where(eq(userAchievements.user_id, userId))
      .all()
      .map((row) => row.id)
  );

const loadCatalogue = (tx: DbExecutor) =>
  tx.select().from(achievements).orderBy(asc(achievements.display_order), asc(achievements.id)).all();

/**
 * Single pass over the catalogue against stats taken at the start of the pass, so
 * XP granted here cannot unlock further achievements until the next submission.
 * Avatars tied to an awarded achievement are unlocked in the same transaction.
 */
export const evaluateAchievements = async (
  ctx: EngineContext,
  userId: string
): Promise<{ unlocked: AchievementUnlocked[]; avatars: AvatarSummary[]; profile: ProfileRow }> => {
  const now = ctx.now();
  return runImmediate(ctx.db, (tx) => {
    let profile = loadProfile(tx, userId, now);
    const stats = loadAchievementStats(tx, userId, profile);
    const earned = loadEarnedIds(tx, userId);
    const unlocked: AchievementUnlocked[] = [];
    const avatars: AvatarSummary[] = [];

    for (const achievement of loadCatalogue(tx)) {
      if (earned.has(achievement.id)) continue;
      if (!evaluateCriterion(achievement, stats).met) continue;

      const result = tx
        .insert(userAchievements)
        .values({ user_id: userId, achievement_id: achievement.id, earned_at: now.getTime() })
        .onConflictDoNothing()
        .run();
      if (!hasDbChanges(result)) {
        ctx.logger.warn("achievement.award_conflict", { userId, achievementId: achievement.id });
        continue;
      }
      profile = grantAchievementXp(tx, userId, achievement.xp_reward, now);
      unlocked.push(toUnlocked(achievement));
      ctx.logger.info("achievement.awarded", {
        userId,
        achievementId: achievement.id,
        xpReward: achievement.xp_reward
      });
      for (const avatar of unlockAchievementAvatars(tx, userId, achievement.id, now)) {
        avatars.push(avatar);
        ctx.logger.info("avatar.unlocked", { userId, avatarId: avatar.id, achievementId: achievement.id });
      }
    }
    return { unlocked, avatars, profile };
  });
};

const progressPercentage = (progress: number, value: number) =>
  Math.min(100, Math.round((progress / value) * 100));

export const listAchievements = async (
  ctx: EngineContext,
  userId: string | null
): Promise<AchievementProgress[]> => {
  const catalogue = loadCatalogue(ctx.db);
  const base = (row: AchievementRow): AchievementProgress => ({
    id: row.id,
    name: row.name,
    description: row.description,
    icon: row.icon,
    criteria_type: row.criteria_type,
    criteria_value: row.criteria_value,
    criteria_exam_type: row.criteria_exam_type,
    rarity: row.rarity,
    xp_reward: row.xp_reward,
    is_hidden: row.is_hidden
  });
  if (!userId) {
    return catalogue.filter((row) => !row.is_hidden).map(base);
  }

  const profile = loadProfile(ctx.db, userId, ctx.now());
  const stats = loadAchievementStats(ctx.db, userId, profile);
  const earned = loadEarnedIds(ctx.db, userId);
  return catalogue
    .filter((row) => !row.is_hidden || earned.has(row.id))
    .map((row) => {
      const isEarned = earned.has(row.id);
      const progress = isEarned ? row.criteria_value : evaluateCriterion(row, stats).progress;
      return {
        ...base(row),
        is_earned: isEarned,
        progress,
        progress_percentage: isEarned ? 100 : progressPercentage(progress, row.criteria_value)
      };
    });
};

export const listEarnedAchievements = async (
  ctx: EngineContext,
  userId: string
): Promise<EarnedAchievement[]> => {
  const rows = ctx.db
    .select({ achievement: achievements, earned_at: userAchievements.earned_at })
    .from(userAchievements)
    .innerJoin(achievements, eq(achievements.id, userAchievements.achievement_id))
    .where(eq(userAchievements.user_id, userId))
    .orderBy(desc(userAchievements.earned_at), asc(achievements.display_order))
    .all();
  return rows.map((row) => ({ ...toUnlocked(row.achievement), earned_at: row.earned_at }));
};

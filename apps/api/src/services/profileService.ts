import { eq } from "drizzle-orm";
import type { ProfileSummary } from "@quizrank/shared";
import { userProfiles, users } from "../db/schema";
import { hasDbChanges } from "../db/sqlite";
import type { DbExecutor } from "../db/types";
import { unlockDefaultAvatars } from "./avatarService";
import type { EngineContext } from "./context";
import {
  applyProgression,
  calculateLevel,
  describeLevelProgress,
  toDateKey,
  type ProfileCounters
} from "./progression";

export type ProfileRow = typeof userProfiles.$inferSelect;

export type ProgressionChange = {
  before: ProfileRow;
  after: ProfileRow;
};

export const ensureProfile = (tx: DbExecutor, userId: string, now: Date) => {
  const timestamp = now.getTime();
  const result = tx
    .insert(userProfiles)
    .values({ user_id: userId, created_at: timestamp, updated_at: timestamp })
    .onConflictDoNothing()
    .run();
  if (hasDbChanges(result)) {
    unlockDefaultAvatars(tx, userId, now);
  }
};

export const loadProfile = (tx: DbExecutor, userId: string, now: Date): ProfileRow => {
  ensureProfile(tx, userId, now);
  const row = tx.select().from(userProfiles).where(eq(userProfiles.user_id, userId)).get();
  if (!row) {
    throw new Error(`Profile for user ${userId} could not be created`);
  }
  return row;
};

const toCounters = (row: ProfileRow): ProfileCounters => ({
  xp: row.xp,
  level: row.level,
  streak_current: row.streak_current,
  streak_longest: row.streak_longest,
  last_activity_date: row.last_activity_date,
  total_exams_taken: row.total_exams_taken,
  total_questions_answered: row.total_questions_answered
});

/**
 * Read-modify-write of XP, level, streak and counters for one recorded attempt.
 * Must run inside the transaction that inserts the attempt.
 */
export const recordProgression = (
  tx: DbExecutor,
  params: {
    userId: string;
    xpEarned: number;
    totalQuestions: number;
    countsTowardStreak: boolean;
    now: Date;
  }
): ProgressionChange => {
  const before = loadProfile(tx, params.userId, params.now);
  const next = applyProgression(toCounters(before), {
    xpEarned: params.xpEarned,
    totalQuestions: params.totalQuestions,
    countsTowardStreak: params.countsTowardStreak,
    today: toDateKey(params.now)
  });
  const after: ProfileRow = { ...before, ...next, updated_at: params.now.getTime() };
  tx.update(userProfiles)
    .set({
      xp: after.xp,
      level: after.level,
      streak_current: after.streak_current,
      streak_longest: after.streak_longest,
      last_activity_date: after.last_activity_date,
      total_exams_taken: after.total_exams_taken,
      total_questions_answered: after.total_questions_answered,
      updated_at: after.updated_at
    })
    .where(eq(userProfiles.user_id, params.userId))
    .run();
  return { before, after };
};

export const grantAchievementXp = (tx: DbExecutor, userId: string, reward: number, now: Date) => {
  const profile = loadProfile(tx, userId, now);
  if (reward <= 0) {
    return profile;
  }
  const xp = profile.xp + reward;
  const updated: ProfileRow = { ...profile, xp, level: calculateLevel(xp), updated_at: now.getTime() };
  tx.update(userProfiles)
    .set({ xp: updated.xp, level: updated.level, updated_at: updated.updated_at })
    .where(eq(userProfiles.user_id, userId))
    .run();
  return updated;
};

export const getProfileSummary = async (
  ctx: EngineContext,
  userId: string
): Promise<ProfileSummary> => {
  const profile = loadProfile(ctx.db, userId, ctx.now());
  const user = ctx.db
    .select({ display_name: users.display_name })
    .from(users)
    .where(eq(users.id, userId))
    .get();
  return {
    user_id: userId,
    display_name: user?.display_name ?? "Player",
    xp: profile.xp,
    level_progress: describeLevelProgress(profile.xp),
    streak_current: profile.streak_current,
    streak_longest: profile.streak_longest,
    last_activity_date: profile.last_activity_date,
    total_exams_taken: profile.total_exams_taken,
    total_questions_answered: profile.total_questions_answered,
    selected_avatar_id: profile.selected_avatar_id
  };
};

import { and, asc, desc, eq, isNull, sql } from "drizzle-orm";
import type { AvatarStats, AvatarSummary, AvatarView, UnlockedAvatar } from "@quizrank/shared";
import { achievements, avatars, userAvatars, userProfiles } from "../db/schema";
import { hasDbChanges, runImmediate } from "../db/sqlite";
import type { DbExecutor } from "../db/types";
import type { EngineContext } from "./context";
import { AvatarLockedError, AvatarNotFoundError } from "./errors";

type AvatarRow = typeof avatars.$inferSelect;

export const toAvatarSummary = (row: AvatarRow): AvatarSummary => ({
  id: row.id,
  name: row.name,
  description: row.description,
  image_url: row.image_url,
  rarity: row.rarity
});

const insertUnlocks = (tx: DbExecutor, userId: string, rows: AvatarRow[], now: Date) => {
  const unlocked: AvatarSummary[] = [];
  for (const row of rows) {
    const result = tx
      .insert(userAvatars)
      .values({ user_id: userId, avatar_id: row.id, unlocked_at: now.getTime() })
      .onConflictDoNothing()
      .run();
    if (hasDbChanges(result)) {
      unlocked.push(toAvatarSummary(row));
    }
  }
  return unlocked;
};

const avatarOrder = [asc(avatars.display_order), asc(avatars.id)];

/** Avatars without a required achievement belong to every user from the first profile write. */
export const unlockDefaultAvatars = (tx: DbExecutor, userId: string, now: Date) =>
  insertUnlocks(
    tx,
    userId,
    tx.select().from(avatars).where(isNull(avatars.required_achievement_id)).orderBy(...avatarOrder).all(),
    now
  );

/** Runs inside the award transaction; avatars the user already holds are skipped. */
export const unlockAchievementAvatars = (tx: DbExecutor, userId: string, achievementId: string, now: Date) =>
  insertUnlocks(
    tx,
    userId,
    tx.select().from(avatars).where(eq(avatars.required_achievement_id, achievementId)).orderBy(...avatarOrder).all(),
    now
  );

const loadSelectedId = (tx: DbExecutor, userId: string) =>
  tx
    .select({ selected: userProfiles.selected_avatar_id })
    .from(userProfiles)
    .where(eq(userProfiles.user_id, userId))
    .get()?.selected ?? null;

export const listAvatars = async (ctx: EngineContext, userId: string | null): Promise<AvatarView[]> => {
  const rows = ctx.db
    .select({ avatar: avatars, required_achievement_name: achievements.name })
    .from(avatars)
    .leftJoin(achievements, eq(achievements.id, avatars.required_achievement_id))
    .orderBy(...avatarOrder)
    .all();
  const base = (row: (typeof rows)[number]): AvatarView => ({
    ...toAvatarSummary(row.avatar),
    is_default: row.avatar.required_achievement_id === null,
    required_achievement_id: row.avatar.required_achievement_id,
    required_achievement_name: row.required_achievement_name
  });
  if (!userId) {
    return rows.map(base);
  }

  const unlockedAt = new Map(
    ctx.db
      .select({ id: userAvatars.avatar_id, unlocked_at: userAvatars.unlocked_at })
      .from(userAvatars)
      .where(eq(userAvatars.user_id, userId))
      .all()
      .map((row) => [row.id, row.unlocked_at])
  );
  const selectedId = loadSelectedId(ctx.db, userId);
  return rows.map((row) => ({
    ...base(row),
    is_unlocked: unlockedAt.has(row.avatar.id),
    is_selected: row.avatar.id === selectedId,
    unlocked_at: unlockedAt.get(row.avatar.id) ?? null
  }));
};

export const listUnlockedAvatars = async (ctx: EngineContext, userId: string): Promise<UnlockedAvatar[]> => {
  const selectedId = loadSelectedId(ctx.db, userId);
  return ctx.db
    .select({ avatar: avatars, unlocked_at: userAvatars.unlocked_at })
    .from(userAvatars)
    .innerJoin(avatars, eq(avatars.id, userAvatars.avatar_id))
    .where(eq(userAvatars.user_id, userId))
    .orderBy(desc(userAvatars.unlocked_at), ...avatarOrder)
    .all()
    .map((row) => ({
      ...toAvatarSummary(row.avatar),
      is_selected: row.avatar.id === selectedId,
      unlocked_at: row.unlocked_at
    }));
};

export const selectAvatar = async (
  ctx: EngineContext,
  params: { userId: string; avatarId: string }
): Promise<AvatarSummary> => {
  const now = ctx.now().getTime();
  const selected = runImmediate(ctx.db, (tx) => {
    const avatar = tx.select().from(avatars).where(eq(avatars.id, params.avatarId)).get();
    if (!avatar) {
      throw new AvatarNotFoundError(params.avatarId);
    }
    const owned = tx
      .select({ id: userAvatars.avatar_id })
      .from(userAvatars)
      .where(and(eq(userAvatars.user_id, params.userId), eq(userAvatars.avatar_id, avatar.id)))
      .get();
    if (!owned) {
      throw new AvatarLockedError(avatar.id);
    }
    tx.insert(userProfiles)
      .values({ user_id: params.userId, selected_avatar_id: avatar.id, created_at: now, updated_at: now })
      .onConflictDoUpdate({
        target: userProfiles.user_id,
        set: { selected_avatar_id: avatar.id, updated_at: now }
      })
      .run();
    return avatar;
  });
  ctx.logger.info("avatar.selected", { userId: params.userId, avatarId: selected.id });
  return toAvatarSummary(selected);
};

export const getAvatarStats = async (ctx: EngineContext, userId: string): Promise<AvatarStats> => {
  const total = Number(ctx.db.select({ total: sql<number>`count(*)` }).from(avatars).get()?.total ?? 0);
  const unlocked = Number(
    ctx.db
      .select({ total: sql<number>`count(*)` })
      .from(userAvatars)
      .where(eq(userAvatars.user_id, userId))
      .get()?.total ?? 0
  );
  const selectedId = loadSelectedId(ctx.db, userId);
  const selected = selectedId
    ? ctx.db.select().from(avatars).where(eq(avatars.id, selectedId)).get()
    : undefined;
  return {
    total_avatars: total,
    unlocked_avatars: unlocked,
    completion_percentage: total ? Math.round((unlocked / total) * 1000) / 10 : 0,
    selected_avatar: selected ? toAvatarSummary(selected) : null
  };
};

import assert from "node:assert/strict";
import { test } from "node:test";
import { eq } from "drizzle-orm";
import { userAvatars, userProfiles } from "../src/db/schema";
import { evaluateAchievements } from "../src/services/achievementService";
import {
  getAvatarStats,
  listAvatars,
  listUnlockedAvatars,
  selectAvatar
} from "../src/services/avatarService";
import { AvatarLockedError, AvatarNotFoundError } from "../src/services/errors";
import { ensureProfile } from "../src/services/profileService";
import { submitFullAttempt } from "../src/services/submissionService";
import {
  createTestContext,
  insertAttempt,
  localDay,
  seedAchievement,
  seedAvatar,
  seedQuestions,
  setupDb
} from "./testDb";

const today = localDay(2024, 1, 10);

const setup = () => {
  const { db } = setupDb();
  const ctx = createTestContext(db, { now: () => today });
  seedAchievement(db, { id: "streak-7", name: "Week Warrior", criteria_type: "streak_length", criteria_value: 7 });
  seedAvatar(db, { id: "owl", display_order: 1 });
  seedAvatar(db, { id: "fox", display_order: 2 });
  seedAvatar(db, { id: "flame", display_order: 3, required_achievement_id: "streak-7", rarity: "rare" });
  return { db, ctx };
};

test("a new profile unlocks every default avatar once", async () => {
  const { db, ctx } = setup();
  ensureProfile(db, "user-1", today);
  ensureProfile(db, "user-1", localDay(2024, 1, 11));

  const unlocked = await listUnlockedAvatars(ctx, "user-1");
  assert.deepEqual(
    unlocked.map((avatar) => [avatar.id, avatar.unlocked_at, avatar.is_selected]),
    [
      ["owl", today.getTime(), false],
      ["fox", today.getTime(), false]
    ]
  );
});

test("an awarded achievement unlocks its avatar in the submission result", async () => {
  const { db } = setupDb();
  const ctx = createTestContext(db, { now: () => today });
  const ids = seedQuestions(db, "security", 2);
  seedAchievement(db, { id: "first-quiz", criteria_type: "quiz_count", criteria_value: 1, rarity: "common" });
  seedAvatar(db, { id: "badge", required_achievement_id: "first-quiz", rarity: "rare" });

  const result = await submitFullAttempt(ctx, {
    userId: "user-1",
    examType: "security",
    totalQuestions: 2,
    answers: ids.map((id) => ({ question_id: id, user_answer: "A" }))
  });

  assert.deepEqual(
    result.achievements_unlocked.map((achievement) => [achievement.id, achievement.rarity]),
    [["first-quiz", "common"]]
  );
  assert.deepEqual(result.avatars_unlocked, [
    { id: "badge", name: "badge", description: null, image_url: "/avatars/badge.svg", rarity: "rare" }
  ]);
});

test("an avatar the user already holds is not unlocked again", async () => {
  const { db } = setupDb();
  const ctx = createTestContext(db, { now: () => today });
  seedAchievement(db, { id: "first-quiz", criteria_type: "quiz_count", criteria_value: 1 });
  seedAvatar(db, { id: "badge", required_achievement_id: "first-quiz" });
  db.insert(userAvatars).values({ user_id: "user-1", avatar_id: "badge", unlocked_at: 5 }).run();
  insertAttempt(db, { userId: "user-1" });

  const evaluation = await evaluateAchievements(ctx, "user-1");

  assert.deepEqual(evaluation.unlocked.map((achievement) => achievement.id), ["first-quiz"]);
  assert.deepEqual(evaluation.avatars, []);
  assert.deepEqual(
    db.select().from(userAvatars).all(),
    [{ user_id: "user-1", avatar_id: "badge", unlocked_at: 5 }]
  );
});

test("the catalogue names the unlocking achievement and marks ownership for a user", async () => {
  const { db, ctx } = setup();

  const anonymous = await listAvatars(ctx, null);
  assert.deepEqual(
    anonymous.map((avatar) => [avatar.id, avatar.is_default, avatar.required_achievement_name]),
    [
      ["owl", true, null],
      ["fox", true, null],
      ["flame", false, "Week Warrior"]
    ]
  );
  assert.equal(anonymous[0].is_unlocked, undefined);

  ensureProfile(db, "user-1", today);
  const forUser = await listAvatars(ctx, "user-1");
  assert.deepEqual(
    forUser.map((avatar) => [avatar.id, avatar.is_unlocked, avatar.is_selected, avatar.unlocked_at]),
    [
      ["owl", true, false, today.getTime()],
      ["fox", true, false, today.getTime()],
      ["flame", false, false, null]
    ]
  );
});

test("only an unlocked avatar can be selected", async () => {
  const { db, ctx } = setup();
  ensureProfile(db, "user-1", today);

  await assert.rejects(
    selectAvatar(ctx, { userId: "user-1", avatarId: "dragon" }),
    (error: unknown) => error instanceof AvatarNotFoundError && error.status === 404
  );
  await assert.rejects(
    selectAvatar(ctx, { userId: "user-1", avatarId: "flame" }),
    (error: unknown) => error instanceof AvatarLockedError && error.status === 403
  );

  const selected = await selectAvatar(ctx, { userId: "user-1", avatarId: "fox" });
  assert.equal(selected.id, "fox");
  const profile = db.select().from(userProfiles).where(eq(userProfiles.user_id, "user-1")).get();
  assert.equal(profile?.selected_avatar_id, "fox");
  assert.deepEqual(
    (await listUnlockedAvatars(ctx, "user-1")).map((avatar) => [avatar.id, avatar.is_selected]),
    [
      ["owl", false],
      ["fox", true]
    ]
  );
});

test("collection stats round the completion to one decimal", async () => {
  const { db, ctx } = setup();
  ensureProfile(db, "user-1", today);

  assert.deepEqual(await getAvatarStats(ctx, "user-1"), {
    total_avatars: 3,
    unlocked_avatars: 2,
    completion_percentage: 66.7,
    selected_avatar: null
  });

  db.insert(userAvatars).values({ user_id: "user-1", avatar_id: "flame", unlocked_at: 1 }).run();
  await selectAvatar(ctx, { userId: "user-1", avatarId: "flame" });
  assert.deepEqual(await getAvatarStats(ctx, "user-1"), {
    total_avatars: 3,
    unlocked_avatars: 3,
    completion_percentage: 100,
    selected_avatar: { id: "flame", name: "flame", description: null, image_url: "/avatars/flame.svg", rarity: "rare" }
  });
  assert.equal((await getAvatarStats(ctx, "user-2")).completion_percentage, 0);
});

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { examTypeSchema, questionSchema, raritySchema } from "@quizrank/shared";
import { ensureSchema } from "./db/init";
import { achievements, avatars, questions } from "./db/schema";
import { createSqliteDb } from "./db/sqlite";
import type { ApiDatabase } from "./db/types";
import { resolveNodeEnv } from "./env";
import { ACHIEVEMENT_CRITERIA } from "./services/achievementService";
import { log } from "./utils/logger";

const SEED_DIR = new URL("../seed/", import.meta.url);

const achievementSeedSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  icon: z.string(),
  criteria_type: z.enum(ACHIEVEMENT_CRITERIA),
  criteria_value: z.number().int().positive(),
  criteria_exam_type: examTypeSchema.nullable(),
  xp_reward: z.number().int().min(0),
  rarity: raritySchema,
  display_order: z.number().int(),
  is_hidden: z.boolean()
});

const avatarSeedSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().nullable(),
  image_url: z.string().min(1),
  required_achievement_id: z.string().min(1).nullable(),
  rarity: raritySchema,
  display_order: z.number().int()
});

const readSeedFile = <T>(name: string, schema: z.ZodType<T>) =>
  schema.parse(JSON.parse(fs.readFileSync(fileURLToPath(new URL(name, SEED_DIR)), "utf8")));

export const loadAchievementSeed = () => readSeedFile("achievements.json", z.array(achievementSeedSchema));

export const loadAvatarSeed = () => readSeedFile("avatars.json", z.array(avatarSeedSchema));

export const loadQuestionSeed = () => readSeedFile("questions.json", z.array(questionSchema));

/** Inserts the catalogues and demo bank; rows that already exist are left untouched. */
export const seedDatabase = (db: ApiDatabase, now = Date.now()) => {
  const achievementRows = loadAchievementSeed();
  const avatarRows = loadAvatarSeed();
  const questionRows = loadQuestionSeed();
  db.insert(achievements)
    .values(achievementRows.map((row) => ({ ...row, created_at: now })))
    .onConflictDoNothing()
    .run();
  db.insert(avatars)
    .values(avatarRows.map((row) => ({ ...row, created_at: now })))
    .onConflictDoNothing()
    .run();
  db.insert(questions)
    .values(questionRows.map((row) => ({ ...row, created_at: now })))
    .onConflictDoNothing()
    .run();
  log("info", "seed.applied", {
    achievements: achievementRows.length,
    avatars: avatarRows.length,
    questions: questionRows.length
  });
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const runtimeEnv = resolveNodeEnv();
  ensureSchema(runtimeEnv.dbPath);
  seedDatabase(createSqliteDb(runtimeEnv.dbPath));
}

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";

const MIGRATIONS_DIR = fileURLToPath(new URL("../../../../infra/migrations/", import.meta.url));

export const applySchema = (sqlite: Database.Database, migrationsDir = MIGRATIONS_DIR) => {
  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort();
  for (const file of files) {
    sqlite.exec(fs.readFileSync(path.join(migrationsDir, file), "utf8"));
  }
};

export const ensureSchema = (dbPath: string) => {
  const sqlite = new Database(dbPath);
  applySchema(sqlite);
  sqlite.close();
};

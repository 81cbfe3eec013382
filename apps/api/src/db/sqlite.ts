import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { ApiDatabase, DbExecutor } from "./types";

const BUSY_TIMEOUT_MS = 5_000;

export const openSqlite = (dbPath: string) => {
  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  sqlite.pragma("foreign_keys = ON");
  return sqlite;
};

export const createSqliteDb = (dbPath: string): ApiDatabase => drizzle(openSqlite(dbPath));

/**
 * Runs `work` inside BEGIN IMMEDIATE so the write lock is held from the first read.
 * `work` must stay synchronous: better-sqlite3 commits as soon as it returns.
 */
export const runImmediate = <T>(db: ApiDatabase, work: (tx: DbExecutor) => T): T =>
  db.transaction((tx) => work(tx), { behavior: "immediate" });

export const hasDbChanges = (result: { changes: number | bigint }) => Number(result.changes) > 0;

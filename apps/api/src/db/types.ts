import type { RunResult } from "better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

export type ApiDatabase = BetterSQLite3Database;

/** The database itself or an open transaction on it; both run queries synchronously. */
export type DbExecutor = BaseSQLiteDatabase<"sync", RunResult>;

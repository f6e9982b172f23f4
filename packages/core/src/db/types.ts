import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type * as schema from "./schema.js";

export interface DbConfig {
  /** Database file path, or ":memory:" */
  path: string;
}

export interface CreateDbOptions {
  /** Create tables if missing (default: true) */
  initialize?: boolean;
}

export type DB = BetterSQLite3Database<typeof schema> & {
  $runRaw(sql: string): void;
  $close(): void;
};

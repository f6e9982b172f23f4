import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { ExitCode, HearthError } from "../types.js";
import * as schema from "./schema.js";
import type { CreateDbOptions, DB, DbConfig } from "./types.js";

export * from "./schema.js";
export type { CreateDbOptions, DB, DbConfig } from "./types.js";

const MEMORY_PATH = ":memory:";

export function createDb(config: DbConfig | string, options: CreateDbOptions = {}): DB {
  const { initialize = true } = options;
  const path = typeof config === "string" ? config : config.path;

  try {
    if (path !== MEMORY_PATH) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const sqlite = new Database(path);
    sqlite.pragma("foreign_keys = ON");

    const db: DB = Object.assign(drizzle(sqlite, { schema }), {
      $runRaw(sql: string): void {
        sqlite.exec(sql);
      },
      $close(): void {
        sqlite.close();
      },
    });

    if (initialize) {
      initializeSchema(db);
    }

    return db;
  } catch (error) {
    if (error instanceof HearthError) throw error;
    throw new HearthError(
      `Failed to open database: ${error instanceof Error ? error.message : String(error)}`,
      ExitCode.GENERAL_ERROR,
    );
  }
}

const SCHEMA_SQL = `
PRAGMA journal_mode = WAL;

CREATE TABLE IF NOT EXISTS rooms (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  area_m2 REAL,
  floor TEXT,
  exposure TEXT,
  floor_type TEXT,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS members (
  id TEXT PRIMARY KEY,
  display_name TEXT NOT NULL UNIQUE,
  active INTEGER NOT NULL DEFAULT 1,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  room_id TEXT NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
  description TEXT,
  frequency TEXT,
  interval_days INTEGER CHECK (interval_days IS NULL OR interval_days >= 0),
  hygiene_priority INTEGER NOT NULL CHECK (hygiene_priority >= 0),
  category TEXT NOT NULL DEFAULT 'other' CHECK (category IN ('watering', 'mowing', 'other')),
  avoid_rain INTEGER NOT NULL DEFAULT 0,
  avoid_wind INTEGER NOT NULL DEFAULT 0,
  avoid_snow INTEGER NOT NULL DEFAULT 0,
  avoid_frost INTEGER NOT NULL DEFAULT 0,
  avoid_night INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS rules (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT NOT NULL UNIQUE REFERENCES tasks(id) ON DELETE CASCADE,
  priority_base INTEGER NOT NULL DEFAULT 50,
  target_weekday TEXT CHECK (target_weekday IS NULL OR target_weekday IN
    ('monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday')),
  active INTEGER NOT NULL DEFAULT 1,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS completions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
  room_id TEXT NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
  member_id TEXT REFERENCES members(id) ON DELETE SET NULL,
  completed_at INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'done',
  comment TEXT,
  origin TEXT
);

CREATE UNIQUE INDEX IF NOT EXISTS uq_tasks_room_name ON tasks(room_id, name);
CREATE INDEX IF NOT EXISTS idx_tasks_room ON tasks(room_id);
CREATE INDEX IF NOT EXISTS idx_completions_task ON completions(task_id, completed_at);
`;

export function initializeSchema(db: DB): void {
  db.$runRaw(SCHEMA_SQL);
}

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, join } from "node:path";

export const STATE_DB_FILE = "ingest.sqlite";

export function stateDbPath(stateDir: string): string {
  return join(stateDir, STATE_DB_FILE);
}

export function openStateDb(path: string): Database.Database {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma("journal_mode = DELETE");
  db.pragma("synchronous = FULL");
  db.pragma("busy_timeout = 5000");
  db.exec(`
    CREATE TABLE IF NOT EXISTS checkpoint_sets (
      scope_key  TEXT PRIMARY KEY,
      entities   TEXT NOT NULL, -- sorted JSON array
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS run_history (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id      TEXT    NOT NULL,
      scope       TEXT    NOT NULL,
      status      TEXT    NOT NULL,
      attempts    INTEGER NOT NULL,
      processed   TEXT    NOT NULL, -- JSON array
      remaining   TEXT    NOT NULL, -- JSON array
      started_at  TEXT    NOT NULL,
      finished_at TEXT    NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_run_history_finished_at ON run_history(finished_at);
  `);
  return db;
}

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS ledger_settings (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS ledger_groups (
  name     TEXT PRIMARY KEY,
  currency TEXT NOT NULL DEFAULT 'EUR',
  position INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS group_members (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  group_name TEXT NOT NULL REFERENCES ledger_groups(name) ON DELETE CASCADE,
  name       TEXT NOT NULL,
  balance    INTEGER NOT NULL,
  position   INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS log_entries (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  group_name TEXT NOT NULL REFERENCES ledger_groups(name) ON DELETE CASCADE,
  position   INTEGER NOT NULL,
  command    TEXT NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS log_changes (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  log_entry_id INTEGER NOT NULL REFERENCES log_entries(id) ON DELETE CASCADE,
  member_name  TEXT NOT NULL,
  amount       INTEGER NOT NULL
);
`;

export type LedgerDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Open (and create if needed) the SQLite ledger database.
 * @param databasePath - File path, or `":memory:"` for a throwaway database
 */
export function openDatabase(databasePath: string): LedgerDatabase {
  if (databasePath !== ":memory:") {
    mkdirSync(dirname(databasePath), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(CREATE_TABLES_SQL);

  return drizzle(sqlite, { schema });
}

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { getEnv } from './environment.js';
import { logger } from './logger.js';

export type DatabaseConnection = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS businesses (
    id              TEXT PRIMARY KEY,
    name            TEXT NOT NULL,
    category        TEXT NOT NULL,
    category_labels TEXT NOT NULL DEFAULT '[]',
    lat             REAL,
    lng             REAL,
    address         TEXT,
    rating          REAL,
    review_count    INTEGER,
    popularity      REAL,
    price_tier      INTEGER,
    verified        INTEGER NOT NULL DEFAULT 0,
    hours           TEXT,
    website         TEXT,
    phone           TEXT,
    is_competitor   INTEGER NOT NULL DEFAULT 0,
    first_seen_at   TEXT NOT NULL,
    last_seen_at    TEXT NOT NULL,
    missed_scans    INTEGER NOT NULL DEFAULT 0
  );

  -- Operator annotations outlive the snapshot rows they refer to
  CREATE TABLE IF NOT EXISTS competitor_flags (
    business_id   TEXT PRIMARY KEY,
    is_competitor INTEGER NOT NULL,
    updated_at    TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS scans (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    trigger           TEXT NOT NULL,
    status            TEXT NOT NULL,
    started_at        TEXT NOT NULL,
    finished_at       TEXT,
    businesses_fetched INTEGER NOT NULL DEFAULT 0,
    new_count         INTEGER NOT NULL DEFAULT 0,
    changed_count     INTEGER NOT NULL DEFAULT 0,
    removed_count     INTEGER NOT NULL DEFAULT 0,
    malformed_count   INTEGER NOT NULL DEFAULT 0,
    error_code        TEXT,
    error_message     TEXT
  );

  CREATE TABLE IF NOT EXISTS notifications (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    kind        TEXT NOT NULL,
    business_id TEXT,
    scan_id     INTEGER REFERENCES scans (id),
    title       TEXT NOT NULL,
    message     TEXT NOT NULL,
    created_at  TEXT NOT NULL,
    updated_at  TEXT NOT NULL,
    read        INTEGER NOT NULL DEFAULT 0,
    dismissed   INTEGER NOT NULL DEFAULT 0,
    occurrences INTEGER NOT NULL DEFAULT 1
  );

  CREATE UNIQUE INDEX IF NOT EXISTS notifications_open_key
    ON notifications (COALESCE(business_id, ''), kind)
    WHERE dismissed = 0;

  CREATE INDEX IF NOT EXISTS notifications_created_at ON notifications (created_at);

  CREATE TABLE IF NOT EXISTS settings (
    id         INTEGER PRIMARY KEY CHECK (id = 1),
    config     TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`;

/**
 * Open a SQLite database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string): DatabaseConnection {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

let db: DatabaseConnection | undefined;

export function getDatabase(): DatabaseConnection {
  if (db) return db;
  const { DATABASE_PATH } = getEnv();
  db = openDatabase(DATABASE_PATH);
  logger.info(`[Database] Opened ${DATABASE_PATH}`);
  return db;
}

export function closeDatabase(): void {
  if (!db) return;
  db.close();
  db = undefined;
}

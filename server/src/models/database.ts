/**
 * SQLite Database
 *
 * Opens the provider database and applies the schema. Timestamps are stored
 * as epoch milliseconds so due-time comparisons are plain integer
 * comparisons.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createLogger } from '../utils/logger';

const log = createLogger('DB');

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS providers (
    id                   TEXT PRIMARY KEY,
    name                 TEXT NOT NULL UNIQUE,
    service_type         TEXT NOT NULL,
    schema_version       TEXT NOT NULL,
    endpoint             TEXT NOT NULL,
    create_time          INTEGER NOT NULL,
    update_time          INTEGER NOT NULL,
    health_status        TEXT NOT NULL DEFAULT 'ready'
                         CHECK (health_status IN ('ready', 'not_ready')),
    consecutive_failures INTEGER NOT NULL DEFAULT 0,
    next_health_check    INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_providers_next_health_check
    ON providers (next_health_check);

  CREATE INDEX IF NOT EXISTS idx_providers_service_type
    ON providers (service_type);
`;

/**
 * Create tables and indexes if they do not exist yet
 */
export function migrate(db: SqliteDatabase): void {
  db.exec(SCHEMA);
}

/**
 * Open (creating if needed) the database at `dbPath` and apply the schema.
 * Pass ':memory:' for a throwaway in-process database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  migrate(db);

  log.info('Database ready', { path: dbPath });
  return db;
}

export function closeDatabase(db: SqliteDatabase): void {
  if (!db.open) return;
  db.close();
  log.info('Database connection closed');
}

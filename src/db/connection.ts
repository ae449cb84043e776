/**
 * SQLite connection management.
 *
 * One process-wide connection, used by the game archive. File databases run
 * in WAL mode and get their directory created on open; ':memory:' is
 * accepted as well.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { migrate } from './migrations';

export const MEMORY_DB = ':memory:';

const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'diplomacy.db');

let _db: Database.Database | null = null;

/**
 * Get or create the shared connection.
 */
export function getDb(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (_db) return _db;
  return openDb(dbPath);
}

/**
 * Open a new connection with the schema brought up to date. Any current
 * connection is closed first.
 */
export function openDb(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  closeDb();

  if (dbPath !== MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== MEMORY_DB) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  migrate(db);

  _db = db;
  return db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

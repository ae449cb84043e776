/**
 * SQLite schema migrations.
 *
 * Migrations are numbered sequentially and tracked in `schema_migrations`.
 * Each runs inside its own transaction and is applied once.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

/**
 * All migrations in order. Append new migrations to the end.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      CREATE TABLE games (
        id TEXT PRIMARY KEY,
        players TEXT NOT NULL,
        rules TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'completed')),
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        ended_at TEXT,
        result_type TEXT CHECK (result_type IS NULL OR result_type IN ('win', 'draw')),
        winner TEXT
      );

      CREATE TABLE phases (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        game_id TEXT NOT NULL REFERENCES games(id) ON DELETE CASCADE,
        label TEXT NOT NULL,
        count INTEGER NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN ('MOVE', 'RETREAT', 'BUILD')),
        orders TEXT NOT NULL,
        rejected TEXT NOT NULL,
        state TEXT NOT NULL,
        resolved_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (game_id, label)
      );

      CREATE TABLE press (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        game_id TEXT NOT NULL REFERENCES games(id) ON DELETE CASCADE,
        sender TEXT NOT NULL,
        recipient TEXT NOT NULL,
        phase TEXT NOT NULL,
        content TEXT NOT NULL,
        sent_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_phases_game ON phases(game_id, count);
      CREATE INDEX idx_press_game ON press(game_id);
      CREATE INDEX idx_press_recipient ON press(game_id, recipient);
    `,
  },
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Highest applied migration, 0 for a fresh database.
 */
export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get();
  return row?.version ?? 0;
}

/**
 * Runs all pending migrations and returns how many were applied.
 */
export function migrate(db: Database.Database): number {
  const currentVersion = getCurrentVersion(db);
  const pending = migrations.filter((m) => m.version > currentVersion);

  if (pending.length === 0) return 0;

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  );

  for (const migration of pending) {
    const run = db.transaction(() => {
      db.exec(migration.up);
      insertMigration.run(migration.version, migration.name);
    });
    run();
  }

  return pending.length;
}

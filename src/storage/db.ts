/**
 * Database Connection Factory for Spaced Review
 *
 * Creates SQLite connections through better-sqlite3, wrapped with Drizzle ORM.
 * Every connection has foreign key enforcement enabled and the schema
 * created, so a fresh file (or ':memory:') is usable right away.
 *
 * Usage:
 *   import { createConnection } from '@/storage/db';
 *   const { db, sqlite } = createConnection(config.database.path);
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/**
 * DDL for every table in schema.ts. Statements are idempotent so they can run
 * on each connection.
 */
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS decks (
  id TEXT PRIMARY KEY NOT NULL,
  name TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS decks_name_unique ON decks (name);

CREATE TABLE IF NOT EXISTS flashcards (
  id TEXT PRIMARY KEY NOT NULL,
  deck_id TEXT NOT NULL REFERENCES decks(id) ON DELETE CASCADE,
  term TEXT NOT NULL,
  definition TEXT NOT NULL,
  easiness_factor REAL NOT NULL DEFAULT 2.5,
  interval_days INTEGER NOT NULL DEFAULT 0,
  repetitions INTEGER NOT NULL DEFAULT 0,
  next_review_day INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS flashcards_deck_term_unique ON flashcards (deck_id, term);
CREATE INDEX IF NOT EXISTS flashcards_deck_due_idx ON flashcards (deck_id, next_review_day);

CREATE TABLE IF NOT EXISTS app_state (
  key TEXT PRIMARY KEY NOT NULL,
  value TEXT NOT NULL
);
`;

/**
 * Creates the tables and indexes if they do not exist yet.
 */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}

/**
 * Opens a SQLite database and wraps it with Drizzle ORM.
 *
 * Returns the raw better-sqlite3 handle alongside the Drizzle instance so
 * callers can close the connection.
 *
 * @param dbPath - Path to the SQLite file, or ':memory:'
 *
 * @example
 * ```typescript
 * const { db, sqlite } = createConnection(':memory:');
 * // ...
 * sqlite.close();
 * ```
 */
export function createConnection(dbPath: string = 'spaced-review.db') {
  const sqlite = new Database(dbPath);

  // SQLite ships with foreign keys off; cascade deletes from decks need them
  sqlite.pragma('foreign_keys = ON');

  ensureSchema(sqlite);

  return { db: drizzle(sqlite, { schema }), sqlite };
}

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countDecks(database: AppDatabase) {
 *   return database.select().from(decks);
 * }
 */
export type AppDatabase = ReturnType<typeof createConnection>['db'];

/**
 * A Drizzle instance together with its underlying connection.
 */
export type DatabaseConnection = ReturnType<typeof createConnection>;

/**
 * Database Connection Factory
 *
 * Opens SQLite databases through better-sqlite3 and wraps them with Drizzle
 * ORM. Connections are created explicitly and passed down; there is no
 * module-level instance.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *
 *   const db = createDatabase('study-cadence.db');
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { applySchema } from './migrate';

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countStudents(database: AppDatabase) {
 *   return database.select().from(students).all().length;
 * }
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * A Drizzle instance together with the raw driver connection it wraps.
 * The raw handle is needed for pragmas, schema resets and closing.
 */
export interface DatabaseConnection {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens a raw SQLite connection with foreign keys enforced.
 *
 * File databases are switched to WAL so readers are not blocked by the
 * writer; `:memory:` databases ignore the journal mode.
 */
export function openConnection(dbPath: string): Database.Database {
  const sqlite = new Database(dbPath);

  // SQLite leaves this off by default; sessions and plans cascade from students
  sqlite.pragma('foreign_keys = ON');

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
    // Wait briefly for a competing writer before failing with SQLITE_BUSY
    sqlite.pragma('busy_timeout = 5000');
  }

  return sqlite;
}

/**
 * Opens a database, applies the schema and returns both handles.
 *
 * @param dbPath - SQLite file path, or ':memory:'
 */
export function connectDatabase(dbPath: string): DatabaseConnection {
  const sqlite = openConnection(dbPath);
  applySchema(sqlite);
  return { db: drizzle(sqlite, { schema }), sqlite };
}

/**
 * Creates a ready-to-use Drizzle database at `dbPath`.
 *
 * @example
 * const db = createDatabase(':memory:');
 */
export function createDatabase(dbPath: string): AppDatabase {
  return connectDatabase(dbPath).db;
}

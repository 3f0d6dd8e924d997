/**
 * Database Schema Migration
 *
 * Creates the tables, indexes and check constraints declared in schema.ts.
 * tests/integration/schema.test.ts compares the two. Every statement is
 * idempotent (`IF NOT EXISTS`), so applying the schema to an existing
 * database is safe. Connections opened through `connectDatabase` apply it
 * automatically; this file can also be run directly:
 *
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import { pathToFileURL } from 'node:url';
import type Database from 'better-sqlite3';
import { config as loadEnv } from 'dotenv';
import { getConfig } from '../config';
import { openConnection } from './db';

const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS students (
    id TEXT PRIMARY KEY NOT NULL,
    name TEXT NOT NULL,
    grade TEXT NOT NULL,
    board TEXT NOT NULL,
    daily_duration_minutes INTEGER NOT NULL,
    weekly_frequency INTEGER NOT NULL,
    subjects TEXT NOT NULL,
    study_time_preference TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS newsletters (
    id TEXT PRIMARY KEY NOT NULL,
    user_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    month INTEGER NOT NULL,
    year INTEGER NOT NULL,
    file_path TEXT,
    parsed_data TEXT NOT NULL,
    uploaded_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS newsletters_user_idx ON newsletters (user_id)`,
  `CREATE TABLE IF NOT EXISTS curriculum_items (
    id TEXT PRIMARY KEY NOT NULL,
    newsletter_id TEXT NOT NULL REFERENCES newsletters(id) ON DELETE CASCADE,
    subject TEXT NOT NULL,
    topic TEXT NOT NULL,
    start_date TEXT NOT NULL,
    end_date TEXT,
    created_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS curriculum_items_newsletter_idx ON curriculum_items (newsletter_id)`,
  `CREATE TABLE IF NOT EXISTS topic_states (
    id TEXT PRIMARY KEY NOT NULL,
    user_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    subject TEXT NOT NULL,
    topic TEXT NOT NULL,
    easiness_factor REAL NOT NULL,
    interval INTEGER NOT NULL,
    repetitions INTEGER NOT NULL,
    last_reviewed TEXT,
    next_review TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    CONSTRAINT topic_states_easiness_min CHECK (easiness_factor >= 1.3),
    CONSTRAINT topic_states_interval_min CHECK (interval >= 1),
    CONSTRAINT topic_states_repetitions_min CHECK (repetitions >= 0)
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS topic_states_user_subject_topic_uq ON topic_states (user_id, subject, topic)`,
  `CREATE INDEX IF NOT EXISTS topic_states_user_next_review_idx ON topic_states (user_id, next_review)`,
  `CREATE TABLE IF NOT EXISTS study_sessions (
    id TEXT PRIMARY KEY NOT NULL,
    user_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    topic_state_id TEXT NOT NULL REFERENCES topic_states(id) ON DELETE CASCADE,
    session_date TEXT NOT NULL,
    session_type TEXT NOT NULL,
    quality_rating INTEGER,
    notes TEXT,
    created_at INTEGER NOT NULL,
    CONSTRAINT study_sessions_type_valid CHECK (session_type IN ('study', 'review')),
    CONSTRAINT study_sessions_quality_range CHECK (quality_rating IS NULL OR quality_rating BETWEEN 0 AND 5)
  )`,
  `CREATE INDEX IF NOT EXISTS study_sessions_user_date_idx ON study_sessions (user_id, session_date)`,
  `CREATE INDEX IF NOT EXISTS study_sessions_topic_state_idx ON study_sessions (topic_state_id)`,
  `CREATE TABLE IF NOT EXISTS weekly_plans (
    id TEXT PRIMARY KEY NOT NULL,
    user_id TEXT NOT NULL REFERENCES students(id) ON DELETE CASCADE,
    week_start_date TEXT NOT NULL,
    plan_data TEXT NOT NULL,
    focus_request TEXT,
    events TEXT,
    generated_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS weekly_plans_user_idx ON weekly_plans (user_id, generated_at)`,
];

/** Tables in dependency order (children last). */
export const TABLE_NAMES: readonly string[] = [
  'students',
  'newsletters',
  'curriculum_items',
  'topic_states',
  'study_sessions',
  'weekly_plans',
];

/**
 * Creates every table and index that does not exist yet.
 */
export function applySchema(sqlite: Database.Database): void {
  sqlite.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) {
      sqlite.exec(statement);
    }
  })();
}

/**
 * Drops all application tables and recreates them empty.
 */
export function resetSchema(sqlite: Database.Database): void {
  sqlite.transaction(() => {
    for (const table of [...TABLE_NAMES].reverse()) {
      sqlite.exec(`DROP TABLE IF EXISTS ${table}`);
    }
  })();
  applySchema(sqlite);
}

/**
 * Lists user tables, for reporting after a migration.
 */
export function listTables(sqlite: Database.Database): string[] {
  const rows: unknown[] = sqlite
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all();
  const names: string[] = [];
  for (const row of rows) {
    if (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string') {
      names.push(row.name);
    }
  }
  return names;
}

function runMigration(): void {
  loadEnv();
  const dbPath = getConfig().database.path;
  console.log(`[migrate] Database path: ${dbPath}`);

  const sqlite = openConnection(dbPath);
  try {
    applySchema(sqlite);
    console.log('[migrate] Schema applied.');
    console.log('[migrate] Tables in database:');
    for (const name of listTables(sqlite)) {
      console.log(`  - ${name}`);
    }
    const foreignKeys = sqlite.pragma('foreign_keys', { simple: true });
    console.log(`[migrate] Foreign key enforcement: ${foreignKeys === 1 ? 'ENABLED' : 'DISABLED'}`);
  } finally {
    sqlite.close();
  }
}

const entryPoint = process.argv[1];
if (entryPoint !== undefined && import.meta.url === pathToFileURL(entryPoint).href) {
  try {
    runMigration();
  } catch (error) {
    console.error('[migrate] Migration failed:', error);
    process.exitCode = 1;
  }
}

/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for SQLite. migrate.ts applies the matching DDL; the
 * schema test fails when the two disagree.
 *
 * Tables:
 * - students: learner profiles and planning constraints
 * - newsletters: uploaded monthly curriculum issues
 * - curriculum_items: subject/topic rows of a newsletter
 * - topic_states: SM-2 memory per (student, subject, topic)
 * - study_sessions: append-only session history
 * - weekly_plans: generated study plans
 *
 * Calendar dates (start/end dates, review dates, session dates) are stored
 * as ISO `YYYY-MM-DD` text, which sorts chronologically. Record timestamps
 * are milliseconds since epoch.
 */

import { sql } from 'drizzle-orm';
import {
  sqliteTable,
  check,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';
import type { CurriculumEntry, WeeklyPlanContent } from '@/core/models';

/**
 * Students Table
 */
export const students = sqliteTable('students', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  grade: text('grade').notNull(),
  board: text('board').notNull(),
  dailyDurationMinutes: integer('daily_duration_minutes').notNull(),
  weeklyFrequency: integer('weekly_frequency').notNull(),

  // JSON array of subject names
  subjects: text('subjects', { mode: 'json' }).$type<string[]>().notNull(),

  studyTimePreference: text('study_time_preference'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Newsletters Table
 *
 * One row per uploaded curriculum issue. `parsed_data` keeps the entries
 * exactly as imported so an upload can be audited later.
 */
export const newsletters = sqliteTable(
  'newsletters',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => students.id, { onDelete: 'cascade' }),
    month: integer('month').notNull(),
    year: integer('year').notNull(),
    filePath: text('file_path'),
    parsedData: text('parsed_data', { mode: 'json' }).$type<CurriculumEntry[]>().notNull(),
    uploadedAt: integer('uploaded_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    userIdx: index('newsletters_user_idx').on(table.userId),
  })
);

/**
 * Curriculum Items Table
 */
export const curriculumItems = sqliteTable(
  'curriculum_items',
  {
    id: text('id').primaryKey(),
    newsletterId: text('newsletter_id')
      .notNull()
      .references(() => newsletters.id, { onDelete: 'cascade' }),
    subject: text('subject').notNull(),
    topic: text('topic').notNull(),
    startDate: text('start_date').notNull(),
    // Null when the topic runs open-ended
    endDate: text('end_date'),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    newsletterIdx: index('curriculum_items_newsletter_idx').on(table.newsletterId),
  })
);

/**
 * Topic States Table
 *
 * SM-2 memory for one (student, subject, topic). The unique index enforces
 * a single state per triple; `version` guards schedule updates against
 * lost writes.
 */
export const topicStates = sqliteTable(
  'topic_states',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => students.id, { onDelete: 'cascade' }),
    subject: text('subject').notNull(),
    topic: text('topic').notNull(),

    // SM-2 parameters
    easinessFactor: real('easiness_factor').notNull(),
    interval: integer('interval').notNull(),
    repetitions: integer('repetitions').notNull(),
    lastReviewed: text('last_reviewed'),
    nextReview: text('next_review').notNull(),

    version: integer('version').notNull().default(1),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    topicKey: uniqueIndex('topic_states_user_subject_topic_uq').on(
      table.userId,
      table.subject,
      table.topic
    ),
    dueIdx: index('topic_states_user_next_review_idx').on(table.userId, table.nextReview),
    easinessMin: check('topic_states_easiness_min', sql`${table.easinessFactor} >= 1.3`),
    intervalMin: check('topic_states_interval_min', sql`${table.interval} >= 1`),
    repetitionsMin: check('topic_states_repetitions_min', sql`${table.repetitions} >= 0`),
  })
);

/**
 * Study Sessions Table
 *
 * Append-only. Rows are never updated or deleted by the application.
 */
export const studySessions = sqliteTable(
  'study_sessions',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => students.id, { onDelete: 'cascade' }),
    topicStateId: text('topic_state_id')
      .notNull()
      .references(() => topicStates.id, { onDelete: 'cascade' }),
    sessionDate: text('session_date').notNull(),
    sessionType: text('session_type', { enum: ['study', 'review'] }).notNull(),
    // 0-5, null for a study session recorded without a grade
    qualityRating: integer('quality_rating'),
    notes: text('notes'),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    userDateIdx: index('study_sessions_user_date_idx').on(table.userId, table.sessionDate),
    topicIdx: index('study_sessions_topic_state_idx').on(table.topicStateId),
    typeValid: check('study_sessions_type_valid', sql`${table.sessionType} IN ('study', 'review')`),
    qualityRange: check(
      'study_sessions_quality_range',
      sql`${table.qualityRating} IS NULL OR ${table.qualityRating} BETWEEN 0 AND 5`
    ),
  })
);

/**
 * Weekly Plans Table
 */
export const weeklyPlans = sqliteTable(
  'weekly_plans',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => students.id, { onDelete: 'cascade' }),
    weekStartDate: text('week_start_date').notNull(),
    planData: text('plan_data', { mode: 'json' }).$type<WeeklyPlanContent>().notNull(),
    focusRequest: text('focus_request'),
    events: text('events'),
    generatedAt: integer('generated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    userIdx: index('weekly_plans_user_idx').on(table.userId, table.generatedAt),
  })
);

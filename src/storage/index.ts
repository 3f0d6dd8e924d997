/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { connectDatabase, StudentRepository } from '@/storage';
 *
 *   const { db } = connectDatabase('study-cadence.db');
 *   const students = new StudentRepository(db);
 */

export { openConnection, connectDatabase, createDatabase } from './db';
export type { AppDatabase, DatabaseConnection } from './db';

export { applySchema, resetSchema, listTables, TABLE_NAMES } from './migrate';

export {
  students,
  newsletters,
  curriculumItems,
  topicStates,
  studySessions,
  weeklyPlans,
} from './schema';

export * from './repositories';

/**
 * Repository Helpers
 *
 * Id generation and SQLite error classification shared by the entity
 * repositories.
 *
 * Repositories are synchronous. better-sqlite3 executes each statement on
 * the calling thread, and its transactions only accept synchronous work, so
 * keeping the repositories synchronous lets a service compose several of
 * them inside one transaction.
 */

import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import { ConflictError } from '@/core/errors';

/** Id prefixes per entity. */
export type IdPrefix = 'stu' | 'nl' | 'ci' | 'ts' | 'ss' | 'wp';

/**
 * Generates a prefixed UUID such as `stu_4f0c...`.
 */
export function generateId(prefix: IdPrefix): string {
  return `${prefix}_${randomUUID()}`;
}

const LOCK_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT']);

/**
 * True when `error` (or its cause) is SQLite reporting a locked database.
 */
export function isLockError(error: unknown): boolean {
  if (error instanceof Database.SqliteError) {
    return LOCK_CODES.has(error.code);
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isLockError(error.cause);
  }
  return false;
}

/**
 * True when `error` (or its cause) is a UNIQUE constraint violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof Database.SqliteError) {
    return error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isUniqueViolation(error.cause);
  }
  return false;
}

/**
 * Rethrows a lock error as ConflictError; anything else is returned as-is
 * for the caller to rethrow.
 */
export function translateLockError(error: unknown): unknown {
  if (isLockError(error)) {
    return new ConflictError('The database is locked by another writer; retry the operation', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return error;
}

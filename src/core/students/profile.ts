/**
 * Student Profile Rules
 *
 * Checks applied to profile fields before they are stored, shared by the
 * repository (the single write path) and reusable by callers that want to
 * fail early.
 */

import { ValidationError } from '../errors';
import type { Student } from '../models';

export type StudentProfileFields = Pick<
  Student,
  'name' | 'grade' | 'board' | 'dailyDurationMinutes' | 'weeklyFrequency' | 'subjects' | 'studyTimePreference'
>;

export const MIN_WEEKLY_FREQUENCY = 1;
export const MAX_WEEKLY_FREQUENCY = 7;

/**
 * Trims subject names, drops blanks and duplicates, keeping first-seen order.
 */
export function normalizeSubjects(subjects: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of subjects) {
    const subject = raw.trim();
    if (subject !== '' && !seen.has(subject)) {
      seen.add(subject);
      result.push(subject);
    }
  }
  return result;
}

/**
 * Validates whichever profile fields are present.
 *
 * @throws ValidationError naming the first offending field
 */
export function assertValidProfile(fields: Partial<StudentProfileFields>): void {
  if (fields.name !== undefined && fields.name.trim() === '') {
    throw new ValidationError('name must not be empty', { field: 'name' });
  }

  if (fields.grade !== undefined && fields.grade.trim() === '') {
    throw new ValidationError('grade must not be empty', { field: 'grade' });
  }

  if (fields.board !== undefined && fields.board.trim() === '') {
    throw new ValidationError('board must not be empty', { field: 'board' });
  }

  if (
    fields.dailyDurationMinutes !== undefined &&
    (!Number.isInteger(fields.dailyDurationMinutes) || fields.dailyDurationMinutes <= 0)
  ) {
    throw new ValidationError('dailyDurationMinutes must be a positive integer', {
      field: 'dailyDurationMinutes',
      value: fields.dailyDurationMinutes,
    });
  }

  if (
    fields.weeklyFrequency !== undefined &&
    (!Number.isInteger(fields.weeklyFrequency) ||
      fields.weeklyFrequency < MIN_WEEKLY_FREQUENCY ||
      fields.weeklyFrequency > MAX_WEEKLY_FREQUENCY)
  ) {
    throw new ValidationError(
      `weeklyFrequency must be an integer from ${MIN_WEEKLY_FREQUENCY} to ${MAX_WEEKLY_FREQUENCY}`,
      { field: 'weeklyFrequency', value: fields.weeklyFrequency }
    );
  }

  if (fields.subjects !== undefined && normalizeSubjects(fields.subjects).length === 0) {
    throw new ValidationError('subjects must name at least one subject', { field: 'subjects' });
  }
}

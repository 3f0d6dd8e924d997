/**
 * Commander option parsers. Each throws InvalidArgumentError, which
 * commander reports as "error: option '--x <n>' argument 'y' is invalid".
 */

import { InvalidArgumentError } from 'commander';
import { isCalendarDate, type CalendarDate } from '../../core/sm2/calendar';

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return Number(trimmed);
}

export function parseDate(value: string): CalendarDate {
  const trimmed = value.trim();
  if (!isCalendarDate(trimmed)) {
    throw new InvalidArgumentError('Expected a YYYY-MM-DD date.');
  }
  return trimmed;
}

/**
 * Splits "Maths, Science ,English" into trimmed, non-empty names.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

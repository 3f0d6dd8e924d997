/**
 * Calendar Date Utilities
 *
 * Review scheduling works in whole days. Dates travel through the system as
 * ISO `YYYY-MM-DD` strings and all arithmetic happens on UTC day numbers, so
 * the time of day and the host's time zone never shift a due date.
 */

/** A calendar date in `YYYY-MM-DD` form. */
export type CalendarDate = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 86_400_000;

/**
 * Checks that a string is a real calendar date in `YYYY-MM-DD` form.
 * Rejects impossible dates such as `2024-02-30`.
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  return isValidYearMonthDay(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Checks a year/month/day triple against the proleptic Gregorian calendar.
 */
export function isValidYearMonthDay(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

/**
 * Builds a calendar date from its parts.
 *
 * @throws RangeError when the parts do not name a real date
 */
export function calendarDate(year: number, month: number, day: number): CalendarDate {
  if (!isValidYearMonthDay(year, month, day)) {
    throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
  }
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Converts a calendar date to its day number (days since 1970-01-01).
 *
 * @throws RangeError for malformed input
 */
export function toEpochDay(date: CalendarDate): number {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match || !isValidYearMonthDay(Number(match[1]), Number(match[2]), Number(match[3]))) {
    throw new RangeError(`Expected a YYYY-MM-DD date, received '${date}'`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) / MS_PER_DAY;
}

/** Inverse of {@link toEpochDay}. */
export function fromEpochDay(epochDay: number): CalendarDate {
  const d = new Date(epochDay * MS_PER_DAY);
  return `${String(d.getUTCFullYear()).padStart(4, '0')}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

/**
 * Shifts a date by a whole number of days (negative values go back).
 *
 * @example
 * addDays('2024-02-28', 2); // '2024-03-01'
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + Math.trunc(days));
}

/** Signed number of days from `from` to `to`. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return toEpochDay(to) - toEpochDay(from);
}

/** Lexicographic comparison is chronological for ISO dates. */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * The local calendar date for an instant, defaulting to now.
 */
export function today(now: Date = new Date()): CalendarDate {
  return `${String(now.getFullYear()).padStart(4, '0')}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/** ISO weekday: Monday = 1 ... Sunday = 7. */
export function isoWeekday(date: CalendarDate): number {
  // 1970-01-01 was a Thursday (4)
  const offset = (toEpochDay(date) + 3) % 7;
  return (offset < 0 ? offset + 7 : offset) + 1;
}

/**
 * The first Monday strictly after `date`. A Monday rolls forward a full week.
 *
 * @example
 * nextMonday('2024-01-03'); // '2024-01-08'
 * nextMonday('2024-01-08'); // '2024-01-15'
 */
export function nextMonday(date: CalendarDate): CalendarDate {
  const weekday = isoWeekday(date);
  return addDays(date, 8 - weekday);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Newsletter Parser
 *
 * Reads the curriculum table of a school newsletter exported as CSV. The
 * table has one row per topic with `subject`, `topic`, a start date
 * (`date` or `start_date`) and an optional `end_date` column. Column names
 * are matched case-insensitively after trimming.
 *
 * Rows that cannot be used are reported in `skipped` rather than failing
 * the whole file, since newsletters often carry blank or note rows.
 */

import { ValidationError } from '../errors';
import { calendarDate, type CalendarDate } from '../sm2/calendar';
import type { CurriculumEntry } from '../models';

export interface SkippedRow {
  /** Record number in the file, counting the header as 1 */
  line: number;
  reason: string;
}

export interface ParsedNewsletter {
  items: CurriculumEntry[];
  skipped: SkippedRow[];
}

// =============================================================================
// Dates
// =============================================================================

type DateOrder = 'ymd' | 'dmy' | 'mdy';

interface DateFormat {
  pattern: RegExp;
  order: DateOrder;
  twoDigitYear: boolean;
}

/** Tried in order; the first that yields a real calendar date wins. */
const DATE_FORMATS: readonly DateFormat[] = [
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'ymd', twoDigitYear: false },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'dmy', twoDigitYear: false },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'mdy', twoDigitYear: false },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'dmy', twoDigitYear: false },
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'ymd', twoDigitYear: false },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/, order: 'dmy', twoDigitYear: true },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/, order: 'mdy', twoDigitYear: true },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{2})$/, order: 'dmy', twoDigitYear: true },
];

/**
 * Two-digit years follow the POSIX pivot: 69-99 are 1900s, 00-68 are 2000s.
 */
export function expandTwoDigitYear(year: number): number {
  return year >= 69 ? 1900 + year : 2000 + year;
}

function tryFormat(value: string, format: DateFormat): CalendarDate | null {
  const match = format.pattern.exec(value);
  if (!match) return null;

  const [, a, b, c] = match;
  const parts: Record<DateOrder, [number, number, number]> = {
    ymd: [Number(a), Number(b), Number(c)],
    dmy: [Number(c), Number(b), Number(a)],
    mdy: [Number(c), Number(a), Number(b)],
  };
  const [rawYear, month, day] = parts[format.order];
  const year = format.twoDigitYear ? expandTwoDigitYear(rawYear) : rawYear;

  try {
    return calendarDate(year, month, day);
  } catch (error) {
    if (error instanceof RangeError) return null;
    throw error;
  }
}

/**
 * Parses a newsletter date into `YYYY-MM-DD`, or null when no supported
 * format matches. Day-first readings win over month-first ones, so
 * `03/04/2024` is 3 April.
 *
 * @example
 * parseCurriculumDate('15/01/2024'); // '2024-01-15'
 * parseCurriculumDate('01/15/2024'); // '2024-01-15' (day-first fails, month-first matches)
 * parseCurriculumDate('5-2-24');     // '2024-02-05'
 */
export function parseCurriculumDate(value: string): CalendarDate | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;

  for (const format of DATE_FORMATS) {
    const parsed = tryFormat(trimmed, format);
    if (parsed !== null) return parsed;
  }
  return null;
}

// =============================================================================
// CSV
// =============================================================================

/**
 * Splits CSV text into records. Handles quoted fields containing commas,
 * line breaks and doubled quotes, CRLF line endings and a leading BOM.
 */
export function parseCsvRecords(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < input.length) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      i += 1;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      if (char === '\r' && input[i + 1] === '\n') {
        i += 1;
      }
    } else {
      field += char;
    }
    i += 1;
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}

function isBlankRecord(record: readonly string[]): boolean {
  return record.every((cell) => cell.trim() === '');
}

/** Spreadsheet exports can write empty cells as the literal "nan" */
function isMissing(value: string): boolean {
  return value === '' || value.toLowerCase() === 'nan';
}

/**
 * Parses a newsletter CSV into curriculum entries.
 *
 * @throws ValidationError when the file is empty or lacks the subject,
 *   topic or date columns
 *
 * @example
 * ```typescript
 * const { items, skipped } = parseNewsletterCsv(
 *   'Subject,Topic,Date\nMaths,Fractions,15/01/2024\nMaths,,16/01/2024\n'
 * );
 * // items: [{ subject: 'Maths', topic: 'Fractions', startDate: '2024-01-15', endDate: null }]
 * // skipped: [{ line: 3, reason: 'missing topic' }]
 * ```
 */
export function parseNewsletterCsv(text: string): ParsedNewsletter {
  const records = parseCsvRecords(text);
  const headerIndex = records.findIndex((record) => !isBlankRecord(record));
  if (headerIndex === -1) {
    throw new ValidationError('Newsletter file is empty');
  }

  const header = records[headerIndex].map((name) => name.trim().toLowerCase());
  const column = (name: string): number => header.indexOf(name);

  const subjectCol = column('subject');
  const topicCol = column('topic');
  const dateCol = column('date') !== -1 ? column('date') : column('start_date');
  const endDateCol = column('end_date');

  const missingColumns: string[] = [];
  if (subjectCol === -1) missingColumns.push('subject');
  if (topicCol === -1) missingColumns.push('topic');
  if (dateCol === -1) missingColumns.push('date');
  if (missingColumns.length > 0) {
    throw new ValidationError(`Newsletter is missing required columns: ${missingColumns.join(', ')}`, {
      missingColumns,
      header,
    });
  }

  const items: CurriculumEntry[] = [];
  const skipped: SkippedRow[] = [];

  for (let index = headerIndex + 1; index < records.length; index++) {
    const record = records[index];
    if (isBlankRecord(record)) continue;

    const line = index + 1;
    const cell = (col: number): string => (col === -1 ? '' : (record[col] ?? '').trim());

    const subject = cell(subjectCol);
    const topic = cell(topicCol);
    const rawStart = cell(dateCol);

    if (isMissing(subject)) {
      skipped.push({ line, reason: 'missing subject' });
      continue;
    }
    if (isMissing(topic)) {
      skipped.push({ line, reason: 'missing topic' });
      continue;
    }

    const startDate = parseCurriculumDate(rawStart);
    if (startDate === null) {
      skipped.push({
        line,
        reason: rawStart === '' ? 'missing start date' : `unrecognised start date '${rawStart}'`,
      });
      continue;
    }

    items.push({
      subject,
      topic,
      startDate,
      endDate: parseCurriculumDate(cell(endDateCol)),
    });
  }

  return { items, skipped };
}

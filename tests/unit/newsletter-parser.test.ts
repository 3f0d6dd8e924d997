/**
 * Newsletter Parser Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  expandTwoDigitYear,
  parseCsvRecords,
  parseCurriculumDate,
  parseNewsletterCsv,
} from '../../src/core/curriculum';
import { ValidationError } from '../../src/core/errors';

describe('parseCurriculumDate', () => {
  it('reads ISO dates', () => {
    expect(parseCurriculumDate('2024-01-15')).toBe('2024-01-15');
    expect(parseCurriculumDate('2024-1-5')).toBe('2024-01-05');
  });

  it('reads slashed and dashed dates day first', () => {
    expect(parseCurriculumDate('03/04/2024')).toBe('2024-04-03');
    expect(parseCurriculumDate('15-01-2024')).toBe('2024-01-15');
  });

  it('falls back to month first when day first is impossible', () => {
    expect(parseCurriculumDate('01/15/2024')).toBe('2024-01-15');
  });

  it('expands two-digit years', () => {
    expect(parseCurriculumDate('5-2-24')).toBe('2024-02-05');
    expect(parseCurriculumDate('31/12/99')).toBe('1999-12-31');
  });

  it('returns null for blanks and unrecognised text', () => {
    expect(parseCurriculumDate('  ')).toBeNull();
    expect(parseCurriculumDate('next week')).toBeNull();
    expect(parseCurriculumDate('31/02/2024')).toBeNull();
  });
});

describe('expandTwoDigitYear', () => {
  it('pivots at 69', () => {
    expect(expandTwoDigitYear(68)).toBe(2068);
    expect(expandTwoDigitYear(69)).toBe(1969);
    expect(expandTwoDigitYear(0)).toBe(2000);
  });
});

describe('parseCsvRecords', () => {
  it('handles quoted commas, doubled quotes and line breaks', () => {
    const text = 'a,"b, c","say ""hi""","line\nbreak"\r\nd,e,f,g\n';

    expect(parseCsvRecords(text)).toEqual([
      ['a', 'b, c', 'say "hi"', 'line\nbreak'],
      ['d', 'e', 'f', 'g'],
    ]);
  });

  it('strips a leading byte order mark', () => {
    expect(parseCsvRecords('\uFEFFSubject,Topic')).toEqual([['Subject', 'Topic']]);
  });

  it('keeps a final record without a trailing newline', () => {
    expect(parseCsvRecords('a,b\nc,')).toEqual([
      ['a', 'b'],
      ['c', ''],
    ]);
  });
});

describe('parseNewsletterCsv', () => {
  it('matches column names case-insensitively and ignores extra columns', () => {
    const csv = [' SUBJECT ,Notes,Topic,START_DATE,End_Date', 'Maths,bring ruler,Angles,2024-03-04,2024-03-08'].join(
      '\n'
    );

    expect(parseNewsletterCsv(csv)).toEqual({
      items: [{ subject: 'Maths', topic: 'Angles', startDate: '2024-03-04', endDate: '2024-03-08' }],
      skipped: [],
    });
  });

  it('prefers the date column over start_date', () => {
    const csv = ['subject,topic,start_date,date', 'Maths,Angles,2024-03-01,2024-03-04'].join('\n');

    expect(parseNewsletterCsv(csv).items[0].startDate).toBe('2024-03-04');
  });

  it('reports unusable rows with their line numbers', () => {
    const csv = [
      '',
      'Subject,Topic,Date',
      'nan,Angles,2024-03-04',
      'Maths,NaN,2024-03-04',
      'Maths,Angles,',
      '',
      'Maths,Angles,soon',
      'Maths, Area ,04/03/2024',
    ].join('\n');

    expect(parseNewsletterCsv(csv)).toEqual({
      items: [{ subject: 'Maths', topic: 'Area', startDate: '2024-03-04', endDate: null }],
      skipped: [
        { line: 3, reason: 'missing subject' },
        { line: 4, reason: 'missing topic' },
        { line: 5, reason: 'missing start date' },
        { line: 7, reason: "unrecognised start date 'soon'" },
      ],
    });
  });

  it('treats an unreadable end date as open-ended', () => {
    const csv = ['Subject,Topic,Date,End_Date', 'Maths,Area,2024-03-04,tbc'].join('\n');

    expect(parseNewsletterCsv(csv).items[0].endDate).toBeNull();
  });

  it('rejects an empty file', () => {
    expect(() => parseNewsletterCsv('\n \n')).toThrow('Newsletter file is empty');
  });

  it('names every missing required column', () => {
    try {
      parseNewsletterCsv('Notes\nsomething');
      expect.unreachable('parseNewsletterCsv should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('message', 'Newsletter is missing required columns: subject, topic, date');
    }
  });
});

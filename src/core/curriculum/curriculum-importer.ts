/**
 * CurriculumImporter
 *
 * Turns a parsed newsletter into stored curriculum and SM-2 state. An
 * import is all-or-nothing: the newsletter record, its items and any new
 * topic states are written in one transaction.
 */

import { NotFoundError, ValidationError } from '../errors';
import type { CalendarDate } from '../sm2/calendar';
import type { CurriculumEntry, CurriculumItem, Newsletter, Student } from '../models';
import { TopicInitializer } from '../review/topic-initializer';
import type { TopicStateStore } from '../review/types';
import { parseNewsletterCsv, type SkippedRow } from './newsletter-parser';

/**
 * Persistence the importer needs for newsletters and their items.
 */
export interface CurriculumStore {
  create(input: {
    userId: string;
    month: number;
    year: number;
    filePath?: string | null;
    parsedData: CurriculumEntry[];
  }): Newsletter;
  addItems(newsletterId: string, entries: readonly CurriculumEntry[]): CurriculumItem[];
  findActiveItems(userId: string, date: CalendarDate): CurriculumItem[];
  findSubjects(userId: string): string[];
}

export interface StudentLookup {
  findById(id: string): Student | null;
}

export interface ImportNewsletterInput {
  userId: string;
  /** 1-12 */
  month: number;
  year: number;
  filePath?: string | null;
  items: CurriculumEntry[];
}

export interface ImportNewsletterResult {
  newsletter: Newsletter;
  items: CurriculumItem[];
  /** Topic states created by this import */
  topicsCreated: number;
  /** Topics that already had a state and were left untouched */
  topicsExisting: number;
}

export interface ImportNewsletterCsvInput extends Omit<ImportNewsletterInput, 'items'> {
  /** Text of the newsletter's curriculum table exported as CSV */
  csv: string;
}

export interface ImportNewsletterCsvResult extends ImportNewsletterResult {
  /** Rows left out of the import, with the reason */
  skipped: SkippedRow[];
}

export class CurriculumImporter {
  private readonly initializer: TopicInitializer;

  constructor(
    private readonly students: StudentLookup,
    private readonly curriculum: CurriculumStore,
    private readonly topicStates: TopicStateStore,
    initializer?: TopicInitializer
  ) {
    this.initializer = initializer ?? new TopicInitializer(topicStates);
  }

  /**
   * Stores a newsletter and initializes a topic state for every new
   * (subject, topic) it lists. A topic listed twice is initialized from
   * its first row; a topic already tracked keeps its state.
   *
   * @throws NotFoundError when the student does not exist
   * @throws ValidationError for a month outside 1-12 or a bad year
   */
  importNewsletter(input: ImportNewsletterInput): ImportNewsletterResult {
    if (!Number.isInteger(input.month) || input.month < 1 || input.month > 12) {
      throw new ValidationError('month must be an integer from 1 to 12', {
        field: 'month',
        value: input.month,
      });
    }
    if (!Number.isInteger(input.year) || input.year < 1) {
      throw new ValidationError('year must be a positive integer', { field: 'year', value: input.year });
    }

    return this.topicStates.transaction(() => {
      if (!this.students.findById(input.userId)) {
        throw new NotFoundError('Student', input.userId);
      }

      const newsletter = this.curriculum.create({
        userId: input.userId,
        month: input.month,
        year: input.year,
        filePath: input.filePath ?? null,
        parsedData: input.items,
      });
      const items = this.curriculum.addItems(newsletter.id, input.items);

      let topicsCreated = 0;
      let topicsExisting = 0;
      const seen = new Set<string>();
      for (const item of items) {
        const key = JSON.stringify([item.subject, item.topic]);
        if (seen.has(key)) continue;
        seen.add(key);

        const { created } = this.initializer.initializeTopic(
          { userId: input.userId, subject: item.subject, topic: item.topic },
          item.startDate
        );
        if (created) {
          topicsCreated += 1;
        } else {
          topicsExisting += 1;
        }
      }

      return { newsletter, items, topicsCreated, topicsExisting };
    });
  }

  /**
   * Parses a CSV newsletter and imports its valid rows.
   *
   * @throws ValidationError when the file is empty, lacks a required
   *   column, or has no usable row
   */
  importNewsletterCsv(input: ImportNewsletterCsvInput): ImportNewsletterCsvResult {
    const { items, skipped } = parseNewsletterCsv(input.csv);
    if (items.length === 0) {
      throw new ValidationError('Newsletter contains no valid curriculum rows', { skipped });
    }

    const result = this.importNewsletter({
      userId: input.userId,
      month: input.month,
      year: input.year,
      filePath: input.filePath,
      items,
    });
    return { ...result, skipped };
  }

  /**
   * Curriculum items active on `date`: started on or before it, and either
   * open-ended or ending on or after it.
   */
  currentCurriculum(userId: string, date: CalendarDate): CurriculumItem[] {
    return this.curriculum.findActiveItems(userId, date);
  }

  /** Distinct subjects in the student's uploaded curriculum, sorted. */
  listSubjects(userId: string): string[] {
    return this.curriculum.findSubjects(userId);
  }
}

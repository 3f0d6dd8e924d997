/**
 * Newsletter Repository Implementation
 *
 * Stores uploaded curriculum newsletters and their items. Items belong to a
 * newsletter, so they are written and read through this repository rather
 * than a separate one.
 */

import { and, asc, desc, eq, gte, isNull, lte, or } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { curriculumItems, newsletters } from '../schema';
import type { CalendarDate } from '@/core/sm2/calendar';
import type { CurriculumEntry, CurriculumItem, Newsletter } from '@/core/models';
import { NotFoundError } from '@/core/errors';
import type { CurriculumStore } from '@/core/curriculum';
import { generateId } from './base';

export interface CreateNewsletterInput {
  userId: string;
  month: number;
  year: number;
  filePath?: string | null;
  parsedData: CurriculumEntry[];
}

function mapNewsletter(row: typeof newsletters.$inferSelect): Newsletter {
  return {
    id: row.id,
    userId: row.userId,
    month: row.month,
    year: row.year,
    filePath: row.filePath,
    parsedData: row.parsedData,
    uploadedAt: row.uploadedAt,
  };
}

function mapItem(row: typeof curriculumItems.$inferSelect): CurriculumItem {
  return {
    id: row.id,
    newsletterId: row.newsletterId,
    subject: row.subject,
    topic: row.topic,
    startDate: row.startDate,
    endDate: row.endDate,
    createdAt: row.createdAt,
  };
}

export class NewsletterRepository implements CurriculumStore {
  constructor(private readonly db: AppDatabase) {}

  findById(id: string): Newsletter | null {
    const row = this.db.select().from(newsletters).where(eq(newsletters.id, id)).get();
    return row ? mapNewsletter(row) : null;
  }

  /** Newsletters for a student, most recently uploaded first. */
  findByUser(userId: string): Newsletter[] {
    return this.db
      .select()
      .from(newsletters)
      .where(eq(newsletters.userId, userId))
      .orderBy(desc(newsletters.uploadedAt), desc(newsletters.id))
      .all()
      .map(mapNewsletter);
  }

  create(input: CreateNewsletterInput): Newsletter {
    const [row] = this.db
      .insert(newsletters)
      .values({
        id: generateId('nl'),
        userId: input.userId,
        month: input.month,
        year: input.year,
        filePath: input.filePath ?? null,
        parsedData: input.parsedData,
        uploadedAt: new Date(),
      })
      .returning()
      .all();

    return mapNewsletter(row);
  }

  /**
   * Inserts the items of a newsletter in their original order.
   *
   * @throws NotFoundError when the newsletter does not exist
   */
  addItems(newsletterId: string, entries: readonly CurriculumEntry[]): CurriculumItem[] {
    if (!this.findById(newsletterId)) {
      throw new NotFoundError('Newsletter', newsletterId);
    }
    if (entries.length === 0) {
      return [];
    }

    const now = new Date();
    return this.db
      .insert(curriculumItems)
      .values(
        entries.map((entry) => ({
          id: generateId('ci'),
          newsletterId,
          subject: entry.subject,
          topic: entry.topic,
          startDate: entry.startDate,
          endDate: entry.endDate,
          createdAt: now,
        }))
      )
      .returning()
      .all()
      .map(mapItem);
  }

  findItemsByNewsletter(newsletterId: string): CurriculumItem[] {
    return this.db
      .select()
      .from(curriculumItems)
      .where(eq(curriculumItems.newsletterId, newsletterId))
      .orderBy(asc(curriculumItems.startDate), asc(curriculumItems.subject), asc(curriculumItems.topic))
      .all()
      .map(mapItem);
  }

  /**
   * Items of every newsletter the student uploaded that are active on
   * `date`: started on or before it and not yet ended.
   */
  findActiveItems(userId: string, date: CalendarDate): CurriculumItem[] {
    return this.db
      .select({ item: curriculumItems })
      .from(curriculumItems)
      .innerJoin(newsletters, eq(curriculumItems.newsletterId, newsletters.id))
      .where(
        and(
          eq(newsletters.userId, userId),
          lte(curriculumItems.startDate, date),
          or(isNull(curriculumItems.endDate), gte(curriculumItems.endDate, date))
        )
      )
      .orderBy(asc(curriculumItems.startDate), asc(curriculumItems.subject), asc(curriculumItems.topic))
      .all()
      .map((row) => mapItem(row.item));
  }

  /** Distinct subjects across the student's curriculum, sorted. */
  findSubjects(userId: string): string[] {
    return this.db
      .selectDistinct({ subject: curriculumItems.subject })
      .from(curriculumItems)
      .innerJoin(newsletters, eq(curriculumItems.newsletterId, newsletters.id))
      .where(eq(newsletters.userId, userId))
      .orderBy(asc(curriculumItems.subject))
      .all()
      .map((row) => row.subject);
  }
}

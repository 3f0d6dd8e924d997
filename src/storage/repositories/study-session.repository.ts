/**
 * StudySession Repository Implementation
 *
 * Append-only history of study and review sessions. There is no update or
 * delete: a recorded session is a fact about the past. Rows leave the table
 * only when their student or topic state is deleted (cascade).
 */

import { and, desc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { studySessions, topicStates } from '../schema';
import type { CalendarDate } from '@/core/sm2/calendar';
import { isQuality, type Quality } from '@/core/sm2/types';
import type { StudySession, StudySessionWithTopic } from '@/core/models';
import type { AppendSessionInput } from '@/core/review';
import { generateId } from './base';

// Insertion order, used to break ties between sessions on the same date
const insertionOrder = sql`study_sessions.rowid`;

export const DEFAULT_RECENT_SESSION_LIMIT = 50;

/**
 * Ratings are constrained to 0-5 by the table's CHECK, so anything else
 * read back is treated as absent.
 */
function toQuality(value: number | null): Quality | null {
  return isQuality(value) ? value : null;
}

function mapToDomain(row: typeof studySessions.$inferSelect): StudySession {
  return {
    id: row.id,
    userId: row.userId,
    topicStateId: row.topicStateId,
    sessionDate: row.sessionDate,
    sessionType: row.sessionType,
    qualityRating: toQuality(row.qualityRating),
    notes: row.notes,
    createdAt: row.createdAt,
  };
}

export class StudySessionRepository {
  constructor(private readonly db: AppDatabase) {}

  findById(id: string): StudySession | null {
    const row = this.db.select().from(studySessions).where(eq(studySessions.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * Appends a session record.
   */
  create(input: AppendSessionInput): StudySession {
    const [row] = this.db
      .insert(studySessions)
      .values({
        id: generateId('ss'),
        userId: input.userId,
        topicStateId: input.topicStateId,
        sessionDate: input.sessionDate,
        sessionType: input.sessionType,
        qualityRating: input.qualityRating,
        notes: input.notes,
        createdAt: new Date(),
      })
      .returning()
      .all();

    return mapToDomain(row);
  }

  /**
   * Most recent sessions for a student with their subject and topic,
   * newest session date first (insertion order breaks ties).
   */
  findRecentByUser(userId: string, limit: number = DEFAULT_RECENT_SESSION_LIMIT): StudySessionWithTopic[] {
    return this.db
      .select({ session: studySessions, subject: topicStates.subject, topic: topicStates.topic })
      .from(studySessions)
      .innerJoin(topicStates, eq(studySessions.topicStateId, topicStates.id))
      .where(eq(studySessions.userId, userId))
      .orderBy(desc(studySessions.sessionDate), desc(insertionOrder))
      .limit(limit)
      .all()
      .map((row) => ({ ...mapToDomain(row.session), subject: row.subject, topic: row.topic }));
  }

  /** Sessions recorded for a student on one date, oldest first. */
  findByDate(userId: string, date: CalendarDate): StudySessionWithTopic[] {
    return this.db
      .select({ session: studySessions, subject: topicStates.subject, topic: topicStates.topic })
      .from(studySessions)
      .innerJoin(topicStates, eq(studySessions.topicStateId, topicStates.id))
      .where(and(eq(studySessions.userId, userId), eq(studySessions.sessionDate, date)))
      .orderBy(insertionOrder)
      .all()
      .map((row) => ({ ...mapToDomain(row.session), subject: row.subject, topic: row.topic }));
  }

  /** Every session recorded against one topic state, oldest first. */
  findByTopicState(topicStateId: string): StudySession[] {
    return this.db
      .select()
      .from(studySessions)
      .where(eq(studySessions.topicStateId, topicStateId))
      .orderBy(studySessions.sessionDate, insertionOrder)
      .all()
      .map(mapToDomain);
  }

  countByUser(userId: string): number {
    return this.db
      .select({ id: studySessions.id })
      .from(studySessions)
      .where(eq(studySessions.userId, userId))
      .all().length;
  }
}

/**
 * TopicState Repository Implementation
 *
 * The SQLite implementation of the review core's {@link TopicStateStore}.
 * Maps between the flat SM-2 columns and the nested `schedule` object,
 * guards schedule writes with the row's `version`, and translates SQLite
 * lock and uniqueness failures into ConflictError.
 */

import { and, asc, eq, lte } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { topicStates } from '../schema';
import type { StudySession, TopicKey, TopicState } from '@/core/models';
import type {
  AppendSessionInput,
  CreateTopicStateInput,
  TopicStateFilter,
  TopicStateStore,
} from '@/core/review';
import { ConflictError, NotFoundError } from '@/core/errors';
import { generateId, isUniqueViolation, translateLockError } from './base';
import { StudySessionRepository } from './study-session.repository';

/**
 * Maps a database row to a TopicState domain model, nesting the SM-2
 * columns under `schedule`.
 */
function mapToDomain(row: typeof topicStates.$inferSelect): TopicState {
  return {
    id: row.id,
    userId: row.userId,
    subject: row.subject,
    topic: row.topic,
    schedule: {
      easinessFactor: row.easinessFactor,
      interval: row.interval,
      repetitions: row.repetitions,
      lastReviewed: row.lastReviewed,
      nextReview: row.nextReview,
    },
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * @example
 * ```typescript
 * const store = new TopicStateRepository(db);
 * const recorder = new ReviewSessionRecorder(store);
 *
 * recorder.record({
 *   userId: 'stu_1',
 *   topic: { subject: 'Maths', topic: 'Fractions' },
 *   sessionType: 'review',
 *   qualityRating: 5,
 * });
 * ```
 */
export class TopicStateRepository implements TopicStateStore {
  private readonly sessions: StudySessionRepository;

  constructor(private readonly db: AppDatabase) {
    this.sessions = new StudySessionRepository(db);
  }

  getState(key: TopicKey): TopicState | null {
    const row = this.db
      .select()
      .from(topicStates)
      .where(
        and(
          eq(topicStates.userId, key.userId),
          eq(topicStates.subject, key.subject),
          eq(topicStates.topic, key.topic)
        )
      )
      .get();

    return row ? mapToDomain(row) : null;
  }

  getStateById(id: string): TopicState | null {
    const row = this.db.select().from(topicStates).where(eq(topicStates.id, id)).get();
    return row ? mapToDomain(row) : null;
  }

  /**
   * @throws ConflictError when a state already exists for the triple
   */
  createState(input: CreateTopicStateInput): TopicState {
    const now = new Date();

    try {
      const [row] = this.db
        .insert(topicStates)
        .values({
          id: generateId('ts'),
          userId: input.userId,
          subject: input.subject,
          topic: input.topic,
          easinessFactor: input.schedule.easinessFactor,
          interval: input.schedule.interval,
          repetitions: input.schedule.repetitions,
          lastReviewed: input.schedule.lastReviewed,
          nextReview: input.schedule.nextReview,
          version: 1,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
        .all();

      return mapToDomain(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(
          `A topic state already exists for ${input.subject}/${input.topic}`,
          { userId: input.userId, subject: input.subject, topic: input.topic }
        );
      }
      throw translateLockError(error);
    }
  }

  /**
   * Compare-and-swap on `version`: the row is written only if its stored
   * version still equals `state.version`.
   *
   * @throws NotFoundError when the state no longer exists
   * @throws ConflictError when another writer updated it first
   */
  updateState(state: TopicState): TopicState {
    const nextVersion = state.version + 1;

    const result = this.db
      .update(topicStates)
      .set({
        easinessFactor: state.schedule.easinessFactor,
        interval: state.schedule.interval,
        repetitions: state.schedule.repetitions,
        lastReviewed: state.schedule.lastReviewed,
        nextReview: state.schedule.nextReview,
        version: nextVersion,
        updatedAt: new Date(),
      })
      .where(and(eq(topicStates.id, state.id), eq(topicStates.version, state.version)))
      .run();

    if (result.changes === 0) {
      const current = this.getStateById(state.id);
      if (!current) {
        throw new NotFoundError('TopicState', state.id);
      }
      throw new ConflictError(`TopicState '${state.id}' was modified by another writer`, {
        id: state.id,
        expectedVersion: state.version,
        actualVersion: current.version,
      });
    }

    const updated = this.getStateById(state.id);
    if (!updated) {
      throw new NotFoundError('TopicState', state.id);
    }
    return updated;
  }

  appendSession(input: AppendSessionInput): StudySession {
    return this.sessions.create(input);
  }

  /**
   * States for a student, ordered by nextReview then subject and topic.
   */
  queryStates(userId: string, filter: TopicStateFilter = {}): TopicState[] {
    const conditions = [eq(topicStates.userId, userId)];
    if (filter.dueOnOrBefore !== undefined) {
      conditions.push(lte(topicStates.nextReview, filter.dueOnOrBefore));
    }
    if (filter.subject !== undefined) {
      conditions.push(eq(topicStates.subject, filter.subject));
    }

    const states = this.db
      .select()
      .from(topicStates)
      .where(and(...conditions))
      .orderBy(asc(topicStates.nextReview), asc(topicStates.subject), asc(topicStates.topic))
      .all()
      .map(mapToDomain);

    if (filter.topicContains === undefined) {
      return states;
    }
    const needle = filter.topicContains.toLowerCase();
    return states.filter((state) => state.topic.toLowerCase().includes(needle));
  }

  /**
   * Runs `work` inside `BEGIN IMMEDIATE`, taking the write lock up front so
   * a competing writer fails at the start instead of at commit. Nested
   * calls become savepoints.
   *
   * @throws ConflictError when the database is locked
   */
  transaction<T>(work: () => T): T {
    try {
      return this.db.transaction(() => work(), { behavior: 'immediate' });
    } catch (error) {
      throw translateLockError(error);
    }
  }
}

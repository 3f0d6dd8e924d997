/**
 * ReviewSessionRecorder
 *
 * The only path by which a TopicState changes after it is created. Recording
 * a session:
 *
 * 1. Validates the session type, rating and date (nothing is written on failure)
 * 2. Opens a store transaction
 * 3. Looks up the topic's state, failing with NotFoundError if absent
 * 4. Appends the immutable session record
 * 5. Recomputes the SM-2 schedule with the session date as reference
 * 6. Writes the new schedule guarded by the state's version
 *
 * Steps 3-6 commit together or not at all. A version mismatch or a locked
 * database surfaces as ConflictError for the caller to retry.
 */

import { NotFoundError, ValidationError } from '../errors';
import { SM2Engine } from '../sm2/engine';
import { isCalendarDate, today, type CalendarDate } from '../sm2/calendar';
import { isQuality, type Quality } from '../sm2/types';
import { isSessionType, type SessionType, type StudySession, type TopicState } from '../models';
import type { RecordSessionInput, TopicRef, TopicStateStore } from './types';

/**
 * Grade applied to a study session recorded without one ("good response").
 */
export const DEFAULT_STUDY_QUALITY: Quality = 4;

export interface ReviewSessionRecorderOptions {
  /** Grade used for study sessions without a rating. Defaults to 4. */
  defaultStudyQuality?: Quality;
}

/**
 * Result of recording a session: the new record plus the state it produced.
 */
export interface RecordedSession {
  session: StudySession;
  state: TopicState;
}

interface ValidatedSessionInput {
  sessionType: SessionType;
  qualityRating: Quality | null;
  sessionDate: CalendarDate;
  notes: string | null;
}

export class ReviewSessionRecorder {
  private readonly defaultStudyQuality: Quality;

  constructor(
    private readonly store: TopicStateStore,
    private readonly engine: SM2Engine = new SM2Engine(),
    options: ReviewSessionRecorderOptions = {}
  ) {
    this.defaultStudyQuality = options.defaultStudyQuality ?? DEFAULT_STUDY_QUALITY;
  }

  /**
   * Records a session and returns the created record.
   *
   * @throws ValidationError for a bad session type, rating or date
   * @throws NotFoundError when the topic has no state for this student
   * @throws ConflictError when another writer updated the topic first
   */
  record(input: RecordSessionInput): StudySession {
    return this.recordWithState(input).session;
  }

  /**
   * Same as {@link record}, also returning the updated TopicState.
   */
  recordWithState(input: RecordSessionInput): RecordedSession {
    const validated = validateSessionInput(input);
    const quality = validated.qualityRating ?? this.defaultStudyQuality;

    return this.store.transaction(() => {
      const current = this.resolveState(input.userId, input.topic);

      const session = this.store.appendSession({
        userId: input.userId,
        topicStateId: current.id,
        sessionDate: validated.sessionDate,
        sessionType: validated.sessionType,
        qualityRating: validated.qualityRating,
        notes: validated.notes,
      });

      const scheduled = this.engine.recompute(current.schedule, quality, validated.sessionDate);

      const state = this.store.updateState({
        ...current,
        schedule: {
          easinessFactor: scheduled.easinessFactor,
          interval: scheduled.interval,
          repetitions: scheduled.repetitions,
          nextReview: scheduled.nextReview,
          lastReviewed: validated.sessionDate,
        },
      });

      return { session, state };
    });
  }

  private resolveState(userId: string, ref: TopicRef): TopicState {
    if ('id' in ref) {
      const state = this.store.getStateById(ref.id);
      // A state owned by another student is reported as missing
      if (!state || state.userId !== userId) {
        throw new NotFoundError('TopicState', ref.id);
      }
      return state;
    }

    const state = this.store.getState({ userId, subject: ref.subject, topic: ref.topic });
    if (!state) {
      throw new NotFoundError('TopicState', `${ref.subject}/${ref.topic}`);
    }
    return state;
  }
}

function validateSessionInput(input: RecordSessionInput): ValidatedSessionInput {
  if (!isSessionType(input.sessionType)) {
    throw new ValidationError(
      `sessionType must be 'study' or 'review', received '${input.sessionType}'`,
      { field: 'sessionType', value: input.sessionType }
    );
  }

  const rating = input.qualityRating ?? null;
  if (rating !== null && !isQuality(rating)) {
    throw new ValidationError('qualityRating must be an integer from 0 to 5', {
      field: 'qualityRating',
      value: rating,
    });
  }

  if (input.sessionType === 'review' && rating === null) {
    throw new ValidationError('A review session requires a qualityRating', {
      field: 'qualityRating',
    });
  }

  const sessionDate = input.sessionDate ?? today();
  if (!isCalendarDate(sessionDate)) {
    throw new ValidationError(`sessionDate must be a YYYY-MM-DD date, received '${sessionDate}'`, {
      field: 'sessionDate',
      value: sessionDate,
    });
  }

  return {
    sessionType: input.sessionType,
    qualityRating: rating,
    sessionDate,
    notes: input.notes ?? null,
  };
}

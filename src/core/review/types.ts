/**
 * Review Core Types
 *
 * The store boundary the review services work through, and the inputs they
 * accept. The store is synchronous: the SQLite driver behind it runs each
 * statement to completion on the calling thread, so a unit of work passed to
 * {@link TopicStateStore.transaction} runs without interleaving.
 */

import type { CalendarDate } from '../sm2/calendar';
import type { Quality, SM2State } from '../sm2/types';
import type { SessionType, StudySession, TopicKey, TopicState } from '../models';

/**
 * Fields needed to create a TopicState. Ids, versions and timestamps are
 * assigned by the store.
 */
export interface CreateTopicStateInput extends TopicKey {
  schedule: SM2State;
}

/**
 * Fields needed to append a session record.
 */
export interface AppendSessionInput {
  userId: string;
  topicStateId: string;
  sessionDate: CalendarDate;
  sessionType: SessionType;
  qualityRating: Quality | null;
  notes: string | null;
}

/**
 * Filters for {@link TopicStateStore.queryStates}. All are optional and
 * combine with AND.
 */
export interface TopicStateFilter {
  /** Only states with nextReview on or before this date */
  dueOnOrBefore?: CalendarDate;
  /** Exact subject match */
  subject?: string;
  /** Case-insensitive substring match on the topic name */
  topicContains?: string;
}

/**
 * Persistence operations the review core consumes.
 */
export interface TopicStateStore {
  /** Finds the state for a (user, subject, topic) triple. */
  getState(key: TopicKey): TopicState | null;

  getStateById(id: string): TopicState | null;

  /**
   * Creates a state. Fails if one already exists for the same triple.
   */
  createState(input: CreateTopicStateInput): TopicState;

  /**
   * Writes `state.schedule` guarded by `state.version`.
   *
   * @returns the stored state with its version incremented
   * @throws ConflictError when the stored version no longer matches
   */
  updateState(state: TopicState): TopicState;

  /** Appends an immutable session record and assigns its id. */
  appendSession(input: AppendSessionInput): StudySession;

  queryStates(userId: string, filter?: TopicStateFilter): TopicState[];

  /**
   * Runs `work` as one atomic unit. If it throws, every write it made is
   * rolled back and the error propagates.
   *
   * @throws ConflictError when the database is locked by another writer
   */
  transaction<T>(work: () => T): T;
}

/**
 * How a caller names the topic a session belongs to.
 */
export type TopicRef = { id: string } | { subject: string; topic: string };

/**
 * Input to {@link ReviewSessionRecorder.record}.
 *
 * Fields arrive unvalidated (from HTTP bodies and CLI flags), so the
 * recorder checks `sessionType` and `qualityRating` itself.
 */
export interface RecordSessionInput {
  userId: string;
  topic: TopicRef;
  /** Defaults to today */
  sessionDate?: CalendarDate;
  sessionType: string;
  qualityRating?: number | null;
  notes?: string | null;
}

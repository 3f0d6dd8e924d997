/**
 * StudySession Domain Types
 *
 * A StudySession is the immutable history record of one sitting with one
 * topic. Sessions are append-only; the topic's schedule changes alongside
 * each new session inside the same transaction.
 */

import type { CalendarDate } from '../sm2/calendar';
import type { Quality } from '../sm2/types';

/**
 * - 'study': first exposure to the material; a quality grade is optional
 * - 'review': a spaced review; a quality grade is required
 */
export type SessionType = 'study' | 'review';

export const SESSION_TYPES: readonly SessionType[] = ['study', 'review'] as const;

export function isSessionType(value: unknown): value is SessionType {
  return SESSION_TYPES.some((type) => type === value);
}

export interface StudySession {
  /** Unique identifier - prefixed UUID (e.g. 'ss_abc123') */
  id: string;

  userId: string;

  /** The TopicState this session was recorded against */
  topicStateId: string;

  sessionDate: CalendarDate;

  sessionType: SessionType;

  /** Grade supplied by the student, null when a study session had none */
  qualityRating: Quality | null;

  notes: string | null;

  createdAt: Date;
}

/**
 * A session joined with the subject and topic it was recorded for.
 */
export interface StudySessionWithTopic extends StudySession {
  subject: string;
  topic: string;
}

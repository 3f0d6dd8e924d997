/**
 * SM-2 Type Definitions
 *
 * Quality grades and scheduling state used by the SM-2 engine. The engine
 * works only with these plain values; persistence concerns (ids, versions,
 * timestamps) live on the TopicState model that wraps an SM2State.
 */

import type { CalendarDate } from './calendar';

/**
 * Self-assessed recall quality on the SM-2 scale.
 *
 * - 0: complete blackout
 * - 1: incorrect, but the answer felt familiar once seen
 * - 2: incorrect, but the answer seemed easy to recall once seen
 * - 3: correct with serious difficulty
 * - 4: correct after some hesitation
 * - 5: perfect recall
 *
 * Grades below 3 count as a lapse and restart the repetition ladder.
 */
export type Quality = 0 | 1 | 2 | 3 | 4 | 5;

/** Every valid quality grade, lowest first. */
export const QUALITY_GRADES: readonly Quality[] = [0, 1, 2, 3, 4, 5] as const;

/** Lowest grade that still counts as a successful recall. */
export const PASSING_QUALITY: Quality = 3;

/**
 * Narrows an arbitrary value to a Quality grade.
 * Only the integers 0..5 pass; `4.5`, `'4'` and `NaN` do not.
 */
export function isQuality(value: unknown): value is Quality {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 5
  );
}

/**
 * Per-topic scheduling memory.
 */
export interface SM2State {
  /** Multiplier for interval growth. Never below 1.3. */
  easinessFactor: number;
  /** Days between the last review and the next one. At least 1. */
  interval: number;
  /** Consecutive successful reviews since the last lapse. */
  repetitions: number;
  /** Date of the last recorded session, null for a topic never studied. */
  lastReviewed: CalendarDate | null;
  /** The topic is due on or after this date. */
  nextReview: CalendarDate;
}

/**
 * Output of a recompute. `lastReviewed` is not part of it: the caller
 * decides which date to record as the review date.
 */
export type ScheduledReview = Omit<SM2State, 'lastReviewed'>;

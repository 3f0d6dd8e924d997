/**
 * SM2Engine - Spaced Repetition Scheduling
 *
 * Implements the SM-2 algorithm (Wozniak, 1987) over whole calendar days:
 *
 * 1. Create the initial state for a topic the student has just met
 * 2. Recompute the state after a study or review session graded 0..5
 * 3. Answer whether a topic is due, and by how many days it is overdue
 *
 * All operations are pure. Out-of-range stored values (an easiness factor
 * below the floor, a zero interval, negative repetitions) are clamped on
 * input rather than rejected; quality grades are validated by callers with
 * {@link isQuality}.
 */

import { addDays, daysBetween, today, type CalendarDate } from './calendar';
import type { Quality, ScheduledReview, SM2State } from './types';
import { PASSING_QUALITY } from './types';

/** Easiness factor given to a newly initialized topic. */
export const INITIAL_EASINESS_FACTOR = 2.5;

/** The easiness factor never drops below this floor. */
export const MINIMUM_EASINESS_FACTOR = 1.3;

/** Interval after the first successful repetition. */
export const FIRST_INTERVAL_DAYS = 1;

/** Interval after the second successful repetition. */
export const SECOND_INTERVAL_DAYS = 6;

/**
 * Rounds to the nearest integer, sending exact halves to the even neighbour.
 *
 * @example
 * roundHalfEven(12.5); // 12
 * roundHalfEven(13.5); // 14
 * roundHalfEven(37.7); // 38
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Change in easiness factor for a quality grade:
 * `0.1 - (5 - q) * (0.08 + (5 - q) * 0.02)`.
 */
export function easinessDelta(quality: Quality): number {
  const distance = 5 - quality;
  return 0.1 - distance * (0.08 + distance * 0.02);
}

/**
 * SM2Engine computes review schedules for curriculum topics.
 *
 * The class is stateless; it exists so callers can inject it like the other
 * core services and swap it in tests.
 *
 * @example
 * ```typescript
 * const engine = new SM2Engine();
 *
 * const state = engine.initialize('2024-01-01');
 * // { easinessFactor: 2.5, interval: 1, repetitions: 0,
 * //   lastReviewed: null, nextReview: '2024-01-02' }
 *
 * const next = engine.recompute(state, 4, '2024-01-02');
 * // { easinessFactor: 2.5, interval: 1, repetitions: 1, nextReview: '2024-01-03' }
 * ```
 */
export class SM2Engine {
  /**
   * Creates the scheduling state for a topic first seen on `referenceDate`.
   * The topic becomes due the following day.
   */
  initialize(referenceDate: CalendarDate = today()): SM2State {
    return {
      easinessFactor: INITIAL_EASINESS_FACTOR,
      interval: FIRST_INTERVAL_DAYS,
      repetitions: 0,
      lastReviewed: null,
      nextReview: addDays(referenceDate, FIRST_INTERVAL_DAYS),
    };
  }

  /**
   * Computes the schedule that follows a session graded `quality` on
   * `referenceDate`.
   *
   * A grade below 3 resets the repetition count and brings the topic back
   * the next day. Otherwise the ladder climbs 1 day, 6 days, then the
   * previous interval times the updated easiness factor. The easiness
   * factor is updated on every grade, lapses included.
   */
  recompute(
    state: Pick<SM2State, 'easinessFactor' | 'interval' | 'repetitions'>,
    quality: Quality,
    referenceDate: CalendarDate = today()
  ): ScheduledReview {
    const currentEasiness = Math.max(MINIMUM_EASINESS_FACTOR, state.easinessFactor);
    const currentInterval = Math.max(1, Math.trunc(state.interval));
    const currentRepetitions = Math.max(0, Math.trunc(state.repetitions));

    const easinessFactor = Math.max(
      MINIMUM_EASINESS_FACTOR,
      currentEasiness + easinessDelta(quality)
    );

    let repetitions: number;
    let interval: number;

    if (quality < PASSING_QUALITY) {
      repetitions = 0;
      interval = FIRST_INTERVAL_DAYS;
    } else {
      repetitions = currentRepetitions + 1;
      if (repetitions === 1) {
        interval = FIRST_INTERVAL_DAYS;
      } else if (repetitions === 2) {
        interval = SECOND_INTERVAL_DAYS;
      } else {
        interval = Math.max(1, roundHalfEven(currentInterval * easinessFactor));
      }
    }

    return {
      easinessFactor,
      interval,
      repetitions,
      nextReview: addDays(referenceDate, interval),
    };
  }

  /** True once `asOf` has reached the topic's next review date. */
  isDue(state: Pick<SM2State, 'nextReview'>, asOf: CalendarDate = today()): boolean {
    return asOf >= state.nextReview;
  }

  /** Whole days past the due date, 0 for topics not yet due. */
  daysOverdue(state: Pick<SM2State, 'nextReview'>, asOf: CalendarDate = today()): number {
    return Math.max(0, daysBetween(state.nextReview, asOf));
  }
}

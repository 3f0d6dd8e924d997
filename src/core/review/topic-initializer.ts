/**
 * TopicInitializer
 *
 * Creates the SM-2 state for a topic the first time it appears in a
 * student's curriculum. The topic's curriculum start date is the reference
 * date, so a topic introduced on the 10th first comes due on the 11th
 * regardless of when the newsletter was uploaded.
 */

import { SM2Engine } from '../sm2/engine';
import type { CalendarDate } from '../sm2/calendar';
import type { TopicKey, TopicState } from '../models';
import type { TopicStateStore } from './types';

export interface InitializeTopicResult {
  state: TopicState;
  /** false when a state already existed and was returned untouched */
  created: boolean;
}

export class TopicInitializer {
  constructor(
    private readonly store: TopicStateStore,
    private readonly engine: SM2Engine = new SM2Engine()
  ) {}

  /**
   * Returns the existing state for the triple, or creates one from
   * `SM2Engine.initialize(startDate)`.
   *
   * @example
   * ```typescript
   * const { state, created } = initializer.initializeTopic(
   *   { userId: 'stu_1', subject: 'Maths', topic: 'Fractions' },
   *   '2024-01-10'
   * );
   * // created === true, state.schedule.nextReview === '2024-01-11'
   * ```
   */
  initializeTopic(key: TopicKey, startDate: CalendarDate): InitializeTopicResult {
    const existing = this.store.getState(key);
    if (existing) {
      return { state: existing, created: false };
    }

    const state = this.store.createState({
      userId: key.userId,
      subject: key.subject,
      topic: key.topic,
      schedule: this.engine.initialize(startDate),
    });

    return { state, created: true };
  }
}

/**
 * DueTopicQuery
 *
 * Read-only view of the topics a student should review. A topic is due once
 * the as-of date reaches its nextReview date. Results are ordered most
 * overdue first, then by subject and topic name so repeated calls return
 * the same sequence.
 */

import { SM2Engine } from '../sm2/engine';
import { today, type CalendarDate } from '../sm2/calendar';
import type { DueTopic, TopicState } from '../models';
import type { TopicStateStore } from './types';

/**
 * Orders states by nextReview ascending, then subject, then topic.
 */
export function compareByUrgency(a: TopicState, b: TopicState): number {
  if (a.schedule.nextReview !== b.schedule.nextReview) {
    return a.schedule.nextReview < b.schedule.nextReview ? -1 : 1;
  }
  if (a.subject !== b.subject) {
    return a.subject < b.subject ? -1 : 1;
  }
  if (a.topic !== b.topic) {
    return a.topic < b.topic ? -1 : 1;
  }
  return 0;
}

export class DueTopicQuery {
  constructor(
    private readonly store: TopicStateStore,
    private readonly engine: SM2Engine = new SM2Engine()
  ) {}

  /**
   * Every state for the student with nextReview on or before `asOf`.
   * Unknown students get an empty array.
   */
  dueTopics(userId: string, asOf: CalendarDate = today()): TopicState[] {
    return this.store
      .queryStates(userId, { dueOnOrBefore: asOf })
      .filter((state) => this.engine.isDue(state.schedule, asOf))
      .sort(compareByUrgency);
  }

  /**
   * {@link dueTopics} with the number of days each topic is overdue.
   */
  listDue(userId: string, asOf: CalendarDate = today()): DueTopic[] {
    return this.dueTopics(userId, asOf).map((state) => ({
      state,
      daysOverdue: this.engine.daysOverdue(state.schedule, asOf),
    }));
  }
}

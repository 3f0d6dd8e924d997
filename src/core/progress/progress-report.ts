/**
 * ProgressReporter
 *
 * Read-only summary of a student's spaced-repetition progress: how many
 * topics are tracked, how many are due, how easy they have proven on
 * average, and what was studied most recently.
 */

import { NotFoundError } from '../errors';
import { today, type CalendarDate } from '../sm2/calendar';
import type { DueTopic, StudySessionWithTopic, TopicState } from '../models';
import type { StudentLookup } from '../curriculum/curriculum-importer';
import { DueTopicQuery } from '../review/due-topics';
import type { TopicStateStore } from '../review/types';

export const RECENT_SESSION_COUNT = 10;

export interface SessionHistory {
  findRecentByUser(userId: string, limit?: number): StudySessionWithTopic[];
}

export interface SubjectProgress {
  subject: string;
  topicCount: number;
  dueCount: number;
  /** Topics with at least one recorded session */
  reviewedCount: number;
  averageEasiness: number;
}

export interface ProgressReport {
  userId: string;
  asOf: CalendarDate;
  totalTopics: number;
  dueCount: number;
  /** Mean easiness factor across all topics, null when none are tracked */
  averageEasiness: number | null;
  dueTopics: DueTopic[];
  subjects: SubjectProgress[];
  /** Newest session date first */
  recentSessions: StudySessionWithTopic[];
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function summarizeSubjects(states: readonly TopicState[], due: readonly DueTopic[]): SubjectProgress[] {
  const dueIds = new Set(due.map((entry) => entry.state.id));
  const bySubject = new Map<string, TopicState[]>();
  for (const state of states) {
    const group = bySubject.get(state.subject);
    if (group) {
      group.push(state);
    } else {
      bySubject.set(state.subject, [state]);
    }
  }

  return [...bySubject.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([subject, group]) => ({
      subject,
      topicCount: group.length,
      dueCount: group.filter((state) => dueIds.has(state.id)).length,
      reviewedCount: group.filter((state) => state.schedule.lastReviewed !== null).length,
      averageEasiness: mean(group.map((state) => state.schedule.easinessFactor)),
    }));
}

export class ProgressReporter {
  private readonly dueTopics: DueTopicQuery;

  constructor(
    private readonly students: StudentLookup,
    private readonly topicStates: TopicStateStore,
    private readonly sessions: SessionHistory,
    dueTopics?: DueTopicQuery
  ) {
    this.dueTopics = dueTopics ?? new DueTopicQuery(topicStates);
  }

  /**
   * @throws NotFoundError when the student does not exist
   */
  getReport(userId: string, asOf: CalendarDate = today()): ProgressReport {
    if (!this.students.findById(userId)) {
      throw new NotFoundError('Student', userId);
    }

    const states = this.topicStates.queryStates(userId);
    const due = this.dueTopics.listDue(userId, asOf);

    return {
      userId,
      asOf,
      totalTopics: states.length,
      dueCount: due.length,
      averageEasiness:
        states.length === 0 ? null : mean(states.map((state) => state.schedule.easinessFactor)),
      dueTopics: due,
      subjects: summarizeSubjects(states, due),
      recentSessions: this.sessions.findRecentByUser(userId, RECENT_SESSION_COUNT),
    };
  }
}

/**
 * TopicState Domain Types
 *
 * A TopicState is the per-(student, subject, topic) memory record that the
 * SM-2 engine reads and rewrites. Exactly one exists for each triple; it is
 * created once when the topic first appears in curriculum data and is
 * afterwards only mutated by recorded study sessions.
 */

import type { SM2State } from '../sm2/types';

/**
 * Identifies a topic within a student's curriculum.
 */
export interface TopicKey {
  userId: string;
  subject: string;
  topic: string;
}

export interface TopicState extends TopicKey {
  /** Unique identifier - prefixed UUID (e.g. 'ts_abc123') */
  id: string;

  /** SM-2 scheduling memory for this topic */
  schedule: SM2State;

  /**
   * Optimistic concurrency counter. Starts at 1 and increases by one on
   * every schedule update; an update carrying a stale version is refused.
   */
  version: number;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * A due topic together with how late it is.
 */
export interface DueTopic {
  state: TopicState;
  daysOverdue: number;
}

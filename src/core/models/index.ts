/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import type { Student, TopicState, StudySession } from '@/core/models';
 * ```
 */

export type { Student, StudyTimePreference } from './student';

export type { TopicKey, TopicState, DueTopic } from './topic-state';

export type { SessionType, StudySession, StudySessionWithTopic } from './study-session';
export { SESSION_TYPES, isSessionType } from './study-session';

export type { CurriculumEntry, Newsletter, CurriculumItem } from './curriculum';

export type { DailyPlan, WeeklyPlanContent, WeeklyPlan } from './weekly-plan';

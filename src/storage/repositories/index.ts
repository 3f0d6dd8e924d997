/**
 * Repository Layer - Barrel Export
 *
 * Each repository maps between Drizzle rows and domain models and is
 * constructed with a database connection:
 *
 * @example
 * ```typescript
 * import { StudentRepository, TopicStateRepository } from '@/storage/repositories';
 *
 * const students = new StudentRepository(db);
 * const topicStates = new TopicStateRepository(db);
 * ```
 */

export {
  generateId,
  isLockError,
  isUniqueViolation,
  translateLockError,
  type IdPrefix,
} from './base';

export {
  StudentRepository,
  type CreateStudentInput,
  type UpdateStudentInput,
} from './student.repository';

export { NewsletterRepository, type CreateNewsletterInput } from './newsletter.repository';

export { TopicStateRepository } from './topic-state.repository';

export {
  StudySessionRepository,
  DEFAULT_RECENT_SESSION_LIMIT,
} from './study-session.repository';

export { WeeklyPlanRepository, type CreateWeeklyPlanInput } from './weekly-plan.repository';

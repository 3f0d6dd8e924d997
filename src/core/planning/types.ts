/**
 * Planning Types
 *
 * The context a weekly plan is generated from, and the capability that
 * turns it into a plan. Generation is asynchronous because the only
 * implementation calls out to a language model.
 */

import type { CalendarDate } from '../sm2/calendar';
import type { CurriculumEntry, DueTopic, Student, TopicState, WeeklyPlanContent } from '../models';

export interface WeeklyPlanContext {
  student: Student;
  /** First study day of the week */
  weekStartDate: CalendarDate;
  /** The date "today" refers to when describing overdue and past work */
  asOf: CalendarDate;
  /** Curriculum active at `asOf`, in start-date order */
  curriculum: CurriculumEntry[];
  /** Topics due at `asOf`, most overdue first */
  dueTopics: DueTopic[];
  /** Every topic state the student has, reviewed or not */
  history: TopicState[];
  focusRequest: string | null;
  events: string | null;
}

export interface WeeklyPlanGenerator {
  generateWeeklyPlan(context: WeeklyPlanContext): Promise<WeeklyPlanContent>;
}

/**
 * WeeklyPlan Domain Types
 *
 * A WeeklyPlan is a generated study schedule for one week. The content
 * comes from the plan generator; the record keeps the inputs the student
 * gave so a plan can be reviewed later.
 */

import type { CalendarDate } from '../sm2/calendar';

export interface DailyPlan {
  date: CalendarDate;
  subjects: string[];
  topics: string[];
  /** Parallel to `topics`: true for new curriculum, false for review */
  isNewTopic: boolean[];
  durationMinutes: number;
}

export interface WeeklyPlanContent {
  days: DailyPlan[];
  rationale: string;
}

export interface WeeklyPlan {
  /** Unique identifier - prefixed UUID (e.g. 'wp_abc123') */
  id: string;
  userId: string;
  weekStartDate: CalendarDate;
  plan: WeeklyPlanContent;
  focusRequest: string | null;
  events: string | null;
  generatedAt: Date;
}

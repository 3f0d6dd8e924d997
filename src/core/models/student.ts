/**
 * Student Domain Types
 *
 * A Student is the learner whose topics are being scheduled. The profile
 * carries the constraints the weekly planner works within: how long the
 * student studies per day, how many days a week, and which subjects.
 */

/**
 * Preferred time of day for study, free text (e.g. "evening").
 */
export type StudyTimePreference = string;

export interface Student {
  /** Unique identifier - prefixed UUID (e.g. 'stu_abc123') */
  id: string;

  /** Display name */
  name: string;

  /** School grade or class (e.g. "5") */
  grade: string;

  /** Examination board or curriculum body (e.g. "CBSE") */
  board: string;

  /** Minutes of study per study day. Always positive. */
  dailyDurationMinutes: number;

  /** Study days per week, 1 to 7. */
  weeklyFrequency: number;

  /** Subjects the student takes. Never empty. */
  subjects: string[];

  /** Optional time-of-day preference, null when unset */
  studyTimePreference: StudyTimePreference | null;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * Curriculum Domain Types
 *
 * Schools publish a monthly newsletter listing the topics each subject will
 * cover and when. A Newsletter is one uploaded issue; each row becomes a
 * CurriculumItem, and each distinct (subject, topic) gets a TopicState.
 */

import type { CalendarDate } from '../sm2/calendar';

/**
 * One subject/topic row of a newsletter, as parsed from the source file.
 */
export interface CurriculumEntry {
  subject: string;
  topic: string;
  startDate: CalendarDate;
  endDate: CalendarDate | null;
}

export interface Newsletter {
  /** Unique identifier - prefixed UUID (e.g. 'nl_abc123') */
  id: string;
  userId: string;
  /** Month the issue covers, 1-12 */
  month: number;
  year: number;
  /** Path of the uploaded file, when it came from disk */
  filePath: string | null;
  /** The parsed entries as they were imported */
  parsedData: CurriculumEntry[];
  uploadedAt: Date;
}

export interface CurriculumItem extends CurriculumEntry {
  /** Unique identifier - prefixed UUID (e.g. 'ci_abc123') */
  id: string;
  newsletterId: string;
  createdAt: Date;
}

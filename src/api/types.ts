/**
 * API Types
 *
 * Response envelope shared by every endpoint, and the zod schemas that
 * request bodies and query strings are validated against.
 *
 * @example
 * ```typescript
 * const ok: ApiResponse<Student> = { success: true, data: student };
 * const failed: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'NOT_FOUND', message: "Student 'stu_1' not found" },
 * };
 * ```
 */

import { z } from 'zod';
import { isCalendarDate } from '@/core/sm2/calendar';

// ============================================================================
// Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR' or 'CONFLICT' */
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

/**
 * One failed field from a zod validation.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the field, e.g. 'topic.subject' */
  path: string;
  message: string;
}

// ============================================================================
// Shared Fields
// ============================================================================

const calendarDateField = z.string().refine(isCalendarDate, 'Expected a valid YYYY-MM-DD date');

const subjectsField = z.array(z.string().min(1)).min(1, 'At least one subject is required');

// ============================================================================
// Students
// ============================================================================

/**
 * Body of POST /api/students.
 */
export const createStudentSchema = z.object({
  name: z.string().min(1).max(200),
  grade: z.string().min(1).max(50),
  board: z.string().min(1).max(100),
  dailyDurationMinutes: z.number().int().positive(),
  weeklyFrequency: z.number().int().min(1).max(7),
  subjects: subjectsField,
  studyTimePreference: z.string().min(1).nullable().optional(),
});

export type CreateStudentBody = z.infer<typeof createStudentSchema>;

/**
 * Body of PATCH /api/students/:id. Only the study settings can change.
 */
export const updateStudentSchema = z
  .object({
    dailyDurationMinutes: z.number().int().positive().optional(),
    weeklyFrequency: z.number().int().min(1).max(7).optional(),
    subjects: subjectsField.optional(),
    studyTimePreference: z.string().min(1).nullable().optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided for update',
  });

export type UpdateStudentBody = z.infer<typeof updateStudentSchema>;

// ============================================================================
// Curriculum
// ============================================================================

/**
 * Body of POST /api/students/:id/newsletters: the CSV export of the
 * newsletter's curriculum table plus the month it covers.
 */
export const uploadNewsletterSchema = z.object({
  month: z.number().int().min(1).max(12),
  year: z.number().int().min(1),
  csv: z.string().min(1, 'Newsletter content is required'),
  filePath: z.string().min(1).optional(),
});

export type UploadNewsletterBody = z.infer<typeof uploadNewsletterSchema>;

export const curriculumQuerySchema = z.object({
  date: calendarDateField.optional(),
});

// ============================================================================
// Topics and Sessions
// ============================================================================

export const asOfQuerySchema = z.object({
  asOf: calendarDateField.optional(),
});

export const topicsQuerySchema = z.object({
  subject: z.string().min(1).optional(),
  search: z.string().min(1).optional(),
});

/**
 * Body of POST /api/students/:id/sessions. The topic is named either by
 * its state id or by subject and topic name. Session type and rating are
 * checked by the recorder itself.
 */
export const recordSessionSchema = z
  .object({
    topicStateId: z.string().min(1).optional(),
    subject: z.string().min(1).optional(),
    topic: z.string().min(1).optional(),
    sessionType: z.string().min(1),
    qualityRating: z.number().nullable().optional(),
    sessionDate: calendarDateField.optional(),
    notes: z.string().nullable().optional(),
  })
  .refine(
    (body) => body.topicStateId !== undefined || (body.subject !== undefined && body.topic !== undefined),
    { message: 'Provide topicStateId, or both subject and topic' }
  );

export type RecordSessionBody = z.infer<typeof recordSessionSchema>;

export const sessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  date: calendarDateField.optional(),
});

// ============================================================================
// Weekly Plans
// ============================================================================

/**
 * Body of POST /api/students/:id/plans. Every field is optional.
 */
export const generatePlanSchema = z.object({
  weekStartDate: calendarDateField.optional(),
  asOf: calendarDateField.optional(),
  focusRequest: z.string().max(2000).nullable().optional(),
  events: z.string().max(2000).nullable().optional(),
});

export type GeneratePlanBody = z.infer<typeof generatePlanSchema>;

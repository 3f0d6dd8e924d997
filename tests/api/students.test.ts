/**
 * Students API Tests
 *
 * Exercises the student-scoped endpoints through `app.request` against an
 * in-memory database and a fake plan generator.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { ConflictError } from '../../src/core/errors';
import type { Student } from '../../src/core/models';
import { LLMError } from '../../src/llm/types';
import { cleanupTestContext, createTestApp, createTestContext, type TestContext } from '../setup';
import {
  DEFAULT_STUDENT,
  FakeWeeklyPlanGenerator,
  SAMPLE_NEWSLETTER_CSV,
  createStudentWithCurriculum,
  createTestStudent,
} from '../helpers';

function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

describe('Students API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTestContext(ctx);
  });

  // ==========================================================================
  // Profiles
  // ==========================================================================

  describe('POST /api/students', () => {
    it('creates a profile', async () => {
      const res = await app.request(
        '/api/students',
        jsonRequest('POST', { ...DEFAULT_STUDENT, subjects: [' Maths ', 'Maths', 'Art'] })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        success: true,
        data: { name: 'Test Student', weeklyFrequency: 3, subjects: ['Maths', 'Art'], studyTimePreference: 'evening' },
      });
      expect(ctx.students.findAll()).toHaveLength(1);
    });

    it('rejects out-of-range settings field by field', async () => {
      const res = await app.request(
        '/api/students',
        jsonRequest('POST', { ...DEFAULT_STUDENT, weeklyFrequency: 8, dailyDurationMinutes: 0 })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request body',
          details: [
            { path: 'dailyDurationMinutes', message: 'Number must be greater than 0' },
            { path: 'weeklyFrequency', message: 'Number must be less than or equal to 7' },
          ],
        },
      });
    });

    it('rejects a body that is not JSON', async () => {
      const res = await app.request('/api/students', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"name": ',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body must be valid JSON' },
      });
    });
  });

  describe('GET /api/students/:id', () => {
    it('returns the profile', async () => {
      const student = createTestStudent(ctx);
      const res = await app.request(`/api/students/${student.id}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ data: { id: student.id, board: 'CBSE' } });
    });

    it('returns 404 for an unknown student', async () => {
      const res = await app.request('/api/students/stu_missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        success: false,
        error: { code: 'NOT_FOUND', message: "Student 'stu_missing' not found" },
      });
    });
  });

  describe('PATCH /api/students/:id', () => {
    it('updates study settings and clears the time preference', async () => {
      const student = createTestStudent(ctx);
      const res = await app.request(
        `/api/students/${student.id}`,
        jsonRequest('PATCH', { weeklyFrequency: 5, studyTimePreference: null })
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ data: { weeklyFrequency: 5, studyTimePreference: null } });
    });

    it('rejects an empty update', async () => {
      const student = createTestStudent(ctx);
      const res = await app.request(`/api/students/${student.id}`, jsonRequest('PATCH', {}));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { details: [{ path: '', message: 'At least one field must be provided for update' }] },
      });
    });
  });

  // ==========================================================================
  // Curriculum
  // ==========================================================================

  describe('POST /api/students/:id/newsletters', () => {
    it('imports the CSV and reports skipped rows', async () => {
      const student = createTestStudent(ctx);
      const res = await app.request(
        `/api/students/${student.id}/newsletters`,
        jsonRequest('POST', { month: 1, year: 2024, csv: SAMPLE_NEWSLETTER_CSV })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          newsletter: { userId: student.id, month: 1, year: 2024, filePath: null },
          topicsCreated: 4,
          topicsExisting: 0,
          skipped: [{ line: 6, reason: 'missing topic' }],
        },
      });
    });

    it('rejects a newsletter without usable rows', async () => {
      const student = createTestStudent(ctx);
      const res = await app.request(
        `/api/students/${student.id}/newsletters`,
        jsonRequest('POST', { month: 1, year: 2024, csv: 'Subject,Topic,Date\nMaths,,2024-01-01' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Newsletter contains no valid curriculum rows',
          details: { skipped: [{ line: 2, reason: 'missing topic' }] },
        },
      });
    });

    it('returns 404 for an unknown student', async () => {
      const res = await app.request(
        '/api/students/stu_missing/newsletters',
        jsonRequest('POST', { month: 1, year: 2024, csv: SAMPLE_NEWSLETTER_CSV })
      );

      expect(res.status).toBe(404);
    });
  });

  describe('curriculum queries', () => {
    let student: Student;

    beforeEach(() => {
      student = createStudentWithCurriculum(ctx);
    });

    it('lists the curriculum active on a date', async () => {
      const res = await app.request(`/api/students/${student.id}/curriculum?date=2024-02-05`);

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        data: [{ topic: 'Plants' }, { topic: 'Decimals' }, { topic: 'Poetry, rhyme and rhythm' }],
      });
    });

    it('rejects a malformed date', async () => {
      const res = await app.request(`/api/students/${student.id}/curriculum?date=05/02/2024`);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          message: 'Invalid query parameters',
          details: [{ path: 'date', message: 'Expected a valid YYYY-MM-DD date' }],
        },
      });
    });

    it('lists subjects', async () => {
      const res = await app.request(`/api/students/${student.id}/subjects`);

      expect(await res.json()).toEqual({ success: true, data: ['English', 'Maths', 'Science'] });
    });

    it('filters topics by subject and by name', async () => {
      const maths = await app.request(`/api/students/${student.id}/topics?subject=Maths`);
      expect(await maths.json()).toMatchObject({ data: [{ topic: 'Fractions' }, { topic: 'Decimals' }] });

      const poetry = await app.request(`/api/students/${student.id}/topics?search=RHYME`);
      expect(await poetry.json()).toMatchObject({ data: [{ subject: 'English' }] });
    });

    it('lists due topics as of a date', async () => {
      const res = await app.request(`/api/students/${student.id}/topics/due?asOf=2024-01-10`);

      expect(await res.json()).toMatchObject({
        data: [
          { state: { topic: 'Fractions' }, daysOverdue: 8 },
          { state: { topic: 'Plants' }, daysOverdue: 6 },
        ],
      });
    });
  });

  // ==========================================================================
  // Sessions
  // ==========================================================================

  describe('POST /api/students/:id/sessions', () => {
    let student: Student;

    beforeEach(() => {
      student = createStudentWithCurriculum(ctx);
    });

    it('records a review and returns the new schedule', async () => {
      const res = await app.request(
        `/api/students/${student.id}/sessions`,
        jsonRequest('POST', {
          subject: 'Maths',
          topic: 'Fractions',
          sessionType: 'review',
          qualityRating: 5,
          sessionDate: '2024-01-02',
        })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          session: { sessionType: 'review', qualityRating: 5, sessionDate: '2024-01-02' },
          state: {
            version: 2,
            schedule: {
              easinessFactor: 2.6,
              interval: 1,
              repetitions: 1,
              lastReviewed: '2024-01-02',
              nextReview: '2024-01-03',
            },
          },
        },
      });
    });

    it('records against a topic state id', async () => {
      const state = ctx.topicStates.getState({ userId: student.id, subject: 'Science', topic: 'Plants' });
      const res = await app.request(
        `/api/students/${student.id}/sessions`,
        jsonRequest('POST', { topicStateId: state?.id, sessionType: 'study', sessionDate: '2024-01-04' })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ data: { session: { qualityRating: null } } });
    });

    it('requires a rating for reviews', async () => {
      const res = await app.request(
        `/api/students/${student.id}/sessions`,
        jsonRequest('POST', { subject: 'Maths', topic: 'Fractions', sessionType: 'review' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'A review session requires a qualityRating' },
      });
      expect(ctx.sessions.countByUser(student.id)).toBe(0);
    });

    it('requires the topic to be named', async () => {
      const res = await app.request(
        `/api/students/${student.id}/sessions`,
        jsonRequest('POST', { subject: 'Maths', sessionType: 'study' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { details: [{ path: '', message: 'Provide topicStateId, or both subject and topic' }] },
      });
    });

    it('returns 404 for a topic the student does not have', async () => {
      const res = await app.request(
        `/api/students/${student.id}/sessions`,
        jsonRequest('POST', { subject: 'Maths', topic: 'Algebra', sessionType: 'review', qualityRating: 3 })
      );

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { message: "TopicState 'Maths/Algebra' not found" } });
    });

    it('returns 409 when the topic was changed concurrently', async () => {
      vi.spyOn(ctx.topicStates, 'updateState').mockImplementation(() => {
        throw new ConflictError("TopicState 'ts_1' was modified by another writer");
      });

      const res = await app.request(
        `/api/students/${student.id}/sessions`,
        jsonRequest('POST', { subject: 'Maths', topic: 'Fractions', sessionType: 'review', qualityRating: 4 })
      );

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ error: { code: 'CONFLICT' } });
      expect(ctx.sessions.countByUser(student.id)).toBe(0);
    });
  });

  describe('GET /api/students/:id/sessions', () => {
    let student: Student;

    beforeEach(() => {
      student = createStudentWithCurriculum(ctx);
      for (const [topic, date] of [
        ['Fractions', '2024-01-02'],
        ['Plants', '2024-01-04'],
        ['Fractions', '2024-01-04'],
      ]) {
        ctx.recorder.record({
          userId: student.id,
          topic: { subject: topic === 'Plants' ? 'Science' : 'Maths', topic },
          sessionType: 'review',
          qualityRating: 4,
          sessionDate: date,
        });
      }
    });

    it('lists recent sessions newest first, up to the limit', async () => {
      const res = await app.request(`/api/students/${student.id}/sessions?limit=2`);

      expect(await res.json()).toMatchObject({
        data: [
          { topic: 'Fractions', sessionDate: '2024-01-04' },
          { topic: 'Plants', sessionDate: '2024-01-04' },
        ],
      });
    });

    it('lists the sessions on one date in recording order', async () => {
      const res = await app.request(`/api/students/${student.id}/sessions?date=2024-01-04`);

      expect(await res.json()).toMatchObject({ data: [{ topic: 'Plants' }, { topic: 'Fractions' }] });
    });

    it('rejects a limit below 1', async () => {
      const res = await app.request(`/api/students/${student.id}/sessions?limit=0`);

      expect(res.status).toBe(400);
    });
  });

  // ==========================================================================
  // Progress and Plans
  // ==========================================================================

  describe('GET /api/students/:id/progress', () => {
    it('returns the report as of a date', async () => {
      const student = createStudentWithCurriculum(ctx);
      const res = await app.request(`/api/students/${student.id}/progress?asOf=2024-01-10`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { asOf: '2024-01-10', totalTopics: 4, dueCount: 2, averageEasiness: 2.5, recentSessions: [] },
      });
    });
  });

  describe('weekly plans', () => {
    it('generates a plan and returns it as the latest', async () => {
      const student = createStudentWithCurriculum(ctx);

      const missing = await app.request(`/api/students/${student.id}/plans/latest`);
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `No weekly plan has been generated for student '${student.id}'`,
          details: { studentId: student.id },
        },
      });

      const created = await app.request(
        `/api/students/${student.id}/plans`,
        jsonRequest('POST', { asOf: '2024-01-10', focusRequest: 'Fractions' })
      );
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({
        data: { weekStartDate: '2024-01-15', focusRequest: 'Fractions', events: null },
      });
      expect(ctx.generator.contexts[0].focusRequest).toBe('Fractions');

      const latest = await app.request(`/api/students/${student.id}/plans/latest`);
      expect(latest.status).toBe(200);
      expect(await latest.json()).toMatchObject({ data: { weekStartDate: '2024-01-15' } });
    });

    it('accepts a bare POST with no body', async () => {
      const student = createStudentWithCurriculum(ctx);
      const res = await app.request(`/api/students/${student.id}/plans`, { method: 'POST' });

      expect(res.status).toBe(201);
    });

    it('returns 502 when the plan backend fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const failing = createTestContext({
        generator: new FakeWeeklyPlanGenerator(new LLMError('model offline', 'network')),
      });
      try {
        const student = createStudentWithCurriculum(failing);
        const res = await createTestApp(failing).request(
          `/api/students/${student.id}/plans`,
          jsonRequest('POST', { asOf: '2024-01-10' })
        );

        expect(res.status).toBe(502);
        expect(await res.json()).toEqual({
          success: false,
          error: { code: 'LLM_ERROR', message: 'model offline', details: { type: 'network' } },
        });
        expect(failing.planner.latest(student.id)).toBeNull();
      } finally {
        cleanupTestContext(failing);
      }
    });
  });
});

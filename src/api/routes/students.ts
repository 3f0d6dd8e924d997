/**
 * Students API Routes
 *
 * Everything in the API hangs off a student:
 *
 * - GET    /                       - List students
 * - POST   /                       - Create a student profile
 * - GET    /:id                    - Get a profile
 * - PATCH  /:id                    - Update study settings
 * - POST   /:id/newsletters        - Import a CSV newsletter
 * - GET    /:id/curriculum?date=   - Curriculum active on a date
 * - GET    /:id/subjects           - Distinct curriculum subjects
 * - GET    /:id/topics             - Every tracked topic state
 * - GET    /:id/topics/due?asOf=   - Topics due for review
 * - POST   /:id/sessions           - Record a study or review session
 * - GET    /:id/sessions?limit=    - Recent sessions, newest first
 * - GET    /:id/progress?asOf=     - Progress report
 * - POST   /:id/plans              - Generate a weekly plan
 * - GET    /:id/plans/latest       - Most recent weekly plan
 *
 * Domain errors propagate to the error handler, which maps them to
 * 400/404/409/502 envelopes.
 */

import { Hono } from 'hono';
import type { AppContext } from '@/app-context';
import { today } from '@/core/sm2/calendar';
import type { TopicRef } from '@/core/review';
import { validate, validateQuery } from '../middleware/validate';
import {
  asOfQuerySchema,
  createStudentSchema,
  curriculumQuerySchema,
  generatePlanSchema,
  recordSessionSchema,
  sessionsQuerySchema,
  topicsQuerySchema,
  updateStudentSchema,
  uploadNewsletterSchema,
  type RecordSessionBody,
} from '../types';
import { AppError, ErrorCodes } from '../middleware/error-handler';
import { success } from '../utils/response';

function topicRefFrom(body: RecordSessionBody): TopicRef {
  if (body.topicStateId !== undefined) {
    return { id: body.topicStateId };
  }
  return { subject: body.subject ?? '', topic: body.topic ?? '' };
}

export function studentsRoutes(ctx: AppContext): Hono {
  const router = new Hono();

  // ===========================================================================
  // Profiles
  // ===========================================================================

  router.get('/', (c) => success(c, ctx.students.findAll()));

  router.post('/', validate(createStudentSchema), (c) => {
    const student = ctx.students.create(c.get('validatedBody'));
    return success(c, student, 201);
  });

  router.get('/:id', (c) => success(c, ctx.students.getById(c.req.param('id'))));

  router.patch('/:id', validate(updateStudentSchema), (c) => {
    const student = ctx.students.update(c.req.param('id'), c.get('validatedBody'));
    return success(c, student);
  });

  // ===========================================================================
  // Curriculum
  // ===========================================================================

  /**
   * Body: { month, year, csv, filePath? }. Responds with the stored
   * newsletter, its items, topic-state counts and any skipped rows.
   */
  router.post('/:id/newsletters', validate(uploadNewsletterSchema), (c) => {
    const body = c.get('validatedBody');
    const result = ctx.importer.importNewsletterCsv({
      userId: c.req.param('id'),
      month: body.month,
      year: body.year,
      filePath: body.filePath,
      csv: body.csv,
    });
    return success(c, result, 201);
  });

  router.get('/:id/curriculum', validateQuery(curriculumQuerySchema), (c) => {
    const student = ctx.students.getById(c.req.param('id'));
    const date = c.get('validatedQuery').date ?? today();
    return success(c, ctx.importer.currentCurriculum(student.id, date));
  });

  router.get('/:id/subjects', (c) => {
    const student = ctx.students.getById(c.req.param('id'));
    return success(c, ctx.importer.listSubjects(student.id));
  });

  // ===========================================================================
  // Topics and Sessions
  // ===========================================================================

  router.get('/:id/topics', validateQuery(topicsQuerySchema), (c) => {
    const student = ctx.students.getById(c.req.param('id'));
    const query = c.get('validatedQuery');
    const states = ctx.topicStates.queryStates(student.id, {
      subject: query.subject,
      topicContains: query.search,
    });
    return success(c, states);
  });

  router.get('/:id/topics/due', validateQuery(asOfQuerySchema), (c) => {
    const student = ctx.students.getById(c.req.param('id'));
    const asOf = c.get('validatedQuery').asOf ?? today();
    return success(c, ctx.dueTopics.listDue(student.id, asOf));
  });

  /**
   * Body names the topic by `topicStateId` or by `subject` and `topic`.
   * Responds with the new session and the topic state it produced.
   */
  router.post('/:id/sessions', validate(recordSessionSchema), (c) => {
    const student = ctx.students.getById(c.req.param('id'));
    const body = c.get('validatedBody');
    const recorded = ctx.recorder.recordWithState({
      userId: student.id,
      topic: topicRefFrom(body),
      sessionDate: body.sessionDate,
      sessionType: body.sessionType,
      qualityRating: body.qualityRating,
      notes: body.notes,
    });
    return success(c, recorded, 201);
  });

  router.get('/:id/sessions', validateQuery(sessionsQuerySchema), (c) => {
    const student = ctx.students.getById(c.req.param('id'));
    const query = c.get('validatedQuery');
    const sessions =
      query.date !== undefined
        ? ctx.sessions.findByDate(student.id, query.date)
        : ctx.sessions.findRecentByUser(student.id, query.limit);
    return success(c, sessions);
  });

  router.get('/:id/progress', validateQuery(asOfQuerySchema), (c) => {
    const report = ctx.progress.getReport(c.req.param('id'), c.get('validatedQuery').asOf);
    return success(c, report);
  });

  // ===========================================================================
  // Weekly Plans
  // ===========================================================================

  router.post('/:id/plans', validate(generatePlanSchema), async (c) => {
    const body = c.get('validatedBody');
    const plan = await ctx.planner.generate({
      userId: c.req.param('id'),
      weekStartDate: body.weekStartDate,
      asOf: body.asOf,
      focusRequest: body.focusRequest,
      events: body.events,
    });
    return success(c, plan, 201);
  });

  router.get('/:id/plans/latest', (c) => {
    const id = c.req.param('id');
    const plan = ctx.planner.latest(id);
    if (!plan) {
      throw new AppError(ErrorCodes.NOT_FOUND, `No weekly plan has been generated for student '${id}'`, 404, {
        studentId: id,
      });
    }
    return success(c, plan);
  });

  return router;
}

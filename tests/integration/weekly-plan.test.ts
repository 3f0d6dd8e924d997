/**
 * Weekly Plan Integration Tests
 *
 * Checks the context handed to the plan generator and the storage of the
 * plans it returns. The generator is an in-process fake.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NotFoundError, ValidationError } from '../../src/core/errors';
import { LLMError } from '../../src/llm/types';
import type { Student, WeeklyPlanContent } from '../../src/core/models';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { FakeWeeklyPlanGenerator, createStudentWithCurriculum } from '../helpers';

describe('WeeklyPlanService', () => {
  let ctx: TestContext;
  let student: Student;

  beforeEach(() => {
    ctx = createTestContext();
    student = createStudentWithCurriculum(ctx);
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  describe('buildContext', () => {
    it('defaults the week to the Monday after the as-of date', () => {
      const context = ctx.planner.buildContext({ userId: student.id, asOf: '2024-01-10' });

      expect(context.weekStartDate).toBe('2024-01-15');
      expect(context.asOf).toBe('2024-01-10');
    });

    it('gathers the active curriculum, due topics and full history', () => {
      const context = ctx.planner.buildContext({ userId: student.id, asOf: '2024-01-10' });

      expect(context.student.id).toBe(student.id);
      expect(context.curriculum.map((item) => item.topic)).toEqual(['Fractions', 'Plants']);
      expect(context.dueTopics.map((entry) => [entry.state.topic, entry.daysOverdue])).toEqual([
        ['Fractions', 8],
        ['Plants', 6],
      ]);
      expect(context.history).toHaveLength(4);
    });

    it('trims the focus request and events, treating blanks as absent', () => {
      const context = ctx.planner.buildContext({
        userId: student.id,
        asOf: '2024-01-10',
        focusRequest: '   ',
        events: ' Maths olympiad on Friday ',
      });

      expect(context.focusRequest).toBeNull();
      expect(context.events).toBe('Maths olympiad on Friday');
    });

    it('rejects a malformed week start date', () => {
      expect(() =>
        ctx.planner.buildContext({ userId: student.id, asOf: '2024-01-10', weekStartDate: '2024-02-30' })
      ).toThrow(ValidationError);
    });
  });

  describe('generate', () => {
    it('stores the plan returned by the generator', async () => {
      const plan = await ctx.planner.generate({
        userId: student.id,
        asOf: '2024-01-10',
        events: 'Science fair',
      });

      expect(plan.id).toMatch(/^wp_/);
      expect(plan.weekStartDate).toBe('2024-01-15');
      expect(plan.focusRequest).toBeNull();
      expect(plan.events).toBe('Science fair');
      expect(plan.plan.days.map((day) => day.date)).toEqual(['2024-01-15', '2024-01-16', '2024-01-17']);
      expect(plan.plan.days[0]).toEqual({
        date: '2024-01-15',
        subjects: ['Maths'],
        topics: ['Fractions'],
        isNewTopic: [false],
        durationMinutes: 45,
      });
      expect(ctx.generator.contexts).toHaveLength(1);
      expect(ctx.planner.latest(student.id)).toEqual(plan);
    });

    it('uses an explicit week start date', async () => {
      const plan = await ctx.planner.generate({ userId: student.id, asOf: '2024-01-10', weekStartDate: '2024-01-11' });

      expect(plan.weekStartDate).toBe('2024-01-11');
      expect(plan.plan.days[0].date).toBe('2024-01-11');
    });

    it('returns the newest plan as the latest', async () => {
      await ctx.planner.generate({ userId: student.id, asOf: '2024-01-10' });
      const second = await ctx.planner.generate({ userId: student.id, asOf: '2024-01-17' });

      expect(ctx.planner.latest(student.id)?.id).toBe(second.id);
      expect(ctx.plans.findByUser(student.id)).toHaveLength(2);
    });

    it('stores nothing when the generator fails', async () => {
      const failing = createTestContext({
        generator: new FakeWeeklyPlanGenerator(new LLMError('model unavailable', 'server_error')),
      });
      try {
        const other = createStudentWithCurriculum(failing);

        await expect(failing.planner.generate({ userId: other.id, asOf: '2024-01-10' })).rejects.toThrow(
          'model unavailable'
        );
        expect(failing.planner.latest(other.id)).toBeNull();
      } finally {
        cleanupTestContext(failing);
      }
    });

    it('stores a fixed plan verbatim', async () => {
      const content: WeeklyPlanContent = {
        days: [
          {
            date: '2024-01-15',
            subjects: ['Science', 'Maths'],
            topics: ['Plants', 'Decimals'],
            isNewTopic: [false, true],
            durationMinutes: 45,
          },
        ],
        rationale: 'Plants is overdue; Decimals starts this week.',
      };
      const fixed = createTestContext({ generator: new FakeWeeklyPlanGenerator(content) });
      try {
        const other = createStudentWithCurriculum(fixed);
        const plan = await fixed.planner.generate({ userId: other.id, asOf: '2024-01-10' });

        expect(plan.plan).toEqual(content);
      } finally {
        cleanupTestContext(fixed);
      }
    });

    it('rejects an unknown student without calling the generator', async () => {
      await expect(ctx.planner.generate({ userId: 'stu_missing', asOf: '2024-01-10' })).rejects.toThrow(
        NotFoundError
      );
      expect(ctx.generator.contexts).toEqual([]);
    });
  });

  describe('latest', () => {
    it('is null before any plan is generated', () => {
      expect(ctx.planner.latest(student.id)).toBeNull();
    });

    it('rejects an unknown student', () => {
      expect(() => ctx.planner.latest('stu_missing')).toThrow(NotFoundError);
    });
  });
});

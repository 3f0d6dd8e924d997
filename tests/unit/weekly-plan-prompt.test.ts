/**
 * Weekly Plan Prompt Tests
 *
 * Covers the sections of the plan request and the parsing of model replies,
 * including the reply shapes local models tend to produce.
 */

import { describe, it, expect } from 'vitest';
import {
  buildWeeklyPlanUserMessage,
  extractJsonFromResponse,
  formatCurriculum,
  formatDueTopics,
  formatLearningHistory,
  parseWeeklyPlanResponse,
  weekStudyDates,
} from '../../src/llm/prompts/weekly-plan';
import { LLMError } from '../../src/llm/types';
import type { Student, TopicState } from '../../src/core/models';
import type { WeeklyPlanContext } from '../../src/core/planning';

const created = new Date('2024-01-01T00:00:00Z');

const student: Student = {
  id: 'stu_test',
  name: 'Test Student',
  grade: '7',
  board: 'CBSE',
  dailyDurationMinutes: 45,
  weeklyFrequency: 3,
  subjects: ['Maths', 'Science'],
  studyTimePreference: 'evening',
  createdAt: created,
  updatedAt: created,
};

function topicState(subject: string, topic: string, lastReviewed: string | null, nextReview: string): TopicState {
  return {
    id: `ts_${topic.toLowerCase()}`,
    userId: student.id,
    subject,
    topic,
    schedule: { easinessFactor: 2.36, interval: 1, repetitions: 1, lastReviewed, nextReview },
    version: 1,
    createdAt: created,
    updatedAt: created,
  };
}

function context(overrides: Partial<WeeklyPlanContext> = {}): WeeklyPlanContext {
  return {
    student,
    weekStartDate: '2024-01-15',
    asOf: '2024-01-10',
    curriculum: [{ subject: 'Maths', topic: 'Fractions', startDate: '2024-01-01', endDate: null }],
    dueTopics: [{ state: topicState('Maths', 'Fractions', null, '2024-01-02'), daysOverdue: 8 }],
    history: [topicState('Maths', 'Fractions', null, '2024-01-02')],
    focusRequest: null,
    events: null,
    ...overrides,
  };
}

describe('prompt sections', () => {
  it('lists the study dates from the week start', () => {
    expect(weekStudyDates('2024-01-29', 3)).toEqual(['2024-01-29', '2024-01-30', '2024-01-31']);
  });

  it('formats curriculum rows with their start dates', () => {
    expect(formatCurriculum([])).toBe('No new curriculum topics for this period.');
    expect(
      formatCurriculum([
        { subject: 'Maths', topic: 'Fractions', startDate: '2024-01-01', endDate: '2024-01-31' },
        { subject: 'Science', topic: 'Plants', startDate: '2024-01-03', endDate: null },
      ])
    ).toBe('  - Maths: Fractions (starts 2024-01-01)\n  - Science: Plants (starts 2024-01-03)');
  });

  it('formats due topics with lateness and easiness', () => {
    expect(formatDueTopics([])).toBe('No topics currently due for review.');
    expect(formatDueTopics(context().dueTopics)).toBe(
      '  - Maths: Fractions (due: 2024-01-02, 8 days overdue, easiness: 2.4)'
    );
  });

  it('summarizes practiced topics per subject', () => {
    const history = [
      topicState('Science', 'Plants', '2024-01-08', '2024-01-09'),
      topicState('Maths', 'Fractions', '2024-01-02', '2024-01-03'),
      topicState('Maths', 'Decimals', '2024-01-05', '2024-01-06'),
      topicState('English', 'Poetry', null, '2024-02-02'),
    ];

    expect(formatLearningHistory(history, '2024-01-10')).toBe(
      '  - Maths: 2 topics practiced, last session 2024-01-05 (5 days ago)\n' +
        '  - Science: 1 topics practiced, last session 2024-01-08 (2 days ago)'
    );
  });

  it('distinguishes no history from unpracticed history', () => {
    expect(formatLearningHistory([], '2024-01-10')).toBe('No learning history yet.');
    expect(formatLearningHistory(context().history, '2024-01-10')).toBe(
      'No topics have been practiced yet - focus on introducing new curriculum.'
    );
  });
});

describe('buildWeeklyPlanUserMessage', () => {
  it('describes the student and the week to plan', () => {
    const message = buildWeeklyPlanUserMessage(context());

    expect(message).toContain('- Daily Study Duration: 45 minutes\n');
    expect(message).toContain('- Preferred Study Time: evening\n');
    expect(message).toContain('**Week to Plan:** 2024-01-15 to 2024-01-17 (3 study days)\n');
    expect(message).toContain('**Study Dates:** 2024-01-15, 2024-01-16, 2024-01-17\n');
    expect(message).toContain('ABSOLUTE HARD LIMIT: Maximum 2 topics per day, no exceptions.');
  });

  it('includes the focus request and events only when given', () => {
    expect(buildWeeklyPlanUserMessage(context())).not.toContain('Focus Request');

    const message = buildWeeklyPlanUserMessage(
      context({ focusRequest: 'More fractions practice', events: 'Science fair on Thursday' })
    );
    expect(message).toContain("**Student's Focus Request:** More fractions practice\n");
    expect(message).toContain('**Upcoming Events:** Science fair on Thursday\n');
  });
});

describe('extractJsonFromResponse', () => {
  it('unwraps a fenced block', () => {
    expect(extractJsonFromResponse('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('cuts the object out of surrounding prose', () => {
    expect(extractJsonFromResponse('Here is the plan: {"a": {"b": 2}} Enjoy!')).toBe('{"a": {"b": 2}}');
  });
});

describe('parseWeeklyPlanResponse', () => {
  const day = {
    date: '2024-01-15',
    subjects: ['Maths'],
    topics: ['Fractions'],
    is_new_topic: [false],
    duration_minutes: 45,
  };

  it('reads a plan with a top-level rationale', () => {
    const reply = '```json\n' + JSON.stringify({ weekly_plan: [day], rationale: 'Fractions is overdue.' }) + '\n```';

    expect(parseWeeklyPlanResponse(reply)).toEqual({
      days: [
        {
          date: '2024-01-15',
          subjects: ['Maths'],
          topics: ['Fractions'],
          isNewTopic: [false],
          durationMinutes: 45,
        },
      ],
      rationale: 'Fractions is overdue.',
    });
  });

  it('lifts a rationale given as the last list element', () => {
    const reply = JSON.stringify({ weekly_plan: [day, { rationale: 'Balanced across subjects.' }] });
    const plan = parseWeeklyPlanResponse(reply);

    expect(plan.days).toHaveLength(1);
    expect(plan.rationale).toBe('Balanced across subjects.');
  });

  it('marks topics as review when is_new_topic is absent', () => {
    const { is_new_topic: _omitted, ...bare } = day;
    const plan = parseWeeklyPlanResponse(JSON.stringify({ weekly_plan: [{ ...bare, topics: ['A', 'B'] }] }));

    expect(plan.days[0].isNewTopic).toEqual([false, false]);
    expect(plan.rationale).toBe('');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseWeeklyPlanResponse('I cannot help with that.')).toThrow(LLMError);
    expect(() => parseWeeklyPlanResponse('I cannot help with that.')).toThrow(
      'Plan response is not valid JSON: I cannot help with that.'
    );
  });

  it('rejects a reply without a day list', () => {
    expect(() => parseWeeklyPlanResponse('{"plan": []}')).toThrow('Plan response has no weekly_plan list');
  });

  it('names the first invalid day field', () => {
    const reply = JSON.stringify({ weekly_plan: [{ ...day, date: 'Monday' }] });

    expect(() => parseWeeklyPlanResponse(reply)).toThrow(
      'Plan response has an invalid day at 0.date: date must be YYYY-MM-DD'
    );
  });

  it('rejects new-topic flags that do not line up with the topics', () => {
    const reply = JSON.stringify({ weekly_plan: [{ ...day, is_new_topic: [true, false] }] });

    try {
      parseWeeklyPlanResponse(reply);
      expect.unreachable('parseWeeklyPlanResponse should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(LLMError);
      expect(error).toHaveProperty('type', 'invalid_response');
      expect(error).toHaveProperty(
        'message',
        'Plan response has an invalid day at 0: is_new_topic must have one entry per topic'
      );
    }
  });
});

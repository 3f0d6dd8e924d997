/**
 * Test Helpers Module
 *
 * Fixtures and fakes shared by the integration, API and CLI tests.
 */

import type { AppContext } from '../src/app-context';
import type { CreateStudentInput } from '../src/storage/repositories';
import type { Student, WeeklyPlanContent } from '../src/core/models';
import type { WeeklyPlanContext, WeeklyPlanGenerator } from '../src/core/planning';
import { addDays } from '../src/core/sm2/calendar';
import type { CliIO } from '../src/cli/utils/terminal';

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Five data rows and one row without a topic (line 6).
 *
 * | line | subject | topic                   | start      | end        |
 * |------|---------|-------------------------|------------|------------|
 * | 2    | Maths   | Fractions               | 2024-01-01 | 2024-01-31 |
 * | 3    | Maths   | Decimals                | 2024-01-15 | -          |
 * | 4    | Science | Plants                  | 2024-01-03 | -          |
 * | 5    | English | Poetry, rhyme and rhythm| 2024-02-01 | -          |
 * | 6    | History | (missing)               |            |            |
 */
export const SAMPLE_NEWSLETTER_CSV = [
  'Subject,Topic,Date,End_Date',
  'Maths,Fractions,2024-01-01,2024-01-31',
  'Maths,Decimals,15/01/2024,',
  'Science,Plants,2024-01-03,',
  'English,"Poetry, rhyme and rhythm",01-02-2024,',
  'History,,2024-01-05,',
].join('\n');

export const DEFAULT_STUDENT: CreateStudentInput = {
  name: 'Test Student',
  grade: '7',
  board: 'CBSE',
  dailyDurationMinutes: 45,
  weeklyFrequency: 3,
  subjects: ['Maths', 'Science', 'English'],
  studyTimePreference: 'evening',
};

export function createTestStudent(ctx: AppContext, overrides: Partial<CreateStudentInput> = {}): Student {
  return ctx.students.create({ ...DEFAULT_STUDENT, ...overrides });
}

/**
 * Creates a student and imports {@link SAMPLE_NEWSLETTER_CSV} for January 2024.
 */
export function createStudentWithCurriculum(ctx: AppContext): Student {
  const student = createTestStudent(ctx);
  ctx.importer.importNewsletterCsv({ userId: student.id, month: 1, year: 2024, csv: SAMPLE_NEWSLETTER_CSV });
  return student;
}

// ============================================================================
// Fakes
// ============================================================================

/**
 * Plan generator that records each context it receives. By default it
 * returns one day per study day, each reviewing the first due topic.
 */
export class FakeWeeklyPlanGenerator implements WeeklyPlanGenerator {
  readonly contexts: WeeklyPlanContext[] = [];

  constructor(private readonly outcome: WeeklyPlanContent | Error | null = null) {}

  async generateWeeklyPlan(context: WeeklyPlanContext): Promise<WeeklyPlanContent> {
    this.contexts.push(context);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    if (this.outcome) {
      return this.outcome;
    }

    const first = context.dueTopics[0];
    return {
      days: Array.from({ length: context.student.weeklyFrequency }, (_, index) => ({
        date: addDays(context.weekStartDate, index),
        subjects: first ? [first.state.subject] : [],
        topics: first ? [first.state.topic] : [],
        isNewTopic: first ? [false] : [],
        durationMinutes: context.student.dailyDurationMinutes,
      })),
      rationale: 'Review the most overdue topic every day.',
    };
  }
}

/**
 * CLI output sink that keeps every line.
 */
export function createCapturingIO(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Parses a response body as JSON.
 */
export async function getJsonResponse(response: Response): Promise<unknown> {
  return response.json();
}

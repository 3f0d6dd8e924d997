/**
 * Weekly Plan Prompt Builder
 *
 * Builds the prompts that ask a model for a week of study sessions, and
 * parses the model's JSON reply into a {@link WeeklyPlanContent}.
 *
 * The user message carries everything the model may draw on: the student's
 * profile, the dates to plan, the active curriculum, the topics SM-2 says
 * are due and a per-subject summary of past practice. The model is told to
 * use only those subjects and topics, and to keep to two topics a day.
 */

import { z } from 'zod';
import { addDays, daysBetween, isCalendarDate, type CalendarDate } from '../../core/sm2/calendar';
import type { CurriculumEntry, DailyPlan, DueTopic, TopicState, WeeklyPlanContent } from '../../core/models';
import type { WeeklyPlanContext } from '../../core/planning/types';
import { LLMError } from '../types';

/** Curriculum rows included in the prompt */
export const MAX_CURRICULUM_ITEMS = 20;

/** Due topics included in the prompt */
export const MAX_DUE_TOPICS = 15;

export const MAX_TOPICS_PER_DAY = 2;

// =============================================================================
// Prompt construction
// =============================================================================

export function buildWeeklyPlanSystemPrompt(): string {
  return `You are an expert educational planner specializing in creating balanced study schedules for children using spaced repetition principles.

**Your Responsibilities:**
1. Create daily study plans that balance NEW curriculum topics with REVIEW of previously learned topics
2. Follow the SM-2 spaced repetition algorithm - prioritize topics that are due for review
3. Ensure NO subject is neglected for more than 7 consecutive days
4. Distribute subjects evenly across the week to maintain engagement
5. Respect time constraints (daily duration and weekly frequency)
6. Adapt plans based on upcoming events (e.g., olympiads, tests)
7. Honor the student's focus requests while maintaining balance

**CRITICAL:**
ONLY use subjects and topics from the curriculum data provided. DO NOT make up or invent subjects or topics.

**SM-2 Spaced Repetition Guidelines:**
- Topics with next_review <= today are DUE and should be prioritized
- Topics not practiced in 7+ days risk being forgotten
- Balance: ~60% time on NEW topics, ~40% on REVIEW topics
- Mix subjects within each day when possible (max 2 subjects per day)

**Scheduling Principles:**
- Variety: Don't repeat same subjects on consecutive days unless necessary
- Difficulty distribution: Mix easier and harder topics within a session
- Age-appropriate: Adjust complexity and pacing based on grade level

**Output Requirements:**
- Exactly match the requested number of study days per week
- Stay within daily time limits
- Provide clear rationale for scheduling decisions
- Mark each topic as new or review
- Respond with a single JSON object and nothing else`;
}

/**
 * The dates to plan: `weeklyFrequency` consecutive days from the start.
 *
 * @example
 * weekStudyDates('2024-01-08', 3); // ['2024-01-08', '2024-01-09', '2024-01-10']
 */
export function weekStudyDates(weekStartDate: CalendarDate, weeklyFrequency: number): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (let i = 0; i < weeklyFrequency; i++) {
    dates.push(addDays(weekStartDate, i));
  }
  return dates;
}

export function formatCurriculum(curriculum: readonly CurriculumEntry[]): string {
  if (curriculum.length === 0) {
    return 'No new curriculum topics for this period.';
  }
  return curriculum
    .slice(0, MAX_CURRICULUM_ITEMS)
    .map((item) => `  - ${item.subject}: ${item.topic} (starts ${item.startDate})`)
    .join('\n');
}

export function formatDueTopics(dueTopics: readonly DueTopic[]): string {
  if (dueTopics.length === 0) {
    return 'No topics currently due for review.';
  }
  return dueTopics
    .slice(0, MAX_DUE_TOPICS)
    .map(
      ({ state, daysOverdue }) =>
        `  - ${state.subject}: ${state.topic} (due: ${state.schedule.nextReview}, ` +
        `${daysOverdue} days overdue, easiness: ${state.schedule.easinessFactor.toFixed(1)})`
    )
    .join('\n');
}

/**
 * Per-subject practice summary. Topics never reviewed are left out: they
 * are new material, not neglected material.
 */
export function formatLearningHistory(history: readonly TopicState[], asOf: CalendarDate): string {
  if (history.length === 0) {
    return 'No learning history yet.';
  }

  const bySubject = new Map<string, { topicCount: number; lastDate: CalendarDate }>();
  for (const state of history) {
    const reviewed = state.schedule.lastReviewed;
    if (reviewed === null) continue;

    const entry = bySubject.get(state.subject);
    if (!entry) {
      bySubject.set(state.subject, { topicCount: 1, lastDate: reviewed });
    } else {
      entry.topicCount += 1;
      if (reviewed > entry.lastDate) entry.lastDate = reviewed;
    }
  }

  if (bySubject.size === 0) {
    return 'No topics have been practiced yet - focus on introducing new curriculum.';
  }

  return [...bySubject.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(
      ([subject, { topicCount, lastDate }]) =>
        `  - ${subject}: ${topicCount} topics practiced, ` +
        `last session ${lastDate} (${daysBetween(lastDate, asOf)} days ago)`
    )
    .join('\n');
}

const OUTPUT_CONTRACT = `{
  "weekly_plan": [
    {
      "date": "YYYY-MM-DD",
      "subjects": ["subject name"],
      "topics": ["topic name copied exactly"],
      "is_new_topic": [true],
      "duration_minutes": 30
    }
  ],
  "rationale": "how the week was balanced"
}`;

/**
 * Builds the user message for a plan request.
 */
export function buildWeeklyPlanUserMessage(context: WeeklyPlanContext): string {
  const { student } = context;
  const dates = weekStudyDates(context.weekStartDate, student.weeklyFrequency);
  const first = dates[0];
  const last = dates[dates.length - 1];

  let message = `**Student Profile:**
- Name: ${student.name}
- Grade: ${student.grade}
- Board: ${student.board}
- Daily Study Duration: ${student.dailyDurationMinutes} minutes
- Study Days Per Week: ${student.weeklyFrequency} days
- Subjects: ${student.subjects.join(', ')}${
    student.studyTimePreference ? `\n- Preferred Study Time: ${student.studyTimePreference}` : ''
  }

**Week to Plan:** ${first} to ${last} (${student.weeklyFrequency} study days)
**Study Dates:** ${dates.join(', ')}

**Current Curriculum (New Topics to Cover):**
${formatCurriculum(context.curriculum)}

**Topics Due for Review (SM-2 Algorithm):**
${formatDueTopics(context.dueTopics)}

**Learning History Summary:**
${formatLearningHistory(context.history, context.asOf)}
`;

  if (context.focusRequest) {
    message += `\n**Student's Focus Request:** ${context.focusRequest}`;
  }
  if (context.events) {
    message += `\n**Upcoming Events:** ${context.events}`;
  }

  message += `

**Task:** Generate a ${student.weeklyFrequency}-day study plan for the dates listed above.

**CRITICAL RULES - YOU MUST FOLLOW THESE EXACTLY:**
1. ONLY use subjects and topics from the "Current Curriculum" and "Topics Due for Review" sections above
2. DO NOT invent, create, or make up ANY subjects or topics
3. Each day should total ${student.dailyDurationMinutes} minutes
4. Balance subject distribution: ${student.subjects.join(', ')} should each appear at least twice where the curriculum allows
5. Balance new curriculum topics (~60%) with review topics (~40%)
6. Copy topic names EXACTLY as they appear in the curriculum data
7. The last day of the week follows the SAME rules as every other day. Unscheduled topics carry over to next week
8. Each topic must belong to one of the subjects listed for that day
9. Provide a clear rationale explaining your scheduling decisions

ABSOLUTE HARD LIMIT: Maximum ${MAX_TOPICS_PER_DAY} topics per day, no exceptions.
It is CORRECT and EXPECTED to leave topics unscheduled.

**Output Format:** Respond with JSON in exactly this shape:
${OUTPUT_CONTRACT}`;

  return message;
}

// =============================================================================
// Response parsing
// =============================================================================

const dailyPlanSchema = z
  .object({
    date: z.string().refine(isCalendarDate, { message: 'date must be YYYY-MM-DD' }),
    subjects: z.array(z.string()),
    topics: z.array(z.string()),
    is_new_topic: z.array(z.boolean()).optional(),
    duration_minutes: z.number().int().nonnegative(),
  })
  .refine((day) => day.is_new_topic === undefined || day.is_new_topic.length === day.topics.length, {
    message: 'is_new_topic must have one entry per topic',
  });

const rationaleOnlySchema = z.object({ rationale: z.string() }).strict();

const weeklyPlanResponseSchema = z.object({
  weekly_plan: z.array(z.unknown()),
  rationale: z.string().optional(),
});

/**
 * Extracts the JSON object from a reply that may wrap it in a code fence
 * or surround it with prose.
 */
export function extractJsonFromResponse(response: string): string {
  const codeBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonString = codeBlockMatch ? codeBlockMatch[1].trim() : response.trim();

  if (!jsonString.startsWith('{')) {
    const startIdx = jsonString.indexOf('{');
    const endIdx = jsonString.lastIndexOf('}');
    if (startIdx !== -1 && endIdx !== -1 && endIdx > startIdx) {
      return jsonString.substring(startIdx, endIdx + 1);
    }
  }

  return jsonString;
}

function toDailyPlan(day: z.infer<typeof dailyPlanSchema>): DailyPlan {
  return {
    date: day.date,
    subjects: day.subjects,
    topics: day.topics,
    isNewTopic: day.is_new_topic ?? day.topics.map(() => false),
    durationMinutes: day.duration_minutes,
  };
}

/**
 * Parses a model reply into plan content.
 *
 * Some models put the rationale as a final `{ "rationale": ... }` element
 * of the day list instead of beside it; that element is lifted out.
 *
 * @throws LLMError('invalid_response') when no valid plan can be read
 *
 * @example
 * ```typescript
 * const plan = parseWeeklyPlanResponse(response.text);
 * plan.days[0].topics; // ['Fractions']
 * ```
 */
export function parseWeeklyPlanResponse(response: string): WeeklyPlanContent {
  let payload: unknown;
  try {
    payload = JSON.parse(extractJsonFromResponse(response));
  } catch (error) {
    throw new LLMError(
      `Plan response is not valid JSON: ${response.substring(0, 100)}`,
      'invalid_response',
      error
    );
  }

  const envelope = weeklyPlanResponseSchema.safeParse(payload);
  if (!envelope.success) {
    throw new LLMError('Plan response has no weekly_plan list', 'invalid_response', envelope.error);
  }

  const entries = [...envelope.data.weekly_plan];
  let rationale = envelope.data.rationale;
  const trailing = rationaleOnlySchema.safeParse(entries[entries.length - 1]);
  if (trailing.success) {
    entries.pop();
    rationale = rationale ?? trailing.data.rationale;
  }

  const days = z.array(dailyPlanSchema).safeParse(entries);
  if (!days.success) {
    const issue = days.error.errors[0];
    throw new LLMError(
      `Plan response has an invalid day at ${issue.path.join('.')}: ${issue.message}`,
      'invalid_response',
      days.error
    );
  }

  return {
    days: days.data.map(toDailyPlan),
    rationale: rationale ?? '',
  };
}

/**
 * Review Commands
 *
 * ```bash
 * npm run cli -- due stu_123 --as-of 2024-01-05
 * npm run cli -- record-session stu_123 --subject Maths --topic Fractions --type review --quality 4
 * npm run cli -- record-session stu_123 --topic-id ts_456 --type study
 * npm run cli -- record-session stu_123 --search fract --type review --quality 3
 * ```
 */

import type { Command } from 'commander';
import type { AppContext } from '../../app-context';
import { ValidationError } from '../../core/errors';
import type { DueTopic } from '../../core/models';
import type { TopicRef } from '../../core/review';
import { today, type CalendarDate } from '../../core/sm2/calendar';
import { parseDate, parseInteger } from '../utils/options';
import { bold, dim, formatEasiness, green, plural, printHeading, yellow } from '../utils/terminal';
import type { CommandRuntime } from './types';

interface DueOptions {
  asOf?: CalendarDate;
}

interface RecordSessionOptions {
  subject?: string;
  topic?: string;
  topicId?: string;
  search?: string;
  type: string;
  quality?: number;
  date?: CalendarDate;
  notes?: string;
}

export function formatDueTopic(entry: DueTopic): string {
  const { state, daysOverdue } = entry;
  const overdue = daysOverdue === 0 ? 'due today' : yellow(`${plural(daysOverdue, 'day')} overdue`);
  return (
    `  ${bold(state.subject)}: ${state.topic}  ` +
    dim(`(next review ${state.schedule.nextReview}, EF ${formatEasiness(state.schedule.easinessFactor)}) `) +
    overdue
  );
}

/**
 * Resolves a search term to the one tracked topic whose name contains it.
 * Several matches are listed and refused.
 */
function searchTopic(
  runtime: CommandRuntime,
  ctx: AppContext,
  userId: string,
  options: RecordSessionOptions
): TopicRef {
  const term = options.search?.trim() ?? '';
  if (term === '') {
    throw new ValidationError('--search needs a non-empty term');
  }
  const matches = ctx.topicStates.queryStates(userId, { topicContains: term, subject: options.subject });

  if (matches.length === 0) {
    throw new ValidationError(`No tracked topic matches '${term}'`);
  }
  if (matches.length > 1) {
    printHeading(runtime.io, `Topics matching '${term}' (${matches.length})`);
    for (const state of matches) {
      runtime.io.out(`  ${dim(state.id)}  ${bold(state.subject)}: ${state.topic}`);
    }
    throw new ValidationError(`'${term}' matches ${matches.length} topics; pick one with --topic-id`);
  }
  return { id: matches[0].id };
}

function topicRefFrom(
  runtime: CommandRuntime,
  ctx: AppContext,
  userId: string,
  options: RecordSessionOptions
): TopicRef {
  if (options.topicId !== undefined) {
    if (options.subject !== undefined || options.topic !== undefined || options.search !== undefined) {
      throw new ValidationError('Use either --topic-id, --search or --subject with --topic');
    }
    return { id: options.topicId };
  }
  if (options.search !== undefined) {
    if (options.topic !== undefined) {
      throw new ValidationError('Use either --search or --topic, not both');
    }
    return searchTopic(runtime, ctx, userId, options);
  }
  if (options.subject === undefined || options.topic === undefined) {
    throw new ValidationError('Name the topic with --topic-id, --search, or both --subject and --topic');
  }
  return { subject: options.subject, topic: options.topic };
}

export function registerReviewCommands(program: Command, runtime: CommandRuntime): void {
  program
    .command('due <studentId>')
    .description('List topics due for review, most overdue first')
    .option('--as-of <date>', 'Date to check against (YYYY-MM-DD, default today)', parseDate)
    .action((studentId: string, options: DueOptions) => {
      const ctx = runtime.context();
      const student = ctx.students.getById(studentId);
      const asOf = options.asOf ?? today();
      const due = ctx.dueTopics.listDue(student.id, asOf);

      printHeading(runtime.io, `Topics due for ${student.name} as of ${asOf} (${due.length})`);
      if (due.length === 0) {
        runtime.io.out(green('No topics are due for review.'));
        return;
      }
      for (const entry of due) {
        runtime.io.out(formatDueTopic(entry));
      }
    });

  program
    .command('record-session <studentId>')
    .description('Record a study or review session and reschedule the topic')
    .requiredOption('--type <type>', "Session type: 'study' or 'review'")
    .option('--subject <subject>', 'Subject of the topic')
    .option('--topic <topic>', 'Topic name')
    .option('--topic-id <id>', 'Topic state id, instead of --subject and --topic')
    .option('--search <term>', 'Find the topic by part of its name (narrow with --subject)')
    .option('--quality <rating>', 'Recall quality 0-5 (study sessions default to 4)', parseInteger)
    .option('--date <date>', 'Session date (YYYY-MM-DD, default today)', parseDate)
    .option('--notes <text>', 'Free-text notes')
    .action((studentId: string, options: RecordSessionOptions) => {
      const ctx = runtime.context();
      const student = ctx.students.getById(studentId);
      const { session, state } = ctx.recorder.recordWithState({
        userId: student.id,
        topic: topicRefFrom(runtime, ctx, student.id, options),
        sessionType: options.type,
        qualityRating: options.quality ?? null,
        sessionDate: options.date,
        notes: options.notes ?? null,
      });

      const rating = session.qualityRating === null ? 'no rating' : `quality ${session.qualityRating}`;
      runtime.io.out(
        green(`Recorded ${session.sessionType} session for ${state.subject}: ${state.topic} on ${session.sessionDate} (${rating})`)
      );
      runtime.io.out(
        `  Next review: ${bold(state.schedule.nextReview)} ` +
          dim(
            `(interval ${plural(state.schedule.interval, 'day')}, EF ${formatEasiness(state.schedule.easinessFactor)}, ` +
              `${plural(state.schedule.repetitions, 'repetition')})`
          )
      );
    });
}

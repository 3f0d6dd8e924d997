/**
 * Weekly Plan Commands
 *
 * ```bash
 * npm run cli -- generate-plan stu_123 --focus "Extra fractions practice" --events "Sports day on Friday"
 * npm run cli -- view-plan stu_123
 * ```
 */

import type { Command } from 'commander';
import type { WeeklyPlan } from '../../core/models';
import { isoWeekday, type CalendarDate } from '../../core/sm2/calendar';
import { parseDate } from '../utils/options';
import { bold, dim, formatField, formatSeparator, green, plural, printHeading, yellow, type CliIO } from '../utils/terminal';
import type { CommandRuntime } from './types';

const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

interface GeneratePlanOptions {
  weekStart?: CalendarDate;
  asOf?: CalendarDate;
  focus?: string;
  events?: string;
}

function weekdayName(date: CalendarDate): string {
  return WEEKDAY_NAMES[isoWeekday(date) - 1] ?? '';
}

export function printWeeklyPlan(io: CliIO, plan: WeeklyPlan): void {
  printHeading(io, `Weekly plan for the week of ${plan.weekStartDate}`, 60);
  io.out(formatField('Generated', plan.generatedAt.toISOString()));
  if (plan.focusRequest) io.out(formatField('Focus', plan.focusRequest));
  if (plan.events) io.out(formatField('Events', plan.events));

  for (const day of plan.plan.days) {
    io.out('');
    io.out(`${bold(`${weekdayName(day.date)} ${day.date}`)}  ${dim(plural(day.durationMinutes, 'minute'))}`);
    if (day.topics.length === 0) {
      io.out(dim('    Rest day'));
    }
    day.topics.forEach((topic, index) => {
      const subject = day.subjects[index] ?? day.subjects[0] ?? '';
      const label = day.isNewTopic[index] ? green('new') : yellow('review');
      io.out(`    - ${subject}: ${topic} (${label})`);
    });
  }

  if (plan.plan.rationale !== '') {
    io.out('');
    io.out(bold('Rationale'));
    io.out(`  ${plan.plan.rationale}`);
  }
  io.out(formatSeparator(60));
}

export function registerPlanCommands(program: Command, runtime: CommandRuntime): void {
  program
    .command('generate-plan <studentId>')
    .description('Generate a weekly study plan with the configured AI provider')
    .option('--week-start <date>', 'First day of the week (default: the next Monday)', parseDate)
    .option('--as-of <date>', 'Date the plan is made on (default today)', parseDate)
    .option('--focus <text>', 'What the student wants to focus on')
    .option('--events <text>', 'Upcoming events to plan around')
    .action(async (studentId: string, options: GeneratePlanOptions) => {
      const ctx = runtime.context();
      runtime.io.out(dim(`Generating plan with ${ctx.config.planner.provider}...`));

      const plan = await ctx.planner.generate({
        userId: studentId,
        weekStartDate: options.weekStart,
        asOf: options.asOf,
        focusRequest: options.focus,
        events: options.events,
      });

      runtime.io.out(green(`Saved plan ${plan.id}`));
      printWeeklyPlan(runtime.io, plan);
    });

  program
    .command('view-plan <studentId>')
    .description('Show the most recently generated weekly plan')
    .action((studentId: string) => {
      const plan = runtime.context().planner.latest(studentId);
      if (!plan) {
        runtime.io.out(yellow('No weekly plan has been generated yet. Run generate-plan first.'));
        return;
      }
      printWeeklyPlan(runtime.io, plan);
    });
}

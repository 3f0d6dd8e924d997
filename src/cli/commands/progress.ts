/**
 * Progress Command
 *
 * ```bash
 * npm run cli -- view-progress stu_123 --as-of 2024-02-01
 * ```
 */

import type { Command } from 'commander';
import type { ProgressReport } from '../../core/progress';
import type { CalendarDate } from '../../core/sm2/calendar';
import { parseDate } from '../utils/options';
import {
  bold,
  dim,
  formatEasiness,
  formatField,
  formatSeparator,
  printHeading,
  yellow,
  type CliIO,
} from '../utils/terminal';
import { formatDueTopic } from './review';
import type { CommandRuntime } from './types';

interface ProgressOptions {
  asOf?: CalendarDate;
}

export function printProgressReport(io: CliIO, studentName: string, report: ProgressReport): void {
  printHeading(io, `Progress for ${studentName} as of ${report.asOf}`, 60);
  io.out(formatField('Topics tracked', String(report.totalTopics)));
  io.out(formatField('Due for review', report.dueCount > 0 ? yellow(String(report.dueCount)) : '0'));
  io.out(
    formatField('Average easiness', report.averageEasiness === null ? dim('n/a') : formatEasiness(report.averageEasiness))
  );

  if (report.subjects.length > 0) {
    io.out('');
    io.out(bold('By subject'));
    io.out(dim(`  ${'Subject'.padEnd(20)} ${'Topics'.padStart(6)} ${'Due'.padStart(5)} ${'Studied'.padStart(8)} ${'EF'.padStart(6)}`));
    for (const subject of report.subjects) {
      io.out(
        `  ${subject.subject.padEnd(20)} ${String(subject.topicCount).padStart(6)} ${String(subject.dueCount).padStart(5)} ` +
          `${String(subject.reviewedCount).padStart(8)} ${formatEasiness(subject.averageEasiness).padStart(6)}`
      );
    }
  }

  if (report.dueTopics.length > 0) {
    io.out('');
    io.out(bold('Due topics'));
    for (const entry of report.dueTopics) {
      io.out(formatDueTopic(entry));
    }
  }

  io.out('');
  io.out(bold('Recent sessions'));
  if (report.recentSessions.length === 0) {
    io.out(dim('  No sessions recorded yet.'));
  }
  for (const session of report.recentSessions) {
    const rating = session.qualityRating === null ? '-' : String(session.qualityRating);
    io.out(`  ${session.sessionDate}  ${session.sessionType.padEnd(6)}  q=${rating}  ${session.subject}: ${session.topic}`);
  }
  io.out(formatSeparator(60));
}

export function registerProgressCommands(program: Command, runtime: CommandRuntime): void {
  program
    .command('view-progress <studentId>')
    .description('Summarize tracked topics, due reviews and recent sessions')
    .option('--as-of <date>', 'Report date (YYYY-MM-DD, default today)', parseDate)
    .action((studentId: string, options: ProgressOptions) => {
      const ctx = runtime.context();
      const student = ctx.students.getById(studentId);
      printProgressReport(runtime.io, student.name, ctx.progress.getReport(student.id, options.asOf));
    });
}

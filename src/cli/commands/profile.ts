/**
 * Profile Commands
 *
 * ```bash
 * npm run cli -- create-profile --name "Asha" --grade 7 --board CBSE \
 *   --duration 45 --frequency 5 --subjects "Maths,Science" --time evening
 * npm run cli -- update-profile stu_123 --frequency 4
 * npm run cli -- view-profile stu_123
 * ```
 */

import type { Command } from 'commander';
import { ValidationError } from '../../core/errors';
import type { Student } from '../../core/models';
import { parseInteger, parseList } from '../utils/options';
import { bold, dim, formatField, green, plural, printHeading, type CliIO } from '../utils/terminal';
import type { CommandRuntime } from './types';

interface CreateProfileOptions {
  id?: string;
  name: string;
  grade: string;
  board: string;
  duration: number;
  frequency: number;
  subjects: string[];
  time?: string;
}

interface UpdateProfileOptions {
  duration?: number;
  frequency?: number;
  subjects?: string[];
  time?: string;
  clearTime?: boolean;
}

export function printProfile(io: CliIO, student: Student): void {
  printHeading(io, 'Student Profile');
  io.out(formatField('ID', dim(student.id)));
  io.out(formatField('Name', bold(student.name)));
  io.out(formatField('Grade', student.grade));
  io.out(formatField('Board', student.board));
  io.out(formatField('Daily duration', plural(student.dailyDurationMinutes, 'minute')));
  io.out(formatField('Weekly frequency', plural(student.weeklyFrequency, 'day')));
  io.out(formatField('Subjects', student.subjects.join(', ')));
  io.out(formatField('Preferred time', student.studyTimePreference ?? dim('(none)')));
}

export function registerProfileCommands(program: Command, runtime: CommandRuntime): void {
  program
    .command('create-profile')
    .description('Create a student profile')
    .requiredOption('--name <name>', 'Student name')
    .requiredOption('--grade <grade>', 'School grade, e.g. 7')
    .requiredOption('--board <board>', 'Education board, e.g. CBSE')
    .requiredOption('--duration <minutes>', 'Daily study time in minutes', parseInteger)
    .requiredOption('--frequency <days>', 'Study days per week (1-7)', parseInteger)
    .requiredOption('--subjects <list>', 'Comma-separated subjects', parseList)
    .option('--time <preference>', 'Preferred study time, e.g. evening')
    .option('--id <id>', 'Explicit student id')
    .action((options: CreateProfileOptions) => {
      const student = runtime.context().students.create({
        id: options.id,
        name: options.name,
        grade: options.grade,
        board: options.board,
        dailyDurationMinutes: options.duration,
        weeklyFrequency: options.frequency,
        subjects: options.subjects,
        studyTimePreference: options.time ?? null,
      });

      runtime.io.out(green(`Created profile for ${student.name} (${student.id})`));
      printProfile(runtime.io, student);
    });

  program
    .command('update-profile <studentId>')
    .description("Change a student's study settings")
    .option('--duration <minutes>', 'Daily study time in minutes', parseInteger)
    .option('--frequency <days>', 'Study days per week (1-7)', parseInteger)
    .option('--subjects <list>', 'Comma-separated subjects', parseList)
    .option('--time <preference>', 'Preferred study time')
    .option('--clear-time', 'Remove the preferred study time')
    .action((studentId: string, options: UpdateProfileOptions) => {
      if (options.time !== undefined && options.clearTime) {
        throw new ValidationError('Use either --time or --clear-time, not both');
      }
      const studyTimePreference = options.clearTime ? null : options.time;

      if (
        options.duration === undefined &&
        options.frequency === undefined &&
        options.subjects === undefined &&
        studyTimePreference === undefined
      ) {
        throw new ValidationError('Nothing to update: pass --duration, --frequency, --subjects, --time or --clear-time');
      }

      const student = runtime.context().students.update(studentId, {
        dailyDurationMinutes: options.duration,
        weeklyFrequency: options.frequency,
        subjects: options.subjects,
        studyTimePreference,
      });

      runtime.io.out(green(`Updated profile for ${student.name}`));
      printProfile(runtime.io, student);
    });

  program
    .command('view-profile <studentId>')
    .description('Show a student profile')
    .action((studentId: string) => {
      printProfile(runtime.io, runtime.context().students.getById(studentId));
    });
}

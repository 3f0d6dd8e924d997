/**
 * Curriculum Commands
 *
 * ```bash
 * npm run cli -- upload-newsletter stu_123 ./october.csv --month 10 --year 2024
 * npm run cli -- list-subjects stu_123
 * ```
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { Command } from 'commander';
import { ValidationError } from '../../core/errors';
import { parseInteger } from '../utils/options';
import { dim, green, plural, printHeading, yellow } from '../utils/terminal';
import type { CommandRuntime } from './types';

interface UploadNewsletterOptions {
  month: number;
  year: number;
}

async function readNewsletter(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`Newsletter file not found: ${file}`, { file });
    }
    throw error;
  }
}

export function registerCurriculumCommands(program: Command, runtime: CommandRuntime): void {
  program
    .command('upload-newsletter <studentId> <file>')
    .description("Import a newsletter's curriculum table exported as CSV")
    .requiredOption('--month <month>', 'Month the newsletter covers (1-12)', parseInteger)
    .requiredOption('--year <year>', 'Year the newsletter covers', parseInteger)
    .action(async (studentId: string, file: string, options: UploadNewsletterOptions) => {
      if (extname(file).toLowerCase() !== '.csv') {
        throw new ValidationError(`Only CSV newsletters are supported, received '${file}'`, { file });
      }
      const csv = await readNewsletter(file);

      const result = runtime.context().importer.importNewsletterCsv({
        userId: studentId,
        month: options.month,
        year: options.year,
        filePath: file,
        csv,
      });
      const { io } = runtime;

      io.out(
        green(
          `Imported ${plural(result.items.length, 'curriculum item')} for ${options.month}/${options.year} ` +
            `(${result.newsletter.id})`
        )
      );
      io.out(`  New topics scheduled: ${result.topicsCreated}`);
      io.out(`  Topics already tracked: ${result.topicsExisting}`);

      if (result.skipped.length > 0) {
        io.out(yellow(`  Skipped ${plural(result.skipped.length, 'row')}:`));
        for (const row of result.skipped) {
          io.out(dim(`    line ${row.line}: ${row.reason}`));
        }
      }
    });

  program
    .command('list-subjects <studentId>')
    .description("List the subjects in a student's uploaded curriculum")
    .action((studentId: string) => {
      const ctx = runtime.context();
      const student = ctx.students.getById(studentId);
      const subjects = ctx.importer.listSubjects(student.id);

      printHeading(runtime.io, `Subjects for ${student.name}`);
      if (subjects.length === 0) {
        runtime.io.out(yellow('No curriculum has been uploaded yet.'));
        return;
      }
      for (const subject of subjects) {
        runtime.io.out(`  - ${subject}`);
      }
    });
}

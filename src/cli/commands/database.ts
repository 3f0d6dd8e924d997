/**
 * Database Commands
 *
 * ```bash
 * npm run cli -- init
 * npm run cli -- reset-db --yes
 * ```
 */

import type { Command } from 'commander';
import { ValidationError } from '../../core/errors';
import { listTables, resetSchema } from '../../storage/migrate';
import { dim, green, yellow } from '../utils/terminal';
import type { CommandRuntime } from './types';

interface ResetOptions {
  yes?: boolean;
}

export function registerDatabaseCommands(program: Command, runtime: CommandRuntime): void {
  program
    .command('init')
    .description('Create the database and its tables if they do not exist')
    .action(() => {
      const ctx = runtime.context();
      runtime.io.out(green(`Database ready at ${ctx.config.database.path}`));
      for (const name of listTables(ctx.connection.sqlite)) {
        runtime.io.out(dim(`  - ${name}`));
      }
    });

  program
    .command('reset-db')
    .description('Drop every table and recreate an empty schema')
    .option('--yes', 'Confirm that all data should be deleted')
    .action((options: ResetOptions) => {
      if (!options.yes) {
        throw new ValidationError('reset-db deletes all data; pass --yes to confirm');
      }
      const ctx = runtime.context();
      resetSchema(ctx.connection.sqlite);
      runtime.io.out(yellow(`All data in ${ctx.config.database.path} has been deleted.`));
    });
}

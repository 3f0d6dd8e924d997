#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * ```bash
 * npm run cli -- init
 * npm run cli -- create-profile --name Asha --grade 7 --board CBSE --duration 45 --frequency 5 --subjects "Maths,Science"
 * npm run cli -- upload-newsletter stu_123 ./october.csv --month 10 --year 2024
 * npm run cli -- due stu_123
 * npm run cli -- record-session stu_123 --subject Maths --topic Fractions --type review --quality 4
 * npm run cli -- view-progress stu_123
 * npm run cli -- generate-plan stu_123
 * npm run cli -- --help
 * ```
 *
 * The database and the LLM client are opened only when a command needs
 * them. Errors print as one red line and set a non-zero exit code.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, CommanderError } from 'commander';
import { config as loadEnv } from 'dotenv';
import { closeAppContext, createAppContext, type AppContext } from '../app-context';
import { ConfigValidationError, getConfig } from '../config';
import { SchedulingError } from '../core/errors';
import { LLMError } from '../llm/types';
import { registerCurriculumCommands } from './commands/curriculum';
import { registerDatabaseCommands } from './commands/database';
import { registerPlanCommands } from './commands/plan';
import { registerProfileCommands } from './commands/profile';
import { registerProgressCommands } from './commands/progress';
import { registerReviewCommands } from './commands/review';
import type { CommandRuntime } from './commands/types';
import { consoleIO, dim, red, type CliIO } from './utils/terminal';

export const CLI_VERSION = '0.1.0';

export interface CliDependencies {
  io?: CliIO;
  /** Builds the application context; defaults to one over the configured database */
  createContext?: () => AppContext;
}

function defaultContext(): AppContext {
  loadEnv();
  return createAppContext(getConfig());
}

/**
 * Builds the commander program. Commander never exits the process: usage
 * errors surface as CommanderError from `parseAsync`.
 */
export function createProgram(runtime: CommandRuntime): Command {
  const program = new Command();

  program
    .name('study-cadence')
    .description('Spaced-repetition scheduling for school curriculum topics')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.io.out(text.replace(/\n$/, '')),
      writeErr: (text) => runtime.io.err(text.replace(/\n$/, '')),
    });

  registerDatabaseCommands(program, runtime);
  registerProfileCommands(program, runtime);
  registerCurriculumCommands(program, runtime);
  registerReviewCommands(program, runtime);
  registerProgressCommands(program, runtime);
  registerPlanCommands(program, runtime);

  return program;
}

function describeError(error: unknown): string | null {
  if (error instanceof SchedulingError || error instanceof LLMError || error instanceof ConfigValidationError) {
    return error.message;
  }
  return null;
}

/**
 * Runs one CLI invocation.
 *
 * @param args - Arguments after the executable and script, e.g. `['due', 'stu_1']`
 * @returns the process exit code
 */
export async function runCli(args: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const createContext = deps.createContext ?? defaultContext;
  const opened: { context: AppContext | null } = { context: null };

  const runtime: CommandRuntime = {
    io,
    context: () => {
      if (!opened.context) {
        opened.context = createContext();
      }
      return opened.context;
    },
  };

  try {
    await createProgram(runtime).parseAsync([...args], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output also end in a CommanderError
      return error.exitCode;
    }

    const message = describeError(error);
    if (message !== null) {
      io.err(red(`Error: ${message}`));
      if (error instanceof LLMError && error.type === 'network') {
        io.err(dim('Is the Ollama server running? Set OLLAMA_BASE_URL or AI_PROVIDER=claude.'));
      }
      return 1;
    }

    console.error('[CLI] Unexpected error:', error);
    return 1;
  } finally {
    if (opened.context && !deps.createContext) {
      closeAppContext(opened.context);
    }
  }
}

function isEntryPoint(scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) return false;
  try {
    // Resolved so that a linked `bin` script still counts as the entry point
    return import.meta.url === pathToFileURL(realpathSync(scriptPath)).href;
  } catch (error) {
    console.error('[CLI] Could not resolve the script path:', error);
    return false;
  }
}

if (isEntryPoint(process.argv[1])) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[CLI] Fatal error:', error);
      process.exitCode = 1;
    }
  );
}

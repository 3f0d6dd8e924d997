/**
 * Study Cadence
 *
 * SM-2 spaced-repetition scheduling for school curriculum topics: student
 * profiles, newsletter curriculum import, due-topic queries, session
 * recording and AI-assisted weekly plans over a SQLite store.
 *
 * @example
 * ```typescript
 * import { createAppContext, loadConfig } from 'study-cadence';
 *
 * const ctx = createAppContext(loadConfig({ DATABASE_PATH: ':memory:' }));
 * const student = ctx.students.create({ ... });
 * ctx.importer.importNewsletterCsv({ userId: student.id, month: 1, year: 2024, csv });
 * ctx.dueTopics.listDue(student.id, '2024-01-05');
 * ```
 */

export { createAppContext, closeAppContext, type AppContext, type AppContextOptions } from './app-context';
export {
  loadConfig,
  getConfig,
  resetConfig,
  isProduction,
  ConfigValidationError,
  type Config,
  type PlannerProvider,
} from './config';

export * from './core/errors';
export * from './core/models';
export * from './core/sm2';
export * from './core/review';
export * from './core/students';
export * from './core/curriculum';
export * from './core/planning';
export * from './core/progress';

export {
  LLMError,
  LLMWeeklyPlanGenerator,
  createTextCompletionClient,
  AnthropicClient,
  OllamaClient,
  type TextCompletionClient,
  type LLMErrorType,
} from './llm';

export { connectDatabase, createDatabase, applySchema, resetSchema } from './storage';
export {
  StudentRepository,
  NewsletterRepository,
  TopicStateRepository,
  StudySessionRepository,
  WeeklyPlanRepository,
} from './storage/repositories';

export { createApp } from './api/server';
export { runCli } from './cli';

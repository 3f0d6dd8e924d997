/**
 * Application Context
 *
 * Wires the repositories and services over one database connection. The
 * HTTP server, the CLI and the tests all build their object graph here so
 * that each of them shares a single transaction boundary per connection.
 */

import type { Config } from './config';
import type { WeeklyPlanContent } from './core/models';
import { CurriculumImporter } from './core/curriculum';
import { WeeklyPlanService, type WeeklyPlanContext, type WeeklyPlanGenerator } from './core/planning';
import { ProgressReporter } from './core/progress';
import { DueTopicQuery, ReviewSessionRecorder, TopicInitializer } from './core/review';
import { SM2Engine } from './core/sm2';
import { createTextCompletionClient, LLMWeeklyPlanGenerator } from './llm';
import { connectDatabase, type DatabaseConnection } from './storage/db';
import {
  NewsletterRepository,
  StudentRepository,
  StudySessionRepository,
  TopicStateRepository,
  WeeklyPlanRepository,
} from './storage/repositories';

export interface AppContext {
  config: Config;
  connection: DatabaseConnection;
  students: StudentRepository;
  newsletters: NewsletterRepository;
  topicStates: TopicStateRepository;
  sessions: StudySessionRepository;
  plans: WeeklyPlanRepository;
  engine: SM2Engine;
  initializer: TopicInitializer;
  recorder: ReviewSessionRecorder;
  dueTopics: DueTopicQuery;
  importer: CurriculumImporter;
  planner: WeeklyPlanService;
  progress: ProgressReporter;
}

export interface AppContextOptions {
  /** An open connection; when absent one is opened at `config.database.path` */
  connection?: DatabaseConnection;
  /**
   * Plan generator. Defaults to the LLM generator for the configured
   * provider, built on first use so that commands which never plan do not
   * need provider credentials.
   */
  generator?: WeeklyPlanGenerator;
}

/**
 * Defers building the LLM client until a plan is actually requested.
 */
class LazyWeeklyPlanGenerator implements WeeklyPlanGenerator {
  private generator: WeeklyPlanGenerator | null = null;

  constructor(private readonly config: Config) {}

  async generateWeeklyPlan(context: WeeklyPlanContext): Promise<WeeklyPlanContent> {
    if (!this.generator) {
      this.generator = new LLMWeeklyPlanGenerator(createTextCompletionClient(this.config));
    }
    return this.generator.generateWeeklyPlan(context);
  }
}

export function createAppContext(config: Config, options: AppContextOptions = {}): AppContext {
  const connection = options.connection ?? connectDatabase(config.database.path);
  const { db } = connection;

  const students = new StudentRepository(db);
  const newsletters = new NewsletterRepository(db);
  const topicStates = new TopicStateRepository(db);
  const sessions = new StudySessionRepository(db);
  const plans = new WeeklyPlanRepository(db);

  const engine = new SM2Engine();
  const initializer = new TopicInitializer(topicStates, engine);
  const dueTopics = new DueTopicQuery(topicStates, engine);
  const recorder = new ReviewSessionRecorder(topicStates, engine, {
    defaultStudyQuality: config.review.defaultStudyQuality,
  });

  return {
    config,
    connection,
    students,
    newsletters,
    topicStates,
    sessions,
    plans,
    engine,
    initializer,
    recorder,
    dueTopics,
    importer: new CurriculumImporter(students, newsletters, topicStates, initializer),
    planner: new WeeklyPlanService({
      students,
      curriculum: newsletters,
      topicStates,
      plans,
      generator: options.generator ?? new LazyWeeklyPlanGenerator(config),
      dueTopics,
    }),
    progress: new ProgressReporter(students, topicStates, sessions, dueTopics),
  };
}

/**
 * Closes the underlying SQLite handle.
 */
export function closeAppContext(context: AppContext): void {
  context.connection.sqlite.close();
}

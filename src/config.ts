/**
 * Centralized Configuration Module
 *
 * Type-safe configuration loaded from environment variables and validated
 * with zod. `.env` files are read by the CLI and server entry points through
 * dotenv before the first call to {@link getConfig}.
 *
 * Usage:
 *   import { getConfig } from './config';
 *
 *   const config = getConfig();
 *   console.log(config.server.port);
 *   console.log(config.database.path);
 *
 * Environment variables:
 * - NODE_ENV: development | production | test
 * - PORT, HOST: HTTP server binding
 * - DATABASE_PATH: SQLite file (':memory:' for a throwaway database)
 * - AI_PROVIDER: ollama | claude, selects the weekly-plan backend
 * - OLLAMA_BASE_URL, OLLAMA_MODEL: local model server
 * - ANTHROPIC_API_KEY (or CLAUDE_API_KEY), ANTHROPIC_MODEL, ANTHROPIC_MAX_TOKENS
 * - DEFAULT_STUDY_QUALITY: grade applied to study sessions recorded without one
 *
 * @module config
 */

import { z } from 'zod';
import type { Quality } from './core/sm2/types';

// =============================================================================
// Configuration Schema
// =============================================================================

const qualitySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().max(65535),
    host: z.string().min(1),
    nodeEnv: z.enum(['development', 'production', 'test']),
  }),

  database: z.object({
    path: z.string().min(1),
  }),

  planner: z.object({
    provider: z.enum(['ollama', 'claude']),
  }),

  ollama: z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().min(1),
    maxTokens: z.number().int().positive(),
  }),

  review: z.object({
    defaultStudyQuality: qualitySchema,
  }),
});

export type Config = z.infer<typeof configSchema>;

export type PlannerProvider = Config['planner']['provider'];

/** Maps schema paths back to the environment variable that feeds them. */
const ENV_VAR_NAMES: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'database.path': 'DATABASE_PATH',
  'planner.provider': 'AI_PROVIDER',
  'ollama.baseUrl': 'OLLAMA_BASE_URL',
  'ollama.model': 'OLLAMA_MODEL',
  'anthropic.apiKey': 'ANTHROPIC_API_KEY',
  'anthropic.model': 'ANTHROPIC_MODEL',
  'anthropic.maxTokens': 'ANTHROPIC_MAX_TOKENS',
  'review.defaultStudyQuality': 'DEFAULT_STUDY_QUALITY',
};

export const DEFAULT_DATABASE_PATH = 'study-cadence.db';

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Environment shape accepted by {@link loadConfig}. `process.env` fits it.
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * Parses a number from an environment variable. Blank values are treated as
 * unset; anything else that is not numeric becomes NaN so the schema rejects
 * it by name instead of silently falling back to the default.
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim();
}

function loadFromEnvironment(env: EnvSource): unknown {
  return {
    server: {
      port: parseNumber(env.PORT) ?? 3001,
      host: nonEmpty(env.HOST) ?? '0.0.0.0',
      nodeEnv: nonEmpty(env.NODE_ENV) ?? 'development',
    },
    database: {
      path: nonEmpty(env.DATABASE_PATH) ?? DEFAULT_DATABASE_PATH,
    },
    planner: {
      provider: nonEmpty(env.AI_PROVIDER)?.toLowerCase() ?? 'ollama',
    },
    ollama: {
      baseUrl: nonEmpty(env.OLLAMA_BASE_URL) ?? 'http://localhost:11434',
      model: nonEmpty(env.OLLAMA_MODEL) ?? 'llama3.2:latest',
    },
    anthropic: {
      apiKey: nonEmpty(env.ANTHROPIC_API_KEY) ?? nonEmpty(env.CLAUDE_API_KEY),
      model: nonEmpty(env.ANTHROPIC_MODEL) ?? nonEmpty(env.CLAUDE_MODEL) ?? 'claude-3-5-sonnet-20241022',
      maxTokens: parseNumber(env.ANTHROPIC_MAX_TOKENS) ?? 4096,
    },
    review: {
      defaultStudyQuality: parseNumber(env.DEFAULT_STUDY_QUALITY) ?? 4,
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Loads and validates configuration from an environment.
 *
 * In production with AI_PROVIDER=claude, ANTHROPIC_API_KEY is required.
 *
 * @throws {ConfigValidationError} listing every invalid or missing variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ PORT: '8080', AI_PROVIDER: 'claude' });
 * config.server.port; // 8080
 * ```
 */
export function loadConfig(env: EnvSource = process.env): Config {
  const parsed = configSchema.safeParse(loadFromEnvironment(env));

  if (!parsed.success) {
    const invalidVars = parsed.error.errors.map((issue) => {
      const path = issue.path.join('.');
      return { name: ENV_VAR_NAMES[path] ?? path, reason: issue.message };
    });
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      [],
      invalidVars
    );
  }

  const config = parsed.data;
  const missingVars: string[] = [];

  if (
    config.server.nodeEnv === 'production' &&
    config.planner.provider === 'claude' &&
    !config.anthropic.apiKey
  ) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (missingVars.length > 0) {
    throw new ConfigValidationError(
      `Missing required environment variables: ${missingVars.join(', ')}`,
      missingVars
    );
  }

  return config;
}

// =============================================================================
// Process Configuration
// =============================================================================

let cachedConfig: Config | undefined;

/**
 * The configuration for this process, loaded from `process.env` on first use.
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drops the cached configuration so the next {@link getConfig} re-reads the
 * environment.
 */
export function resetConfig(): void {
  cachedConfig = undefined;
}

export function isProduction(config: Config = getConfig()): boolean {
  return config.server.nodeEnv === 'production';
}

/** Narrowed accessor used when wiring the review recorder. */
export function getDefaultStudyQuality(config: Config = getConfig()): Quality {
  return config.review.defaultStudyQuality;
}

/**
 * Configuration Loading Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigValidationError, DEFAULT_DATABASE_PATH, loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('fills every default from an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { port: 3001, host: '0.0.0.0', nodeEnv: 'development' },
      database: { path: DEFAULT_DATABASE_PATH },
      planner: { provider: 'ollama' },
      ollama: { baseUrl: 'http://localhost:11434', model: 'llama3.2:latest' },
      anthropic: { apiKey: undefined, model: 'claude-3-5-sonnet-20241022', maxTokens: 4096 },
      review: { defaultStudyQuality: 4 },
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: ' ',
      DATABASE_PATH: '/tmp/cadence.db',
      AI_PROVIDER: 'Claude',
      CLAUDE_API_KEY: 'test-secret',
      DEFAULT_STUDY_QUALITY: '3',
    });

    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.database.path).toBe('/tmp/cadence.db');
    expect(config.planner.provider).toBe('claude');
    expect(config.anthropic.apiKey).toBe('test-secret');
    expect(config.review.defaultStudyQuality).toBe(3);
  });

  it('names each invalid variable', () => {
    try {
      loadConfig({ PORT: 'eighty', AI_PROVIDER: 'gpt', DEFAULT_STUDY_QUALITY: '7' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidVars.map((v) => v.name)).toEqual(['PORT', 'AI_PROVIDER', 'DEFAULT_STUDY_QUALITY']);
      }
    }
  });

  it('requires an API key for the claude planner in production', () => {
    try {
      loadConfig({ NODE_ENV: 'production', AI_PROVIDER: 'claude' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.missingVars).toEqual(['ANTHROPIC_API_KEY']);
        expect(error.message).toBe('Missing required environment variables: ANTHROPIC_API_KEY');
      }
    }
  });

  it('does not require a key for the local planner in production', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).planner.provider).toBe('ollama');
  });
});

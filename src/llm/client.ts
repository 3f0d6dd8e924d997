/**
 * Anthropic Client Wrapper
 *
 * A {@link TextCompletionClient} over the Anthropic SDK. It handles:
 * - API key presence with a clear error message
 * - System prompt and per-call configuration
 * - Mapping SDK errors to typed LLMErrors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: 'test-secret' });
 * const response = await client.complete(
 *   [{ role: 'user', content: 'Plan my week' }],
 *   'You are an educational planner.'
 * );
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { LLMMessage, LLMConfig, LLMResponse, TextCompletionClient } from './types';
import { LLMError, type LLMErrorType } from './types';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

const DEFAULT_MAX_TOKENS = 4096;

const DEFAULT_TEMPERATURE = 0;

export interface AnthropicClientOptions {
  /** Required; an empty or missing key fails construction */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

type ResolvedConfig = Required<Omit<LLMConfig, 'jsonOutput'>>;

/**
 * Maps conversation messages to the SDK's request shape.
 */
export function toMessageParams(messages: readonly LLMMessage[]): Anthropic.MessageParam[] {
  return messages.map((msg) => ({
    role: msg.role,
    content: msg.content,
  }));
}

export class AnthropicClient implements TextCompletionClient {
  readonly provider = 'claude';

  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: ResolvedConfig;

  /**
   * @throws LLMError('authentication') when no API key is given
   */
  constructor(options: AnthropicClientOptions) {
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required for AI_PROVIDER=claude.\n' +
          'Get your API key at: https://console.anthropic.com/\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey: options.apiKey });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_ANTHROPIC_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   * `jsonOutput` has no Anthropic equivalent; the prompt asks for JSON.
   *
   * @throws LLMError on API errors
   */
  async complete(
    messages: LLMMessage[],
    systemPrompt?: string,
    config: LLMConfig = {}
  ): Promise<LLMResponse> {
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create({
        model: mergedConfig.model,
        max_tokens: mergedConfig.maxTokens,
        temperature: mergedConfig.temperature,
        system: systemPrompt,
        messages: toMessageParams(messages),
      });

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private mergeConfig(config: LLMConfig): ResolvedConfig {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Concatenates the text blocks of a response, ignoring tool-use blocks.
   */
  private extractText(
    content: Anthropic.Messages.ContentBlock[]
  ): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    // Timeout extends APIConnectionError, so it is checked first
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError(
        'Request to Anthropic API timed out. Please try again.',
        'timeout',
        error
      );
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}

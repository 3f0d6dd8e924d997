/**
 * Ollama Client
 *
 * A {@link TextCompletionClient} for a local Ollama server, calling its
 * `/api/chat` endpoint with streaming disabled. Responses are validated
 * with zod before use.
 */

import { z } from 'zod';
import type { LLMConfig, LLMMessage, LLMResponse, TextCompletionClient } from './types';
import { LLMError } from './types';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'llama3.2:latest';

const DEFAULT_TIMEOUT_MS = 120_000;

export interface OllamaClientOptions {
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  /** Replaces the global fetch, e.g. with an in-process stub */
  fetch?: typeof fetch;
}

const chatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

function mapStopReason(reason: string | undefined): LLMResponse['stopReason'] {
  if (reason === 'stop') return 'end_turn';
  if (reason === 'length') return 'max_tokens';
  return null;
}

export class OllamaClient implements TextCompletionClient {
  readonly provider = 'ollama';

  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, '');
    this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
    this.temperature = options.temperature ?? 0;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * @throws LLMError typed by failure: network, timeout, invalid_request,
   *   server_error or invalid_response
   */
  async complete(
    messages: LLMMessage[],
    systemPrompt?: string,
    config: LLMConfig = {}
  ): Promise<LLMResponse> {
    const body = {
      model: config.model ?? this.model,
      messages: [
        ...(systemPrompt ? [{ role: 'system', content: systemPrompt }] : []),
        ...messages.map((msg) => ({ role: msg.role, content: msg.content })),
      ],
      stream: false,
      ...(config.jsonOutput && { format: 'json' }),
      options: {
        temperature: config.temperature ?? this.temperature,
        ...(config.maxTokens !== undefined && { num_predict: config.maxTokens }),
      },
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new LLMError(`Request to Ollama at ${this.baseUrl} timed out`, 'timeout', error);
      }
      throw new LLMError(
        `Failed to connect to Ollama at ${this.baseUrl}. Is \`ollama serve\` running?`,
        'network',
        error
      );
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new LLMError(
        `Ollama returned HTTP ${response.status}: ${detail.slice(0, 200)}`,
        response.status >= 500 ? 'server_error' : 'invalid_request'
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new LLMError('Ollama returned a response that is not JSON', 'invalid_response', error);
    }

    const parsed = chatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LLMError('Ollama response is missing message content', 'invalid_response', parsed.error);
    }

    const data = parsed.data;
    return {
      text: data.message.content,
      usage:
        data.prompt_eval_count !== undefined && data.eval_count !== undefined
          ? { inputTokens: data.prompt_eval_count, outputTokens: data.eval_count }
          : null,
      stopReason: mapStopReason(data.done_reason),
    };
  }
}

/**
 * LLM Types and Interfaces
 *
 * Provider-neutral types for the text-completion clients. The weekly-plan
 * generator depends only on {@link TextCompletionClient}, so the Anthropic
 * and Ollama clients are interchangeable behind it.
 */

/**
 * Represents a single message in a conversation.
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Per-call options. All fields are optional; clients fill in their own
 * configured defaults.
 */
export interface LLMConfig {
  /** Model name; defaults to the client's configured model */
  model?: string;

  /** Maximum number of tokens to generate */
  maxTokens?: number;

  /**
   * Controls randomness (0.0 to 1.0). Plan generation uses 0 so the same
   * context yields the same plan where the backend allows it.
   */
  temperature?: number;

  /** Ask the backend for a JSON object response where it supports one */
  jsonOutput?: boolean;
}

/**
 * Result of a completion call.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /**
   * Token usage information. Null if the backend does not report it.
   */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  /** Why generation stopped, when the backend reports it */
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use' | null;
}

/**
 * A backend that turns a system prompt and messages into text.
 */
export interface TextCompletionClient {
  /** Short provider name for logs, e.g. 'claude' or 'ollama' */
  readonly provider: string;

  complete(messages: LLMMessage[], systemPrompt?: string, config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling an LLM backend.
 */
export type LLMErrorType =
  | 'authentication'    // Invalid or missing API key
  | 'rate_limit'        // Too many requests
  | 'invalid_request'   // Bad request parameters
  | 'server_error'      // Backend server error
  | 'network'           // Network/connection error
  | 'timeout'           // Request took too long
  | 'invalid_response'  // Response text could not be used
  | 'unknown';          // Unexpected error

/**
 * Custom error class for LLM-related errors.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  readonly type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LLMError';
    this.type = type;
  }
}

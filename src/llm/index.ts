/**
 * LLM Module - Barrel Export
 *
 * Text-completion clients for Anthropic and Ollama, the weekly-plan prompt
 * builders, and the generator that ties them together.
 *
 * @example
 * ```typescript
 * import { createTextCompletionClient, LLMWeeklyPlanGenerator } from './llm';
 *
 * const generator = new LLMWeeklyPlanGenerator(createTextCompletionClient(getConfig()));
 * const plan = await generator.generateWeeklyPlan(context);
 * ```
 */

export { AnthropicClient, DEFAULT_ANTHROPIC_MODEL, type AnthropicClientOptions } from './client';
export {
  OllamaClient,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OLLAMA_MODEL,
  type OllamaClientOptions,
} from './ollama-client';
export { LLMWeeklyPlanGenerator, createTextCompletionClient } from './plan-generator';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMErrorType,
  TextCompletionClient,
} from './types';

export { LLMError } from './types';

export * from './prompts';

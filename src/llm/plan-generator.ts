/**
 * LLM Weekly Plan Generator
 *
 * Implements {@link WeeklyPlanGenerator} over any {@link TextCompletionClient},
 * and selects the client for the configured provider.
 */

import type { Config } from '../config';
import type { WeeklyPlanContent } from '../core/models';
import type { WeeklyPlanContext, WeeklyPlanGenerator } from '../core/planning/types';
import { AnthropicClient } from './client';
import { OllamaClient } from './ollama-client';
import {
  buildWeeklyPlanSystemPrompt,
  buildWeeklyPlanUserMessage,
  parseWeeklyPlanResponse,
} from './prompts/weekly-plan';
import type { TextCompletionClient } from './types';

export class LLMWeeklyPlanGenerator implements WeeklyPlanGenerator {
  constructor(private readonly client: TextCompletionClient) {}

  /**
   * @throws LLMError when the backend fails or its reply is not a valid plan
   */
  async generateWeeklyPlan(context: WeeklyPlanContext): Promise<WeeklyPlanContent> {
    const systemPrompt = buildWeeklyPlanSystemPrompt();
    const userMessage = buildWeeklyPlanUserMessage(context);

    console.log(
      `[Planner] Requesting ${context.student.weeklyFrequency}-day plan from ${this.client.provider} ` +
        `(week of ${context.weekStartDate}, ${context.curriculum.length} curriculum items, ` +
        `${context.dueTopics.length} due topics)`
    );

    const response = await this.client.complete(
      [{ role: 'user', content: userMessage }],
      systemPrompt,
      { temperature: 0, jsonOutput: true }
    );

    const plan = parseWeeklyPlanResponse(response.text);
    console.log(`[Planner] Received plan with ${plan.days.length} days`);
    return plan;
  }
}

/**
 * Builds the completion client for `config.planner.provider`.
 *
 * @throws LLMError('authentication') for 'claude' without an API key
 */
export function createTextCompletionClient(config: Config): TextCompletionClient {
  if (config.planner.provider === 'claude') {
    return new AnthropicClient({
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
      maxTokens: config.anthropic.maxTokens,
      temperature: 0,
    });
  }
  return new OllamaClient({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.model,
    temperature: 0,
  });
}

/**
 * LLM Prompts Module - Barrel Export
 *
 * @example
 * ```typescript
 * import {
 *   buildWeeklyPlanSystemPrompt,
 *   buildWeeklyPlanUserMessage,
 *   parseWeeklyPlanResponse,
 * } from '@/llm/prompts';
 *
 * const response = await client.complete(
 *   [{ role: 'user', content: buildWeeklyPlanUserMessage(context) }],
 *   buildWeeklyPlanSystemPrompt()
 * );
 * const plan = parseWeeklyPlanResponse(response.text);
 * ```
 */

export {
  buildWeeklyPlanSystemPrompt,
  buildWeeklyPlanUserMessage,
  parseWeeklyPlanResponse,
  extractJsonFromResponse,
  weekStudyDates,
  formatCurriculum,
  formatDueTopics,
  formatLearningHistory,
  MAX_CURRICULUM_ITEMS,
  MAX_DUE_TOPICS,
  MAX_TOPICS_PER_DAY,
} from './weekly-plan';

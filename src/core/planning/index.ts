/**
 * Planning Module - Barrel Export
 */

export type { WeeklyPlanContext, WeeklyPlanGenerator } from './types';
export {
  WeeklyPlanService,
  type WeeklyPlanStore,
  type GenerateWeeklyPlanInput,
  type WeeklyPlanServiceDeps,
} from './weekly-plan-service';

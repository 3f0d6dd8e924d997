/**
 * SM-2 Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { SM2Engine, isQuality } from '@/core/sm2';
 *
 * const engine = new SM2Engine();
 * const state = engine.initialize('2024-01-01');
 * if (isQuality(input)) {
 *   const next = engine.recompute(state, input, '2024-01-02');
 * }
 * ```
 */

export {
  SM2Engine,
  roundHalfEven,
  easinessDelta,
  INITIAL_EASINESS_FACTOR,
  MINIMUM_EASINESS_FACTOR,
  FIRST_INTERVAL_DAYS,
  SECOND_INTERVAL_DAYS,
} from './engine';

export {
  type Quality,
  type SM2State,
  type ScheduledReview,
  QUALITY_GRADES,
  PASSING_QUALITY,
  isQuality,
} from './types';

export {
  type CalendarDate,
  isCalendarDate,
  isValidYearMonthDay,
  calendarDate,
  toEpochDay,
  fromEpochDay,
  addDays,
  daysBetween,
  compareDates,
  today,
  isoWeekday,
  nextMonday,
} from './calendar';

export {
  assertValidProfile,
  normalizeSubjects,
  MIN_WEEKLY_FREQUENCY,
  MAX_WEEKLY_FREQUENCY,
  type StudentProfileFields,
} from './profile';

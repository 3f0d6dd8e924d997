export {
  ProgressReporter,
  RECENT_SESSION_COUNT,
  type ProgressReport,
  type SubjectProgress,
  type SessionHistory,
} from './progress-report';

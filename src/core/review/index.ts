/**
 * Review Module - Barrel Export
 *
 * The services that move a topic through its review cycle: the initializer
 * creates its state, the due query surfaces it, and the recorder applies
 * each session to it.
 */

export { TopicInitializer, type InitializeTopicResult } from './topic-initializer';
export {
  ReviewSessionRecorder,
  DEFAULT_STUDY_QUALITY,
  type ReviewSessionRecorderOptions,
  type RecordedSession,
} from './review-recorder';
export { DueTopicQuery, compareByUrgency } from './due-topics';
export type {
  TopicStateStore,
  CreateTopicStateInput,
  AppendSessionInput,
  TopicStateFilter,
  TopicRef,
  RecordSessionInput,
} from './types';

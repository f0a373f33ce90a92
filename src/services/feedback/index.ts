export {
  FeedbackRecorder,
  FeedbackInputSchema,
  classifyFeedback,
  type FeedbackInput,
  type FeedbackOutcome,
  type FeedbackConfig,
} from './feedback-recorder.js';
export { QualityCurator, type CurationConfig, type CurationReport } from './curation.js';

export { createLearningWriter, LearningWriterImpl, learnedConfigId, type LearningWriterOptions } from './learning-writer-impl.js'
export type { LearningInput, LearningResult, LearningWriter } from './learning-writer.js'
export { evaluateQualityGate, countPassedStages, type QualityGateOptions } from './quality-gate.js'
export {
  FeedbackRecorder,
  createFeedbackRecorder,
  feedbackId,
  type FeedbackInput,
  type FeedbackRecorderOptions,
  type FeedbackSource,
} from './feedback-recorder.js'

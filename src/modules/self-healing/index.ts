export {
  createSelfHealingEngine,
  SelfHealingEngineImpl,
  type SelfHealingEngineOptions,
} from './self-healing-engine-impl.js'
export type { HealingInput, HealingOutcome, HealingOutcomeKind, SelfHealingEngine } from './self-healing-engine.js'
export { ErrorClassifier, BUILT_IN_PATTERNS, UNCLASSIFIED, compilePatterns, type Classification } from './error-classifier.js'
export { buildFixContext, fixSystemPrompt, parseFixResponse, logTail, type FixAnswer } from './fix-prompt.js'

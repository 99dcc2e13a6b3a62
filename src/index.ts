/**
 * Pipewright - Main module exports
 * Public API surface of the workflow engine
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'
export { parseWorkflowRequest, parseLearningCallback, WorkflowRequestSchema, LearningCallbackSchema } from './core/workflow-request.js'
export type { LearningCallback } from './core/workflow-request.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export { maskSecrets, deepMask } from './utils/masking.js'

// Orchestrator
export { createOrchestrator, normalizerOptionsFrom } from './core/orchestrator-impl.js'
export type { CreateOrchestratorOptions } from './core/orchestrator-impl.js'
export type {
  Orchestrator,
  WorkflowStartResult,
  WorkflowState,
  WorkflowStatus,
  LearningCallbackResult,
} from './core/orchestrator.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { WorkflowEvents, WorkflowOutcome } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/template-store/index.js'
export * from './modules/vcs/index.js'
export * from './modules/reference-selector/index.js'
export * from './modules/artifact-normalizer/index.js'
export * from './modules/generation/index.js'
export * from './modules/commit/index.js'
export * from './modules/execution-monitor/index.js'
export * from './modules/self-healing/index.js'
export * from './modules/learning/index.js'
export * from './modules/progress/index.js'

// Surfaces
export * from './server/index.js'
export * from './recovery/index.js'

/**
 * Orchestrator interface: the public contract of the workflow engine.
 *
 * All callers (CLI, HTTP server, tests) depend on this interface, not the
 * concrete implementation. Create an instance via `createOrchestrator()`
 * from orchestrator-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { WorkflowOutcome } from './event-bus.types.js'
import type { ExecutionState, LearnedConfig, WorkflowRequest } from './types.js'
import type { LearningCallback } from './workflow-request.js'
import type { ProgressEvent, WorkflowPhase, WorkflowProgress } from '../modules/progress/progress-store.js'

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Returned once the initial commit exists; monitoring continues in the background */
export interface WorkflowStartResult {
  readonly executionRef: string
  readonly branch: string
  readonly commitId: string
}

export type WorkflowState = WorkflowPhase | ExecutionState | WorkflowOutcome

export interface WorkflowStatus extends WorkflowProgress {
  /** Outcome once completed, else the latest execution state, else the phase */
  readonly state: WorkflowState
}

export type LearningCallbackResult =
  | { readonly status: 'stored'; readonly executionRef: string; readonly config: LearnedConfig }
  | { readonly status: 'skipped'; readonly executionRef: string; readonly reason: string; readonly issues: readonly string[] }
  /** The execution id is not known yet; the background task learns on success */
  | { readonly status: 'pending'; readonly executionRef: string }

// ---------------------------------------------------------------------------
// Orchestrator interface
// ---------------------------------------------------------------------------

/**
 * Workflow engine: generation and commit run in the caller's request; one
 * detached task per workflow then owns monitoring, healing and learning.
 *
 * Lifecycle:
 *  1. Create via `createOrchestrator(config, options)`
 *  2. Call `startWorkflow()` for each repository
 *  3. Follow progress via `getWorkflowStatus()` or the event bus
 *  4. Call `shutdown()` to abort running workflows and close the store
 */
export interface Orchestrator {
  /** The typed event bus every module of this instance emits on */
  readonly eventBus: TypedEventBus

  readonly isReady: boolean

  /**
   * Validate, analyze, generate and commit.
   * @throws {ValidationFailureError} when the request is malformed
   * @throws {NotFoundError} when the repository cannot be reached
   * @throws {CommitFailureError} when the artifact cannot be committed
   */
  startWorkflow(request: WorkflowRequest): Promise<WorkflowStartResult>

  /** @throws {NotFoundError} for an unknown (or evicted) executionRef */
  getWorkflowStatus(executionRef: string): WorkflowStatus

  /**
   * Abort the background task; it completes with outcome `aborted`.
   * @returns false when the workflow is unknown or already completed
   */
  cancelWorkflow(executionRef: string): boolean

  /**
   * Resolve with the final status once the background task has finished.
   * @throws {NotFoundError} for an unknown executionRef
   */
  waitForWorkflow(executionRef: string): Promise<WorkflowStatus>

  /**
   * Observe every progress event of every workflow.
   * @returns the unsubscribe function
   */
  onProgress(listener: (status: WorkflowStatus, event: ProgressEvent) => void): () => void

  /**
   * Handle the callback of a pipeline's learning job.
   * @throws {NotFoundError} when no workflow committed the branch
   */
  recordLearning(callback: LearningCallback): Promise<LearningCallbackResult>

  /**
   * Abort all workflows, await their tasks, then shut services down in
   * reverse order. Safe to call multiple times.
   */
  shutdown(): Promise<void>
}

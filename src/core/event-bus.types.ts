/**
 * WorkflowEvents interface - defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "execution:state-changed", "learning:stored")
 * Every workflow-scoped payload carries the workflow's executionRef so that
 * subscribers (progress store, CLI renderers) can route it.
 */

import type { ArtifactSource, ExecutionState } from './types.js'

// ---------------------------------------------------------------------------
// Shared payload subtypes
// ---------------------------------------------------------------------------

/** Final outcome of a workflow's background task */
export type WorkflowOutcome =
  | 'succeeded'
  | 'failed'
  | 'canceled'
  | 'timed_out'
  | 'max_attempts_reached'
  | 'aborted'

// ---------------------------------------------------------------------------
// WorkflowEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the workflow event bus.
 * Use `keyof WorkflowEvents` to constrain event keys.
 */
export interface WorkflowEvents {
  // -------------------------------------------------------------------------
  // Generation
  // -------------------------------------------------------------------------

  /** An artifact was produced for a repository profile */
  'generation:completed': {
    executionRef: string
    language: string
    framework: string
    source: ArtifactSource
    templateId?: string
    usedFallback: boolean
  }

  // -------------------------------------------------------------------------
  // Workflow lifecycle
  // -------------------------------------------------------------------------

  /** Initial commit succeeded; the background task is about to start */
  'workflow:started': {
    executionRef: string
    repositoryUrl: string
    branch: string
    commitId: string
    maxAttempts: number
  }

  /** The background task reached a final outcome */
  'workflow:completed': {
    executionRef: string
    outcome: WorkflowOutcome
    attempts: number
    message: string
  }

  // -------------------------------------------------------------------------
  // Execution monitor
  // -------------------------------------------------------------------------

  /** The observed execution state changed between two polls */
  'execution:state-changed': {
    executionRef: string
    branch: string
    executionId: string | null
    state: ExecutionState
    poll: number
  }

  /** A status poll failed; the next scheduled poll retries */
  'execution:poll-failed': {
    executionRef: string
    branch: string
    poll: number
    error: string
  }

  // -------------------------------------------------------------------------
  // Self-healing
  // -------------------------------------------------------------------------

  /** A failed execution was classified and a fix is being requested */
  'healing:attempt-started': {
    executionRef: string
    attempt: number
    maxAttempts: number
    errorClass: string
    failedJob: string | null
  }

  /** A fix was committed to a fresh branch */
  'healing:attempt-committed': {
    executionRef: string
    attempt: number
    errorClass: string
    branch: string
    commitId: string
    startedAt: string
    fixDescription: string
  }

  // -------------------------------------------------------------------------
  // Learning
  // -------------------------------------------------------------------------

  /** A fully-passing configuration was upserted into the learned collection */
  'learning:stored': {
    executionRef: string
    configId: string
    language: string
    framework: string
  }

  /** The quality gate rejected the configuration */
  'learning:skipped': {
    executionRef: string
    reason: string
    issues: string[]
  }

  /** The fix that healed the workflow was kept for later prompts */
  'learning:feedback-stored': {
    executionRef: string
    feedbackId: string
    errorClass: string
  }
}

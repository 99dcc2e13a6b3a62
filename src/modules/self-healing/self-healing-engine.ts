/**
 * SelfHealingEngine interface: repairs a failed execution by committing
 * model-written fixes to fresh branches until one succeeds or the attempt
 * budget is spent.
 */

import type {
  ExecutionHandle,
  HealingAttempt,
  PipelineArtifact,
  RepositoryProfile,
  WorkflowRequest,
} from '../../core/types.js'
import type { MonitorResult } from '../execution-monitor/execution-monitor.js'
import type { RepositoryRef } from '../vcs/vcs-client.js'

export interface HealingInput {
  readonly executionRef: string
  readonly repo: RepositoryRef
  readonly request: WorkflowRequest
  readonly profile: RepositoryProfile
  /** Artifact of the failed execution */
  readonly artifact: PipelineArtifact
  /** Handle of the initial commit; fix branches derive from its branch */
  readonly handle: ExecutionHandle
  /** The FAILED monitor result that triggered healing */
  readonly failed: MonitorResult
  readonly signal?: AbortSignal
  /** Called after each fix commit, before the new execution is monitored */
  readonly onCommitted?: (attempt: HealingAttempt, artifact: PipelineArtifact) => void
}

export type HealingOutcomeKind = 'succeeded' | 'timed_out' | 'canceled' | 'max_attempts_reached'

export interface HealingOutcome {
  readonly kind: HealingOutcomeKind
  readonly attempts: readonly HealingAttempt[]
  /** Artifact of the last committed execution */
  readonly artifact: PipelineArtifact
  readonly handle: ExecutionHandle
  readonly result: MonitorResult
}

export interface SelfHealingEngine {
  readonly maxAttempts: number

  /**
   * Run the healing loop from a FAILED execution.
   * @throws {GenerationFailureError} when the model cannot produce a usable fix twice in a row
   * @throws {CommitFailureError} when a fix cannot be committed
   * @throws {WorkflowAbortedError} when the signal aborts
   */
  heal(input: HealingInput): Promise<HealingOutcome>
}

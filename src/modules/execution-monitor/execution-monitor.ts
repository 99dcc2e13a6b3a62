/**
 * ExecutionMonitor interface: polls a triggered execution to a terminal
 * state or until the wait budget runs out.
 *
 *   QUEUED → RUNNING → SUCCEEDED | FAILED | CANCELED
 *   budget exhausted while QUEUED/RUNNING → TIMED_OUT
 */

import type { ExecutionHandle, ExecutionState, JobStatus } from '../../core/types.js'
import type { RepositoryRef } from '../vcs/vcs-client.js'

export interface MonitorResult {
  readonly state: ExecutionState
  readonly executionId: string | null
  /** Per-job breakdown; fetched only for terminal states */
  readonly jobs: readonly JobStatus[]
  /** Status calls made */
  readonly polls: number
  readonly durationSeconds: number
}

export interface WatchContext {
  executionRef?: string
  /** Checked between polls; abort ends the watch with WorkflowAbortedError */
  signal?: AbortSignal
}

export interface ExecutionMonitor {
  /** Upper bound on status calls per watch: floor(maxWait / interval) */
  readonly maxPolls: number
  watch(repo: RepositoryRef, handle: ExecutionHandle, context?: WatchContext): Promise<MonitorResult>
}

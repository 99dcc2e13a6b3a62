/**
 * StreamingFormatter - NDJSON event emitter for `pipewright generate
 * --output-format json`.
 *
 * Each event follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { WorkflowStatus } from '../../core/orchestrator.js'
import type { ProgressEvent } from '../../modules/progress/progress-store.js'

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "workflow:progress", "workflow:result")
 * @param data  - Event payload data
 */
export function emitEvent(event: string, data: Record<string, unknown>, timestamp: string = new Date().toISOString()): void {
  process.stdout.write(JSON.stringify({ event, timestamp, data }) + '\n')
}

/** A progress event keeps the timestamp it was recorded with */
export function emitProgressEvent(executionRef: string, event: ProgressEvent): void {
  emitEvent(
    'workflow:progress',
    { executionRef, stage: event.stage, attempt: event.attempt, message: event.message },
    event.timestamp,
  )
}

export function emitWorkflowResult(status: WorkflowStatus): void {
  emitEvent('workflow:result', {
    executionRef: status.executionRef,
    state: status.state,
    branch: status.branch,
    healingAttempts: status.healingAttempts.length,
    ...(status.message !== undefined && { message: status.message }),
  })
}

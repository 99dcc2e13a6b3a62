/**
 * Human-readable rendering of workflow progress for `pipewright generate`.
 */

import type { WorkflowStatus } from '../../core/orchestrator.js'
import type { ProgressEvent } from '../../modules/progress/progress-store.js'

// ---------------------------------------------------------------------------
// formatProgressLine
// ---------------------------------------------------------------------------

/**
 * One line per progress event, e.g. `[healing #2] Fix committed to ...`.
 * The attempt number is shown once healing has started.
 */
export function formatProgressLine(event: ProgressEvent): string {
  const attempt = event.attempt > 0 ? ` #${String(event.attempt)}` : ''
  return `[${event.stage}${attempt}] ${event.message}`
}

// ---------------------------------------------------------------------------
// renderWorkflowSummary
// ---------------------------------------------------------------------------

/**
 * Render the final report of a workflow.
 *
 * Output sections:
 *  - Header: Workflow <ref>: <state>
 *  - Branch and healing budget
 *  - One line per committed fix
 *  - The completion message, when there is one
 */
export function renderWorkflowSummary(status: WorkflowStatus): string {
  const lines: string[] = []
  lines.push(`Workflow ${status.executionRef}: ${status.state}`)
  lines.push(`  Branch:           ${status.branch ?? '-'}`)
  lines.push(`  Healing attempts: ${String(status.healingAttempts.length)}/${String(status.maxAttempts)}`)

  for (const attempt of status.healingAttempts) {
    lines.push(
      `    #${String(attempt.attemptNumber)} ${attempt.errorClass} on ${attempt.newExecutionHandle.branch}: ${attempt.fixDescription}`,
    )
  }

  if (status.message !== undefined) {
    lines.push('')
    lines.push(status.message)
  }
  return lines.join('\n')
}

/**
 * Quality gate for learned configurations.
 *
 * Every job must have succeeded, optional jobs included. Tolerated:
 *  - a `skipped` job listed as exempt (failure-only notification jobs)
 *  - the learning job itself while it is still running, since it is the
 *    one reporting the success
 */

import type { JobState, JobStatus } from '../../core/types.js'

export interface QualityGateOptions {
  readonly exemptSkippedJobs: readonly string[]
  readonly learningJob: string
}

const LEARNING_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'created',
  'pending',
  'running',
  'success',
  'skipped',
])

/** @returns one issue per offending job; empty when the gate passes */
export function evaluateQualityGate(jobs: readonly JobStatus[], options: QualityGateOptions): string[] {
  if (jobs.length === 0) return ['execution reported no jobs']

  const exempt = new Set(options.exemptSkippedJobs)
  const issues: string[] = []
  for (const job of jobs) {
    if (job.state === 'success') continue
    if (job.state === 'skipped' && exempt.has(job.name)) continue
    if (job.name === options.learningJob && LEARNING_JOB_STATES.has(job.state)) continue
    issues.push(`job "${job.name}" is ${job.state}${job.allowFailure ? ' (allowed to fail)' : ''}`)
  }
  return issues
}

/** Distinct stages with at least one successful job */
export function countPassedStages(jobs: readonly JobStatus[]): number {
  return new Set(jobs.filter((job) => job.state === 'success').map((job) => job.stage)).size
}

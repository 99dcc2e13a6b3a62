/**
 * ExecutionMonitor implementation.
 *
 * Sleeps one interval before every status call. A failed call is a
 * transient polling error: logged, reported on the bus, state unchanged.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { PollingTransientError, WorkflowAbortedError, errorMessage } from '../../core/errors.js'
import {
  TERMINAL_EXECUTION_STATES,
  type ExecutionHandle,
  type ExecutionState,
  type JobStatus,
} from '../../core/types.js'
import { sleep as defaultSleep, type SleepFn } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ExecutionStatus, RepositoryRef, VcsClient } from '../vcs/vcs-client.js'
import type { ExecutionMonitor, MonitorResult, WatchContext } from './execution-monitor.js'

const logger = createLogger('monitor')

export interface ExecutionMonitorOptions {
  vcs: VcsClient
  pollIntervalMs: number
  maxWaitMs: number
  eventBus?: TypedEventBus
  /** Injected for tests */
  sleep?: SleepFn
  now?: () => number
}

export class ExecutionMonitorImpl implements ExecutionMonitor {
  readonly maxPolls: number
  private readonly _vcs: VcsClient
  private readonly _intervalMs: number
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _sleep: SleepFn
  private readonly _now: () => number

  constructor(options: ExecutionMonitorOptions) {
    this._vcs = options.vcs
    this._intervalMs = options.pollIntervalMs
    this.maxPolls = Math.max(1, Math.floor(options.maxWaitMs / options.pollIntervalMs))
    this._eventBus = options.eventBus
    this._sleep = options.sleep ?? defaultSleep
    this._now = options.now ?? Date.now
  }

  async watch(repo: RepositoryRef, handle: ExecutionHandle, context: WatchContext = {}): Promise<MonitorResult> {
    const { signal, executionRef } = context
    const started = this._now()
    const elapsedSeconds = (): number => Math.round((this._now() - started) / 1000)

    let state: ExecutionState = 'QUEUED'
    let executionId: string | null = null

    for (let poll = 1; poll <= this.maxPolls; poll++) {
      await this._pause(signal, handle.branch)

      let status: ExecutionStatus
      try {
        status = await this._vcs.getExecutionStatus(repo, { branch: handle.branch, commitId: handle.commitId })
      } catch (err) {
        const transient = new PollingTransientError(`Status poll ${String(poll)} failed: ${errorMessage(err)}`, {
          branch: handle.branch,
          poll,
        }, { cause: err })
        logger.warn({ branch: handle.branch, poll, err: transient.message }, 'Status poll failed; retrying next interval')
        if (executionRef !== undefined) {
          this._eventBus?.emit('execution:poll-failed', {
            executionRef,
            branch: handle.branch,
            poll,
            error: transient.message,
          })
        }
        continue
      }

      if (status.state !== state || status.executionId !== executionId) {
        state = status.state
        executionId = status.executionId
        logger.debug({ branch: handle.branch, executionId, state, poll }, 'Execution state changed')
        if (executionRef !== undefined) {
          this._eventBus?.emit('execution:state-changed', {
            executionRef,
            branch: handle.branch,
            executionId,
            state,
            poll,
          })
        }
      }

      if (TERMINAL_EXECUTION_STATES.has(state)) {
        const jobs = executionId !== null ? await this._jobs(repo, executionId) : []
        return {
          state,
          executionId,
          jobs,
          polls: poll,
          durationSeconds: status.durationSeconds ?? elapsedSeconds(),
        }
      }
    }

    logger.warn({ branch: handle.branch, executionId, polls: this.maxPolls }, 'Execution did not finish in time')
    if (executionRef !== undefined) {
      this._eventBus?.emit('execution:state-changed', {
        executionRef,
        branch: handle.branch,
        executionId,
        state: 'TIMED_OUT',
        poll: this.maxPolls,
      })
    }
    return { state: 'TIMED_OUT', executionId, jobs: [], polls: this.maxPolls, durationSeconds: elapsedSeconds() }
  }

  private async _pause(signal: AbortSignal | undefined, branch: string): Promise<void> {
    if (signal?.aborted === true) {
      throw new WorkflowAbortedError('Workflow aborted while monitoring', { branch })
    }
    try {
      await this._sleep(this._intervalMs, signal)
    } catch (err) {
      if (signal?.aborted === true) {
        throw new WorkflowAbortedError('Workflow aborted while monitoring', { branch })
      }
      throw err
    }
    if (signal?.aborted === true) {
      throw new WorkflowAbortedError('Workflow aborted while monitoring', { branch })
    }
  }

  private async _jobs(repo: RepositoryRef, executionId: string): Promise<JobStatus[]> {
    try {
      return await this._vcs.getJobs(repo, executionId)
    } catch (err) {
      logger.warn({ executionId, err: errorMessage(err) }, 'Could not fetch job breakdown')
      return []
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createExecutionMonitor(options: ExecutionMonitorOptions): ExecutionMonitor {
  return new ExecutionMonitorImpl(options)
}

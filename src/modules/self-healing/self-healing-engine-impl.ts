/**
 * SelfHealingEngine implementation.
 *
 * One sequential loop per workflow. Each pass takes the previous pass's
 * state by value and returns the next one:
 *
 *   FAILED → pick failed job → classify → ask model for a fix
 *          → normalize → commit to <base>-fix-<n> → monitor → next state
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  GenerationFailureError,
  ModelTimeoutError,
  ModelUnavailableError,
  ValidationFailureError,
  WorkflowAbortedError,
  errorMessage,
} from '../../core/errors.js'
import type {
  ExecutionHandle,
  ExecutionState,
  HealingAttempt,
  JobLog,
  PipelineArtifact,
} from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { normalizeArtifact, type NormalizerOptions } from '../artifact-normalizer/artifact-normalizer.js'
import { parsePipelineDocument } from '../artifact-normalizer/pipeline-document.js'
import type { CommitCoordinator } from '../commit/commit-coordinator.js'
import type { ErrorPatternConfig } from '../config/config-schema.js'
import type { ExecutionMonitor, MonitorResult } from '../execution-monitor/execution-monitor.js'
import type { FeedbackSource } from '../learning/feedback-recorder.js'
import type { ModelClient } from '../generation/model-client.js'
import { validateArtifact } from '../generation/pipeline-validator.js'
import { serverLintErrors, type PipelineLinter } from '../generation/server-lint.js'
import { DEFAULT_FILE_NAMES, type ArtifactFileNames } from '../template-store/artifact-document.js'
import type { RepositoryRef, VcsClient } from '../vcs/vcs-client.js'
import { ErrorClassifier, type Classification } from './error-classifier.js'
import { buildFixContext, fixSystemPrompt, logTail, parseFixResponse } from './fix-prompt.js'
import type { HealingInput, HealingOutcome, HealingOutcomeKind, SelfHealingEngine } from './self-healing-engine.js'

const logger = createLogger('healing')

/** Model requests per attempt: the first try plus one immediate retry */
const FIX_REQUESTS_PER_ATTEMPT = 2

export interface SelfHealingEngineOptions {
  vcs: VcsClient
  model: ModelClient
  commit: CommitCoordinator
  monitor: ExecutionMonitor
  maxAttempts: number
  logTailChars: number
  extraPatterns?: readonly ErrorPatternConfig[]
  files?: ArtifactFileNames
  normalizer?: Partial<NormalizerOptions>
  /** Checks each fix with the CI server before it is committed */
  linter?: PipelineLinter
  /** Earlier successful fixes offered to the model */
  feedback?: FeedbackSource
  eventBus?: TypedEventBus
}

interface LoopState {
  /** Number of the next attempt */
  readonly attempt: number
  readonly artifact: PipelineArtifact
  readonly handle: ExecutionHandle
  readonly result: MonitorResult
  readonly attempts: readonly HealingAttempt[]
}

interface Fix {
  readonly artifact: PipelineArtifact
  readonly explanation: string
}

function finalKind(state: ExecutionState): Exclude<HealingOutcomeKind, 'max_attempts_reached'> | undefined {
  switch (state) {
    case 'SUCCEEDED':
      return 'succeeded'
    case 'CANCELED':
      return 'canceled'
    case 'FAILED':
      return undefined
    case 'TIMED_OUT':
    case 'QUEUED':
    case 'RUNNING':
      return 'timed_out'
  }
}

function isModelFailure(err: unknown): boolean {
  return err instanceof ModelUnavailableError || err instanceof ModelTimeoutError
}

export class SelfHealingEngineImpl implements SelfHealingEngine {
  readonly maxAttempts: number
  private readonly _options: SelfHealingEngineOptions
  private readonly _classifier: ErrorClassifier
  private readonly _files: ArtifactFileNames
  private readonly _notifyStage: string

  constructor(options: SelfHealingEngineOptions) {
    this._options = options
    this.maxAttempts = options.maxAttempts
    this._classifier = new ErrorClassifier(options.extraPatterns ?? [])
    this._files = options.files ?? DEFAULT_FILE_NAMES
    this._notifyStage = options.normalizer?.notifyStage ?? 'notify'
  }

  async heal(input: HealingInput): Promise<HealingOutcome> {
    let state: LoopState = {
      attempt: 1,
      artifact: input.artifact,
      handle: input.handle,
      result: input.failed,
      attempts: [],
    }

    for (;;) {
      const kind = finalKind(state.result.state)
      if (kind !== undefined) {
        logger.info({ executionRef: input.executionRef, outcome: kind, attempts: state.attempts.length }, 'Healing finished')
        return this._outcome(kind, state)
      }
      if (state.attempt > this.maxAttempts) {
        logger.warn({ executionRef: input.executionRef, maxAttempts: this.maxAttempts }, 'Healing budget exhausted')
        return this._outcome('max_attempts_reached', state)
      }
      state = await this._attempt(input, state)
    }
  }

  // ---------------------------------------------------------------------------
  // One attempt
  // ---------------------------------------------------------------------------

  private async _attempt(input: HealingInput, state: LoopState): Promise<LoopState> {
    if (input.signal?.aborted === true) {
      throw new WorkflowAbortedError('Workflow aborted before healing attempt', { attempt: state.attempt })
    }
    const { executionRef } = input
    const attempt = state.attempt

    const failedJob = await this._failedJob(input.repo, state.result, state.artifact)
    const classification = this._classifier.classify(logTail(failedJob?.logText ?? '', this._options.logTailChars))
    logger.info(
      { executionRef, attempt, errorClass: classification.errorClass, failedJob: failedJob?.jobName },
      'Healing attempt started',
    )
    this._options.eventBus?.emit('healing:attempt-started', {
      executionRef,
      attempt,
      maxAttempts: this.maxAttempts,
      errorClass: classification.errorClass,
      failedJob: failedJob?.jobName ?? null,
    })

    const fix = await this._requestFix(input, state, failedJob, classification)
    const handle = await this._options.commit.commit(fix.artifact, input.profile, input.request, {
      attempt,
      baseBranch: input.handle.branch,
    })
    const fixDescription = fix.explanation !== '' ? fix.explanation : `Fix for ${classification.errorClass}`
    const record: HealingAttempt = {
      attemptNumber: attempt,
      errorClass: classification.errorClass,
      fixDescription,
      newExecutionHandle: handle,
    }
    this._options.eventBus?.emit('healing:attempt-committed', {
      executionRef,
      attempt,
      errorClass: classification.errorClass,
      branch: handle.branch,
      commitId: handle.commitId,
      startedAt: handle.startedAt,
      fixDescription,
    })
    input.onCommitted?.(record, fix.artifact)

    const result = await this._options.monitor.watch(input.repo, handle, {
      executionRef,
      ...(input.signal !== undefined && { signal: input.signal }),
    })
    logger.info({ executionRef, attempt, branch: handle.branch, state: result.state }, 'Healing attempt finished')

    return {
      attempt: attempt + 1,
      artifact: fix.artifact,
      handle,
      result,
      attempts: [...state.attempts, record],
    }
  }

  /**
   * Failed job to repair: earliest stage first, notification jobs last.
   * @returns undefined when the execution reported no failed job logs
   */
  private async _failedJob(
    repo: RepositoryRef,
    result: MonitorResult,
    artifact: PipelineArtifact,
  ): Promise<JobLog | undefined> {
    if (result.executionId === null) return undefined
    let logs: JobLog[]
    try {
      logs = await this._options.vcs.getJobLogs(repo, result.executionId, { states: ['failed'] })
    } catch (err) {
      logger.warn({ executionId: result.executionId, err: errorMessage(err) }, 'Could not fetch failed job logs')
      return undefined
    }

    const stages = this._stageOrder(artifact.pipelineDefinition)
    const rank = (log: JobLog): number => {
      const index = stages.indexOf(log.stage)
      const stageRank = index === -1 ? stages.length : index
      const notify = log.stage === this._notifyStage || log.jobName.startsWith('notify')
      return (notify ? stages.length + 1 : 0) + stageRank
    }
    return [...logs].sort((a, b) => rank(a) - rank(b))[0]
  }

  private _stageOrder(pipelineDefinition: string): readonly string[] {
    try {
      return parsePipelineDocument(pipelineDefinition).stages
    } catch (err) {
      if (!(err instanceof ValidationFailureError)) throw err
      return []
    }
  }

  private async _requestFix(
    input: HealingInput,
    state: LoopState,
    failedJob: JobLog | undefined,
    classification: Classification,
  ): Promise<Fix> {
    const systemPrompt = fixSystemPrompt(this._files, this._notifyStage)
    const feedback = (await this._options.feedback?.relevant(input.profile.language, input.profile.framework)) ?? []
    const contextFor = (lintErrors: readonly string[]): string =>
      buildFixContext({
        artifact: state.artifact,
        profile: input.profile,
        failedJob,
        classification,
        files: this._files,
        logTailChars: this._options.logTailChars,
        feedback,
        lintErrors,
      })
    let context = contextFor([])

    let reason = ''
    for (let request = 1; request <= FIX_REQUESTS_PER_ATTEMPT; request++) {
      let text: string
      try {
        text = await this._options.model.complete(systemPrompt, context, {
          ...(input.signal !== undefined && { signal: input.signal }),
        })
      } catch (err) {
        if (!isModelFailure(err)) throw err
        reason = errorMessage(err)
        logger.warn({ attempt: state.attempt, request, err: reason }, 'Fix request failed')
        continue
      }

      const answer = parseFixResponse(text, this._files)
      if (answer.pipelineDefinition === undefined) {
        reason = 'answer contained no pipeline definition'
        logger.warn({ attempt: state.attempt, request }, 'Fix answer contained no pipeline definition')
        continue
      }
      const candidate: PipelineArtifact = {
        pipelineDefinition: answer.pipelineDefinition,
        imageBuildDefinition: answer.imageBuildDefinition ?? state.artifact.imageBuildDefinition,
        provenance: { source: 'generated' },
      }
      const issues = validateArtifact(candidate)
      if (issues.length > 0) {
        reason = issues.join('; ')
        logger.warn({ attempt: state.attempt, request, issues }, 'Fix answer failed validation')
        continue
      }
      const artifact = normalizeArtifact(candidate, this._options.normalizer)
      if (this._options.linter !== undefined) {
        const lintErrors = await serverLintErrors(this._options.linter, input.repo, artifact.pipelineDefinition)
        if (lintErrors.length > 0) {
          reason = `CI lint: ${lintErrors.join('; ')}`
          logger.warn({ attempt: state.attempt, request, lintErrors }, 'Fix answer rejected by CI lint')
          // the retry sees what the server rejected
          context = contextFor(lintErrors)
          continue
        }
      }
      return { artifact, explanation: answer.explanation }
    }

    throw new GenerationFailureError(`No usable fix for attempt ${String(state.attempt)}: ${reason}`, {
      attempt: state.attempt,
      errorClass: classification.errorClass,
    })
  }

  private _outcome(kind: HealingOutcomeKind, state: LoopState): HealingOutcome {
    return { kind, attempts: state.attempts, artifact: state.artifact, handle: state.handle, result: state.result }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createSelfHealingEngine(options: SelfHealingEngineOptions): SelfHealingEngine {
  return new SelfHealingEngineImpl(options)
}

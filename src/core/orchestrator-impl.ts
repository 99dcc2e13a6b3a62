/**
 * OrchestratorImpl: concrete implementation of the Orchestrator interface.
 *
 * The createOrchestrator() factory:
 *  1. Instantiates the TypedEventBus
 *  2. Creates the template store, VCS client and model client from config
 *  3. Creates every module via constructor injection
 *  4. Registers the stateful services in a ServiceRegistry and initializes them
 *
 * Architecture constraints:
 *  - No module-to-module wiring outside this file
 *  - Modules report progress only through the event bus
 */

import { createLogger, setLogLevel } from '../utils/logger.js'
import { generateId, type SleepFn } from '../utils/helpers.js'
import { maskSecrets } from '../utils/masking.js'
import { createEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import type { TypedEventBus } from './event-bus.js'
import type { WorkflowEvents, WorkflowOutcome } from './event-bus.types.js'
import {
  ExecutionFailedError,
  MaxAttemptsExhaustedError,
  MonitorTimeoutError,
  NotFoundError,
  WorkflowAbortedError,
  errorMessage,
} from './errors.js'
import type {
  ExecutionHandle,
  PipelineArtifact,
  RepositoryProfile,
  WorkflowRequest,
} from './types.js'
import { parseLearningCallback, parseWorkflowRequest, type LearningCallback } from './workflow-request.js'
import type {
  LearningCallbackResult,
  Orchestrator,
  WorkflowStartResult,
  WorkflowStatus,
} from './orchestrator.js'
import type { PipewrightConfig } from '../modules/config/config-schema.js'
import type { NormalizerOptions } from '../modules/artifact-normalizer/artifact-normalizer.js'
import type { ArtifactFileNames } from '../modules/template-store/artifact-document.js'
import { createTemplateStore } from '../modules/template-store/index.js'
import type { TemplateStore } from '../modules/template-store/template-store.js'
import { createReferenceSelector } from '../modules/reference-selector/reference-selector-impl.js'
import { createGenerationCoordinator, createModelClient } from '../modules/generation/index.js'
import type { GenerationCoordinator } from '../modules/generation/generation-coordinator.js'
import type { ModelClient } from '../modules/generation/model-client.js'
import { GitLabClient } from '../modules/vcs/gitlab-client.js'
import { createRepositoryAnalyzer, type RepositoryAnalyzer } from '../modules/vcs/analyzer.js'
import { parseRepositoryUrl, repositoryWebUrl } from '../modules/vcs/repository-url.js'
import type { RepositoryRef, VcsClient } from '../modules/vcs/vcs-client.js'
import { createCommitCoordinator } from '../modules/commit/commit-coordinator-impl.js'
import type { CommitCoordinator } from '../modules/commit/commit-coordinator.js'
import { createExecutionMonitor } from '../modules/execution-monitor/execution-monitor-impl.js'
import type { ExecutionMonitor, MonitorResult } from '../modules/execution-monitor/execution-monitor.js'
import { createSelfHealingEngine } from '../modules/self-healing/self-healing-engine-impl.js'
import type { SelfHealingEngine } from '../modules/self-healing/self-healing-engine.js'
import { createFeedbackRecorder, type FeedbackRecorder } from '../modules/learning/feedback-recorder.js'
import { createLearningWriter } from '../modules/learning/learning-writer-impl.js'
import type { LearningWriter } from '../modules/learning/learning-writer.js'
import { createProgressStore, type ProgressStore } from '../modules/progress/progress-store.js'
import type { ProgressEvent, WorkflowProgress } from '../modules/progress/progress-store.js'

const logger = createLogger('orchestrator')

/** Completed workflows kept for status and learning callbacks */
const MAX_COMPLETED = 200

const SHUTDOWN_REASON = 'Workflow aborted by shutdown'

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface OrchestratorDeps {
  eventBus: TypedEventBus
  /** Services shut down after all workflows have stopped */
  registry: ServiceRegistry
  progress: ProgressStore
  analyzer: RepositoryAnalyzer
  generation: GenerationCoordinator
  commit: CommitCoordinator
  monitor: ExecutionMonitor
  healing: SelfHealingEngine
  learning: LearningWriter
  /** Stores the fix behind a healed success; absent when learning is disabled */
  feedback?: FeedbackRecorder
  /** Host used for bare `group/project` references */
  defaultBaseUrl: string
  /** Configured secrets masked out of every status message */
  secrets?: readonly string[]
}

interface WorkflowEntry {
  readonly executionRef: string
  readonly request: WorkflowRequest
  readonly repo: RepositoryRef
  readonly profile: RepositoryProfile
  readonly controller: AbortController
  /** Every branch committed for this workflow, initial branch first */
  readonly branches: string[]
  artifact: PipelineArtifact
  handle: ExecutionHandle
  /** Execution of the current handle, once the monitor has resolved it */
  executionId: string | null
  attempts: number
  abortReason: string | null
  task: Promise<void>
}

interface Conclusion {
  outcome: WorkflowOutcome
  message: string
}

/** The latest committed fix of a workflow */
interface AppliedFix {
  readonly before: PipelineArtifact
  readonly after: PipelineArtifact
  readonly errorClass: string
  readonly fixDescription: string
}

function toStatus(progress: WorkflowProgress): WorkflowStatus {
  const state = progress.outcome ?? (progress.phase === 'healing' ? 'healing' : (progress.executionState ?? progress.phase))
  return { ...progress, state }
}

// ---------------------------------------------------------------------------
// OrchestratorImpl
// ---------------------------------------------------------------------------

/** Internal symbol used to expose lifecycle hooks to the factory only */
const INTERNAL = Symbol('OrchestratorImpl.internal')

export class OrchestratorImpl implements Orchestrator {
  readonly eventBus: TypedEventBus
  private readonly _deps: OrchestratorDeps
  private readonly _workflows = new Map<string, WorkflowEntry>()
  private readonly _completedOrder: string[] = []
  /** Starts still before their first commit */
  private readonly _starting = new Map<AbortController, Promise<WorkflowStartResult>>()
  private readonly _unsubscribe: () => void
  private _ready = false
  private _shutdown = false

  constructor(deps: OrchestratorDeps) {
    this._deps = deps
    this.eventBus = deps.eventBus

    const onStateChanged = (event: WorkflowEvents['execution:state-changed']): void => {
      const entry = this._workflows.get(event.executionRef)
      if (entry !== undefined && entry.handle.branch === event.branch && event.executionId !== null) {
        entry.executionId = event.executionId
      }
    }
    this.eventBus.on('execution:state-changed', onStateChanged)
    this._unsubscribe = () => this.eventBus.off('execution:state-changed', onStateChanged)
  }

  get isReady(): boolean {
    return this._ready
  }

  async startWorkflow(input: WorkflowRequest): Promise<WorkflowStartResult> {
    if (this._shutdown) {
      throw new WorkflowAbortedError('Orchestrator is shutting down')
    }
    const request = parseWorkflowRequest(input)
    // Registered before the first await so that shutdown() can abort and await it
    const controller = new AbortController()
    const starting = this._start(request, controller)
    this._starting.set(controller, starting)
    try {
      return await starting
    } finally {
      this._starting.delete(controller)
    }
  }

  private async _start(request: WorkflowRequest, controller: AbortController): Promise<WorkflowStartResult> {
    const profile = await this._deps.analyzer.analyze(request.repositoryUrl, request.credential)
    const repo = parseRepositoryUrl(request.repositoryUrl, request.credential, this._deps.defaultBaseUrl)

    const executionRef = generateId('wf')
    logger.info({ executionRef, projectPath: repo.projectPath }, 'Workflow starting')

    let artifact: PipelineArtifact
    let handle: ExecutionHandle
    try {
      const generation = await this._deps.generation.generate(profile, {
        executionRef,
        repo,
        signal: controller.signal,
        ...(request.additionalContext !== undefined && { additionalContext: request.additionalContext }),
      })
      artifact = generation.artifact
      handle = await this._deps.commit.commit(artifact, profile, request)
    } catch (err) {
      const message = this._mask(errorMessage(err), request)
      const outcome = err instanceof WorkflowAbortedError ? 'aborted' : 'failed'
      logger.error({ executionRef, error: message }, 'Workflow failed before the first commit')
      this._complete(executionRef, { outcome, message }, 0)
      throw err
    }

    const entry: WorkflowEntry = {
      executionRef,
      request,
      repo,
      profile,
      controller,
      branches: [handle.branch],
      artifact,
      handle,
      executionId: null,
      attempts: 0,
      abortReason: controller.signal.aborted ? SHUTDOWN_REASON : null,
      task: Promise.resolve(),
    }
    this._workflows.set(executionRef, entry)

    this.eventBus.emit('workflow:started', {
      executionRef,
      repositoryUrl: repositoryWebUrl(repo),
      branch: handle.branch,
      commitId: handle.commitId,
      maxAttempts: this._deps.healing.maxAttempts,
    })
    // An aborted controller ends the task at the monitor's first check
    entry.task = this._run(entry)

    return { executionRef, branch: handle.branch, commitId: handle.commitId }
  }

  getWorkflowStatus(executionRef: string): WorkflowStatus {
    const progress = this._deps.progress.get(executionRef)
    if (progress === undefined) {
      throw new NotFoundError(`Unknown workflow ${executionRef}`, { executionRef })
    }
    return toStatus(progress)
  }

  cancelWorkflow(executionRef: string): boolean {
    const entry = this._workflows.get(executionRef)
    if (entry === undefined || entry.controller.signal.aborted) return false
    if (this._deps.progress.get(executionRef)?.completed === true) return false
    logger.info({ executionRef }, 'Workflow cancel requested')
    entry.abortReason = 'Workflow canceled by request'
    entry.controller.abort()
    return true
  }

  async waitForWorkflow(executionRef: string): Promise<WorkflowStatus> {
    const entry = this._workflows.get(executionRef)
    if (entry !== undefined) await entry.task
    return this.getWorkflowStatus(executionRef)
  }

  onProgress(listener: (status: WorkflowStatus, event: ProgressEvent) => void): () => void {
    return this._deps.progress.onEvent((progress, event) => listener(toStatus(progress), event))
  }

  async recordLearning(input: LearningCallback): Promise<LearningCallbackResult> {
    const callback = parseLearningCallback(input)
    const entry = this._findByBranch(callback.branch)
    if (entry === undefined) {
      throw new NotFoundError(`No workflow committed branch ${callback.branch}`, { branch: callback.branch })
    }
    const { executionRef } = entry
    if (callback.branch !== entry.handle.branch) {
      // The artifact of an earlier attempt is no longer held
      const reason = `branch ${callback.branch} was superseded by ${entry.handle.branch}`
      logger.info({ executionRef, branch: callback.branch }, 'Learning callback for a superseded branch')
      this.eventBus.emit('learning:skipped', { executionRef, reason, issues: [] })
      return { status: 'skipped', executionRef, reason, issues: [] }
    }
    const executionId = callback.pipelineId ?? entry.executionId
    if (executionId === null) {
      logger.info({ executionRef, branch: callback.branch }, 'Learning callback before the execution is known')
      return { status: 'pending', executionRef }
    }

    const result = await this._deps.learning.record({
      executionRef,
      repo: entry.repo,
      executionId,
      profile: entry.profile,
      artifact: entry.artifact,
      durationSeconds: this._elapsedSeconds(entry.handle),
    })
    return result.kind === 'stored'
      ? { status: 'stored', executionRef, config: result.config }
      : { status: 'skipped', executionRef, reason: result.reason, issues: result.issues }
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true
    logger.info({ running: this._workflows.size, starting: this._starting.size }, 'Orchestrator shutdown initiated')

    for (const controller of this._starting.keys()) controller.abort()
    // Starts that got past their commit have registered a task by now
    await Promise.allSettled([...this._starting.values()])

    for (const entry of this._workflows.values()) {
      if (!entry.controller.signal.aborted) {
        entry.abortReason = SHUTDOWN_REASON
        entry.controller.abort()
      }
    }
    await Promise.all([...this._workflows.values()].map((entry) => entry.task))
    this._unsubscribe()

    try {
      await this._deps.registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during orchestrator shutdown')
    }
    logger.info('Orchestrator shutdown complete')
  }

  // ---------------------------------------------------------------------------
  // Background task
  // ---------------------------------------------------------------------------

  /** Never rejects: every ending is reported through workflow:completed */
  private async _run(entry: WorkflowEntry): Promise<void> {
    let conclusion: Conclusion
    try {
      conclusion = await this._follow(entry)
    } catch (err) {
      if (err instanceof WorkflowAbortedError) {
        conclusion = { outcome: 'aborted', message: entry.abortReason ?? err.message }
      } else {
        const message = this._mask(errorMessage(err), entry.request)
        logger.error({ executionRef: entry.executionRef, error: message }, 'Workflow failed')
        conclusion = { outcome: 'failed', message }
      }
    }
    this._complete(entry.executionRef, conclusion, entry.attempts)
    this._retire(entry.executionRef)
  }

  private async _follow(entry: WorkflowEntry): Promise<Conclusion> {
    const { executionRef, controller } = entry
    let result = await this._deps.monitor.watch(entry.repo, entry.handle, { executionRef, signal: controller.signal })
    const fixes: AppliedFix[] = []

    if (result.state === 'FAILED') {
      const healed = await this._deps.healing.heal({
        executionRef,
        repo: entry.repo,
        request: entry.request,
        profile: entry.profile,
        artifact: entry.artifact,
        handle: entry.handle,
        failed: result,
        signal: controller.signal,
        onCommitted: (attempt, artifact) => {
          fixes.push({
            before: entry.artifact,
            after: artifact,
            errorClass: attempt.errorClass,
            fixDescription: attempt.fixDescription,
          })
          entry.artifact = artifact
          entry.handle = attempt.newExecutionHandle
          entry.executionId = null
          entry.attempts = attempt.attemptNumber
          entry.branches.push(attempt.newExecutionHandle.branch)
        },
      })
      entry.artifact = healed.artifact
      entry.handle = healed.handle
      if (healed.kind === 'max_attempts_reached') {
        return {
          outcome: 'max_attempts_reached',
          message: new MaxAttemptsExhaustedError(this._deps.healing.maxAttempts).message,
        }
      }
      result = healed.result
    }

    switch (result.state) {
      case 'SUCCEEDED':
        await this._learn(entry, result)
        await this._storeFeedback(entry, fixes[fixes.length - 1])
        return { outcome: 'succeeded', message: `Pipeline succeeded on ${entry.handle.branch}` }
      case 'CANCELED':
        return { outcome: 'canceled', message: `Execution ${result.executionId ?? '(unknown)'} was canceled` }
      case 'FAILED':
        return { outcome: 'failed', message: new ExecutionFailedError(result.executionId).message }
      case 'QUEUED':
      case 'RUNNING':
      case 'TIMED_OUT':
        return { outcome: 'timed_out', message: new MonitorTimeoutError(result.polls).message }
    }
  }

  private async _learn(entry: WorkflowEntry, result: MonitorResult): Promise<void> {
    const executionId = result.executionId ?? entry.executionId
    if (executionId === null) {
      this.eventBus.emit('learning:skipped', {
        executionRef: entry.executionRef,
        reason: 'execution id unknown',
        issues: [],
      })
      return
    }
    try {
      await this._deps.learning.record({
        executionRef: entry.executionRef,
        repo: entry.repo,
        executionId,
        profile: entry.profile,
        artifact: entry.artifact,
        durationSeconds: result.durationSeconds,
      })
    } catch (err) {
      // A succeeded pipeline stays succeeded when the store is unavailable
      const message = this._mask(errorMessage(err), entry.request)
      logger.warn({ executionRef: entry.executionRef, error: message }, 'Learning failed')
      this.eventBus.emit('learning:skipped', {
        executionRef: entry.executionRef,
        reason: `learning failed: ${message}`,
        issues: [],
      })
    }
  }

  /** The fix that turned the execution green, if healing produced one */
  private async _storeFeedback(entry: WorkflowEntry, fix: AppliedFix | undefined): Promise<void> {
    const recorder = this._deps.feedback
    if (recorder === undefined || fix === undefined) return
    try {
      await recorder.record({ executionRef: entry.executionRef, profile: entry.profile, ...fix })
    } catch (err) {
      const message = this._mask(errorMessage(err), entry.request)
      logger.warn({ executionRef: entry.executionRef, error: message }, 'Storing fix feedback failed')
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _complete(executionRef: string, conclusion: Conclusion, attempts: number): void {
    logger.info({ executionRef, outcome: conclusion.outcome, attempts }, 'Workflow completed')
    this.eventBus.emit('workflow:completed', { executionRef, attempts, ...conclusion })
  }

  private _retire(executionRef: string): void {
    this._completedOrder.push(executionRef)
    while (this._completedOrder.length > MAX_COMPLETED) {
      const oldest = this._completedOrder.shift()
      if (oldest !== undefined) this._workflows.delete(oldest)
    }
  }

  private _findByBranch(branch: string): WorkflowEntry | undefined {
    let found: WorkflowEntry | undefined
    for (const entry of this._workflows.values()) {
      if (entry.branches.includes(branch)) found = entry
    }
    return found
  }

  private _elapsedSeconds(handle: ExecutionHandle): number {
    const started = Date.parse(handle.startedAt)
    return Number.isNaN(started) ? 0 : Math.max(0, Math.round((Date.now() - started) / 1000))
  }

  private _mask(text: string, request: WorkflowRequest): string {
    return maskSecrets(text, [request.credential, ...(this._deps.secrets ?? [])])
  }

  private _markReady(): void {
    this._ready = true
  }

  /**
   * Internal accessor used exclusively by the createOrchestrator factory.
   * @internal
   */
  [INTERNAL](): { markReady: () => void } {
    return { markReady: () => this._markReady() }
  }
}

// ---------------------------------------------------------------------------
// createOrchestrator factory
// ---------------------------------------------------------------------------

export interface CreateOrchestratorOptions {
  /** Replaces the GitLab client */
  vcs?: VcsClient
  /** Replaces the configured model backend */
  model?: ModelClient
  /** Replaces the configured template store */
  store?: TemplateStore
  /** Used by the HTTP backends (GitLab, Chroma, model) */
  fetchImpl?: typeof fetch
  /** Used between status polls */
  sleep?: SleepFn
}

/** Normalizer options derived from the `normalizer` config section */
export function normalizerOptionsFrom(config: PipewrightConfig): NormalizerOptions {
  return {
    learningStage: config.normalizer.learning_stage,
    notifyStage: config.normalizer.notify_stage,
    learningJob: config.normalizer.learning_job,
    callbackVariable: config.normalizer.callback_variable,
    callbackUrl: config.normalizer.callback_url,
  }
}

/**
 * Build every module from configuration and initialize the stateful ones.
 *
 * Steps performed:
 *  1. Create the TypedEventBus
 *  2. Create the store, VCS and model clients (or take the given ones)
 *  3. Instantiate all modules with constructor injection
 *  4. Register the store and the progress store in the ServiceRegistry
 *  5. Call initialize() on all services in registration order
 */
export async function createOrchestrator(
  config: PipewrightConfig,
  options: CreateOrchestratorOptions = {},
): Promise<Orchestrator> {
  setLogLevel(config.global.log_level)
  logger.info({ store: config.store.backend, model: config.model.provider }, 'Initializing orchestrator')

  // Step 1: Create the event bus
  const eventBus = createEventBus()

  // Step 2: External collaborators
  const store =
    options.store ?? createTemplateStore(config.store, { dataDir: config.global.data_dir, fetchImpl: options.fetchImpl })
  const vcs = options.vcs ?? new GitLabClient({ timeoutMs: config.vcs.request_timeout_ms, fetchImpl: options.fetchImpl })
  const model = options.model ?? createModelClient(config.model, options.fetchImpl)

  // Step 3: Modules
  const files: ArtifactFileNames = {
    pipelineFile: config.vcs.pipeline_file,
    imageBuildFile: config.vcs.image_build_file,
  }
  const normalizer = normalizerOptionsFrom(config)
  const selector = createReferenceSelector(store, {
    templatesCollection: config.store.templates_collection,
    learnedCollection: config.store.learned_collection,
    learnedCandidates: config.store.learned_candidates,
    pipelineFile: files.pipelineFile,
    imageBuildFile: files.imageBuildFile,
    notifyStage: normalizer.notifyStage,
  })
  const commit = createCommitCoordinator({
    vcs,
    defaultBaseUrl: config.vcs.base_url,
    branchPrefix: config.vcs.branch_prefix,
    pipelineFile: files.pipelineFile,
    imageBuildFile: files.imageBuildFile,
    commitMessage: config.vcs.commit_message,
  })
  const monitor = createExecutionMonitor({
    vcs,
    pollIntervalMs: config.monitor.poll_interval_ms,
    maxWaitMs: config.monitor.max_wait_ms,
    eventBus,
    ...(options.sleep !== undefined && { sleep: options.sleep }),
  })
  const feedback = createFeedbackRecorder({
    store,
    collection: config.store.feedback_collection,
    limit: config.learning.feedback_limit,
    files,
    eventBus,
  })
  const linter = config.vcs.lint_before_commit ? vcs : undefined
  const progress = createProgressStore(eventBus)

  // Step 4: Register services; the store opens first and closes last
  const registry = new ServiceRegistry()
  registry.register('templateStore', store)
  registry.register('progress', progress)

  const orchestrator = new OrchestratorImpl({
    eventBus,
    registry,
    progress,
    analyzer: createRepositoryAnalyzer(vcs, {
      defaultBaseUrl: config.vcs.base_url,
      pipelineFile: files.pipelineFile,
      imageBuildFile: files.imageBuildFile,
    }),
    generation: createGenerationCoordinator({
      selector,
      model,
      files,
      normalizer,
      feedback,
      eventBus,
      ...(linter !== undefined && { linter }),
    }),
    commit,
    monitor,
    healing: createSelfHealingEngine({
      vcs,
      model,
      commit,
      monitor,
      maxAttempts: config.healing.max_attempts,
      logTailChars: config.healing.log_tail_chars,
      extraPatterns: config.healing.extra_patterns,
      files,
      normalizer,
      feedback,
      eventBus,
      ...(linter !== undefined && { linter }),
    }),
    learning: createLearningWriter({
      vcs,
      store,
      learnedCollection: config.store.learned_collection,
      enabled: config.learning.enabled,
      exemptSkippedJobs: config.learning.exempt_skipped_jobs,
      learningJob: normalizer.learningJob,
      files,
      eventBus,
    }),
    ...(config.learning.enabled && { feedback }),
    defaultBaseUrl: config.vcs.base_url,
    secrets: [config.vcs.token, config.model.api_key].filter((s): s is string => s !== undefined && s !== ''),
  })

  // Step 5: Initialize; the registry closes what it opened when a service fails
  await registry.initializeAll()

  orchestrator[INTERNAL]().markReady()
  logger.info('Orchestrator ready')
  return orchestrator
}

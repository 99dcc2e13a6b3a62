/**
 * ProgressStore: per-workflow progress assembled from the event bus.
 *
 * Every workflow-scoped event becomes one `{timestamp, stage, message,
 * attempt}` entry; the store also tracks the current phase, the latest
 * execution state and the healing attempts committed so far.
 */

import type { BaseService } from '../../core/di.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { WorkflowEvents, WorkflowOutcome } from '../../core/event-bus.types.js'
import type { ExecutionState, HealingAttempt } from '../../core/types.js'

export type ProgressStage = 'generation' | 'commit' | 'monitor' | 'healing' | 'learning' | 'workflow'

export type WorkflowPhase = 'generating' | 'monitoring' | 'healing' | 'completed'

export interface ProgressEvent {
  readonly timestamp: string
  readonly stage: ProgressStage
  readonly message: string
  /** Healing attempt in progress; 0 for the initial execution */
  readonly attempt: number
}

export interface WorkflowProgress {
  readonly executionRef: string
  readonly phase: WorkflowPhase
  readonly executionState: ExecutionState | null
  readonly branch: string | null
  readonly attempt: number
  readonly maxAttempts: number
  readonly events: readonly ProgressEvent[]
  readonly healingAttempts: readonly HealingAttempt[]
  readonly completed: boolean
  readonly outcome?: WorkflowOutcome
  readonly message?: string
}

export interface ProgressStoreOptions {
  /** Completed workflows kept in memory; the oldest are dropped first */
  maxCompleted?: number
  now?: () => Date
}

interface MutableProgress {
  executionRef: string
  phase: WorkflowPhase
  executionState: ExecutionState | null
  branch: string | null
  attempt: number
  maxAttempts: number
  events: ProgressEvent[]
  healingAttempts: HealingAttempt[]
  completed: boolean
  outcome?: WorkflowOutcome
  message?: string
}

type Listener = (progress: WorkflowProgress, event: ProgressEvent) => void

export class ProgressStore implements BaseService {
  private readonly _eventBus: TypedEventBus
  private readonly _maxCompleted: number
  private readonly _now: () => Date
  private readonly _workflows = new Map<string, MutableProgress>()
  private readonly _completedOrder: string[] = []
  private readonly _listeners = new Set<Listener>()
  private readonly _subscriptions: (() => void)[] = []

  constructor(eventBus: TypedEventBus, options: ProgressStoreOptions = {}) {
    this._eventBus = eventBus
    this._maxCompleted = options.maxCompleted ?? 200
    this._now = options.now ?? (() => new Date())
  }

  async initialize(): Promise<void> {
    this._subscribe('generation:completed', (e, p) => {
      const via = e.templateId !== undefined ? `, template ${e.templateId}` : ''
      const fallback = e.usedFallback ? ', default fallback' : ''
      p.phase = 'generating'
      return ['generation', `Artifact ready for ${e.language}/${e.framework} (source ${e.source}${via}${fallback})`]
    }, true)
    this._subscribe('workflow:started', (e, p) => {
      p.phase = 'monitoring'
      p.branch = e.branch
      p.maxAttempts = e.maxAttempts
      return ['commit', `Committed ${e.commitId} to ${e.branch}`]
    }, true)
    this._subscribe('execution:state-changed', (e, p) => {
      p.executionState = e.state
      return ['monitor', `Execution ${e.executionId ?? '(pending)'} on ${e.branch} is ${e.state}`]
    })
    this._subscribe('execution:poll-failed', (e) => ['monitor', e.error])
    this._subscribe('healing:attempt-started', (e, p) => {
      p.phase = 'healing'
      p.attempt = e.attempt
      return [
        'healing',
        `Attempt ${String(e.attempt)}/${String(e.maxAttempts)}: ${e.errorClass} in ${e.failedJob ?? 'no reported job'}`,
      ]
    })
    this._subscribe('healing:attempt-committed', (e, p) => {
      p.phase = 'monitoring'
      p.branch = e.branch
      p.executionState = null
      p.healingAttempts.push({
        attemptNumber: e.attempt,
        errorClass: e.errorClass,
        fixDescription: e.fixDescription,
        newExecutionHandle: { branch: e.branch, commitId: e.commitId, startedAt: e.startedAt },
      })
      return ['healing', `Fix committed to ${e.branch}: ${e.fixDescription}`]
    })
    this._subscribe('learning:stored', (e) => ['learning', `Stored learned configuration ${e.configId}`])
    this._subscribe('learning:feedback-stored', (e) => ['learning', `Stored ${e.errorClass} fix as feedback ${e.feedbackId}`])
    this._subscribe('learning:skipped', (e) => [
      'learning',
      e.issues.length > 0 ? `Learning skipped: ${e.reason} (${e.issues.join('; ')})` : `Learning skipped: ${e.reason}`,
    ])
    this._subscribe('workflow:completed', (e, p) => {
      p.phase = 'completed'
      p.completed = true
      p.outcome = e.outcome
      p.message = e.message
      this._retire(e.executionRef)
      return ['workflow', e.message]
    }, true)
  }

  async shutdown(): Promise<void> {
    for (const unsubscribe of this._subscriptions.splice(0)) unsubscribe()
    this._listeners.clear()
  }

  get(executionRef: string): WorkflowProgress | undefined {
    const progress = this._workflows.get(executionRef)
    return progress !== undefined ? snapshot(progress) : undefined
  }

  list(): WorkflowProgress[] {
    return [...this._workflows.values()].map(snapshot)
  }

  /** Observe every recorded event; returns the unsubscribe function */
  onEvent(listener: Listener): () => void {
    this._listeners.add(listener)
    return () => {
      this._listeners.delete(listener)
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _subscribe<K extends keyof WorkflowEvents>(
    event: K,
    apply: (payload: WorkflowEvents[K], progress: MutableProgress) => [ProgressStage, string],
    /** Whether the event may open a workflow; other events for unknown workflows are dropped */
    opens = false,
  ): void {
    const handler = (payload: WorkflowEvents[K]): void => {
      const progress = opens ? this._ensure(payload.executionRef) : this._workflows.get(payload.executionRef)
      // A late learning callback for a workflow that was already evicted
      if (progress === undefined) return
      const [stage, message] = apply(payload, progress)
      const entry: ProgressEvent = { timestamp: this._now().toISOString(), stage, message, attempt: progress.attempt }
      progress.events.push(entry)
      if (this._listeners.size === 0) return
      const view = snapshot(progress)
      for (const listener of this._listeners) listener(view, entry)
    }
    this._eventBus.on(event, handler)
    this._subscriptions.push(() => this._eventBus.off(event, handler))
  }

  private _ensure(executionRef: string): MutableProgress {
    let progress = this._workflows.get(executionRef)
    if (progress === undefined) {
      progress = {
        executionRef,
        phase: 'generating',
        executionState: null,
        branch: null,
        attempt: 0,
        maxAttempts: 0,
        events: [],
        healingAttempts: [],
        completed: false,
      }
      this._workflows.set(executionRef, progress)
    }
    return progress
  }

  private _retire(executionRef: string): void {
    this._completedOrder.push(executionRef)
    while (this._completedOrder.length > this._maxCompleted) {
      const oldest = this._completedOrder.shift()
      if (oldest !== undefined) this._workflows.delete(oldest)
    }
  }
}

function snapshot(progress: MutableProgress): WorkflowProgress {
  return { ...progress, events: [...progress.events], healingAttempts: [...progress.healingAttempts] }
}

export function createProgressStore(eventBus: TypedEventBus, options: ProgressStoreOptions = {}): ProgressStore {
  return new ProgressStore(eventBus, options)
}

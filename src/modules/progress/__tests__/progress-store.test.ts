import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createEventBus, type TypedEventBus } from '../../../core/event-bus.js'
import { ProgressStore } from '../progress-store.js'

describe('ProgressStore', () => {
  let bus: TypedEventBus
  let store: ProgressStore

  beforeEach(async () => {
    bus = createEventBus()
    store = new ProgressStore(bus, { now: () => new Date('2024-03-05T08:00:00Z') })
    await store.initialize()
  })

  afterEach(async () => {
    await store.shutdown()
  })

  function startWorkflow(ref: string): void {
    bus.emit('generation:completed', {
      executionRef: ref,
      language: 'go',
      framework: 'generic',
      source: 'generated',
      templateId: 'default_go_generic',
      usedFallback: true,
    })
    bus.emit('workflow:started', {
      executionRef: ref,
      repositoryUrl: 'https://gitlab.test/group/app',
      branch: 'ci/base',
      commitId: 'c1',
      maxAttempts: 10,
    })
  }

  it('records one event per workflow event', () => {
    startWorkflow('wf-1')
    bus.emit('execution:state-changed', { executionRef: 'wf-1', branch: 'ci/base', executionId: '7', state: 'RUNNING', poll: 1 })

    const progress = store.get('wf-1')

    expect(progress?.events).toEqual([
      {
        timestamp: '2024-03-05T08:00:00.000Z',
        stage: 'generation',
        message: 'Artifact ready for go/generic (source generated, template default_go_generic, default fallback)',
        attempt: 0,
      },
      { timestamp: '2024-03-05T08:00:00.000Z', stage: 'commit', message: 'Committed c1 to ci/base', attempt: 0 },
      { timestamp: '2024-03-05T08:00:00.000Z', stage: 'monitor', message: 'Execution 7 on ci/base is RUNNING', attempt: 0 },
    ])
    expect(progress?.phase).toBe('monitoring')
    expect(progress?.executionState).toBe('RUNNING')
    expect(progress?.maxAttempts).toBe(10)
    expect(progress?.completed).toBe(false)
  })

  it('tracks healing attempts and the current branch', () => {
    startWorkflow('wf-1')
    bus.emit('healing:attempt-started', {
      executionRef: 'wf-1',
      attempt: 1,
      maxAttempts: 10,
      errorClass: 'build_failure',
      failedJob: 'compile',
    })
    expect(store.get('wf-1')?.phase).toBe('healing')

    bus.emit('healing:attempt-committed', {
      executionRef: 'wf-1',
      attempt: 1,
      errorClass: 'build_failure',
      branch: 'ci/base-fix-1',
      commitId: 'c2',
      startedAt: '2024-03-05T08:01:00.000Z',
      fixDescription: 'Use the Go image.',
    })

    const progress = store.get('wf-1')
    expect(progress?.attempt).toBe(1)
    expect(progress?.branch).toBe('ci/base-fix-1')
    expect(progress?.healingAttempts).toEqual([
      {
        attemptNumber: 1,
        errorClass: 'build_failure',
        fixDescription: 'Use the Go image.',
        newExecutionHandle: { branch: 'ci/base-fix-1', commitId: 'c2', startedAt: '2024-03-05T08:01:00.000Z' },
      },
    ])
    expect(progress?.events.slice(-2).map((e) => `${String(e.attempt)} ${e.message}`)).toEqual([
      '1 Attempt 1/10: build_failure in compile',
      '1 Fix committed to ci/base-fix-1: Use the Go image.',
    ])
  })

  it('marks the workflow completed with its outcome', () => {
    startWorkflow('wf-1')
    bus.emit('learning:skipped', { executionRef: 'wf-1', reason: 'quality gate failed', issues: ['job "lint" is failed'] })
    bus.emit('workflow:completed', {
      executionRef: 'wf-1',
      outcome: 'succeeded',
      attempts: 0,
      message: 'Pipeline succeeded on ci/base',
    })

    const progress = store.get('wf-1')
    expect(progress?.completed).toBe(true)
    expect(progress?.phase).toBe('completed')
    expect(progress?.outcome).toBe('succeeded')
    expect(progress?.events.map((e) => e.message).slice(-2)).toEqual([
      'Learning skipped: quality gate failed (job "lint" is failed)',
      'Pipeline succeeded on ci/base',
    ])
  })

  it('returns snapshots that later events do not change', () => {
    startWorkflow('wf-1')
    const before = store.get('wf-1')
    bus.emit('execution:poll-failed', { executionRef: 'wf-1', branch: 'ci/base', poll: 1, error: 'Status poll 1 failed: boom' })

    expect(before?.events).toHaveLength(2)
    expect(store.get('wf-1')?.events).toHaveLength(3)
  })

  it('drops the oldest completed workflows beyond the limit', async () => {
    const small = new ProgressStore(bus, { maxCompleted: 1 })
    await small.initialize()
    for (const ref of ['wf-a', 'wf-b']) {
      startWorkflow(ref)
      bus.emit('workflow:completed', { executionRef: ref, outcome: 'failed', attempts: 0, message: 'failed' })
    }

    expect(small.get('wf-a')).toBeUndefined()
    expect(small.get('wf-b')?.completed).toBe(true)
    await small.shutdown()
  })

  it('notifies listeners and stops after shutdown', async () => {
    const seen: string[] = []
    const unsubscribe = store.onEvent((progress, event) => seen.push(`${progress.executionRef}:${event.stage}`))

    startWorkflow('wf-1')
    unsubscribe()
    bus.emit('execution:poll-failed', { executionRef: 'wf-1', branch: 'ci/base', poll: 1, error: 'boom' })
    await store.shutdown()
    bus.emit('execution:poll-failed', { executionRef: 'wf-1', branch: 'ci/base', poll: 2, error: 'boom' })

    expect(seen).toEqual(['wf-1:generation', 'wf-1:commit'])
    expect(store.get('wf-1')?.events).toHaveLength(3)
  })

  it('ignores a learning event for a workflow it no longer keeps', async () => {
    const small = new ProgressStore(bus, { maxCompleted: 1 })
    await small.initialize()
    for (const ref of ['wf-a', 'wf-b']) {
      startWorkflow(ref)
      bus.emit('workflow:completed', { executionRef: ref, outcome: 'succeeded', attempts: 0, message: 'done' })
    }

    bus.emit('learning:stored', { executionRef: 'wf-a', configId: 'learned_go_generic_0', language: 'go', framework: 'generic' })

    expect(small.get('wf-a')).toBeUndefined()
    expect(small.list().map((p) => p.executionRef)).toEqual(['wf-b'])
    await small.shutdown()
  })

  it('opens a workflow for a failure reported before any other event', () => {
    bus.emit('workflow:completed', { executionRef: 'wf-early', outcome: 'failed', attempts: 0, message: 'store offline' })

    expect(store.get('wf-early')?.outcome).toBe('failed')
  })

  it('returns undefined for an unknown workflow', () => {
    expect(store.get('wf-missing')).toBeUndefined()
  })
})

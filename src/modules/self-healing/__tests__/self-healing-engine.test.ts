/**
 * Healing loop tests against the in-memory VCS and a scripted model.
 */

import { describe, it, expect } from 'vitest'
import { createEventBus, type TypedEventBus } from '../../../core/event-bus.js'
import {
  GenerationFailureError,
  ModelTimeoutError,
  ModelUnavailableError,
  VcsError,
  WorkflowAbortedError,
} from '../../../core/errors.js'
import type { FixFeedback, PipelineArtifact, RepositoryProfile, WorkflowRequest } from '../../../core/types.js'
import { FakeVcs, job, type ExecutionScript } from '../../../../test/fixtures/fake-vcs.js'
import { ScriptedModel } from '../../../../test/fixtures/scripted-model.js'
import { parsePipelineDocument } from '../../artifact-normalizer/pipeline-document.js'
import { createCommitCoordinator } from '../../commit/commit-coordinator-impl.js'
import { createExecutionMonitor } from '../../execution-monitor/execution-monitor-impl.js'
import type { RepositoryRef } from '../../vcs/vcs-client.js'
import { createSelfHealingEngine, type SelfHealingEngineOptions } from '../self-healing-engine-impl.js'
import type { HealingInput } from '../self-healing-engine.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const REPO: RepositoryRef = { baseUrl: 'https://gitlab.test', projectPath: 'group/app', credential: 'test-secret' }
const REQUEST: WorkflowRequest = { repositoryUrl: 'https://gitlab.test/group/app', credential: 'test-secret' }
const BASE_BRANCH = 'pipewright/pipeline-20240305-070809-a1b2c3'

const PROFILE: RepositoryProfile = {
  language: 'go',
  framework: 'generic',
  packageManager: 'go modules',
  hasExistingPipelineFiles: false,
  files: ['go.mod'],
}

const ARTIFACT: PipelineArtifact = {
  pipelineDefinition: 'stages: [compile, test, notify]\ncompile:\n  stage: compile\n  script: [go build ./...]\n',
  imageBuildDefinition: 'FROM golang:1.21\n',
  provenance: { source: 'generated' },
}

const FIXED_PIPELINE = 'stages: [compile, notify]\ncompile:\n  stage: compile\n  script: [go build -o app .]\n'

const FAILED: ExecutionScript = {
  states: ['FAILED'],
  jobs: [job('notify_failure', 'notify', 'failed'), job('compile', 'compile', 'failed'), job('test', 'test', 'skipped')],
  logs: { compile: 'go: build failed\n', notify_failure: 'curl: (7) connection refused\n' },
}

const SUCCEEDED: ExecutionScript = { states: ['RUNNING', 'SUCCEEDED'], jobs: [job('compile', 'compile', 'success')] }

function fixAnswer(pipeline: string, dockerfile: string, explanation = 'Pinned the build command.'): string {
  return `---EXPLANATION---\n${explanation}\n---DOCKERFILE---\n${dockerfile}\n---GITLAB_CI---\n${pipeline}\n---END---\n`
}

interface Harness {
  vcs: FakeVcs
  model: ScriptedModel
  bus: TypedEventBus
  engine: ReturnType<typeof createSelfHealingEngine>
  input: (signal?: AbortSignal) => Promise<HealingInput>
}

function harness(
  maxAttempts = 10,
  extra: (vcs: FakeVcs) => Partial<SelfHealingEngineOptions> = () => ({}),
): Harness {
  const vcs = new FakeVcs({ 'go.mod': 'module app\n' })
  const model = new ScriptedModel()
  const bus = createEventBus()
  const commit = createCommitCoordinator({
    vcs,
    defaultBaseUrl: 'https://gitlab.test',
    branchPrefix: 'pipewright/pipeline',
    pipelineFile: '.gitlab-ci.yml',
    imageBuildFile: 'Dockerfile',
    commitMessage: 'ci: add generated pipeline configuration',
    now: () => new Date('2024-03-05T07:08:09Z'),
    suffix: () => 'a1b2c3',
  })
  const monitor = createExecutionMonitor({ vcs, pollIntervalMs: 1_000, maxWaitMs: 5_000, sleep: async () => {} })
  const engine = createSelfHealingEngine({
    vcs,
    model,
    commit,
    monitor,
    maxAttempts,
    logTailChars: 3000,
    eventBus: bus,
    ...extra(vcs),
  })

  const input = async (signal?: AbortSignal): Promise<HealingInput> => {
    const handle = await commit.commit(ARTIFACT, PROFILE, REQUEST)
    const failed = await monitor.watch(REPO, handle)
    return {
      executionRef: 'wf-1',
      repo: REPO,
      request: REQUEST,
      profile: PROFILE,
      artifact: ARTIFACT,
      handle,
      failed,
      ...(signal !== undefined && { signal }),
    }
  }
  return { vcs, model, bus, engine, input }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('SelfHealingEngine', () => {
  it('commits a fix to a fresh branch and stops on success', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, SUCCEEDED)
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('succeeded')
    expect(outcome.result.state).toBe('SUCCEEDED')
    expect(outcome.attempts).toEqual([
      {
        attemptNumber: 1,
        errorClass: 'build_failure',
        fixDescription: 'Pinned the build command.',
        newExecutionHandle: {
          branch: `${BASE_BRANCH}-fix-1`,
          commitId: 'commit-2',
          startedAt: '2024-03-05T07:08:09.000Z',
        },
      },
    ])

    const fixCommit = vcs.commits[1]
    expect(fixCommit?.branch).toBe(`${BASE_BRANCH}-fix-1`)
    expect(fixCommit?.message).toBe('ci: add generated pipeline configuration (fix attempt 1)')
    expect(fixCommit?.files['Dockerfile']).toBe('FROM golang:1.22\n')
    const committedPipeline = fixCommit?.files['.gitlab-ci.yml'] ?? ''
    expect(parsePipelineDocument(committedPipeline).stages).toEqual(['compile', 'notify', 'learn'])
    expect(outcome.artifact.pipelineDefinition).toBe(committedPipeline)
  })

  it('repairs the earliest failed job before notification jobs', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, SUCCEEDED)
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    await engine.heal(await input())

    const context = model.calls[0]?.context ?? ''
    expect(context).toContain('- Failed job: compile\n- Stage: compile\n- Error class: build_failure')
    expect(context).toContain('go: build failed')
    expect(context).not.toContain('connection refused')
  })

  it('reports max_attempts_reached after 11 consecutive failures with a budget of 10', async () => {
    const { vcs, model, engine, input } = harness(10)
    vcs.fallbackScript = FAILED
    for (let i = 0; i < 10; i++) model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('max_attempts_reached')
    expect(outcome.attempts.map((a) => a.attemptNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
    expect(vcs.commits).toHaveLength(11)
    expect(model.calls).toHaveLength(10)
    expect(outcome.handle.branch).toBe(`${BASE_BRANCH}-fix-10`)
  })

  it('does not attempt anything with a budget of zero', async () => {
    const { vcs, model, engine, input } = harness(0)
    vcs.script(FAILED)

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('max_attempts_reached')
    expect(outcome.attempts).toEqual([])
    expect(model.calls).toHaveLength(0)
  })

  it('retries the model once when it is unavailable', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, SUCCEEDED)
    model.push(new ModelUnavailableError('Ollama connection failed'), fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('succeeded')
    expect(model.calls).toHaveLength(2)
  })

  it('retries once when the fix fails validation', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, SUCCEEDED)
    model.push(
      fixAnswer('stages: [compile]\ncompile:\n  stage: build\n  script: [make]\n', 'FROM golang:1.22\n'),
      fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'),
    )

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('succeeded')
    expect(model.calls).toHaveLength(2)
  })

  it('fails the workflow when the retry also yields nothing usable', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED)
    model.push(new ModelTimeoutError(1000), 'I cannot help with that.')

    const run = engine.heal(await input())

    await expect(run).rejects.toBeInstanceOf(GenerationFailureError)
    await expect(run).rejects.toThrow('No usable fix for attempt 1: answer contained no pipeline definition')
    expect(vcs.commits).toHaveLength(1)
  })

  it('keeps the current image-build definition when the fix omits it', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, SUCCEEDED)
    model.push(fixAnswer(FIXED_PIPELINE, '', ''))

    const outcome = await engine.heal(await input())

    expect(vcs.commits[1]?.files['Dockerfile']).toBe('FROM golang:1.21\n')
    expect(outcome.attempts[0]?.fixDescription).toBe('Fix for build_failure')
  })

  it('reports a timed-out fix execution as timed_out', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, { states: ['RUNNING'] })
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('timed_out')
    expect(outcome.attempts).toHaveLength(1)
  })

  it('reports a canceled fix execution as canceled', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, { states: ['CANCELED'] })
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('canceled')
  })

  it('emits attempt events', async () => {
    const { vcs, model, bus, engine, input } = harness(3)
    vcs.script(FAILED, SUCCEEDED)
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))
    const events: string[] = []
    bus.on('healing:attempt-started', (e) =>
      events.push(`started ${String(e.attempt)}/${String(e.maxAttempts)} ${e.errorClass} ${e.failedJob ?? '-'}`),
    )
    bus.on('healing:attempt-committed', (e) => events.push(`committed ${String(e.attempt)} ${e.branch} ${e.commitId}`))

    await engine.heal(await input())

    expect(events).toEqual([
      'started 1/3 build_failure compile',
      `committed 1 ${BASE_BRANCH}-fix-1 commit-2`,
    ])
  })

  it('reports each committed fix to the caller', async () => {
    const { vcs, model, engine, input } = harness()
    vcs.script(FAILED, SUCCEEDED)
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))
    const seen: string[] = []

    await engine.heal({
      ...(await input()),
      onCommitted: (attempt, artifact) =>
        seen.push(`${String(attempt.attemptNumber)} ${attempt.newExecutionHandle.commitId} ${artifact.imageBuildDefinition.trim()}`),
    })

    expect(seen).toEqual(['1 commit-2 FROM golang:1.22'])
  })

  it('stops when the workflow is aborted', async () => {
    const { vcs, engine, input } = harness()
    vcs.script(FAILED)
    const controller = new AbortController()
    const healingInput = await input(controller.signal)
    controller.abort()

    await expect(engine.heal(healingInput)).rejects.toBeInstanceOf(WorkflowAbortedError)
  })
})

describe('SelfHealingEngine with CI lint and feedback', () => {
  const LINT_ERROR = 'jobs:compile script config should be a string or a nested array of strings'

  it('retries with the lint errors when the server rejects a fix', async () => {
    const { vcs, model, engine, input } = harness(10, (fake) => ({ linter: fake }))
    vcs.script(FAILED, SUCCEEDED)
    vcs.lintResults.push({ valid: false, errors: [LINT_ERROR], warnings: [] })
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'), fixAnswer(FIXED_PIPELINE, 'FROM golang:1.23\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('succeeded')
    expect(vcs.linted).toHaveLength(2)
    expect(model.calls[0]?.context).not.toContain('## Rejected by the CI lint check')
    expect(model.calls[1]?.context.endsWith(`## Rejected by the CI lint check\nFix every error:\n- ${LINT_ERROR}`)).toBe(true)
    expect(vcs.commits[1]?.files['Dockerfile']).toBe('FROM golang:1.23\n')
  })

  it('fails the workflow when both fixes are rejected by the server', async () => {
    const { vcs, model, engine, input } = harness(10, (fake) => ({ linter: fake }))
    vcs.script(FAILED)
    vcs.lintResults.push(
      { valid: false, errors: [LINT_ERROR], warnings: [] },
      { valid: false, errors: [], warnings: [] },
    )
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'), fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const run = engine.heal(await input())

    await expect(run).rejects.toThrow('No usable fix for attempt 1: CI lint: pipeline definition rejected without details')
    expect(vcs.commits).toHaveLength(1)
  })

  it('commits the fix unchecked when the lint endpoint fails', async () => {
    const { vcs, model, engine, input } = harness(10, (fake) => ({ linter: fake }))
    vcs.script(FAILED, SUCCEEDED)
    vcs.lintResults.push(new VcsError('CI lint failed: 503 Service Unavailable', 503))
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    const outcome = await engine.heal(await input())

    expect(outcome.kind).toBe('succeeded')
    expect(model.calls).toHaveLength(1)
  })

  it('offers earlier fixes for the stack to the model', async () => {
    const earlier: FixFeedback = {
      id: 'feedback_go_generic_0123456789abcdef',
      language: 'go',
      framework: 'generic',
      errorClass: 'build_failure',
      fixDescription: 'Built with go build -o app .',
      timestamp: '2024-03-01T00:00:00.000Z',
    }
    const asked: string[] = []
    const { vcs, model, engine, input } = harness(10, () => ({
      feedback: {
        relevant: async (language, framework) => {
          asked.push(`${language}/${framework}`)
          return [earlier]
        },
      },
    }))
    vcs.script(FAILED, SUCCEEDED)
    model.push(fixAnswer(FIXED_PIPELINE, 'FROM golang:1.22\n'))

    await engine.heal(await input())

    expect(asked).toEqual(['go/generic'])
    expect(model.calls[0]?.context).toContain(
      '## Fixes that worked before for this stack\n- build_failure: Built with go build -o app .\n\n## Job log (last part)',
    )
  })
})

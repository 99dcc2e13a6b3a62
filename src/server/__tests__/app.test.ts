/**
 * HTTP surface tests: each request goes through a real listener on an
 * ephemeral port, against an orchestrator built on in-process stand-ins.
 */

import { describe, it, expect, afterEach } from 'vitest'
import type { Server } from 'node:http'
import type { Express } from 'express'
import { createApp } from '../app.js'
import { createOrchestrator } from '../../core/orchestrator-impl.js'
import type { Orchestrator } from '../../core/orchestrator.js'
import { ModelUnavailableError, VcsError } from '../../core/errors.js'
import { createDatabaseService } from '../../persistence/database.js'
import { SqliteTemplateStore } from '../../modules/template-store/sqlite-template-store.js'
import type { SleepFn } from '../../utils/helpers.js'
import { FakeVcs, job } from '../../../test/fixtures/fake-vcs.js'
import { ScriptedModel } from '../../../test/fixtures/scripted-model.js'
import { noSleep, testConfig, untilAborted } from '../../../test/fixtures/test-config.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface TestResponse {
  status: number
  body: unknown
}

async function request(
  app: Express,
  method: string,
  path: string,
  body?: unknown,
  rawBody?: string,
): Promise<TestResponse> {
  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, () => resolve(s))
  })
  try {
    const address = server.address()
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a port')
    const { port } = address
    const payload = rawBody ?? (body !== undefined ? JSON.stringify(body) : undefined)
    const res = await fetch(`http://127.0.0.1:${String(port)}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      ...(payload !== undefined && { body: payload }),
    })
    return { status: res.status, body: await res.json() }
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()))
  }
}

const START_BODY = {
  repositoryUrl: 'group/app',
  credential: 'test-secret',
  branchName: 'pipewright/http-run',
}

let current: Orchestrator | undefined

async function setup(sleep: SleepFn = untilAborted): Promise<{ app: Express; vcs: FakeVcs; orchestrator: Orchestrator }> {
  const vcs = new FakeVcs({ 'go.mod': 'module app\n', 'main.go': 'package main\n' })
  const model = new ScriptedModel([new ModelUnavailableError('model offline')])
  const store = new SqliteTemplateStore(createDatabaseService(':memory:'))
  const orchestrator = await createOrchestrator(testConfig(), { vcs, model, store, sleep })
  current = orchestrator
  return { app: createApp(orchestrator, { version: '0.1.0' }), vcs, orchestrator }
}

afterEach(async () => {
  await current?.shutdown()
  current = undefined
})

// ---------------------------------------------------------------------------
// /health
// ---------------------------------------------------------------------------

describe('GET /health', () => {
  it('reports ok with the version', async () => {
    const { app } = await setup()
    const res = await request(app, 'GET', '/health')
    expect(res).toEqual({ status: 200, body: { status: 'ok', version: '0.1.0' } })
  })
})

// ---------------------------------------------------------------------------
// /api/v1/workflows
// ---------------------------------------------------------------------------

describe('POST /api/v1/workflows', () => {
  it('returns 202 with the committed branch', async () => {
    const { app } = await setup()

    const res = await request(app, 'POST', '/api/v1/workflows', START_BODY)

    expect(res.status).toBe(202)
    expect(res.body).toMatchObject({ branch: 'pipewright/http-run', commitId: 'commit-1' })
  })

  it('returns 400 with the validation issues', async () => {
    const { app } = await setup()

    const res = await request(app, 'POST', '/api/v1/workflows', { repositoryUrl: 'group/app' })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({
      error: {
        code: 'VALIDATION_FAILURE',
        message: 'Invalid workflow request',
        issues: ['credential: Required'],
      },
    })
  })

  it('returns 400 for a body that is not JSON', async () => {
    const { app } = await setup()

    const res = await request(app, 'POST', '/api/v1/workflows', undefined, '{not json')

    expect(res).toEqual({
      status: 400,
      body: { error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' } },
    })
  })

  it('returns 404 when the repository cannot be reached', async () => {
    const { app, vcs } = await setup()
    vcs.missing = true

    const res = await request(app, 'POST', '/api/v1/workflows', START_BODY)

    expect(res.status).toBe(404)
    expect(res.body).toMatchObject({ error: { code: 'NOT_FOUND' } })
  })

  it('returns 502 when the commit fails', async () => {
    const { app, vcs } = await setup()
    vcs.commitError = new VcsError('Forbidden', 403)

    const res = await request(app, 'POST', '/api/v1/workflows', START_BODY)

    expect(res).toEqual({
      status: 502,
      body: { error: { code: 'COMMIT_FAILURE', message: 'Commit to pipewright/http-run failed: Forbidden' } },
    })
  })

  it('returns 503 once the orchestrator is shutting down', async () => {
    const { app, orchestrator } = await setup()
    await orchestrator.shutdown()

    const res = await request(app, 'POST', '/api/v1/workflows', START_BODY)

    expect(res).toEqual({
      status: 503,
      body: { error: { code: 'WORKFLOW_ABORTED', message: 'Orchestrator is shutting down' } },
    })
  })
})

describe('GET /api/v1/workflows/:ref', () => {
  it('returns the final status of a completed workflow', async () => {
    const { app, vcs, orchestrator } = await setup(noSleep)
    vcs.script({ states: ['SUCCEEDED'], jobs: [job('compile', 'compile', 'success')] })
    const { executionRef } = await orchestrator.startWorkflow({ ...START_BODY })
    await orchestrator.waitForWorkflow(executionRef)

    const res = await request(app, 'GET', `/api/v1/workflows/${executionRef}`)

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({
      executionRef,
      state: 'succeeded',
      completed: true,
      message: 'Pipeline succeeded on pipewright/http-run',
    })
  })

  it('returns 404 for an unknown reference', async () => {
    const { app } = await setup()

    const res = await request(app, 'GET', '/api/v1/workflows/wf-unknown')

    expect(res).toEqual({
      status: 404,
      body: { error: { code: 'NOT_FOUND', message: 'Unknown workflow wf-unknown' } },
    })
  })
})

describe('POST /api/v1/workflows/:ref/cancel', () => {
  it('aborts a running workflow', async () => {
    const { app, orchestrator } = await setup()
    const { executionRef } = await orchestrator.startWorkflow({ ...START_BODY })

    const res = await request(app, 'POST', `/api/v1/workflows/${executionRef}/cancel`)
    const status = await orchestrator.waitForWorkflow(executionRef)

    expect(res).toEqual({ status: 202, body: { executionRef, canceled: true } })
    expect(status.state).toBe('aborted')
  })

  it('returns 409 for a completed workflow', async () => {
    const { app, orchestrator } = await setup(noSleep)
    const { executionRef } = await orchestrator.startWorkflow({ ...START_BODY })
    await orchestrator.waitForWorkflow(executionRef)

    const res = await request(app, 'POST', `/api/v1/workflows/${executionRef}/cancel`)

    expect(res).toEqual({
      status: 409,
      body: { error: { code: 'NOT_CANCELABLE', message: `Workflow ${executionRef} is not running` } },
    })
  })

  it('returns 404 for an unknown reference', async () => {
    const { app } = await setup()
    const res = await request(app, 'POST', '/api/v1/workflows/wf-unknown/cancel')
    expect(res.status).toBe(404)
  })
})

// ---------------------------------------------------------------------------
// /api/v1/learn/record
// ---------------------------------------------------------------------------

describe('POST /api/v1/learn/record', () => {
  it('stores the configuration of a passing execution', async () => {
    const { app, vcs, orchestrator } = await setup()
    vcs.script({ states: ['SUCCEEDED'], jobs: [job('compile', 'compile', 'success')] })
    const { executionRef } = await orchestrator.startWorkflow({ ...START_BODY })

    const res = await request(app, 'POST', '/api/v1/learn/record', { branch: 'pipewright/http-run', pipelineId: 1 })

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ status: 'stored', executionRef })
  })

  it('returns 202 while the execution id is unknown', async () => {
    const { app, orchestrator } = await setup()
    const { executionRef } = await orchestrator.startWorkflow({ ...START_BODY })

    const res = await request(app, 'POST', '/api/v1/learn/record', { branch: 'pipewright/http-run' })

    expect(res).toEqual({ status: 202, body: { status: 'pending', executionRef } })
  })

  it('returns 400 without a branch', async () => {
    const { app } = await setup()

    const res = await request(app, 'POST', '/api/v1/learn/record', { pipelineId: '7' })

    expect(res.status).toBe(400)
    expect(res.body).toMatchObject({ error: { issues: ['branch: Required'] } })
  })

  it('returns 404 for a branch no workflow committed', async () => {
    const { app } = await setup()
    const res = await request(app, 'POST', '/api/v1/learn/record', { branch: 'feature/other' })
    expect(res.status).toBe(404)
  })
})

describe('unknown routes', () => {
  it('return a JSON 404', async () => {
    const { app } = await setup()
    const res = await request(app, 'GET', '/api/v1/nothing')
    expect(res).toEqual({ status: 404, body: { error: { code: 'NOT_FOUND', message: 'No route for GET /api/v1/nothing' } } })
  })
})

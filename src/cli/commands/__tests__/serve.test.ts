import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { EventEmitter } from 'node:events'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { startServer, type RunningServer, type ServeOptions } from '../serve.js'
import { ConfigError } from '../../../core/errors.js'
import { createDatabaseService } from '../../../persistence/database.js'
import { SqliteTemplateStore } from '../../../modules/template-store/sqlite-template-store.js'
import { FakeVcs } from '../../../../test/fixtures/fake-vcs.js'
import { ScriptedModel } from '../../../../test/fixtures/scripted-model.js'
import { noSleep } from '../../../../test/fixtures/test-config.js'

let testDir: string
let running: RunningServer | undefined

beforeEach(async () => {
  testDir = join(tmpdir(), `pipewright-serve-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  await mkdir(join(testDir, '.pipewright'), { recursive: true })
})

afterEach(async () => {
  if (running !== undefined) {
    running.dispose()
    if (running.server.listening) await new Promise<void>((resolve) => running?.server.close(() => resolve()))
    await running.orchestrator.shutdown()
    running = undefined
  }
  await rm(testDir, { recursive: true, force: true })
})

function options(overrides: Partial<ServeOptions> = {}): ServeOptions {
  return {
    host: '127.0.0.1',
    port: 0,
    version: '9.9.9',
    projectConfigDir: join(testDir, '.pipewright'),
    globalConfigDir: join(testDir, 'global'),
    env: {},
    orchestratorOptions: {
      vcs: new FakeVcs(),
      model: new ScriptedModel(),
      store: new SqliteTemplateStore(createDatabaseService(':memory:')),
      sleep: noSleep,
    },
    ...overrides,
  }
}

describe('startServer', () => {
  it('serves /health on the bound port', async () => {
    running = await startServer(options({ signals: new EventEmitter(), exit: vi.fn() }))

    const res = await fetch(`http://127.0.0.1:${String(running.port)}/health`)

    expect(running.port).toBeGreaterThan(0)
    expect(await res.json()).toEqual({ status: 'ok', version: '9.9.9' })
  })

  it('closes the listener and the orchestrator on SIGTERM', async () => {
    const signals = new EventEmitter()
    const exit = vi.fn()
    running = await startServer(options({ signals, exit }))
    const shutdown = vi.spyOn(running.orchestrator, 'shutdown')

    signals.emit('SIGTERM')
    await vi.waitFor(() => {
      expect(exit).toHaveBeenCalledWith(0)
    })

    expect(running.server.listening).toBe(false)
    expect(shutdown).toHaveBeenCalledTimes(1)
  })

  it('rejects an invalid configuration', async () => {
    await writeFile(join(testDir, '.pipewright', 'config.yaml'), 'server:\n  port: 70000\n', 'utf-8')

    await expect(startServer(options({ port: undefined }))).rejects.toBeInstanceOf(ConfigError)
  })
})

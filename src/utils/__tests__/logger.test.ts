/**
 * Unit tests for src/utils/logger.ts - pino configuration and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS } from '../masking.js'
import { createLogger, childLogger, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Synchronous in-memory pino logger that writes JSON lines to a buffer */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: PINO_REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {}
  for (const key of Object.keys(vars)) {
    saved[key] = process.env[key]
    const value = vars[key]
    if (value === undefined) delete process.env[key]
    else process.env[key] = value
  }
  try {
    fn()
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('honours an explicit level option', () => {
    const logger = createLogger('selector', { pretty: false, level: 'error' })
    expect(logger.level).toBe('error')
  })

  it('uses LOG_LEVEL to override the default level', () => {
    withEnv({ LOG_LEVEL: 'warn' }, () => {
      expect(createLogger('monitor', { pretty: false }).level).toBe('warn')
    })
  })

  it('uses info level when NODE_ENV is production', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: 'production' }, () => {
      expect(createLogger('commit', { pretty: false }).level).toBe('info')
    })
  })

  it('defaults to warn when neither LOG_LEVEL nor NODE_ENV is set', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: undefined }, () => {
      expect(createLogger('cli', { pretty: false }).level).toBe('warn')
    })
  })
})

describe('childLogger', () => {
  it('returns a distinct logger carrying the bindings', () => {
    const parent = createLogger('orchestrator', { pretty: false, level: 'info' })
    const child = childLogger(parent, { executionRef: 'wf-1' })
    expect(child).not.toBe(parent)
    expect(child.bindings()).toMatchObject({ executionRef: 'wf-1' })
  })
})

describe('redaction', () => {
  it('redacts a top-level credential field', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')
    logger.info({ credential: 'test-secret', repositoryUrl: 'https://vcs.example/group/app' }, 'starting')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed: unknown = JSON.parse(lines[0] ?? '{}')
    expect(parsed).toMatchObject({
      credential: '[Redacted]',
      repositoryUrl: 'https://vcs.example/group/app',
    })
  })

  it('redacts nested apiKey and token fields', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')
    logger.info({ model: { apiKey: 'test-secret' }, vcs: { token: 'test-secret' } }, 'config loaded')

    const raw = getLines().join('')
    expect(raw).not.toContain('test-secret')
  })

  it('redacts the credential of a logged workflow request', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-3')
    logger.info({ request: { repositoryUrl: 'r', credential: 'test-secret' } }, 'request')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(parsed).toMatchObject({ request: { repositoryUrl: 'r', credential: '[Redacted]' } })
  })
})

// Changes module state, so it runs last
describe('setLogLevel', () => {
  it('moves existing and future loggers to the configured level', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: undefined }, () => {
      const before = createLogger('generation', { pretty: false })
      const pinned = createLogger('pinned', { pretty: false, level: 'fatal' })
      setLogLevel('error')
      expect(before.level).toBe('error')
      expect(pinned.level).toBe('fatal')
      expect(createLogger('learning', { pretty: false }).level).toBe('error')
    })
  })

  it('leaves LOG_LEVEL in charge', () => {
    withEnv({ LOG_LEVEL: 'silent' }, () => {
      const instance = createLogger('vcs', { pretty: false })
      setLogLevel('debug')
      expect(instance.level).toBe('silent')
    })
  })
})

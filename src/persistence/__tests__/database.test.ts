/**
 * Unit tests for the database service and migration runner.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import Database from 'better-sqlite3'
import { createDatabaseService } from '../database.js'
import { runMigrations, MIGRATIONS } from '../migrations/index.js'

describe('runMigrations', () => {
  it('applies every migration once and is idempotent', () => {
    const db = new Database(':memory:')
    expect(runMigrations(db)).toBe(MIGRATIONS.length)
    expect(runMigrations(db)).toBe(0)
    db.close()
  })
})

describe('DatabaseService', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir !== undefined) await rm(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('creates the parent directory and opens the file with migrations applied', async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipewright-db-'))
    const service = createDatabaseService(join(dir, 'nested', 'store.db'))
    await service.initialize()
    expect(service.isOpen).toBe(true)

    const tables: unknown[] = service.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'documents'")
      .all()
    expect(tables).toEqual([{ name: 'documents' }])

    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })

  it('throws when the raw handle is used before initialize', () => {
    const service = createDatabaseService(':memory:')
    expect(() => service.db).toThrow(/database is not open/)
  })

  it('keeps one connection across repeated initialize calls', async () => {
    const service = createDatabaseService(':memory:')
    await service.initialize()
    const first = service.db
    await service.initialize()

    expect(service.db).toBe(first)
    await service.shutdown()
    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })
})

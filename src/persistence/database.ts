/**
 * SQLite connection for the local template store.
 *
 * The file (or `:memory:`) is opened on initialize with WAL journaling and
 * the document migrations applied; query modules use the raw handle.
 */

import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

const MEMORY = ':memory:'

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** @throws {Error} before initialize() and after shutdown() */
  readonly db: BetterSqlite3Database
}

export class SqliteDatabase implements DatabaseService {
  private _db: BetterSqlite3Database | null = null

  constructor(private readonly _path: string) {}

  get isOpen(): boolean {
    return this._db !== null
  }

  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error(`SQLite database ${this._path}: database is not open`)
    }
    return this._db
  }

  async initialize(): Promise<void> {
    if (this._db !== null) return
    if (this._path !== MEMORY) {
      await mkdir(dirname(this._path), { recursive: true })
    }

    const db = new BetterSqlite3(this._path)
    // ":memory:" answers "memory"
    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')

    let applied: number
    try {
      applied = runMigrations(db)
    } catch (err) {
      db.close()
      throw err
    }
    this._db = db
    logger.debug({ path: this._path, journalMode, applied }, 'SQLite database opened')
  }

  async shutdown(): Promise<void> {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new SqliteDatabase(databasePath)
}

/**
 * TemplateStore backed by the local SQLite documents table.
 */

import type { DatabaseService } from '../../persistence/database.js'
import { queryDocuments, upsertDocument } from '../../persistence/queries/documents.js'
import { StoreError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { DocumentMetadata, StoreDocument, TemplateStore } from './template-store.js'

const logger = createLogger('template-store:sqlite')

export class SqliteTemplateStore implements TemplateStore {
  readonly backend = 'sqlite'
  private readonly _database: DatabaseService

  constructor(database: DatabaseService) {
    this._database = database
  }

  async initialize(): Promise<void> {
    if (!this._database.isOpen) {
      await this._database.initialize()
    }
  }

  async shutdown(): Promise<void> {
    if (this._database.isOpen) {
      await this._database.shutdown()
    }
  }

  async query(collection: string, filter: DocumentMetadata, limit: number): Promise<StoreDocument[]> {
    try {
      const rows = queryDocuments(this._database.db, collection, filter, limit)
      logger.debug({ collection, filter, count: rows.length }, 'Queried documents')
      return rows.map((row) => ({ id: row.id, content: row.content, metadata: row.metadata }))
    } catch (err) {
      throw new StoreError(`SQLite query on "${collection}" failed: ${errorMessage(err)}`, { collection }, { cause: err })
    }
  }

  async upsert(collection: string, id: string, content: string, metadata: DocumentMetadata): Promise<void> {
    try {
      upsertDocument(this._database.db, { collection, id, content, metadata })
      logger.debug({ collection, id }, 'Upserted document')
    } catch (err) {
      throw new StoreError(`SQLite upsert of "${id}" failed: ${errorMessage(err)}`, { collection, id }, { cause: err })
    }
  }
}

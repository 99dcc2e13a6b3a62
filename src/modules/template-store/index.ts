/**
 * Template store module: backends, document format and factory.
 */

import { isAbsolute, join } from 'node:path'
import type { StoreConfig } from '../config/config-schema.js'
import { createDatabaseService, type DatabaseService } from '../../persistence/database.js'
import { ChromaTemplateStore } from './chroma-template-store.js'
import { SqliteTemplateStore } from './sqlite-template-store.js'
import type { TemplateStore } from './template-store.js'

export type { TemplateStore, StoreDocument, DocumentMetadata, MetadataValue } from './template-store.js'
export { SqliteTemplateStore } from './sqlite-template-store.js'
export { ChromaTemplateStore, buildWhere } from './chroma-template-store.js'
export {
  renderArtifactDocument,
  parseArtifactDocument,
  DEFAULT_FILE_NAMES,
  type ArtifactFileNames,
} from './artifact-document.js'
export { learnedConfigToDocument, documentToLearnedConfig } from './learned-document.js'
export { feedbackToDocument, documentToFeedback, type FeedbackDocumentInput } from './feedback-document.js'
export { storeTemplate, templateId, type ManualTemplateInput, type StoredTemplate } from './templates.js'

export interface CreateTemplateStoreOptions {
  /** Base directory for a relative sqlite_path */
  dataDir: string
  /** Pre-built database service (tests pass an in-memory one) */
  database?: DatabaseService
  fetchImpl?: typeof fetch
}

/** Resolve the SQLite file for a store config */
export function resolveSqlitePath(config: StoreConfig, dataDir: string): string {
  if (config.sqlite_path === ':memory:' || isAbsolute(config.sqlite_path)) return config.sqlite_path
  return join(dataDir, config.sqlite_path)
}

/**
 * Create the configured TemplateStore backend. Call `initialize()` before use.
 */
export function createTemplateStore(config: StoreConfig, options: CreateTemplateStoreOptions): TemplateStore {
  switch (config.backend) {
    case 'chroma':
      return new ChromaTemplateStore({
        baseUrl: config.chroma_url,
        timeoutMs: config.request_timeout_ms,
        fetchImpl: options.fetchImpl,
      })
    case 'sqlite':
      return new SqliteTemplateStore(
        options.database ?? createDatabaseService(resolveSqlitePath(config, options.dataDir)),
      )
  }
}

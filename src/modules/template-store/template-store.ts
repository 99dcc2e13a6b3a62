/**
 * TemplateStore interface - typed access to the document collections that
 * hold pipeline templates and learned configurations.
 *
 * Backends carry no business logic: they filter by metadata equality and
 * upsert by id. Ranking and fallback live in the reference selector.
 */

import type { BaseService } from '../../core/di.js'
import type { DocumentMetadata } from '../../persistence/schemas/documents.js'

export type { DocumentMetadata, MetadataValue } from '../../persistence/schemas/documents.js'

/** A document as returned by a store query */
export interface StoreDocument {
  readonly id: string
  readonly content: string
  readonly metadata: DocumentMetadata
}

export interface TemplateStore extends BaseService {
  /** Short backend identifier for logs ("sqlite", "chroma") */
  readonly backend: string

  /**
   * Return up to `limit` documents of `collection` whose metadata matches
   * every entry of `filter`.
   * @throws {StoreError} when the backend cannot be reached or answers malformed data
   */
  query(collection: string, filter: DocumentMetadata, limit: number): Promise<StoreDocument[]>

  /**
   * Insert or replace the document `id`. Storing identical content twice
   * leaves a single document.
   * @throws {StoreError}
   */
  upsert(collection: string, id: string, content: string, metadata: DocumentMetadata): Promise<void>
}

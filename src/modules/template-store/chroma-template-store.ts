/**
 * TemplateStore backed by a Chroma server over its REST API (v1).
 *
 * Collections are resolved by name with get_or_create and cached by id.
 * Queries use metadata `where` filters only; similarity search is left to
 * the server and never needed for exact language/framework lookups.
 *
 * Default base URL: http://localhost:8000
 */

import { z } from 'zod'
import { StoreError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { DocumentMetadataSchema } from '../../persistence/schemas/documents.js'
import type { DocumentMetadata, StoreDocument, TemplateStore } from './template-store.js'

const logger = createLogger('template-store:chroma')

export const CHROMA_DEFAULT_BASE_URL = 'http://localhost:8000'

export interface ChromaTemplateStoreOptions {
  baseUrl?: string
  timeoutMs: number
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch
}

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

const CollectionResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
})

const GetResponseSchema = z.object({
  ids: z.array(z.string()),
  documents: z.array(z.string().nullable()).nullable().optional(),
  metadatas: z.array(DocumentMetadataSchema.nullable()).nullable().optional(),
})

type ChromaWhere =
  | Record<string, string | number | boolean>
  | { $and: Record<string, string | number | boolean>[] }

/** Chroma rejects multi-key `where` objects; more than one key needs `$and` */
export function buildWhere(filter: DocumentMetadata): ChromaWhere | undefined {
  const entries = Object.entries(filter)
  if (entries.length === 0) return undefined
  if (entries.length === 1) return filter
  return { $and: entries.map(([key, value]) => ({ [key]: value })) }
}

// ---------------------------------------------------------------------------
// ChromaTemplateStore
// ---------------------------------------------------------------------------

export class ChromaTemplateStore implements TemplateStore {
  readonly backend = 'chroma'
  private readonly _baseUrl: string
  private readonly _timeoutMs: number
  private readonly _fetch: typeof fetch
  private readonly _collectionIds = new Map<string, string>()

  constructor(options: ChromaTemplateStoreOptions) {
    this._baseUrl = (options.baseUrl ?? CHROMA_DEFAULT_BASE_URL).replace(/\/+$/, '')
    this._timeoutMs = options.timeoutMs
    this._fetch = options.fetchImpl ?? fetch
  }

  async initialize(): Promise<void> {
    logger.debug({ baseUrl: this._baseUrl }, 'Chroma template store ready')
  }

  async shutdown(): Promise<void> {
    this._collectionIds.clear()
  }

  async query(collection: string, filter: DocumentMetadata, limit: number): Promise<StoreDocument[]> {
    const collectionId = await this._resolveCollection(collection)
    const where = buildWhere(filter)
    const body: Record<string, unknown> = {
      limit,
      include: ['documents', 'metadatas'],
    }
    if (where !== undefined) body['where'] = where

    const raw = await this._post(`/api/v1/collections/${encodeURIComponent(collectionId)}/get`, body)
    const parsed = GetResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw new StoreError(`Chroma returned a malformed get response for "${collection}"`, {
        collection,
        issues: parsed.error.issues,
      })
    }

    const { ids, documents, metadatas } = parsed.data
    const results: StoreDocument[] = []
    ids.forEach((id, index) => {
      const content = documents?.[index]
      if (typeof content !== 'string') return
      results.push({ id, content, metadata: metadatas?.[index] ?? {} })
    })
    logger.debug({ collection, filter, count: results.length }, 'Queried documents')
    return results
  }

  async upsert(collection: string, id: string, content: string, metadata: DocumentMetadata): Promise<void> {
    const collectionId = await this._resolveCollection(collection)
    await this._post(`/api/v1/collections/${encodeURIComponent(collectionId)}/upsert`, {
      ids: [id],
      documents: [content],
      metadatas: [metadata],
    })
    logger.debug({ collection, id }, 'Upserted document')
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _resolveCollection(name: string): Promise<string> {
    const cached = this._collectionIds.get(name)
    if (cached !== undefined) return cached

    const raw = await this._post('/api/v1/collections', { name, get_or_create: true })
    const parsed = CollectionResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw new StoreError(`Chroma returned a malformed collection for "${name}"`, {
        collection: name,
        issues: parsed.error.issues,
      })
    }
    this._collectionIds.set(name, parsed.data.id)
    return parsed.data.id
  }

  private async _post(path: string, body: unknown): Promise<unknown> {
    const url = `${this._baseUrl}${path}`
    let res: Response
    try {
      res = await this._fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this._timeoutMs),
      })
    } catch (err) {
      throw new StoreError(`Chroma connection failed (${this._baseUrl}): ${errorMessage(err)}`, { url }, { cause: err })
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '')
      throw new StoreError(`Chroma returned HTTP ${String(res.status)}: ${text.slice(0, 200)}`, {
        url,
        status: res.status,
      })
    }

    try {
      const data: unknown = await res.json()
      return data
    } catch (err) {
      throw new StoreError(`Chroma returned a non-JSON response (HTTP ${String(res.status)})`, { url }, { cause: err })
    }
  }
}

/**
 * Document query functions for the SQLite persistence layer.
 *
 * Provides idempotent upsert and metadata-filtered reads over the
 * documents table.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  DocumentCountSchema,
  DocumentMetadataSchema,
  DocumentRowSchema,
  METADATA_KEY_PATTERN,
  UpsertDocumentInputSchema,
  type DocumentMetadata,
  type MetadataValue,
  type StoredDocument,
  type UpsertDocumentInput,
} from '../schemas/documents.js'

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toStoredDocument(raw: unknown): StoredDocument {
  const row = DocumentRowSchema.parse(raw)
  const metadata: unknown = JSON.parse(row.metadata)
  return {
    collection: row.collection,
    id: row.id,
    content: row.content,
    metadata: DocumentMetadataSchema.parse(metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

/** SQLite has no boolean type; json_extract yields 1/0 for JSON true/false */
function toSqlValue(value: MetadataValue): string | number {
  if (typeof value === 'boolean') return value ? 1 : 0
  return value
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert a document, or replace content and metadata of the existing
 * (collection, id) row. `created_at` is preserved on update.
 */
export function upsertDocument(db: BetterSqlite3Database, input: UpsertDocumentInput): void {
  const validated = UpsertDocumentInputSchema.parse(input)
  db.prepare(
    `
    INSERT INTO documents (collection, id, content, metadata)
    VALUES (?, ?, ?, ?)
    ON CONFLICT (collection, id) DO UPDATE SET
      content    = excluded.content,
      metadata   = excluded.metadata,
      updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
  `,
  ).run(validated.collection, validated.id, validated.content, JSON.stringify(validated.metadata))
}

/**
 * Return up to `limit` documents of a collection whose metadata equals
 * every entry of `filter`, most recently updated first.
 * @throws {Error} when a filter key is not a plain identifier
 */
export function queryDocuments(
  db: BetterSqlite3Database,
  collection: string,
  filter: DocumentMetadata,
  limit: number,
): StoredDocument[] {
  const clauses: string[] = ['collection = ?']
  const params: (string | number)[] = [collection]

  for (const [key, value] of Object.entries(filter)) {
    if (!METADATA_KEY_PATTERN.test(key)) {
      throw new Error(`Invalid metadata filter key: ${key}`)
    }
    clauses.push('json_extract(metadata, ?) = ?')
    params.push(`$.${key}`, toSqlValue(value))
  }
  params.push(Math.max(0, Math.floor(limit)))

  return db
    .prepare(`SELECT * FROM documents WHERE ${clauses.join(' AND ')} ORDER BY updated_at DESC, id ASC LIMIT ?`)
    .all(...params)
    .map(toStoredDocument)
}

/** Get a single document. Returns undefined if not found. */
export function getDocument(
  db: BetterSqlite3Database,
  collection: string,
  id: string,
): StoredDocument | undefined {
  const row: unknown = db.prepare('SELECT * FROM documents WHERE collection = ? AND id = ?').get(collection, id)
  return row === undefined ? undefined : toStoredDocument(row)
}

/** Number of documents in a collection */
export function countDocuments(db: BetterSqlite3Database, collection: string): number {
  const row: unknown = db.prepare('SELECT COUNT(*) AS count FROM documents WHERE collection = ?').get(collection)
  return DocumentCountSchema.parse(row).count
}

/**
 * Migration 001: Documents table.
 *
 * Single table for every collection (pipeline templates, learned
 * configurations). Metadata is a JSON object queried with json_extract.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const documentsSchemaMigration: Migration = {
  version: 1,
  name: '001-documents-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        collection  TEXT NOT NULL,
        id          TEXT NOT NULL,
        content     TEXT NOT NULL,
        metadata    TEXT NOT NULL DEFAULT '{}',
        created_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        PRIMARY KEY (collection, id)
      );

      CREATE INDEX IF NOT EXISTS idx_documents_collection_updated
        ON documents(collection, updated_at);
    `)
  },
}

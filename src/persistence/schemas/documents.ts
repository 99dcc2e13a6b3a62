/**
 * Zod schemas for the document store persistence layer.
 *
 * A document is a text body plus flat scalar metadata, addressed by
 * (collection, id). Templates and learned configurations are both stored
 * as documents.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

export const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean()])
export type MetadataValue = z.infer<typeof MetadataValueSchema>

export const DocumentMetadataSchema = z.record(z.string(), MetadataValueSchema)
export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>

/** Metadata keys usable in equality filters */
export const METADATA_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export const UpsertDocumentInputSchema = z.object({
  collection: z.string().min(1),
  id: z.string().min(1),
  content: z.string(),
  metadata: DocumentMetadataSchema,
})
export type UpsertDocumentInput = z.infer<typeof UpsertDocumentInputSchema>

/** Row shape as returned by SELECT * FROM documents */
export const DocumentRowSchema = z.object({
  collection: z.string(),
  id: z.string(),
  content: z.string(),
  metadata: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
})
export type DocumentRow = z.infer<typeof DocumentRowSchema>

export const DocumentCountSchema = z.object({ count: z.number().int() })

export interface StoredDocument {
  collection: string
  id: string
  content: string
  metadata: DocumentMetadata
  createdAt: string
  updatedAt: string
}

/**
 * Mapping between fix feedback and stored documents.
 *
 * The body keeps both pipeline versions for inspection; prompts only use
 * the error class and the fix description, which live in metadata.
 */

import { z } from 'zod'
import type { FixFeedback, PipelineArtifact } from '../../core/types.js'
import { renderArtifactDocument, type ArtifactFileNames } from './artifact-document.js'
import type { DocumentMetadata, StoreDocument } from './template-store.js'

const FeedbackMetadataSchema = z.object({
  language: z.string(),
  framework: z.string(),
  error_class: z.string(),
  fix_description: z.string(),
  timestamp: z.string(),
})

export interface FeedbackDocumentInput {
  readonly feedback: FixFeedback
  /** Artifact of the failing execution */
  readonly before: PipelineArtifact
  /** Artifact that passed */
  readonly after: PipelineArtifact
}

export function feedbackToDocument(
  input: FeedbackDocumentInput,
  files?: ArtifactFileNames,
): { content: string; metadata: DocumentMetadata } {
  const { feedback, before, after } = input
  return {
    content: [
      `## ${feedback.errorClass}`,
      feedback.fixDescription,
      '',
      '## Before',
      renderArtifactDocument(before, files),
      '## After',
      renderArtifactDocument(after, files),
    ].join('\n'),
    metadata: {
      language: feedback.language,
      framework: feedback.framework,
      error_class: feedback.errorClass,
      fix_description: feedback.fixDescription,
      timestamp: feedback.timestamp,
      source: 'feedback',
    },
  }
}

/** @returns undefined when the metadata is malformed */
export function documentToFeedback(doc: StoreDocument): FixFeedback | undefined {
  const metadata = FeedbackMetadataSchema.safeParse(doc.metadata)
  if (!metadata.success) return undefined
  return {
    id: doc.id,
    language: metadata.data.language,
    framework: metadata.data.framework,
    errorClass: metadata.data.error_class,
    fixDescription: metadata.data.fix_description,
    timestamp: metadata.data.timestamp,
  }
}

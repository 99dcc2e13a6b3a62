/**
 * Mapping between LearnedConfig values and stored documents.
 *
 * The artifact pair is kept in the document body (markdown layout from
 * artifact-document.ts); ranking fields are kept in scalar metadata so
 * backends can filter on them.
 */

import { z } from 'zod'
import type { LearnedConfig } from '../../core/types.js'
import { parseArtifactDocument, renderArtifactDocument, type ArtifactFileNames } from './artifact-document.js'
import type { DocumentMetadata, StoreDocument } from './template-store.js'

const LearnedMetadataSchema = z.object({
  language: z.string(),
  framework: z.string(),
  pipeline_id: z.union([z.string(), z.number()]).transform(String),
  duration_seconds: z.number().nonnegative(),
  stages_passed: z.number().int().nonnegative(),
  timestamp: z.string(),
})

export function learnedConfigToDocument(
  config: LearnedConfig,
  files?: ArtifactFileNames,
): { content: string; metadata: DocumentMetadata } {
  return {
    content: renderArtifactDocument(config.content, files),
    metadata: {
      language: config.language,
      framework: config.framework,
      pipeline_id: config.pipelineId,
      duration_seconds: config.durationSeconds,
      stages_passed: config.stagesPassedCount,
      timestamp: config.timestamp,
      source: 'learned',
    },
  }
}

/**
 * Decode a stored learned document.
 * @returns the config, or a reason string when the document is unusable
 */
export function documentToLearnedConfig(
  doc: StoreDocument,
  files?: ArtifactFileNames,
): LearnedConfig | string {
  const metadata = LearnedMetadataSchema.safeParse(doc.metadata)
  if (!metadata.success) {
    return `malformed metadata: ${metadata.error.issues.map((i) => i.path.join('.')).join(', ')}`
  }
  const { pipelineDefinition, imageBuildDefinition } = parseArtifactDocument(doc.content, files)
  if (pipelineDefinition === undefined || imageBuildDefinition === undefined) {
    return 'document does not contain both files'
  }
  return {
    id: doc.id,
    language: metadata.data.language,
    framework: metadata.data.framework,
    pipelineId: metadata.data.pipeline_id,
    durationSeconds: metadata.data.duration_seconds,
    stagesPassedCount: metadata.data.stages_passed,
    timestamp: metadata.data.timestamp,
    content: { pipelineDefinition, imageBuildDefinition },
  }
}

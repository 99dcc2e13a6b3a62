/**
 * Manual template registration: store a pipeline and/or image-build file
 * for a (language, framework) pair in the template collection.
 */

import { ValidationFailureError } from '../../core/errors.js'
import type { PartialArtifact } from '../../core/types.js'
import { renderArtifactDocument, type ArtifactFileNames } from './artifact-document.js'
import type { DocumentMetadata, TemplateStore } from './template-store.js'

export interface ManualTemplateInput extends PartialArtifact {
  readonly language: string
  readonly framework: string
  /** Defaults to `<language>_<framework>` */
  readonly id?: string
}

export interface StoredTemplate {
  readonly id: string
  readonly metadata: DocumentMetadata
}

export function templateId(language: string, framework: string): string {
  return `${language.toLowerCase()}_${framework.toLowerCase()}`
}

/**
 * Render and upsert a manual template.
 * @throws {ValidationFailureError} when neither file is supplied
 */
export async function storeTemplate(
  store: TemplateStore,
  collection: string,
  input: ManualTemplateInput,
  files?: ArtifactFileNames,
): Promise<StoredTemplate> {
  const hasPipeline = input.pipelineDefinition !== undefined && input.pipelineDefinition.trim() !== ''
  const hasImageBuild = input.imageBuildDefinition !== undefined && input.imageBuildDefinition.trim() !== ''
  if (!hasPipeline && !hasImageBuild) {
    throw new ValidationFailureError('A template needs a pipeline definition or an image-build definition', [
      'no files supplied',
    ])
  }

  const language = input.language.toLowerCase()
  const framework = input.framework.toLowerCase()
  const id = input.id ?? templateId(language, framework)
  const metadata: DocumentMetadata = {
    language,
    framework,
    has_pipeline: hasPipeline,
    has_image_build: hasImageBuild,
    source: 'manual',
  }
  const content = renderArtifactDocument(
    {
      pipelineDefinition: hasPipeline ? input.pipelineDefinition : undefined,
      imageBuildDefinition: hasImageBuild ? input.imageBuildDefinition : undefined,
    },
    files,
  )
  await store.upsert(collection, id, content, metadata)
  return { id, metadata }
}

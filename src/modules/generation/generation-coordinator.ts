/**
 * GenerationCoordinator interface: decides between reusing, adapting and
 * generating an artifact for a repository profile.
 *
 *   learned / exact template → normalize and return
 *   partial template         → model fills the missing file, present file kept
 *   default                  → model generates from scratch
 *
 * A model failure or an answer that fails validation falls back to the
 * built-in default, so generation always yields a usable artifact. With a
 * linter and a repository, a pipeline the CI server rejects is regenerated
 * once with the lint errors before the default takes its place.
 */

import type { PipelineArtifact, RepositoryProfile } from '../../core/types.js'
import type { SelectionKind } from '../reference-selector/reference-selector.js'
import type { RepositoryRef } from '../vcs/vcs-client.js'

export interface GenerationContext {
  /** Routes the generation:completed event to a workflow */
  executionRef?: string
  additionalContext?: string
  /** Target repository; the CI lint check runs only when it is given */
  repo?: RepositoryRef
  signal?: AbortSignal
}

export interface GenerationResult {
  readonly artifact: PipelineArtifact
  readonly selectionKind: SelectionKind
  /** The built-in default replaced (part of) a failed model answer */
  readonly usedFallback: boolean
  /** Validation problems and remaining CI lint errors of the returned artifact; empty when clean */
  readonly validation: readonly string[]
}

export interface GenerationCoordinator {
  generate(profile: RepositoryProfile, context?: GenerationContext): Promise<GenerationResult>
}

/**
 * ReferenceSelector interface - priority-ordered lookup of a reference
 * artifact for a (language, framework) pair.
 *
 * Tiers, first hit wins:
 *   learned configuration → exact template → partial template → built-in default
 */

import type { LearnedConfig, PartialArtifact, PipelineArtifact } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Selection result
// ---------------------------------------------------------------------------

export interface LearnedSelection {
  readonly kind: 'learned'
  readonly artifact: PipelineArtifact
  readonly config: LearnedConfig
}

export interface ExactTemplateSelection {
  readonly kind: 'exact_template'
  readonly artifact: PipelineArtifact
  readonly templateId: string
}

export interface PartialTemplateSelection {
  readonly kind: 'partial_template'
  readonly partial: PartialArtifact
  readonly templateId: string
  /** The template matched on language only */
  readonly languageOnly: boolean
}

export interface DefaultSelection {
  readonly kind: 'default'
  readonly artifact: PipelineArtifact
}

export type Selection = LearnedSelection | ExactTemplateSelection | PartialTemplateSelection | DefaultSelection

export type SelectionKind = Selection['kind']

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ReferenceSelectorOptions {
  templatesCollection: string
  learnedCollection: string
  /** Learned candidates inspected per lookup (default 10) */
  learnedCandidates?: number
  pipelineFile?: string
  imageBuildFile?: string
  notifyStage?: string
}

// ---------------------------------------------------------------------------
// ReferenceSelector interface
// ---------------------------------------------------------------------------

export interface ReferenceSelector {
  /**
   * Pick the best available reference.
   * @throws {RetrievalMissError} only when every tier failed, with each tier's cause in `context.causes`
   */
  select(language: string, framework: string): Promise<Selection>
}

/**
 * LearningWriter interface: stores a configuration that passed in full
 * so later lookups for the same stack can reuse it.
 */

import type { LearnedConfig, PipelineArtifact, RepositoryProfile } from '../../core/types.js'
import type { RepositoryRef } from '../vcs/vcs-client.js'

export interface LearningInput {
  readonly executionRef?: string
  readonly repo: RepositoryRef
  readonly executionId: string
  readonly profile: RepositoryProfile
  readonly artifact: PipelineArtifact
  readonly durationSeconds: number
}

export type LearningResult =
  | { readonly kind: 'stored'; readonly config: LearnedConfig }
  | { readonly kind: 'skipped'; readonly reason: string; readonly issues: readonly string[] }

export interface LearningWriter {
  /**
   * Re-read the job breakdown, apply the quality gate and upsert.
   * @throws {VcsError} when the job breakdown cannot be fetched
   * @throws {StoreError} when the upsert fails
   */
  record(input: LearningInput): Promise<LearningResult>
}

/**
 * CommitCoordinator interface: writes an artifact pair to version control
 * as a single commit on a fresh branch.
 */

import type { ExecutionHandle, PipelineArtifact, RepositoryProfile, WorkflowRequest } from '../../core/types.js'

export interface CommitOptions {
  /** Healing attempt number; commits to `<baseBranch>-fix-<attempt>` */
  attempt?: number
  /** Branch of the initial commit, required together with `attempt` */
  baseBranch?: string
}

export interface CommitCoordinator {
  /**
   * Create the branch from the default branch and commit the artifact.
   * Returns as soon as the commit exists; the execution is not awaited.
   * @throws {CommitFailureError} on any version-control failure
   */
  commit(
    artifact: PipelineArtifact,
    profile: RepositoryProfile,
    request: WorkflowRequest,
    options?: CommitOptions,
  ): Promise<ExecutionHandle>
}

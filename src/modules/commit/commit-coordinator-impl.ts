/**
 * CommitCoordinator implementation.
 *
 * Branch names:
 *   initial commit   request.branchName, else <prefix>-<yyyyMMdd-HHmmss>-<6 hex>
 *   healing attempt  <initial branch>-fix-<n>
 */

import { CommitFailureError, PipewrightError, errorMessage } from '../../core/errors.js'
import type { ExecutionHandle, PipelineArtifact, RepositoryProfile, WorkflowRequest } from '../../core/types.js'
import { compactTimestamp, randomSuffix } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import { parseRepositoryUrl } from '../vcs/repository-url.js'
import type { CommitAction, VcsClient } from '../vcs/vcs-client.js'
import type { CommitCoordinator, CommitOptions } from './commit-coordinator.js'

const logger = createLogger('commit')

export interface CommitCoordinatorOptions {
  vcs: VcsClient
  /** Host used for bare `group/project` references */
  defaultBaseUrl: string
  branchPrefix: string
  pipelineFile: string
  imageBuildFile: string
  commitMessage: string
  /** Injected for tests */
  now?: () => Date
  suffix?: () => string
}

export function initialBranchName(prefix: string, now: Date, suffix: string): string {
  return `${prefix}-${compactTimestamp(now)}-${suffix}`
}

export function healingBranchName(baseBranch: string, attempt: number): string {
  return `${baseBranch}-fix-${String(attempt)}`
}

export class CommitCoordinatorImpl implements CommitCoordinator {
  private readonly _vcs: VcsClient
  private readonly _options: CommitCoordinatorOptions
  private readonly _now: () => Date
  private readonly _suffix: () => string

  constructor(options: CommitCoordinatorOptions) {
    this._vcs = options.vcs
    this._options = options
    this._now = options.now ?? (() => new Date())
    this._suffix = options.suffix ?? (() => randomSuffix(3))
  }

  async commit(
    artifact: PipelineArtifact,
    profile: RepositoryProfile,
    request: WorkflowRequest,
    options: CommitOptions = {},
  ): Promise<ExecutionHandle> {
    const branch = this._branchFor(request, options)
    const repo = parseRepositoryUrl(request.repositoryUrl, request.credential, this._options.defaultBaseUrl)

    const files: [string, string][] = [[this._options.pipelineFile, artifact.pipelineDefinition]]
    if (request.pipelineOnly !== true) {
      files.push([this._options.imageBuildFile, artifact.imageBuildDefinition])
    }

    try {
      const defaultBranch = await this._vcs.getDefaultBranch(repo)
      await this._vcs.createBranch(repo, branch, defaultBranch)

      const actions: CommitAction[] = []
      for (const [filePath, content] of files) {
        const exists = await this._vcs.fileExists(repo, filePath, branch)
        actions.push({ action: exists ? 'update' : 'create', filePath, content })
      }

      const message =
        options.attempt !== undefined
          ? `${this._options.commitMessage} (fix attempt ${String(options.attempt)})`
          : this._options.commitMessage
      const { commitId } = await this._vcs.commitFiles(repo, { branch, message, actions })

      logger.info(
        {
          projectPath: repo.projectPath,
          branch,
          commitId,
          language: profile.language,
          attempt: options.attempt ?? 0,
          files: actions.map((a) => `${a.action}:${a.filePath}`),
        },
        'Artifact committed',
      )
      return { branch, commitId, startedAt: this._now().toISOString() }
    } catch (err) {
      const reason = maskSecrets(errorMessage(err), [request.credential])
      throw new CommitFailureError(
        `Commit to ${branch} failed: ${reason}`,
        {
          branch,
          projectPath: repo.projectPath,
          ...(err instanceof PipewrightError && { code: err.code }),
        },
        { cause: err },
      )
    }
  }

  private _branchFor(request: WorkflowRequest, options: CommitOptions): string {
    if (options.attempt !== undefined) {
      if (options.baseBranch === undefined) {
        throw new CommitFailureError('A healing commit needs the base branch', { attempt: options.attempt })
      }
      return healingBranchName(options.baseBranch, options.attempt)
    }
    return request.branchName ?? initialBranchName(this._options.branchPrefix, this._now(), this._suffix())
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createCommitCoordinator(options: CommitCoordinatorOptions): CommitCoordinator {
  return new CommitCoordinatorImpl(options)
}

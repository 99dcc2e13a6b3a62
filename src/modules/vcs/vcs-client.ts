/**
 * VcsClient: version-control and CI primitives the orchestrator needs.
 *
 * Executions are never addressed by id up front: a commit yields a
 * `{branch, commitId}` pair and the client resolves the execution that
 * the CI server started for it.
 */

import type { ExecutionState, JobLog, JobState, JobStatus } from '../../core/types.js'

/** A repository on a hosting server, plus the credential used to reach it */
export interface RepositoryRef {
  /** Scheme and host, e.g. https://gitlab.com */
  readonly baseUrl: string
  /** Namespace path, e.g. group/subgroup/project */
  readonly projectPath: string
  readonly credential: string
}

export type CommitActionKind = 'create' | 'update'

export interface CommitAction {
  readonly action: CommitActionKind
  readonly filePath: string
  readonly content: string
}

export interface CommitRequest {
  readonly branch: string
  readonly message: string
  readonly actions: readonly CommitAction[]
}

export interface ExecutionStatus {
  /** Null while the CI server has not created an execution for the commit */
  readonly executionId: string | null
  readonly state: ExecutionState
  readonly webUrl?: string
  /** Wall-clock duration reported by the CI server, once known */
  readonly durationSeconds?: number
}

export interface JobLogOptions {
  /** Job states whose logs are fetched (default: failed only) */
  states?: readonly JobState[]
}

/** Server-side verdict on a pipeline definition */
export interface LintResult {
  readonly valid: boolean
  readonly errors: readonly string[]
  readonly warnings: readonly string[]
}

export interface VcsClient {
  readonly provider: string

  /** @throws {NotFoundError} when the project does not exist or is not visible */
  getDefaultBranch(repo: RepositoryRef): Promise<string>
  /** Root-level file names on `ref` */
  listFiles(repo: RepositoryRef, ref: string): Promise<string[]>
  fileExists(repo: RepositoryRef, filePath: string, ref: string): Promise<boolean>
  createBranch(repo: RepositoryRef, branch: string, ref: string): Promise<void>
  /** One commit with all actions; returns the new commit id */
  commitFiles(repo: RepositoryRef, request: CommitRequest): Promise<{ commitId: string }>
  getExecutionStatus(repo: RepositoryRef, target: { branch: string; commitId: string }): Promise<ExecutionStatus>
  getJobs(repo: RepositoryRef, executionId: string): Promise<JobStatus[]>
  getJobLogs(repo: RepositoryRef, executionId: string, options?: JobLogOptions): Promise<JobLog[]>
  /**
   * Check a pipeline definition against the CI server without running it.
   * @throws {VcsError} when the server cannot lint (unreachable, unauthorized)
   */
  lintPipeline(repo: RepositoryRef, content: string): Promise<LintResult>
}

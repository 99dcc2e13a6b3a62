/**
 * VcsClient over the GitLab REST API (v4).
 *
 * Authenticates with the PRIVATE-TOKEN header. Every request carries its
 * own timeout; error messages never contain the credential.
 */

import { z, type ZodType } from 'zod'
import { NotFoundError, VcsError, errorMessage } from '../../core/errors.js'
import type { ExecutionState, JobLog, JobState, JobStatus } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type {
  CommitRequest,
  ExecutionStatus,
  JobLogOptions,
  LintResult,
  RepositoryRef,
  VcsClient,
} from './vcs-client.js'

const logger = createLogger('vcs:gitlab')

export interface GitLabClientOptions {
  timeoutMs: number
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch
}

const PAGE_SIZE = 100
const MAX_PAGES = 50

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

const ProjectSchema = z.object({
  id: z.number(),
  default_branch: z.string().nullable().optional(),
})

const TreeEntrySchema = z.object({
  name: z.string(),
  type: z.string(),
})

const CommitSchema = z.object({ id: z.string() })

const PipelineSchema = z.object({
  id: z.number(),
  status: z.string(),
  web_url: z.string().optional(),
  created_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
})

const JobSchema = z.object({
  id: z.number(),
  name: z.string(),
  stage: z.string(),
  status: z.string(),
  allow_failure: z.boolean().default(false),
})

type GitLabJob = z.infer<typeof JobSchema>

const LintSchema = z.object({
  valid: z.boolean(),
  errors: z.array(z.string()).default([]),
  warnings: z.array(z.string()).default([]),
})

// ---------------------------------------------------------------------------
// State mapping
// ---------------------------------------------------------------------------

const PIPELINE_STATES: Readonly<Record<string, ExecutionState>> = {
  created: 'QUEUED',
  waiting_for_resource: 'QUEUED',
  preparing: 'QUEUED',
  pending: 'QUEUED',
  scheduled: 'QUEUED',
  manual: 'QUEUED',
  running: 'RUNNING',
  success: 'SUCCEEDED',
  failed: 'FAILED',
  canceled: 'CANCELED',
  canceling: 'CANCELED',
  skipped: 'CANCELED',
}

const JOB_STATES: Readonly<Record<string, JobState>> = {
  created: 'created',
  pending: 'pending',
  waiting_for_resource: 'pending',
  preparing: 'pending',
  scheduled: 'pending',
  running: 'running',
  success: 'success',
  failed: 'failed',
  canceled: 'canceled',
  canceling: 'canceled',
  skipped: 'skipped',
  manual: 'manual',
}

export function mapPipelineStatus(status: string): ExecutionState {
  return PIPELINE_STATES[status] ?? 'RUNNING'
}

export function mapJobStatus(status: string): JobState {
  return JOB_STATES[status] ?? 'pending'
}

function toJobStatus(job: GitLabJob): JobStatus {
  return {
    id: String(job.id),
    name: job.name,
    stage: job.stage,
    state: mapJobStatus(job.status),
    allowFailure: job.allow_failure,
  }
}

function durationBetween(start: string | null | undefined, end: string | null | undefined): number | undefined {
  if (!start || !end) return undefined
  const ms = Date.parse(end) - Date.parse(start)
  return Number.isFinite(ms) && ms >= 0 ? Math.round(ms / 1000) : undefined
}

// ---------------------------------------------------------------------------
// GitLabClient
// ---------------------------------------------------------------------------

interface RequestOptions {
  method?: 'GET' | 'POST' | 'HEAD'
  query?: Record<string, string>
  body?: unknown
}

export class GitLabClient implements VcsClient {
  readonly provider = 'gitlab'
  private readonly _timeoutMs: number
  private readonly _fetch: typeof fetch

  constructor(options: GitLabClientOptions) {
    this._timeoutMs = options.timeoutMs
    this._fetch = options.fetchImpl ?? fetch
  }

  async getDefaultBranch(repo: RepositoryRef): Promise<string> {
    const res = await this._send(repo, '')
    if (res.status === 404) {
      throw new NotFoundError(`Repository not found: ${repo.projectPath}`, { projectPath: repo.projectPath })
    }
    const project = await this._parse(repo, res, ProjectSchema, 'project')
    return project.default_branch ?? 'main'
  }

  async listFiles(repo: RepositoryRef, ref: string): Promise<string[]> {
    const entries = await this._paginate(repo, '/repository/tree', { ref }, TreeEntrySchema)
    return entries.filter((entry) => entry.type === 'blob').map((entry) => entry.name)
  }

  async fileExists(repo: RepositoryRef, filePath: string, ref: string): Promise<boolean> {
    const res = await this._send(repo, `/repository/files/${encodeURIComponent(filePath)}`, {
      method: 'HEAD',
      query: { ref },
    })
    if (res.status === 404) return false
    await this._expectOk(repo, res, `file ${filePath}`)
    return true
  }

  async createBranch(repo: RepositoryRef, branch: string, ref: string): Promise<void> {
    const res = await this._send(repo, '/repository/branches', { method: 'POST', query: { branch, ref } })
    await this._expectOk(repo, res, `branch ${branch}`)
    logger.debug({ projectPath: repo.projectPath, branch, ref }, 'Branch created')
  }

  async commitFiles(repo: RepositoryRef, request: CommitRequest): Promise<{ commitId: string }> {
    const res = await this._send(repo, '/repository/commits', {
      method: 'POST',
      body: {
        branch: request.branch,
        commit_message: request.message,
        actions: request.actions.map((action) => ({
          action: action.action,
          file_path: action.filePath,
          content: action.content,
        })),
      },
    })
    const commit = await this._parse(repo, res, CommitSchema, 'commit')
    logger.debug({ projectPath: repo.projectPath, branch: request.branch, commitId: commit.id }, 'Files committed')
    return { commitId: commit.id }
  }

  async getExecutionStatus(
    repo: RepositoryRef,
    target: { branch: string; commitId: string },
  ): Promise<ExecutionStatus> {
    const res = await this._send(repo, '/pipelines', {
      query: { ref: target.branch, sha: target.commitId, order_by: 'id', sort: 'desc', per_page: '1' },
    })
    const pipelines = await this._parse(repo, res, z.array(PipelineSchema), 'pipelines')
    const latest = pipelines[0]
    if (latest === undefined) {
      return { executionId: null, state: 'QUEUED' }
    }
    const state = mapPipelineStatus(latest.status)
    const durationSeconds = durationBetween(latest.created_at, latest.updated_at)
    return {
      executionId: String(latest.id),
      state,
      ...(latest.web_url !== undefined && { webUrl: latest.web_url }),
      ...(durationSeconds !== undefined && { durationSeconds }),
    }
  }

  async getJobs(repo: RepositoryRef, executionId: string): Promise<JobStatus[]> {
    const jobs = await this._paginate(repo, `/pipelines/${encodeURIComponent(executionId)}/jobs`, {}, JobSchema)
    return jobs.map(toJobStatus)
  }

  async getJobLogs(repo: RepositoryRef, executionId: string, options: JobLogOptions = {}): Promise<JobLog[]> {
    const states = new Set(options.states ?? ['failed'])
    const jobs = (await this.getJobs(repo, executionId)).filter((job) => states.has(job.state))

    const logs: JobLog[] = []
    for (const job of jobs) {
      const res = await this._send(repo, `/jobs/${encodeURIComponent(job.id)}/trace`)
      await this._expectOk(repo, res, `log of job ${job.name}`)
      logs.push({ jobName: job.name, stage: job.stage, state: job.state, logText: await res.text() })
    }
    return logs
  }

  async lintPipeline(repo: RepositoryRef, content: string): Promise<LintResult> {
    const res = await this._send(repo, '/ci/lint', { method: 'POST', body: { content } })
    const lint = await this._parse(repo, res, LintSchema, 'CI lint')
    logger.debug({ projectPath: repo.projectPath, valid: lint.valid, errors: lint.errors.length }, 'Pipeline linted')
    return lint
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _url(repo: RepositoryRef, path: string, query: Record<string, string> = {}): string {
    const url = new URL(`${repo.baseUrl}/api/v4/projects/${encodeURIComponent(repo.projectPath)}${path}`)
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value)
    }
    return url.toString()
  }

  private async _send(repo: RepositoryRef, path: string, options: RequestOptions = {}): Promise<Response> {
    const url = this._url(repo, path, options.query)
    const headers: Record<string, string> = { 'PRIVATE-TOKEN': repo.credential }
    if (options.body !== undefined) headers['Content-Type'] = 'application/json'

    try {
      return await this._fetch(url, {
        method: options.method ?? 'GET',
        headers,
        ...(options.body !== undefined && { body: JSON.stringify(options.body) }),
        signal: AbortSignal.timeout(this._timeoutMs),
      })
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new VcsError(`GitLab request timed out after ${String(this._timeoutMs)}ms`, undefined, { path })
      }
      throw new VcsError(
        `GitLab connection failed (${repo.baseUrl}): ${maskSecrets(errorMessage(err), [repo.credential])}`,
        undefined,
        { path },
        { cause: err },
      )
    }
  }

  private async _expectOk(repo: RepositoryRef, res: Response, what: string): Promise<void> {
    if (res.ok) return
    const text = await res.text().catch(() => '')
    throw new VcsError(
      `GitLab returned HTTP ${String(res.status)} for ${what}: ${maskSecrets(text.slice(0, 200), [repo.credential])}`,
      res.status,
      { projectPath: repo.projectPath },
    )
  }

  private async _parse<T>(repo: RepositoryRef, res: Response, schema: ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    await this._expectOk(repo, res, what)
    let data: unknown
    try {
      data = await res.json()
    } catch (err) {
      throw new VcsError(`GitLab returned a non-JSON ${what} response`, res.status, {}, { cause: err })
    }
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new VcsError(`GitLab returned a malformed ${what} response`, res.status, {
        issues: parsed.error.issues,
      })
    }
    return parsed.data
  }

  private async _paginate<T>(
    repo: RepositoryRef,
    path: string,
    query: Record<string, string>,
    schema: ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const items: T[] = []
    let page = '1'
    for (let count = 0; count < MAX_PAGES; count++) {
      const res = await this._send(repo, path, { query: { ...query, per_page: String(PAGE_SIZE), page } })
      items.push(...(await this._parse(repo, res, z.array(schema), path)))
      const next = res.headers.get('x-next-page')
      if (next === null || next === '') break
      page = next
    }
    return items
  }
}

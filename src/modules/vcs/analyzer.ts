/**
 * Repository analyzer: marker-file detection over the root file listing.
 *
 * No source file is ever read. The language, framework and package
 * manager come from ordered marker tables in marker-files.json; the first
 * matching row wins.
 */

import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { NotFoundError, VcsError, errorMessage } from '../../core/errors.js'
import type { RepositoryProfile } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { parseRepositoryUrl } from './repository-url.js'
import type { VcsClient } from './vcs-client.js'

const logger = createLogger('analyzer')

// ---------------------------------------------------------------------------
// Marker tables
// ---------------------------------------------------------------------------

const MatchSchema = z.object({
  files: z.array(z.string()).default([]),
  extensions: z.array(z.string()).default([]),
})

const MarkerTablesSchema = z.object({
  languages: z.array(MatchSchema.extend({ language: z.string() })),
  frameworks: z.array(MatchSchema.extend({ framework: z.string(), language: z.string().optional() })),
  packageManagers: z.array(MatchSchema.extend({ packageManager: z.string() })),
})

type MarkerMatch = z.infer<typeof MatchSchema>
export type MarkerTables = z.infer<typeof MarkerTablesSchema>

function loadMarkerTables(): MarkerTables {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, 'marker-files.json'), 'utf-8'))
  return MarkerTablesSchema.parse(raw)
}

export const MARKER_TABLES: MarkerTables = loadMarkerTables()

export const UNKNOWN_LANGUAGE = 'unknown'
export const GENERIC_FRAMEWORK = 'generic'
export const UNKNOWN_PACKAGE_MANAGER = 'unknown'

function matches(marker: MarkerMatch, files: ReadonlySet<string>): boolean {
  if (marker.files.some((file) => files.has(file))) return true
  return marker.extensions.length > 0 && [...files].some((file) => marker.extensions.some((ext) => file.endsWith(ext)))
}

export function detectLanguage(fileNames: readonly string[], tables: MarkerTables = MARKER_TABLES): string {
  const files = new Set(fileNames)
  return tables.languages.find((row) => matches(row, files))?.language ?? UNKNOWN_LANGUAGE
}

export function detectFramework(
  fileNames: readonly string[],
  language: string,
  tables: MarkerTables = MARKER_TABLES,
): string {
  const files = new Set(fileNames)
  const row = tables.frameworks.find(
    (candidate) => (candidate.language === undefined || candidate.language === language) && matches(candidate, files),
  )
  return row?.framework ?? GENERIC_FRAMEWORK
}

export function detectPackageManager(fileNames: readonly string[], tables: MarkerTables = MARKER_TABLES): string {
  const files = new Set(fileNames)
  return tables.packageManagers.find((row) => matches(row, files))?.packageManager ?? UNKNOWN_PACKAGE_MANAGER
}

// ---------------------------------------------------------------------------
// RepositoryAnalyzer
// ---------------------------------------------------------------------------

export interface RepositoryAnalyzer {
  /** @throws {NotFoundError} when the repository cannot be reached */
  analyze(repositoryUrl: string, credential: string): Promise<RepositoryProfile>
}

export interface MarkerFileAnalyzerOptions {
  /** Host used for bare `group/project` references */
  defaultBaseUrl: string
  pipelineFile: string
  imageBuildFile: string
}

export class MarkerFileAnalyzer implements RepositoryAnalyzer {
  private readonly _vcs: VcsClient
  private readonly _options: MarkerFileAnalyzerOptions

  constructor(vcs: VcsClient, options: MarkerFileAnalyzerOptions) {
    this._vcs = vcs
    this._options = options
  }

  async analyze(repositoryUrl: string, credential: string): Promise<RepositoryProfile> {
    const repo = parseRepositoryUrl(repositoryUrl, credential, this._options.defaultBaseUrl)

    let files: string[]
    try {
      const defaultBranch = await this._vcs.getDefaultBranch(repo)
      files = await this._vcs.listFiles(repo, defaultBranch)
    } catch (err) {
      if (err instanceof NotFoundError) throw err
      if (err instanceof VcsError) {
        throw new NotFoundError(
          `Repository ${repo.projectPath} could not be reached: ${errorMessage(err)}`,
          { projectPath: repo.projectPath, status: err.status },
          { cause: err },
        )
      }
      throw err
    }

    const language = detectLanguage(files)
    const profile: RepositoryProfile = {
      language,
      framework: detectFramework(files, language),
      packageManager: detectPackageManager(files),
      hasExistingPipelineFiles: files.includes(this._options.pipelineFile) || files.includes(this._options.imageBuildFile),
      files,
    }
    logger.info(
      {
        projectPath: repo.projectPath,
        language: profile.language,
        framework: profile.framework,
        packageManager: profile.packageManager,
      },
      'Repository analyzed',
    )
    return profile
  }
}

export function createRepositoryAnalyzer(vcs: VcsClient, options: MarkerFileAnalyzerOptions): RepositoryAnalyzer {
  return new MarkerFileAnalyzer(vcs, options)
}

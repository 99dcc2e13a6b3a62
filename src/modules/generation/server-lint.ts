/**
 * Pre-commit check of a pipeline definition by the CI server.
 */

import { VcsError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { LintResult, RepositoryRef } from '../vcs/vcs-client.js'

const logger = createLogger('lint')

export interface PipelineLinter {
  lintPipeline(repo: RepositoryRef, content: string): Promise<LintResult>
}

/**
 * @returns the server's lint errors; empty when the definition passed or
 *   when the server could not lint it, in which case the commit goes ahead
 */
export async function serverLintErrors(
  linter: PipelineLinter,
  repo: RepositoryRef,
  pipelineDefinition: string,
): Promise<string[]> {
  let result: LintResult
  try {
    result = await linter.lintPipeline(repo, pipelineDefinition)
  } catch (err) {
    if (!(err instanceof VcsError)) throw err
    logger.warn({ projectPath: repo.projectPath, err: err.message }, 'CI lint unavailable; committing unchecked')
    return []
  }
  if (result.valid) return []
  return result.errors.length > 0 ? [...result.errors] : ['pipeline definition rejected without details']
}

/**
 * Repository URL parsing.
 *
 * Accepted forms:
 *   https://gitlab.example.com/group/project(.git)
 *   http://localhost:8929/group/sub/project
 *   git@gitlab.example.com:group/project.git
 *   group/project            (resolved against the configured base URL)
 */

import { ValidationFailureError } from '../../core/errors.js'
import type { RepositoryRef } from './vcs-client.js'

const HTTP_URL = /^(https?):\/\/([^/]+)\/(.+)$/
const SSH_URL = /^git@([^:]+):(.+)$/
const BARE_PATH = /^[\w.-]+(?:\/[\w.-]+)+$/

function cleanPath(path: string): string {
  return path.replace(/\/+$/, '').replace(/\.git$/, '')
}

export function parseRepositoryUrl(url: string, credential: string, defaultBaseUrl: string): RepositoryRef {
  const trimmed = url.trim()

  const http = HTTP_URL.exec(trimmed)
  if (http?.[1] !== undefined && http[2] !== undefined && http[3] !== undefined) {
    return { baseUrl: `${http[1]}://${http[2]}`, projectPath: cleanPath(http[3]), credential }
  }

  const ssh = SSH_URL.exec(trimmed)
  if (ssh?.[1] !== undefined && ssh[2] !== undefined) {
    return { baseUrl: `https://${ssh[1]}`, projectPath: cleanPath(ssh[2]), credential }
  }

  if (BARE_PATH.test(trimmed)) {
    return { baseUrl: defaultBaseUrl.replace(/\/+$/, ''), projectPath: cleanPath(trimmed), credential }
  }

  throw new ValidationFailureError(`Invalid repository URL: ${trimmed}`, ['unrecognised repository URL form'])
}

/** The repository's web URL, without credentials */
export function repositoryWebUrl(repo: RepositoryRef): string {
  return `${repo.baseUrl}/${repo.projectPath}`
}

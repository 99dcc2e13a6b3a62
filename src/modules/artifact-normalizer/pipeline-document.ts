/**
 * Structural view of a pipeline definition (GitLab CI YAML).
 */

import { ValidationFailureError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { loadYaml } from '../../utils/yaml.js'

/** Top-level keys that are not jobs */
export const RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  'stages',
  'variables',
  'default',
  'include',
  'workflow',
  'image',
  'services',
  'cache',
  'before_script',
  'after_script',
  'types',
])

/** Stage a job runs in when it declares none */
export const IMPLICIT_STAGE = 'test'

export interface PipelineDocument {
  readonly doc: Record<string, unknown>
  readonly stages: readonly string[]
}

export interface JobEntry {
  readonly name: string
  readonly job: Record<string, unknown>
  readonly stage: string
}

/**
 * Parse a pipeline definition into a mapping with a string `stages` list.
 * @throws {ValidationFailureError} for invalid YAML, a non-mapping document, or a missing `stages` list
 */
export function parsePipelineDocument(text: string): PipelineDocument {
  const parsed = loadYaml(text)
  if (parsed instanceof Error) {
    throw new ValidationFailureError('Pipeline definition is not valid YAML', [parsed.message])
  }
  if (!isPlainObject(parsed)) {
    throw new ValidationFailureError('Pipeline definition is not a YAML mapping', ['document is not a mapping'])
  }
  const stages = parsed['stages']
  if (!Array.isArray(stages) || !stages.every((s): s is string => typeof s === 'string')) {
    throw new ValidationFailureError('Pipeline definition has no stages list', ['stages must be a list of names'])
  }
  return { doc: parsed, stages }
}

/** Jobs of a pipeline: non-reserved, non-hidden keys whose value is a mapping */
export function listJobs(doc: Record<string, unknown>): JobEntry[] {
  const jobs: JobEntry[] = []
  for (const [name, value] of Object.entries(doc)) {
    if (RESERVED_KEYWORDS.has(name) || name.startsWith('.') || !isPlainObject(value)) continue
    const stage = value['stage']
    jobs.push({ name, job: value, stage: typeof stage === 'string' ? stage : IMPLICIT_STAGE })
  }
  return jobs
}

/** Script lines of a job (`script` may be a string or a list) */
export function jobScript(job: Record<string, unknown>): string[] {
  const script = job['script']
  if (typeof script === 'string') return [script]
  if (Array.isArray(script)) return script.filter((line): line is string => typeof line === 'string')
  return []
}

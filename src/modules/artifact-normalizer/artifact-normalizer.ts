/**
 * Artifact normalizer: pure structural fixups applied to every artifact
 * before it is committed:
 *
 *  - the learning stage exists, directly after the notification stage
 *    (appended when there is none)
 *  - the learning job exists, runs in the learning stage and calls the
 *    callback variable; a job that does not is replaced
 *  - the callback variable is declared in `variables`
 *
 * A definition that already satisfies all of this is returned unchanged,
 * byte for byte. Otherwise the YAML is re-emitted, so normalizing twice
 * equals normalizing once.
 */

import type { PipelineArtifact } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import { dumpYaml } from '../../utils/yaml.js'
import { jobScript, parsePipelineDocument } from './pipeline-document.js'

export interface NormalizerOptions {
  readonly learningStage: string
  readonly notifyStage: string
  readonly learningJob: string
  readonly callbackVariable: string
  /** Value given to the callback variable when it has to be declared */
  readonly callbackUrl: string
}

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  learningStage: 'learn',
  notifyStage: 'notify',
  learningJob: 'learn_record',
  callbackVariable: 'PIPEWRIGHT_CALLBACK_URL',
  callbackUrl: 'http://localhost:3000/api/v1/learn/record',
}

const LEARNING_JOB_IMAGE = 'curlimages/curl:8.8.0'

function referencesVariable(line: string, variable: string): boolean {
  return line.includes(`$${variable}`) || line.includes(`\${${variable}}`)
}

/** The learning job: posts the branch and pipeline id to the callback URL */
export function buildLearningJob(options: NormalizerOptions): Record<string, unknown> {
  const payload =
    '{\\"branch\\":\\"$CI_COMMIT_REF_NAME\\",\\"pipelineId\\":\\"$CI_PIPELINE_ID\\",\\"projectUrl\\":\\"$CI_PROJECT_URL\\"}'
  return {
    stage: options.learningStage,
    image: LEARNING_JOB_IMAGE,
    script: [
      `curl -sf -X POST "$${options.callbackVariable}" -H "Content-Type: application/json" -d "${payload}" || echo "learning callback skipped"`,
    ],
    when: 'on_success',
    allow_failure: true,
  }
}

function isCompliantLearningJob(job: unknown, options: NormalizerOptions): boolean {
  if (!isPlainObject(job)) return false
  if (job['stage'] !== options.learningStage) return false
  return jobScript(job).some((line) => referencesVariable(line, options.callbackVariable))
}

function withLearningStage(stages: readonly string[], options: NormalizerOptions): string[] {
  if (stages.includes(options.learningStage)) return [...stages]
  const notifyIndex = stages.indexOf(options.notifyStage)
  if (notifyIndex === -1) return [...stages, options.learningStage]
  return [...stages.slice(0, notifyIndex + 1), options.learningStage, ...stages.slice(notifyIndex + 1)]
}

/**
 * Normalize a pipeline definition.
 * @throws {ValidationFailureError} when the definition is not a YAML mapping with a `stages` list
 */
export function normalizePipelineDefinition(
  pipelineDefinition: string,
  overrides: Partial<NormalizerOptions> = {},
): string {
  const options: NormalizerOptions = { ...DEFAULT_NORMALIZER_OPTIONS, ...overrides }
  const { doc, stages } = parsePipelineDocument(pipelineDefinition)

  const variables = doc['variables']
  const hasStage = stages.includes(options.learningStage)
  const hasVariable = isPlainObject(variables) && options.callbackVariable in variables
  const hasJob = isCompliantLearningJob(doc[options.learningJob], options)

  if (hasStage && hasVariable && hasJob) {
    return pipelineDefinition
  }

  const nextVariables: Record<string, unknown> = isPlainObject(variables) ? { ...variables } : {}
  if (!hasVariable) nextVariables[options.callbackVariable] = options.callbackUrl

  // Rebuild in key order: `variables` directly after `stages` when it was absent
  const next: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(doc)) {
    if (key === 'stages') {
      next[key] = withLearningStage(stages, options)
      if (!('variables' in doc)) next['variables'] = nextVariables
    } else if (key === 'variables') {
      next[key] = nextVariables
    } else if (key === options.learningJob) {
      next[key] = hasJob ? value : buildLearningJob(options)
    } else {
      next[key] = value
    }
  }
  if (!(options.learningJob in next)) {
    next[options.learningJob] = buildLearningJob(options)
  }

  return dumpYaml(next)
}

/** Normalize an artifact; the image-build definition and provenance are untouched */
export function normalizeArtifact(
  artifact: PipelineArtifact,
  overrides: Partial<NormalizerOptions> = {},
): PipelineArtifact {
  const pipelineDefinition = normalizePipelineDefinition(artifact.pipelineDefinition, overrides)
  if (pipelineDefinition === artifact.pipelineDefinition) return artifact
  return { ...artifact, pipelineDefinition }
}

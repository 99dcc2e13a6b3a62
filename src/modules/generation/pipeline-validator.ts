/**
 * Structural validation of generated artifacts.
 *
 * Checks only what a model is known to get wrong: the pipeline must be a
 * YAML mapping with a non-empty stage list and at least one job, every job
 * must run in a declared stage, and the image-build file needs a FROM line.
 * Nothing here talks to a CI server.
 */

import { ValidationFailureError } from '../../core/errors.js'
import { listJobs, parsePipelineDocument, type PipelineDocument } from '../artifact-normalizer/pipeline-document.js'

const FROM_INSTRUCTION = /^\s*FROM\s+\S+/im

export function validatePipelineDefinition(pipelineDefinition: string): string[] {
  let parsed: PipelineDocument
  try {
    parsed = parsePipelineDocument(pipelineDefinition)
  } catch (err) {
    if (err instanceof ValidationFailureError) {
      return [err.message, ...err.issues]
    }
    throw err
  }

  const issues: string[] = []
  if (parsed.stages.length === 0) {
    issues.push('stages must not be empty')
  }
  const jobs = listJobs(parsed.doc)
  if (jobs.length === 0) {
    issues.push('pipeline defines no jobs')
  }
  const declared = new Set(parsed.stages)
  for (const job of jobs) {
    if (!declared.has(job.stage)) {
      issues.push(`job "${job.name}" uses undeclared stage "${job.stage}"`)
    }
  }
  return issues
}

export function validateImageBuildDefinition(imageBuildDefinition: string): string[] {
  return FROM_INSTRUCTION.test(imageBuildDefinition) ? [] : ['image-build definition has no FROM instruction']
}

/** @returns the list of problems; empty when the artifact is usable */
export function validateArtifact(artifact: {
  readonly pipelineDefinition: string
  readonly imageBuildDefinition: string
}): string[] {
  return [
    ...validatePipelineDefinition(artifact.pipelineDefinition),
    ...validateImageBuildDefinition(artifact.imageBuildDefinition),
  ]
}

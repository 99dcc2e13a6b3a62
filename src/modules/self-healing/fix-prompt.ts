/**
 * Prompt and answer format for repairing a failed pipeline.
 *
 * The model returns both files in full between fixed markers:
 *
 *   ---EXPLANATION---
 *   <what was wrong>
 *   ---DOCKERFILE---
 *   <image-build definition>
 *   ---GITLAB_CI---
 *   <pipeline definition>
 *   ---END---
 *
 * Answers that ignore the markers are read as fenced blocks instead.
 */

import type { FixFeedback, JobLog, PipelineArtifact, RepositoryProfile } from '../../core/types.js'
import { feedbackSection, lintErrorSection } from '../generation/prompts.js'
import { parseArtifactDocument, type ArtifactFileNames } from '../template-store/artifact-document.js'
import type { Classification } from './error-classifier.js'

export function fixSystemPrompt(files: ArtifactFileNames, notifyStage: string): string {
  return [
    'You repair failing GitLab CI/CD pipelines.',
    '',
    'Rules:',
    '1. Fix the root-cause job, not notification or other downstream jobs.',
    `2. Keep the stage sequence and the ${notifyStage} jobs of the current pipeline.`,
    '3. Build tools and base images must match the project language.',
    `4. ${files.imageBuildFile} starts with a FROM instruction.`,
    '5. Return complete files, not just the changes.',
    '',
    'Answer in exactly this format:',
    '',
    '---EXPLANATION---',
    '<one or two sentences: what was wrong and what you changed>',
    '---DOCKERFILE---',
    `<complete ${files.imageBuildFile}>`,
    '---GITLAB_CI---',
    `<complete ${files.pipelineFile}>`,
    '---END---',
  ].join('\n')
}

export interface FixContextInput {
  readonly artifact: PipelineArtifact
  readonly profile: RepositoryProfile
  readonly failedJob: JobLog | undefined
  readonly classification: Classification
  readonly files: ArtifactFileNames
  readonly logTailChars: number
  readonly feedback?: readonly FixFeedback[]
  /** CI lint errors of the previous answer for this attempt */
  readonly lintErrors?: readonly string[]
}

const MAX_LISTED_FILES = 20

export function logTail(text: string, chars: number): string {
  return text.length > chars ? text.slice(-chars) : text
}

export function buildFixContext(input: FixContextInput): string {
  const { artifact, profile, failedJob, classification, files } = input
  const lines: string[] = [
    '## Failure',
    `- Failed job: ${failedJob?.jobName ?? '(none reported)'}`,
    `- Stage: ${failedJob?.stage ?? '(unknown)'}`,
    `- Error class: ${classification.errorClass}`,
    `- Language: ${profile.language}`,
    `- Framework: ${profile.framework}`,
    `- Files: ${profile.files.slice(0, MAX_LISTED_FILES).join(', ') || '(none detected)'}`,
  ]
  if (classification.evidence.length > 0) {
    lines.push('', '## Matching lines', ...classification.evidence.map((line) => `- ${line}`))
  }
  lines.push(...feedbackSection(input.feedback ?? []))
  lines.push(
    '',
    '## Job log (last part)',
    '```',
    logTail(failedJob?.logText ?? '', input.logTailChars).replace(/\s+$/, ''),
    '```',
    '',
    `## Current ${files.imageBuildFile}`,
    '```dockerfile',
    artifact.imageBuildDefinition.replace(/\s+$/, ''),
    '```',
    '',
    `## Current ${files.pipelineFile}`,
    '```yaml',
    artifact.pipelineDefinition.replace(/\s+$/, ''),
    '```',
    ...lintErrorSection(input.lintErrors ?? []),
  )
  return lines.join('\n')
}

export interface FixAnswer {
  readonly explanation: string
  readonly pipelineDefinition?: string
  readonly imageBuildDefinition?: string
}

function between(text: string, start: string, end: string): string | undefined {
  const match = new RegExp(`${start}\\s*([\\s\\S]*?)\\s*${end}`).exec(text)
  return match?.[1]
}

function stripFence(text: string): string {
  return text.replace(/^```[\w-]*\s*/, '').replace(/\s*```$/, '')
}

function definition(text: string | undefined): string | undefined {
  if (text === undefined) return undefined
  const body = stripFence(text.trim()).trim()
  return body === '' ? undefined : `${body}\n`
}

export function parseFixResponse(text: string, files: ArtifactFileNames): FixAnswer {
  const explanation = between(text, '---EXPLANATION---', '---DOCKERFILE---')?.trim() ?? ''
  const imageBuildDefinition = definition(between(text, '---DOCKERFILE---', '---GITLAB_CI---'))
  const pipelineDefinition = definition(between(text, '---GITLAB_CI---', '---END---'))

  if (pipelineDefinition === undefined && imageBuildDefinition === undefined) {
    const fenced = parseArtifactDocument(text, files)
    return { explanation, ...fenced }
  }
  return {
    explanation,
    ...(pipelineDefinition !== undefined && { pipelineDefinition }),
    ...(imageBuildDefinition !== undefined && { imageBuildDefinition }),
  }
}

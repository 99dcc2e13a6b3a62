/**
 * Prompts for generating an artifact pair.
 *
 * The system prompt fixes the stage sequence and the answer layout; the
 * context block carries the repository profile and, for partial templates,
 * the file that is already known.
 */

import type { FixFeedback, PartialArtifact, RepositoryProfile } from '../../core/types.js'
import type { ArtifactFileNames } from '../template-store/artifact-document.js'

export function generationSystemPrompt(files: ArtifactFileNames, notifyStage: string): string {
  return [
    'You write GitLab CI/CD pipelines and container image definitions.',
    '',
    'Rules:',
    `1. Use exactly these stages, in this order: compile, test, build_image, ${notifyStage}.`,
    '2. Every job names its stage; every stage a job uses is declared under `stages`.',
    '3. compile builds the project and keeps the build output as artifacts.',
    `4. build_image builds and pushes the image with kaniko from ${files.imageBuildFile}.`,
    `5. The ${notifyStage} stage has notify_success (when: on_success) and notify_failure (when: on_failure).`,
    `6. ${files.imageBuildFile} starts with a FROM instruction and runs the built application.`,
    '7. Do not add a learning stage or learning job; they are added afterwards.',
    '',
    'Answer with exactly two sections and nothing else:',
    '',
    `### ${files.pipelineFile}`,
    '```yaml',
    '<complete pipeline definition>',
    '```',
    '',
    `### ${files.imageBuildFile}`,
    '```dockerfile',
    '<complete image-build definition>',
    '```',
  ].join('\n')
}

export interface GenerationPromptInput {
  readonly profile: RepositoryProfile
  readonly files: ArtifactFileNames
  /** A partial template to adapt; absent when generating from scratch */
  readonly reference?: PartialArtifact
  readonly additionalContext?: string
  /** Fixes that made earlier pipelines for this stack pass */
  readonly feedback?: readonly FixFeedback[]
  /** CI lint errors of a rejected previous answer */
  readonly lintErrors?: readonly string[]
}

const MAX_LISTED_FILES = 15

/** Prompt lines listing earlier successful fixes; empty without feedback */
export function feedbackSection(feedback: readonly FixFeedback[]): string[] {
  if (feedback.length === 0) return []
  return [
    '',
    '## Fixes that worked before for this stack',
    ...feedback.map((entry) => `- ${entry.errorClass}: ${entry.fixDescription}`),
  ]
}

/** Prompt lines quoting the CI server's lint errors; empty without errors */
export function lintErrorSection(errors: readonly string[]): string[] {
  if (errors.length === 0) return []
  return ['', '## Rejected by the CI lint check', 'Fix every error:', ...errors.map((error) => `- ${error}`)]
}

export function buildGenerationContext(input: GenerationPromptInput): string {
  const { profile, files, reference } = input
  const lines: string[] = [
    `Generate ${files.pipelineFile} and ${files.imageBuildFile} for a ${profile.language} ${profile.framework} project.`,
    '',
    '## Project',
    `- Language: ${profile.language}`,
    `- Framework: ${profile.framework}`,
    `- Package manager: ${profile.packageManager}`,
    `- Files: ${profile.files.slice(0, MAX_LISTED_FILES).join(', ') || '(none detected)'}`,
  ]

  if (reference?.pipelineDefinition !== undefined) {
    lines.push(
      '',
      `## Reference ${files.pipelineFile}`,
      'Keep its structure; change only what the project needs.',
      '```yaml',
      reference.pipelineDefinition.trimEnd(),
      '```',
    )
  }
  if (reference?.imageBuildDefinition !== undefined) {
    lines.push(
      '',
      `## Reference ${files.imageBuildFile}`,
      'Keep its structure; change only what the project needs.',
      '```dockerfile',
      reference.imageBuildDefinition.trimEnd(),
      '```',
    )
  }
  lines.push(...feedbackSection(input.feedback ?? []), ...lintErrorSection(input.lintErrors ?? []))
  if (input.additionalContext !== undefined && input.additionalContext.trim() !== '') {
    lines.push('', '## Additional context', input.additionalContext.trim())
  }
  return lines.join('\n')
}

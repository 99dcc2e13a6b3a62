/**
 * Markdown document format for stored artifacts.
 *
 * A document holds up to two sections, each a `### <file name>` heading
 * followed by a fenced block:
 *
 *   ### .gitlab-ci.yml
 *   ```yaml
 *   stages: [...]
 *   ```
 *
 *   ### Dockerfile
 *   ```dockerfile
 *   FROM ...
 *   ```
 *
 * Parsed definitions always end with a single newline.
 */

import type { PartialArtifact } from '../../core/types.js'

export interface ArtifactFileNames {
  readonly pipelineFile: string
  readonly imageBuildFile: string
}

export const DEFAULT_FILE_NAMES: ArtifactFileNames = {
  pipelineFile: '.gitlab-ci.yml',
  imageBuildFile: 'Dockerfile',
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function withTrailingNewline(text: string): string {
  return `${text.replace(/\s+$/, '')}\n`
}

function section(fileName: string, fence: string, body: string): string {
  return `### ${fileName}\n\`\`\`${fence}\n${body.replace(/\s+$/, '')}\n\`\`\`\n`
}

/** Render whichever halves are present into a document */
export function renderArtifactDocument(
  artifact: PartialArtifact,
  files: ArtifactFileNames = DEFAULT_FILE_NAMES,
): string {
  const parts: string[] = []
  if (artifact.pipelineDefinition !== undefined) {
    parts.push(section(files.pipelineFile, 'yaml', artifact.pipelineDefinition))
  }
  if (artifact.imageBuildDefinition !== undefined) {
    parts.push(section(files.imageBuildFile, 'dockerfile', artifact.imageBuildDefinition))
  }
  return parts.join('\n')
}

function extractSection(content: string, fileName: string): string | undefined {
  const heading = new RegExp(`^#{2,4}\\s*${escapeRegExp(fileName)}\\s*$\\n+\`\`\`[\\w-]*\\n([\\s\\S]*?)\\n?\`\`\``, 'm')
  const match = heading.exec(content)
  return match?.[1]
}

function extractFence(content: string, languages: readonly string[]): string | undefined {
  const fence = new RegExp(`\`\`\`(?:${languages.join('|')})\\n([\\s\\S]*?)\\n?\`\`\``, 'i')
  return fence.exec(content)?.[1]
}

/**
 * Parse a stored document (or a model answer in the same layout).
 * Sections are looked up by heading first, then by fence language.
 * Empty sections count as absent.
 */
export function parseArtifactDocument(
  content: string,
  files: ArtifactFileNames = DEFAULT_FILE_NAMES,
): PartialArtifact {
  const pipeline = extractSection(content, files.pipelineFile) ?? extractFence(content, ['yaml', 'yml', 'gitlab-ci'])
  const imageBuild =
    extractSection(content, files.imageBuildFile) ?? extractFence(content, ['dockerfile', 'docker'])

  const result: { pipelineDefinition?: string; imageBuildDefinition?: string } = {}
  if (pipeline !== undefined && pipeline.trim() !== '') {
    result.pipelineDefinition = withTrailingNewline(pipeline)
  }
  if (imageBuild !== undefined && imageBuild.trim() !== '') {
    result.imageBuildDefinition = withTrailingNewline(imageBuild)
  }
  return result
}

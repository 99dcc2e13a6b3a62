import { describe, it, expect } from 'vitest'
import type { PipelineArtifact, RepositoryProfile } from '../../../core/types.js'
import { DEFAULT_FILE_NAMES } from '../../template-store/artifact-document.js'
import { buildFixContext, fixSystemPrompt, logTail, parseFixResponse } from '../fix-prompt.js'

const FENCE = '```'

const ARTIFACT: PipelineArtifact = {
  pipelineDefinition: 'stages: [compile]\n',
  imageBuildDefinition: 'FROM golang:1.22\n',
  provenance: { source: 'generated' },
}

const PROFILE: RepositoryProfile = {
  language: 'go',
  framework: 'gin',
  packageManager: 'go modules',
  hasExistingPipelineFiles: false,
  files: ['go.mod', 'main.go'],
}

describe('parseFixResponse', () => {
  it('reads the marker layout and strips code fences', () => {
    const text = [
      '---EXPLANATION---',
      'Switched to the Go image.',
      '---DOCKERFILE---',
      `${FENCE}dockerfile`,
      'FROM golang:1.22',
      FENCE,
      '---GITLAB_CI---',
      `${FENCE}yaml`,
      'stages: [compile]',
      FENCE,
      '---END---',
    ].join('\n')

    expect(parseFixResponse(text, DEFAULT_FILE_NAMES)).toEqual({
      explanation: 'Switched to the Go image.',
      imageBuildDefinition: 'FROM golang:1.22\n',
      pipelineDefinition: 'stages: [compile]\n',
    })
  })

  it('leaves out an empty section', () => {
    const text = '---EXPLANATION---\nOnly the pipeline.\n---DOCKERFILE---\n\n---GITLAB_CI---\nstages: [a]\n---END---'

    expect(parseFixResponse(text, DEFAULT_FILE_NAMES)).toEqual({
      explanation: 'Only the pipeline.',
      pipelineDefinition: 'stages: [a]\n',
    })
  })

  it('falls back to fenced blocks when the markers are missing', () => {
    const text = `Here is the fix:\n${FENCE}yaml\nstages: [a]\n${FENCE}\n`

    expect(parseFixResponse(text, DEFAULT_FILE_NAMES)).toEqual({
      explanation: '',
      pipelineDefinition: 'stages: [a]\n',
    })
  })
})

describe('buildFixContext', () => {
  it('keeps only the tail of the job log', () => {
    const context = buildFixContext({
      artifact: ARTIFACT,
      profile: PROFILE,
      failedJob: { jobName: 'compile', stage: 'compile', state: 'failed', logText: `${'x'.repeat(500)}END` },
      classification: { errorClass: 'build_failure', evidence: ['build failed'] },
      files: DEFAULT_FILE_NAMES,
      logTailChars: 200,
    })

    expect(context).toContain(`${FENCE}\n${'x'.repeat(197)}END\n${FENCE}`)
    expect(context).toContain('- Failed job: compile\n- Stage: compile\n- Error class: build_failure')
    expect(context).toContain('## Matching lines\n- build failed')
    expect(context).toContain(`## Current .gitlab-ci.yml\n${FENCE}yaml\nstages: [compile]\n${FENCE}`)
  })

  it('describes a failure without job logs', () => {
    const context = buildFixContext({
      artifact: ARTIFACT,
      profile: PROFILE,
      failedJob: undefined,
      classification: { errorClass: 'unclassified', evidence: [] },
      files: DEFAULT_FILE_NAMES,
      logTailChars: 200,
    })

    expect(context).toContain('- Failed job: (none reported)\n- Stage: (unknown)')
    expect(context).not.toContain('## Matching lines')
  })
})

describe('buildFixContext with feedback and lint errors', () => {
  it('lists earlier fixes after the evidence and lint errors at the end', () => {
    const context = buildFixContext({
      artifact: ARTIFACT,
      profile: PROFILE,
      failedJob: { jobName: 'compile', stage: 'compile', state: 'failed', logText: 'build failed\n' },
      classification: { errorClass: 'build_failure', evidence: ['build failed'] },
      files: DEFAULT_FILE_NAMES,
      logTailChars: 200,
      feedback: [
        {
          id: 'feedback_go_gin_1',
          language: 'go',
          framework: 'gin',
          errorClass: 'image_not_found',
          fixDescription: 'Pinned the base image tag.',
          timestamp: '2024-03-05T08:00:00.000Z',
        },
      ],
      lintErrors: ['jobs:compile config should implement a script: or a trigger: keyword'],
    })

    expect(context).toContain(
      '## Matching lines\n- build failed\n\n## Fixes that worked before for this stack\n' +
        '- image_not_found: Pinned the base image tag.\n\n## Job log (last part)',
    )
    expect(context.endsWith(
      `stages: [compile]\n${FENCE}\n\n## Rejected by the CI lint check\nFix every error:\n` +
        '- jobs:compile config should implement a script: or a trigger: keyword',
    )).toBe(true)
  })
})

describe('fix prompt helpers', () => {
  it('logTail keeps the last characters', () => {
    expect(logTail('abcdef', 3)).toBe('def')
    expect(logTail('abc', 10)).toBe('abc')
  })

  it('names the marker layout and file names', () => {
    const prompt = fixSystemPrompt(DEFAULT_FILE_NAMES, 'notify')
    expect(prompt).toContain('---GITLAB_CI---\n<complete .gitlab-ci.yml>\n---END---')
    expect(prompt).toContain('Keep the stage sequence and the notify jobs')
  })
})

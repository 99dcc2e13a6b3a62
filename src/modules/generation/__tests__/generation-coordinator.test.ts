/**
 * Unit tests for the generation decision table.
 */

import { describe, it, expect } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import type { WorkflowEvents } from '../../../core/event-bus.types.js'
import { ModelTimeoutError, ModelUnavailableError } from '../../../core/errors.js'
import type { FixFeedback, PipelineArtifact, RepositoryProfile } from '../../../core/types.js'
import { parsePipelineDocument } from '../../artifact-normalizer/pipeline-document.js'
import { normalizeArtifact } from '../../artifact-normalizer/artifact-normalizer.js'
import { buildDefaultArtifact } from '../../reference-selector/default-templates.js'
import type { ReferenceSelector, Selection } from '../../reference-selector/reference-selector.js'
import { createGenerationCoordinator } from '../generation-coordinator-impl.js'
import type { RepositoryRef } from '../../vcs/vcs-client.js'
import { FakeVcs } from '../../../../test/fixtures/fake-vcs.js'
import { ScriptedModel } from '../../../../test/fixtures/scripted-model.js'

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

function fixedSelector(selection: Selection): ReferenceSelector {
  return { select: async () => selection }
}

const FENCE = '```'

function answer(pipeline: string | undefined, dockerfile: string | undefined): string {
  const parts: string[] = []
  if (pipeline !== undefined) parts.push(`### .gitlab-ci.yml\n${FENCE}yaml\n${pipeline}${FENCE}\n`)
  if (dockerfile !== undefined) parts.push(`### Dockerfile\n${FENCE}dockerfile\n${dockerfile}${FENCE}\n`)
  return parts.join('\n')
}

const PROFILE: RepositoryProfile = {
  language: 'go',
  framework: 'generic',
  packageManager: 'go modules',
  hasExistingPipelineFiles: false,
  files: ['go.mod', 'main.go'],
}

const VALID_PIPELINE = 'stages: [build, notify]\nbuild:\n  stage: build\n  script: [go build ./...]\n'
const VALID_DOCKERFILE = 'FROM golang:1.22\n'

const TEMPLATE: PipelineArtifact = {
  pipelineDefinition: VALID_PIPELINE,
  imageBuildDefinition: VALID_DOCKERFILE,
  provenance: { source: 'exact_template', templateId: 'go_generic' },
}

const DEFAULT_SELECTION: Selection = { kind: 'default', artifact: buildDefaultArtifact('go', 'generic') }

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GenerationCoordinator', () => {
  it('reuses an exact template without calling the model', async () => {
    const model = new ScriptedModel([])
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector({ kind: 'exact_template', artifact: TEMPLATE, templateId: 'go_generic' }),
      model,
    })

    const result = await coordinator.generate(PROFILE)

    expect(model.calls).toHaveLength(0)
    expect(result.selectionKind).toBe('exact_template')
    expect(result.usedFallback).toBe(false)
    expect(result.validation).toEqual([])
    expect(result.artifact).toEqual(normalizeArtifact(TEMPLATE))
    expect(result.artifact.provenance).toEqual({ source: 'exact_template', templateId: 'go_generic' })
  })

  it('generates from scratch when only the default is available', async () => {
    const model = new ScriptedModel([answer(VALID_PIPELINE, VALID_DOCKERFILE)])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(DEFAULT_SELECTION), model })

    const result = await coordinator.generate(PROFILE)

    expect(result.selectionKind).toBe('default')
    expect(result.usedFallback).toBe(false)
    expect(result.artifact.provenance).toEqual({ source: 'generated' })
    expect(result.artifact.imageBuildDefinition).toBe(VALID_DOCKERFILE)
    expect(parsePipelineDocument(result.artifact.pipelineDefinition).stages).toEqual(['build', 'notify', 'learn'])
    expect(model.calls[0]?.systemPrompt).toContain('compile, test, build_image, notify')
    expect(model.calls[0]?.context).toContain('- Files: go.mod, main.go')
  })

  it('falls back to the default when the model is unavailable', async () => {
    const model = new ScriptedModel([new ModelUnavailableError('down')])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(DEFAULT_SELECTION), model })

    const result = await coordinator.generate(PROFILE)

    expect(result.usedFallback).toBe(true)
    expect(result.artifact).toEqual(normalizeArtifact(buildDefaultArtifact('go', 'generic')))
    expect(result.artifact.provenance).toEqual({ source: 'generated', templateId: 'default_go_generic' })
    expect(result.validation).toEqual([])
  })

  it('falls back to the default when the answer fails validation', async () => {
    const broken = 'stages: [build]\nship:\n  stage: deploy\n  script: [ship]\n'
    const model = new ScriptedModel([answer(broken, VALID_DOCKERFILE)])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(DEFAULT_SELECTION), model })

    const result = await coordinator.generate(PROFILE)

    expect(result.usedFallback).toBe(true)
    expect(result.artifact.provenance.templateId).toBe('default_go_generic')
  })

  it('falls back to the default when the answer lacks a file', async () => {
    const model = new ScriptedModel([answer(VALID_PIPELINE, undefined)])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(DEFAULT_SELECTION), model })

    const result = await coordinator.generate(PROFILE)

    expect(result.usedFallback).toBe(true)
  })

  it('keeps the template file and takes the missing one from the model', async () => {
    const model = new ScriptedModel([answer(undefined, 'FROM golang:1.22-alpine\n')])
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector({
        kind: 'partial_template',
        partial: { pipelineDefinition: VALID_PIPELINE },
        templateId: 'go_gin',
        languageOnly: false,
      }),
      model,
    })

    const result = await coordinator.generate(PROFILE)

    expect(result.usedFallback).toBe(false)
    expect(result.artifact.imageBuildDefinition).toBe('FROM golang:1.22-alpine\n')
    expect(result.artifact.provenance).toEqual({ source: 'partial_template', templateId: 'go_gin' })
    expect(parsePipelineDocument(result.artifact.pipelineDefinition).stages).toEqual(['build', 'notify', 'learn'])
    expect(model.calls[0]?.context).toContain('## Reference .gitlab-ci.yml')
  })

  it('lets the default supply the missing file of a partial template when the model times out', async () => {
    const model = new ScriptedModel([new ModelTimeoutError(100)])
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector({
        kind: 'partial_template',
        partial: { pipelineDefinition: VALID_PIPELINE },
        templateId: 'go_gin',
        languageOnly: false,
      }),
      model,
    })

    const result = await coordinator.generate(PROFILE)

    expect(result.usedFallback).toBe(true)
    expect(result.artifact.imageBuildDefinition).toBe(buildDefaultArtifact('go', 'generic').imageBuildDefinition)
    expect(result.artifact.provenance).toEqual({ source: 'partial_template', templateId: 'go_gin' })
  })

  it('uses a language-only partial template with both files without the model', async () => {
    const model = new ScriptedModel([])
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector({
        kind: 'partial_template',
        partial: { pipelineDefinition: VALID_PIPELINE, imageBuildDefinition: VALID_DOCKERFILE },
        templateId: 'go_echo',
        languageOnly: true,
      }),
      model,
    })

    const result = await coordinator.generate(PROFILE)

    expect(model.calls).toHaveLength(0)
    expect(result.artifact.provenance).toEqual({ source: 'partial_template', templateId: 'go_echo' })
  })

  it('replaces a stored reference that cannot be normalized', async () => {
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector({
        kind: 'exact_template',
        artifact: { ...TEMPLATE, pipelineDefinition: '- not\n- a mapping\n' },
        templateId: 'go_generic',
      }),
      model: new ScriptedModel([]),
    })

    const result = await coordinator.generate(PROFILE)

    expect(result.usedFallback).toBe(true)
    expect(result.artifact.provenance.templateId).toBe('default_go_generic')
  })

  it('propagates errors that are not model failures', async () => {
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector(DEFAULT_SELECTION),
      model: new ScriptedModel([new Error('bug')]),
    })

    await expect(coordinator.generate(PROFILE)).rejects.toThrow('bug')
  })

  it('emits generation:completed for a workflow', async () => {
    const eventBus = createEventBus()
    const events: WorkflowEvents['generation:completed'][] = []
    eventBus.on('generation:completed', (payload) => events.push(payload))
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector(DEFAULT_SELECTION),
      model: new ScriptedModel([new ModelUnavailableError('down')]),
      eventBus,
    })

    await coordinator.generate(PROFILE, { executionRef: 'wf-1' })

    expect(events).toEqual([
      {
        executionRef: 'wf-1',
        language: 'go',
        framework: 'generic',
        source: 'generated',
        templateId: 'default_go_generic',
        usedFallback: true,
      },
    ])
  })
})

describe('GenerationCoordinator with CI lint and feedback', () => {
  const REPO: RepositoryRef = { baseUrl: 'https://gitlab.test', projectPath: 'group/app', credential: 'test-secret' }
  const EXACT: Selection = { kind: 'exact_template', artifact: TEMPLATE, templateId: 'go_generic' }
  const LINT_ERROR = 'jobs:build config contains unknown keys: scrpt'
  const REGENERATED = 'stages: [build, notify]\nbuild:\n  stage: build\n  script: [go build -o app .]\n'

  it('regenerates once with the lint errors when the server rejects the pipeline', async () => {
    const vcs = new FakeVcs()
    vcs.lintResults.push({ valid: false, errors: [LINT_ERROR], warnings: [] })
    const model = new ScriptedModel([answer(REGENERATED, VALID_DOCKERFILE)])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(EXACT), model, linter: vcs })

    const result = await coordinator.generate(PROFILE, { repo: REPO })

    expect(vcs.linted).toHaveLength(2)
    expect(model.calls).toHaveLength(1)
    const context = model.calls[0]?.context ?? ''
    expect(context).toContain('## Reference .gitlab-ci.yml')
    expect(context.endsWith(`## Rejected by the CI lint check\nFix every error:\n- ${LINT_ERROR}`)).toBe(true)
    expect(result.usedFallback).toBe(false)
    expect(result.validation).toEqual([])
    expect(result.artifact.provenance).toEqual({ source: 'generated' })
    expect(result.artifact.pipelineDefinition).toContain('go build -o app .')
  })

  it('uses the default when the regenerated pipeline is rejected too', async () => {
    const vcs = new FakeVcs()
    vcs.lintResults.push(
      { valid: false, errors: [LINT_ERROR], warnings: [] },
      { valid: false, errors: [LINT_ERROR], warnings: [] },
    )
    const model = new ScriptedModel([answer(REGENERATED, VALID_DOCKERFILE)])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(EXACT), model, linter: vcs })

    const result = await coordinator.generate(PROFILE, { repo: REPO })

    expect(vcs.linted).toHaveLength(3)
    expect(result.usedFallback).toBe(true)
    expect(result.validation).toEqual([])
    expect(result.artifact).toEqual(normalizeArtifact(buildDefaultArtifact('go', 'generic')))
  })

  it('reports lint errors of the default as validation issues', async () => {
    const vcs = new FakeVcs()
    vcs.lintResults.push({ valid: false, errors: [LINT_ERROR], warnings: [] })
    const model = new ScriptedModel([new ModelUnavailableError('down')])
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(DEFAULT_SELECTION), model, linter: vcs })

    const result = await coordinator.generate(PROFILE, { repo: REPO })

    expect(model.calls).toHaveLength(1)
    expect(result.usedFallback).toBe(true)
    expect(result.validation).toEqual([LINT_ERROR])
  })

  it('skips the lint check without a repository', async () => {
    const vcs = new FakeVcs()
    const coordinator = createGenerationCoordinator({ selector: fixedSelector(EXACT), model: new ScriptedModel(), linter: vcs })

    await coordinator.generate(PROFILE)

    expect(vcs.linted).toEqual([])
  })

  it('offers earlier fixes for the stack to the model', async () => {
    const earlier: FixFeedback = {
      id: 'feedback_go_generic_0123456789abcdef',
      language: 'go',
      framework: 'generic',
      errorClass: 'missing_command',
      fixDescription: 'Installed make in the build image',
      timestamp: '2024-03-01T00:00:00.000Z',
    }
    const model = new ScriptedModel([answer(VALID_PIPELINE, VALID_DOCKERFILE)])
    const coordinator = createGenerationCoordinator({
      selector: fixedSelector(DEFAULT_SELECTION),
      model,
      feedback: { relevant: async () => [earlier] },
    })

    await coordinator.generate(PROFILE)

    expect(model.calls[0]?.context.endsWith(
      '## Fixes that worked before for this stack\n- missing_command: Installed make in the build image',
    )).toBe(true)
  })
})

/**
 * GenerationCoordinator implementation.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  ModelTimeoutError,
  ModelUnavailableError,
  ValidationFailureError,
  errorMessage,
} from '../../core/errors.js'
import type { FixFeedback, PartialArtifact, PipelineArtifact, RepositoryProfile } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { normalizeArtifact, type NormalizerOptions } from '../artifact-normalizer/artifact-normalizer.js'
import { buildDefaultArtifact } from '../reference-selector/default-templates.js'
import type { ReferenceSelector, Selection } from '../reference-selector/reference-selector.js'
import {
  DEFAULT_FILE_NAMES,
  parseArtifactDocument,
  type ArtifactFileNames,
} from '../template-store/artifact-document.js'
import type { FeedbackSource } from '../learning/feedback-recorder.js'
import type { RepositoryRef } from '../vcs/vcs-client.js'
import type { GenerationContext, GenerationCoordinator, GenerationResult } from './generation-coordinator.js'
import type { ModelClient } from './model-client.js'
import { validateArtifact, validateImageBuildDefinition, validatePipelineDefinition } from './pipeline-validator.js'
import { buildGenerationContext, generationSystemPrompt } from './prompts.js'
import { serverLintErrors, type PipelineLinter } from './server-lint.js'

const logger = createLogger('generation')

export interface GenerationCoordinatorOptions {
  selector: ReferenceSelector
  model: ModelClient
  files?: ArtifactFileNames
  normalizer?: Partial<NormalizerOptions>
  /** Checks the pipeline definition with the CI server when the context names a repository */
  linter?: PipelineLinter
  /** Earlier successful fixes offered to the model */
  feedback?: FeedbackSource
  eventBus?: TypedEventBus
}

interface Draft {
  readonly artifact: PipelineArtifact
  readonly usedFallback: boolean
}

interface Checked extends Draft {
  readonly lintErrors: readonly string[]
}

interface AskInput {
  readonly reference?: PartialArtifact
  readonly lintErrors?: readonly string[]
}

function isModelFailure(err: unknown): boolean {
  return err instanceof ModelUnavailableError || err instanceof ModelTimeoutError
}

export class GenerationCoordinatorImpl implements GenerationCoordinator {
  private readonly _selector: ReferenceSelector
  private readonly _model: ModelClient
  private readonly _files: ArtifactFileNames
  private readonly _normalizer: Partial<NormalizerOptions>
  private readonly _linter: PipelineLinter | undefined
  private readonly _feedback: FeedbackSource | undefined
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: GenerationCoordinatorOptions) {
    this._selector = options.selector
    this._model = options.model
    this._files = options.files ?? DEFAULT_FILE_NAMES
    this._normalizer = options.normalizer ?? {}
    this._linter = options.linter
    this._feedback = options.feedback
    this._eventBus = options.eventBus
  }

  async generate(profile: RepositoryProfile, context: GenerationContext = {}): Promise<GenerationResult> {
    const selection = await this._selector.select(profile.language, profile.framework)
    const draft = await this._draft(selection, profile, context)

    let artifact: PipelineArtifact
    let usedFallback = draft.usedFallback
    try {
      artifact = normalizeArtifact(draft.artifact, this._normalizer)
    } catch (err) {
      if (!(err instanceof ValidationFailureError)) throw err
      // A stored reference that is not a usable pipeline
      logger.warn({ kind: selection.kind, issues: err.issues }, 'Reference could not be normalized; using default')
      artifact = normalizeArtifact(this._default(profile), this._normalizer)
      usedFallback = true
    }

    let lintErrors: readonly string[] = []
    if (this._linter !== undefined && context.repo !== undefined) {
      const checked = await this._serverCheck(this._linter, context.repo, { artifact, usedFallback }, profile, context)
      artifact = checked.artifact
      usedFallback = checked.usedFallback
      lintErrors = checked.lintErrors
    }

    const validation = [...validateArtifact(artifact), ...lintErrors]
    if (validation.length > 0) {
      logger.warn({ kind: selection.kind, validation }, 'Generated artifact has validation issues')
    }

    if (context.executionRef !== undefined) {
      this._eventBus?.emit('generation:completed', {
        executionRef: context.executionRef,
        language: profile.language,
        framework: profile.framework,
        source: artifact.provenance.source,
        ...(artifact.provenance.templateId !== undefined && { templateId: artifact.provenance.templateId }),
        usedFallback,
      })
    }

    logger.info(
      {
        language: profile.language,
        framework: profile.framework,
        kind: selection.kind,
        source: artifact.provenance.source,
        usedFallback,
      },
      'Artifact generated',
    )
    return { artifact, selectionKind: selection.kind, usedFallback, validation }
  }

  // ---------------------------------------------------------------------------
  // Decision table
  // ---------------------------------------------------------------------------

  private async _draft(selection: Selection, profile: RepositoryProfile, context: GenerationContext): Promise<Draft> {
    switch (selection.kind) {
      case 'learned':
      case 'exact_template':
        return { artifact: selection.artifact, usedFallback: false }
      case 'partial_template':
        return this._adaptPartial(selection.partial, selection.templateId, profile, context)
      case 'default':
        return this._generateFromScratch(selection.artifact, profile, context)
    }
  }

  private async _adaptPartial(
    partial: PartialArtifact,
    templateId: string,
    profile: RepositoryProfile,
    context: GenerationContext,
  ): Promise<Draft> {
    const provenance = { source: 'partial_template', templateId } as const

    if (partial.pipelineDefinition !== undefined && partial.imageBuildDefinition !== undefined) {
      return {
        artifact: {
          pipelineDefinition: partial.pipelineDefinition,
          imageBuildDefinition: partial.imageBuildDefinition,
          provenance,
        },
        usedFallback: false,
      }
    }

    const answer = await this._ask(profile, context, { reference: partial })
    const fallback = this._default(profile)
    let usedFallback = false

    let pipelineDefinition = partial.pipelineDefinition
    if (pipelineDefinition === undefined) {
      const candidate = answer?.pipelineDefinition
      if (candidate !== undefined && validatePipelineDefinition(candidate).length === 0) {
        pipelineDefinition = candidate
      } else {
        pipelineDefinition = fallback.pipelineDefinition
        usedFallback = true
      }
    }

    let imageBuildDefinition = partial.imageBuildDefinition
    if (imageBuildDefinition === undefined) {
      const candidate = answer?.imageBuildDefinition
      if (candidate !== undefined && validateImageBuildDefinition(candidate).length === 0) {
        imageBuildDefinition = candidate
      } else {
        imageBuildDefinition = fallback.imageBuildDefinition
        usedFallback = true
      }
    }

    if (usedFallback) {
      logger.warn({ templateId }, 'Model could not complete the partial template; default supplied the missing file')
    }
    return { artifact: { pipelineDefinition, imageBuildDefinition, provenance }, usedFallback }
  }

  private async _generateFromScratch(
    fallback: PipelineArtifact,
    profile: RepositoryProfile,
    context: GenerationContext,
  ): Promise<Draft> {
    const answer = await this._ask(profile, context, {})
    if (answer?.pipelineDefinition !== undefined && answer.imageBuildDefinition !== undefined) {
      const generated: PipelineArtifact = {
        pipelineDefinition: answer.pipelineDefinition,
        imageBuildDefinition: answer.imageBuildDefinition,
        provenance: { source: 'generated' },
      }
      const issues = validateArtifact(generated)
      if (issues.length === 0) {
        return { artifact: generated, usedFallback: false }
      }
      logger.warn({ issues }, 'Model answer failed validation; using default')
    } else if (answer !== undefined) {
      logger.warn('Model answer did not contain both files; using default')
    }
    return { artifact: fallback, usedFallback: true }
  }

  // ---------------------------------------------------------------------------
  // CI lint
  // ---------------------------------------------------------------------------

  /**
   * A definition the CI server rejects gets one regeneration with the lint
   * errors in the prompt; if that is rejected too, the default replaces it.
   */
  private async _serverCheck(
    linter: PipelineLinter,
    repo: RepositoryRef,
    draft: Draft,
    profile: RepositoryProfile,
    context: GenerationContext,
  ): Promise<Checked> {
    const lintErrors = await serverLintErrors(linter, repo, draft.artifact.pipelineDefinition)
    if (lintErrors.length === 0 || draft.usedFallback) {
      if (lintErrors.length > 0) logger.warn({ lintErrors }, 'Default pipeline rejected by CI lint')
      return { ...draft, lintErrors }
    }

    logger.warn({ projectPath: repo.projectPath, lintErrors }, 'Pipeline rejected by CI lint; regenerating')
    const answer = await this._ask(profile, context, {
      reference: {
        pipelineDefinition: draft.artifact.pipelineDefinition,
        imageBuildDefinition: draft.artifact.imageBuildDefinition,
      },
      lintErrors,
    })
    const regenerated = this._normalizedAnswer(answer)
    if (regenerated !== undefined) {
      const remaining = await serverLintErrors(linter, repo, regenerated.pipelineDefinition)
      if (remaining.length === 0) return { artifact: regenerated, usedFallback: false, lintErrors: [] }
      logger.warn({ lintErrors: remaining }, 'Regenerated pipeline rejected by CI lint; using default')
    }

    const fallback = normalizeArtifact(this._default(profile), this._normalizer)
    return {
      artifact: fallback,
      usedFallback: true,
      lintErrors: await serverLintErrors(linter, repo, fallback.pipelineDefinition),
    }
  }

  /** @returns the normalized answer, or undefined when it is incomplete or invalid */
  private _normalizedAnswer(answer: PartialArtifact | undefined): PipelineArtifact | undefined {
    if (answer?.pipelineDefinition === undefined || answer.imageBuildDefinition === undefined) return undefined
    const generated: PipelineArtifact = {
      pipelineDefinition: answer.pipelineDefinition,
      imageBuildDefinition: answer.imageBuildDefinition,
      provenance: { source: 'generated' },
    }
    if (validateArtifact(generated).length > 0) return undefined
    try {
      return normalizeArtifact(generated, this._normalizer)
    } catch (err) {
      if (!(err instanceof ValidationFailureError)) throw err
      return undefined
    }
  }

  // ---------------------------------------------------------------------------
  // Model
  // ---------------------------------------------------------------------------

  /** @returns the parsed answer, or undefined when the model is unavailable */
  private async _ask(
    profile: RepositoryProfile,
    context: GenerationContext,
    ask: AskInput,
  ): Promise<PartialArtifact | undefined> {
    const prompt = generationSystemPrompt(this._files, this._normalizer.notifyStage ?? 'notify')
    const feedback: FixFeedback[] = (await this._feedback?.relevant(profile.language, profile.framework)) ?? []
    const input = buildGenerationContext({
      profile,
      files: this._files,
      feedback,
      ...(ask.reference !== undefined && { reference: ask.reference }),
      ...(ask.lintErrors !== undefined && { lintErrors: ask.lintErrors }),
      ...(context.additionalContext !== undefined && { additionalContext: context.additionalContext }),
    })
    try {
      const text = await this._model.complete(prompt, input, { ...(context.signal !== undefined && { signal: context.signal }) })
      return parseArtifactDocument(text, this._files)
    } catch (err) {
      if (!isModelFailure(err)) throw err
      logger.warn({ provider: this._model.provider, err: errorMessage(err) }, 'Model unavailable; using default')
      return undefined
    }
  }

  private _default(profile: RepositoryProfile): PipelineArtifact {
    return buildDefaultArtifact(profile.language, profile.framework, {
      imageBuildFile: this._files.imageBuildFile,
      notifyStage: this._normalizer.notifyStage ?? 'notify',
    })
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createGenerationCoordinator(options: GenerationCoordinatorOptions): GenerationCoordinator {
  return new GenerationCoordinatorImpl(options)
}

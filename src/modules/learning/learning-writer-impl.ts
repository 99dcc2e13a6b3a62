/**
 * LearningWriter implementation.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { LearnedConfig } from '../../core/types.js'
import { sha256Hex } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_FILE_NAMES, type ArtifactFileNames } from '../template-store/artifact-document.js'
import { learnedConfigToDocument } from '../template-store/learned-document.js'
import type { TemplateStore } from '../template-store/template-store.js'
import type { VcsClient } from '../vcs/vcs-client.js'
import type { LearningInput, LearningResult, LearningWriter } from './learning-writer.js'
import { countPassedStages, evaluateQualityGate } from './quality-gate.js'

const logger = createLogger('learning')

/**
 * Deterministic id: identical content for the same stack always maps to
 * the same document.
 */
export function learnedConfigId(language: string, framework: string, artifact: LearnedConfig['content']): string {
  const digest = sha256Hex(`${artifact.pipelineDefinition}\n---\n${artifact.imageBuildDefinition}`).slice(0, 16)
  return `learned_${language}_${framework}_${digest}`
}

export interface LearningWriterOptions {
  vcs: VcsClient
  store: TemplateStore
  learnedCollection: string
  enabled?: boolean
  exemptSkippedJobs: readonly string[]
  learningJob: string
  files?: ArtifactFileNames
  eventBus?: TypedEventBus
  now?: () => Date
}

export class LearningWriterImpl implements LearningWriter {
  private readonly _options: LearningWriterOptions
  private readonly _now: () => Date

  constructor(options: LearningWriterOptions) {
    this._options = options
    this._now = options.now ?? (() => new Date())
  }

  async record(input: LearningInput): Promise<LearningResult> {
    if (this._options.enabled === false) {
      return this._skip(input, 'learning is disabled', [])
    }

    const jobs = await this._options.vcs.getJobs(input.repo, input.executionId)
    const issues = evaluateQualityGate(jobs, {
      exemptSkippedJobs: this._options.exemptSkippedJobs,
      learningJob: this._options.learningJob,
    })
    if (issues.length > 0) {
      return this._skip(input, 'quality gate failed', issues)
    }

    const language = input.profile.language.toLowerCase()
    const framework = input.profile.framework.toLowerCase()
    const content = {
      pipelineDefinition: input.artifact.pipelineDefinition,
      imageBuildDefinition: input.artifact.imageBuildDefinition,
    }
    const config: LearnedConfig = {
      id: learnedConfigId(language, framework, content),
      language,
      framework,
      pipelineId: input.executionId,
      durationSeconds: input.durationSeconds,
      stagesPassedCount: countPassedStages(jobs),
      timestamp: this._now().toISOString(),
      content,
    }

    const doc = learnedConfigToDocument(config, this._options.files ?? DEFAULT_FILE_NAMES)
    await this._options.store.upsert(this._options.learnedCollection, config.id, doc.content, doc.metadata)

    logger.info(
      { id: config.id, language, framework, stagesPassed: config.stagesPassedCount, executionId: input.executionId },
      'Learned configuration stored',
    )
    if (input.executionRef !== undefined) {
      this._options.eventBus?.emit('learning:stored', {
        executionRef: input.executionRef,
        configId: config.id,
        language,
        framework,
      })
    }
    return { kind: 'stored', config }
  }

  private _skip(input: LearningInput, reason: string, issues: string[]): LearningResult {
    logger.info({ executionId: input.executionId, reason, issues }, 'Learning skipped')
    if (input.executionRef !== undefined) {
      this._options.eventBus?.emit('learning:skipped', { executionRef: input.executionRef, reason, issues })
    }
    return { kind: 'skipped', reason, issues }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createLearningWriter(options: LearningWriterOptions): LearningWriter {
  return new LearningWriterImpl(options)
}

/**
 * Fix feedback: what made a failing pipeline pass, kept per stack and
 * offered to later generation and fix prompts.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { StoreError } from '../../core/errors.js'
import type { FixFeedback, PipelineArtifact, RepositoryProfile } from '../../core/types.js'
import { sha256Hex } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactFileNames } from '../template-store/artifact-document.js'
import { documentToFeedback, feedbackToDocument } from '../template-store/feedback-document.js'
import type { TemplateStore } from '../template-store/template-store.js'

const logger = createLogger('learning:feedback')

/** Documents read per lookup before the newest are picked */
const CANDIDATES = 50

export interface FeedbackSource {
  /** Newest fixes for the stack; empty when the store cannot answer */
  relevant(language: string, framework: string): Promise<FixFeedback[]>
}

export interface FeedbackInput {
  readonly executionRef?: string
  readonly profile: RepositoryProfile
  readonly errorClass: string
  readonly fixDescription: string
  readonly before: PipelineArtifact
  readonly after: PipelineArtifact
}

export interface FeedbackRecorderOptions {
  store: TemplateStore
  collection: string
  /** Entries offered per prompt; 0 keeps feedback out of prompts */
  limit: number
  files?: ArtifactFileNames
  eventBus?: TypedEventBus
  now?: () => Date
}

/** The same fix for the same stack always maps to the same document */
export function feedbackId(
  language: string,
  framework: string,
  errorClass: string,
  before: PipelineArtifact,
  after: PipelineArtifact,
): string {
  const digest = sha256Hex(
    [errorClass, before.pipelineDefinition, after.pipelineDefinition, after.imageBuildDefinition].join('\n---\n'),
  ).slice(0, 16)
  return `feedback_${language}_${framework}_${digest}`
}

export class FeedbackRecorder implements FeedbackSource {
  private readonly _options: FeedbackRecorderOptions
  private readonly _now: () => Date

  constructor(options: FeedbackRecorderOptions) {
    this._options = options
    this._now = options.now ?? (() => new Date())
  }

  /** @throws {StoreError} when the upsert fails */
  async record(input: FeedbackInput): Promise<FixFeedback> {
    const language = input.profile.language.toLowerCase()
    const framework = input.profile.framework.toLowerCase()
    const feedback: FixFeedback = {
      id: feedbackId(language, framework, input.errorClass, input.before, input.after),
      language,
      framework,
      errorClass: input.errorClass,
      fixDescription: input.fixDescription,
      timestamp: this._now().toISOString(),
    }

    const doc = feedbackToDocument({ feedback, before: input.before, after: input.after }, this._options.files)
    await this._options.store.upsert(this._options.collection, feedback.id, doc.content, doc.metadata)

    logger.info({ id: feedback.id, language, framework, errorClass: feedback.errorClass }, 'Fix feedback stored')
    if (input.executionRef !== undefined) {
      this._options.eventBus?.emit('learning:feedback-stored', {
        executionRef: input.executionRef,
        feedbackId: feedback.id,
        errorClass: feedback.errorClass,
      })
    }
    return feedback
  }

  async relevant(language: string, framework: string): Promise<FixFeedback[]> {
    if (this._options.limit === 0) return []
    const filter = { language: language.toLowerCase(), framework: framework.toLowerCase() }

    let feedback: FixFeedback[]
    try {
      const docs = await this._options.store.query(this._options.collection, filter, CANDIDATES)
      feedback = docs.map(documentToFeedback).filter((entry): entry is FixFeedback => entry !== undefined)
    } catch (err) {
      if (!(err instanceof StoreError)) throw err
      logger.warn({ ...filter, err: err.message }, 'Fix feedback unavailable')
      return []
    }
    return feedback.sort((a, b) => b.timestamp.localeCompare(a.timestamp)).slice(0, this._options.limit)
  }
}

export function createFeedbackRecorder(options: FeedbackRecorderOptions): FeedbackRecorder {
  return new FeedbackRecorder(options)
}

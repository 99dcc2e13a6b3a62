/**
 * ReferenceSelector implementation.
 *
 * Each tier either yields a Selection or raises RetrievalMissError; a miss
 * (empty result, unreachable store, malformed document) falls through to
 * the next tier.
 */

import { RetrievalMissError, errorMessage } from '../../core/errors.js'
import type { LearnedConfig } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { parseArtifactDocument, type ArtifactFileNames } from '../template-store/artifact-document.js'
import { documentToLearnedConfig } from '../template-store/learned-document.js'
import type { StoreDocument, TemplateStore } from '../template-store/template-store.js'
import { pickBestLearnedConfig } from './compare-learned-configs.js'
import { buildDefaultArtifact } from './default-templates.js'
import type {
  ReferenceSelector,
  ReferenceSelectorOptions,
  Selection,
  SelectionKind,
} from './reference-selector.js'

const logger = createLogger('selector')

const TEMPLATE_CANDIDATES = 5

interface Tier {
  readonly kind: SelectionKind
  run(language: string, framework: string): Promise<Selection>
}

export class ReferenceSelectorImpl implements ReferenceSelector {
  private readonly _store: TemplateStore
  private readonly _options: Required<ReferenceSelectorOptions>
  private readonly _files: ArtifactFileNames
  private readonly _tiers: readonly Tier[]

  constructor(store: TemplateStore, options: ReferenceSelectorOptions) {
    this._store = store
    this._options = {
      learnedCandidates: 10,
      pipelineFile: '.gitlab-ci.yml',
      imageBuildFile: 'Dockerfile',
      notifyStage: 'notify',
      ...options,
    }
    this._files = { pipelineFile: this._options.pipelineFile, imageBuildFile: this._options.imageBuildFile }
    this._tiers = [
      { kind: 'learned', run: (l, f) => this._learned(l, f) },
      { kind: 'exact_template', run: (l, f) => this._exactTemplate(l, f) },
      { kind: 'partial_template', run: (l, f) => this._partialTemplate(l, f) },
      { kind: 'default', run: (l, f) => this._default(l, f) },
    ]
  }

  async select(language: string, framework: string): Promise<Selection> {
    const lang = language.toLowerCase()
    const fw = framework.toLowerCase()
    const causes: Record<string, string> = {}

    for (const tier of this._tiers) {
      try {
        const selection = await tier.run(lang, fw)
        logger.info({ language: lang, framework: fw, kind: selection.kind }, 'Reference selected')
        return selection
      } catch (err) {
        causes[tier.kind] = errorMessage(err)
        logger.debug({ language: lang, framework: fw, tier: tier.kind, reason: causes[tier.kind] }, 'Tier missed')
      }
    }

    throw new RetrievalMissError(`No reference available for ${lang}/${fw}`, { language: lang, framework: fw, causes })
  }

  // ---------------------------------------------------------------------------
  // Tiers
  // ---------------------------------------------------------------------------

  private async _learned(language: string, framework: string): Promise<Selection> {
    const docs = await this._query(this._options.learnedCollection, { language, framework }, this._options.learnedCandidates)
    const configs: LearnedConfig[] = []
    for (const doc of docs) {
      const decoded = documentToLearnedConfig(doc, this._files)
      if (typeof decoded === 'string') {
        logger.warn({ id: doc.id, reason: decoded }, 'Skipping unusable learned configuration')
        continue
      }
      configs.push(decoded)
    }

    const best = pickBestLearnedConfig(configs)
    if (best === undefined) {
      throw new RetrievalMissError(`No usable learned configuration for ${language}/${framework}`, {
        candidates: docs.length,
      })
    }
    return {
      kind: 'learned',
      config: best,
      artifact: {
        pipelineDefinition: best.content.pipelineDefinition,
        imageBuildDefinition: best.content.imageBuildDefinition,
        provenance: { source: 'learned', templateId: best.id },
      },
    }
  }

  private async _exactTemplate(language: string, framework: string): Promise<Selection> {
    const docs = await this._query(this._options.templatesCollection, { language, framework }, TEMPLATE_CANDIDATES)
    for (const doc of docs) {
      const { pipelineDefinition, imageBuildDefinition } = parseArtifactDocument(doc.content, this._files)
      if (pipelineDefinition !== undefined && imageBuildDefinition !== undefined) {
        return {
          kind: 'exact_template',
          templateId: doc.id,
          artifact: {
            pipelineDefinition,
            imageBuildDefinition,
            provenance: { source: 'exact_template', templateId: doc.id },
          },
        }
      }
    }
    throw new RetrievalMissError(`No complete template for ${language}/${framework}`, { candidates: docs.length })
  }

  private async _partialTemplate(language: string, framework: string): Promise<Selection> {
    const reasons: string[] = []
    const lookups: { filter: Record<string, string>; languageOnly: boolean }[] = [
      { filter: { language, framework }, languageOnly: false },
      { filter: { language }, languageOnly: true },
    ]

    for (const lookup of lookups) {
      let docs: StoreDocument[]
      try {
        docs = await this._query(this._options.templatesCollection, lookup.filter, TEMPLATE_CANDIDATES)
      } catch (err) {
        reasons.push(errorMessage(err))
        continue
      }
      for (const doc of docs) {
        const partial = parseArtifactDocument(doc.content, this._files)
        if (partial.pipelineDefinition !== undefined || partial.imageBuildDefinition !== undefined) {
          return { kind: 'partial_template', partial, templateId: doc.id, languageOnly: lookup.languageOnly }
        }
      }
    }
    throw new RetrievalMissError(`No partial template for ${language}/${framework}`, { reasons })
  }

  private async _default(language: string, framework: string): Promise<Selection> {
    return {
      kind: 'default',
      artifact: buildDefaultArtifact(language, framework, {
        imageBuildFile: this._options.imageBuildFile,
        notifyStage: this._options.notifyStage,
      }),
    }
  }

  private async _query(collection: string, filter: Record<string, string>, limit: number): Promise<StoreDocument[]> {
    try {
      return await this._store.query(collection, filter, limit)
    } catch (err) {
      throw new RetrievalMissError(`Store query on "${collection}" failed: ${errorMessage(err)}`, { collection }, { cause: err })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createReferenceSelector(store: TemplateStore, options: ReferenceSelectorOptions): ReferenceSelector {
  return new ReferenceSelectorImpl(store, options)
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createDatabaseService } from '../../../persistence/database.js'
import { SqliteTemplateStore } from '../../template-store/sqlite-template-store.js'
import { renderArtifactDocument } from '../../template-store/artifact-document.js'
import { learnedConfigToDocument } from '../../template-store/learned-document.js'
import type { TemplateStore } from '../../template-store/template-store.js'
import { createReferenceSelector } from '../reference-selector-impl.js'
import type { ReferenceSelector } from '../reference-selector.js'
import { StoreError } from '../../../core/errors.js'
import type { LearnedConfig } from '../../../core/types.js'

const OPTIONS = { templatesCollection: 'templates', learnedCollection: 'learned' }

function learned(id: string, stagesPassedCount: number, durationSeconds: number, marker: string): LearnedConfig {
  return {
    id,
    language: 'java',
    framework: 'spring',
    pipelineId: '42',
    durationSeconds,
    stagesPassedCount,
    timestamp: '2026-03-01T10:00:00.000Z',
    content: { pipelineDefinition: `# ${marker}\nstages: [build]\n`, imageBuildDefinition: 'FROM eclipse-temurin:17-jre\n' },
  }
}

/** Store whose backend is down */
const unreachableStore: TemplateStore = {
  backend: 'down',
  initialize: async () => undefined,
  shutdown: async () => undefined,
  query: async () => {
    throw new StoreError('connection refused')
  },
  upsert: async () => {
    throw new StoreError('connection refused')
  },
}

describe('ReferenceSelector', () => {
  let store: SqliteTemplateStore
  let selector: ReferenceSelector

  beforeEach(async () => {
    store = new SqliteTemplateStore(createDatabaseService(':memory:'))
    await store.initialize()
    selector = createReferenceSelector(store, OPTIONS)
  })

  afterEach(async () => {
    await store.shutdown()
  })

  async function putLearned(config: LearnedConfig): Promise<void> {
    const doc = learnedConfigToDocument(config)
    await store.upsert('learned', config.id, doc.content, doc.metadata)
  }

  it('returns the default for an empty store', async () => {
    const selection = await selector.select('go', 'generic')
    expect(selection.kind).toBe('default')
  })

  it('prefers a learned configuration over templates', async () => {
    await store.upsert(
      'templates',
      'java_spring',
      renderArtifactDocument({ pipelineDefinition: 'stages: [t]\n', imageBuildDefinition: 'FROM t\n' }),
      { language: 'java', framework: 'spring' },
    )
    await putLearned(learned('learned_java_spring_a', 5, 100, 'five'))

    const selection = await selector.select('java', 'spring')
    expect(selection.kind).toBe('learned')
  })

  it('picks the learned configuration with more stages, then the faster one', async () => {
    await putLearned(learned('learned_java_spring_a', 5, 60, 'five-fast'))
    await putLearned(learned('learned_java_spring_b', 7, 600, 'seven-slow'))
    await putLearned(learned('learned_java_spring_c', 7, 300, 'seven-fast'))

    const selection = await selector.select('Java', 'Spring')
    if (selection.kind !== 'learned') throw new Error(`unexpected ${selection.kind}`)
    expect(selection.config.id).toBe('learned_java_spring_c')
    expect(selection.artifact.pipelineDefinition).toBe('# seven-fast\nstages: [build]\n')
    expect(selection.artifact.provenance).toEqual({ source: 'learned', templateId: 'learned_java_spring_c' })
  })

  it('skips malformed learned documents and falls through', async () => {
    await store.upsert('learned', 'learned_java_spring_bad', 'no files here', { language: 'java', framework: 'spring' })
    const selection = await selector.select('java', 'spring')
    expect(selection.kind).toBe('default')
  })

  it('returns an exact template when both files are present', async () => {
    await store.upsert(
      'templates',
      'python_flask',
      renderArtifactDocument({ pipelineDefinition: 'stages: [build]\n', imageBuildDefinition: 'FROM python\n' }),
      { language: 'python', framework: 'flask' },
    )
    const selection = await selector.select('python', 'flask')
    expect(selection).toEqual({
      kind: 'exact_template',
      templateId: 'python_flask',
      artifact: {
        pipelineDefinition: 'stages: [build]\n',
        imageBuildDefinition: 'FROM python\n',
        provenance: { source: 'exact_template', templateId: 'python_flask' },
      },
    })
  })

  it('returns a partial template for a single-file match', async () => {
    await store.upsert('templates', 'python_flask', renderArtifactDocument({ imageBuildDefinition: 'FROM python\n' }), {
      language: 'python',
      framework: 'flask',
    })
    const selection = await selector.select('python', 'flask')
    expect(selection).toEqual({
      kind: 'partial_template',
      templateId: 'python_flask',
      partial: { imageBuildDefinition: 'FROM python\n' },
      languageOnly: false,
    })
  })

  it('falls back to a language-only template as partial', async () => {
    await store.upsert(
      'templates',
      'python_django',
      renderArtifactDocument({ pipelineDefinition: 'stages: [build]\n', imageBuildDefinition: 'FROM python\n' }),
      { language: 'python', framework: 'django' },
    )
    const selection = await selector.select('python', 'fastapi')
    expect(selection.kind).toBe('partial_template')
    if (selection.kind === 'partial_template') {
      expect(selection.languageOnly).toBe(true)
      expect(selection.templateId).toBe('python_django')
    }
  })

  it('treats an unreachable store as a miss on every store tier', async () => {
    const offline = createReferenceSelector(unreachableStore, OPTIONS)
    const selection = await offline.select('rust', 'generic')
    expect(selection.kind).toBe('default')
  })
})

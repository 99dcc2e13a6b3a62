/**
 * `pipewright templates` command group
 *
 *   - `pipewright templates add --language <l> --framework <f> [--pipeline <file>] [--dockerfile <file>]`
 *   - `pipewright templates list [--language <l>] [--framework <f>]`
 *
 * Templates are stored in the configured template collection and found by
 * the reference selector on an exact (language, framework) match.
 */

import type { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PipewrightConfig } from '../../modules/config/config-schema.js'
import { createTemplateStore } from '../../modules/template-store/index.js'
import type { TemplateStore } from '../../modules/template-store/template-store.js'
import { storeTemplate } from '../../modules/template-store/templates.js'
import { ConfigError, PipewrightError, ValidationFailureError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('templates-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const TEMPLATES_EXIT_SUCCESS = 0
export const TEMPLATES_EXIT_ERROR = 1
export const TEMPLATES_EXIT_INVALID = 2

/** Upper bound on documents printed by `templates list` */
const LIST_LIMIT = 500

export interface TemplatesCommandOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// Shared store handling
// ---------------------------------------------------------------------------

async function withStore(
  opts: TemplatesCommandOptions,
  action: (store: TemplateStore, config: PipewrightConfig) => Promise<number>,
): Promise<number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  let config: PipewrightConfig
  try {
    await system.load()
    config = system.getConfig()
  } catch (err) {
    process.stderr.write(`  Configuration error: ${errorMessage(err)}\n`)
    return err instanceof ConfigError ? TEMPLATES_EXIT_INVALID : TEMPLATES_EXIT_ERROR
  }

  const store = createTemplateStore(config.store, { dataDir: config.global.data_dir })
  try {
    await store.initialize()
    return await action(store, config)
  } catch (err) {
    if (err instanceof ValidationFailureError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return TEMPLATES_EXIT_INVALID
    }
    if (!(err instanceof PipewrightError)) logger.error({ err }, 'Template command failed')
    process.stderr.write(`  Error: ${errorMessage(err)}\n`)
    return TEMPLATES_EXIT_ERROR
  } finally {
    await store.shutdown()
  }
}

// ---------------------------------------------------------------------------
// `templates add` action
// ---------------------------------------------------------------------------

export interface TemplatesAddOptions extends TemplatesCommandOptions {
  language: string
  framework: string
  /** Path of a pipeline definition file */
  pipeline?: string
  /** Path of an image-build definition file */
  dockerfile?: string
  id?: string
}

export async function runTemplatesAdd(opts: TemplatesAddOptions): Promise<number> {
  let pipelineDefinition: string | undefined
  let imageBuildDefinition: string | undefined
  try {
    if (opts.pipeline !== undefined) pipelineDefinition = await readFile(opts.pipeline, 'utf-8')
    if (opts.dockerfile !== undefined) imageBuildDefinition = await readFile(opts.dockerfile, 'utf-8')
  } catch (err) {
    process.stderr.write(`  Error: failed to read template file: ${errorMessage(err)}\n`)
    return TEMPLATES_EXIT_INVALID
  }

  return withStore(opts, async (store, config) => {
    const stored = await storeTemplate(
      store,
      config.store.templates_collection,
      {
        language: opts.language,
        framework: opts.framework,
        ...(pipelineDefinition !== undefined && { pipelineDefinition }),
        ...(imageBuildDefinition !== undefined && { imageBuildDefinition }),
        ...(opts.id !== undefined && { id: opts.id }),
      },
      { pipelineFile: config.vcs.pipeline_file, imageBuildFile: config.vcs.image_build_file },
    )
    process.stdout.write(`  Stored template ${stored.id} (${String(stored.metadata['language'])}/${String(stored.metadata['framework'])})\n`)
    return TEMPLATES_EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// `templates list` action
// ---------------------------------------------------------------------------

export interface TemplatesListOptions extends TemplatesCommandOptions {
  language?: string
  framework?: string
}

export async function runTemplatesList(opts: TemplatesListOptions = {}): Promise<number> {
  return withStore(opts, async (store, config) => {
    const documents = await store.query(
      config.store.templates_collection,
      {
        ...(opts.language !== undefined && { language: opts.language.toLowerCase() }),
        ...(opts.framework !== undefined && { framework: opts.framework.toLowerCase() }),
      },
      LIST_LIMIT,
    )
    if (documents.length === 0) {
      process.stdout.write('  No templates stored\n')
      return TEMPLATES_EXIT_SUCCESS
    }

    const sorted = [...documents].sort((a, b) => a.id.localeCompare(b.id))
    const width = Math.max(...sorted.map((doc) => doc.id.length))
    for (const doc of sorted) {
      const files = [
        doc.metadata['has_pipeline'] === true ? 'pipeline' : undefined,
        doc.metadata['has_image_build'] === true ? 'image-build' : undefined,
      ].filter((name) => name !== undefined)
      process.stdout.write(
        `  ${doc.id.padEnd(width)}  ${String(doc.metadata['language'])}/${String(doc.metadata['framework'])}  ${files.join(', ')}\n`,
      )
    }
    return TEMPLATES_EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerTemplatesCommand(program: Command): void {
  const templatesCmd = program.command('templates').description('Manage reference pipeline templates')

  templatesCmd
    .command('add')
    .description('Store a pipeline and/or image-build template for a language and framework')
    .requiredOption('--language <language>', 'Template language (e.g. python)')
    .requiredOption('--framework <framework>', 'Template framework (e.g. django)')
    .option('--pipeline <file>', 'Pipeline definition file')
    .option('--dockerfile <file>', 'Image-build definition file')
    .option('--id <id>', 'Document id (default: <language>_<framework>)')
    .action(
      async (opts: { language: string; framework: string; pipeline?: string; dockerfile?: string; id?: string }) => {
        const exitCode = await runTemplatesAdd({
          language: opts.language,
          framework: opts.framework,
          ...(opts.pipeline !== undefined && { pipeline: opts.pipeline }),
          ...(opts.dockerfile !== undefined && { dockerfile: opts.dockerfile }),
          ...(opts.id !== undefined && { id: opts.id }),
        })
        process.exit(exitCode)
      },
    )

  templatesCmd
    .command('list')
    .description('List stored templates')
    .option('--language <language>', 'Only templates for this language')
    .option('--framework <framework>', 'Only templates for this framework')
    .action(async (opts: { language?: string; framework?: string }) => {
      const exitCode = await runTemplatesList({
        ...(opts.language !== undefined && { language: opts.language }),
        ...(opts.framework !== undefined && { framework: opts.framework }),
      })
      process.exit(exitCode)
    })
}

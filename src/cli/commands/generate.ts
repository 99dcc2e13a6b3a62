/**
 * `pipewright generate <repo-url>`
 *
 * Generates, commits and monitors a pipeline for one repository, printing
 * every progress event until the workflow completes.
 *
 * Exit codes:
 *   0 - the pipeline succeeded
 *   1 - the workflow failed, timed out or was aborted
 *   2 - invalid arguments or configuration
 */

import type { Command } from 'commander'
import type { EventEmitter } from 'node:events'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PipewrightConfig } from '../../modules/config/config-schema.js'
import { createOrchestrator, type CreateOrchestratorOptions } from '../../core/orchestrator-impl.js'
import type { Orchestrator, WorkflowStatus } from '../../core/orchestrator.js'
import type { WorkflowRequest } from '../../core/types.js'
import type { ProgressEvent } from '../../modules/progress/progress-store.js'
import { ConfigError, PipewrightError, ValidationFailureError, errorMessage } from '../../core/errors.js'
import { maskSecrets } from '../../utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import { formatProgressLine, renderWorkflowSummary } from '../formatters/progress-formatter.js'
import { emitProgressEvent, emitWorkflowResult } from '../formatters/streaming.js'

const logger = createLogger('generate-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const GENERATE_EXIT_SUCCESS = 0
export const GENERATE_EXIT_FAILURE = 1
export const GENERATE_EXIT_INVALID = 2

export type OutputFormat = 'human' | 'json'

export interface GenerateOptions {
  /** VCS token; defaults to vcs.token from the configuration */
  token?: string
  context?: string
  pipelineOnly?: boolean
  branch?: string
  outputFormat?: OutputFormat
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  /** Collaborator overrides passed to createOrchestrator */
  orchestratorOptions?: CreateOrchestratorOptions
  /** SIGINT/SIGTERM source (default: process) */
  signals?: EventEmitter
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function loadConfig(opts: GenerateOptions): Promise<PipewrightConfig> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  await system.load()
  return system.getConfig()
}

function writeProgress(format: OutputFormat, status: WorkflowStatus, event: ProgressEvent): void {
  if (format === 'json') {
    emitProgressEvent(status.executionRef, event)
  } else {
    process.stdout.write(formatProgressLine(event) + '\n')
  }
}

/** Abort the workflow on the first SIGINT/SIGTERM; returns the cleanup function */
function abortOnSignal(orchestrator: Orchestrator, signals: EventEmitter): () => void {
  const handler = (): void => {
    logger.info('Signal received, aborting workflow')
    void orchestrator.shutdown()
  }
  signals.once('SIGINT', handler)
  signals.once('SIGTERM', handler)
  return () => {
    signals.removeListener('SIGINT', handler)
    signals.removeListener('SIGTERM', handler)
  }
}

// ---------------------------------------------------------------------------
// runGenerate
// ---------------------------------------------------------------------------

export async function runGenerate(repositoryUrl: string, opts: GenerateOptions = {}): Promise<number> {
  const format = opts.outputFormat ?? 'human'

  let config: PipewrightConfig
  try {
    config = await loadConfig(opts)
  } catch (err) {
    process.stderr.write(`  Configuration error: ${errorMessage(err)}\n`)
    return err instanceof ConfigError ? GENERATE_EXIT_INVALID : GENERATE_EXIT_FAILURE
  }

  const credential = opts.token ?? config.vcs.token
  if (credential === undefined || credential === '') {
    process.stderr.write('  Error: a VCS token is required (--token or vcs.token)\n')
    return GENERATE_EXIT_INVALID
  }
  const secrets = [credential, ...(config.model.api_key !== undefined ? [config.model.api_key] : [])]

  const request: WorkflowRequest = {
    repositoryUrl,
    credential,
    ...(opts.context !== undefined && { additionalContext: opts.context }),
    ...(opts.pipelineOnly !== undefined && { pipelineOnly: opts.pipelineOnly }),
    ...(opts.branch !== undefined && { branchName: opts.branch }),
  }

  let orchestrator: Orchestrator
  try {
    orchestrator = await createOrchestrator(config, opts.orchestratorOptions)
  } catch (err) {
    logger.error({ err }, 'Failed to start the orchestrator')
    process.stderr.write(`  Error: ${maskSecrets(errorMessage(err), secrets)}\n`)
    return GENERATE_EXIT_FAILURE
  }

  const stopProgress = orchestrator.onProgress((status, event) => writeProgress(format, status, event))
  const stopSignals = abortOnSignal(orchestrator, opts.signals ?? process)
  try {
    const started = await orchestrator.startWorkflow(request)
    const status = await orchestrator.waitForWorkflow(started.executionRef)

    if (format === 'json') {
      emitWorkflowResult(status)
    } else {
      process.stdout.write('\n' + renderWorkflowSummary(status) + '\n')
    }
    return status.outcome === 'succeeded' ? GENERATE_EXIT_SUCCESS : GENERATE_EXIT_FAILURE
  } catch (err) {
    if (err instanceof ValidationFailureError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      for (const issue of err.issues) process.stderr.write(`    - ${issue}\n`)
      return GENERATE_EXIT_INVALID
    }
    if (!(err instanceof PipewrightError)) logger.error({ err }, 'Workflow failed unexpectedly')
    process.stderr.write(`  Error: ${maskSecrets(errorMessage(err), secrets)}\n`)
    return GENERATE_EXIT_FAILURE
  } finally {
    stopSignals()
    stopProgress()
    await orchestrator.shutdown()
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <repo-url>')
    .description('Generate, commit and self-heal a CI/CD pipeline for a repository')
    .option('--token <token>', 'VCS access token (default: vcs.token)')
    .option('--context <text>', 'Additional instructions for the generator')
    .option('--pipeline-only', 'Generate only the pipeline definition')
    .option('--branch <name>', 'Branch to commit to (default: derived from vcs.branch_prefix)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .pipewright/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pipewright/ directory')
    .action(
      async (
        repoUrl: string,
        opts: {
          token?: string
          context?: string
          pipelineOnly?: boolean
          branch?: string
          outputFormat: string
          projectConfigDir?: string
          globalConfigDir?: string
        },
      ) => {
        const exitCode = await runGenerate(repoUrl, {
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
          ...(opts.token !== undefined && { token: opts.token }),
          ...(opts.context !== undefined && { context: opts.context }),
          ...(opts.pipelineOnly !== undefined && { pipelineOnly: opts.pipelineOnly }),
          ...(opts.branch !== undefined && { branch: opts.branch }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      },
    )
}

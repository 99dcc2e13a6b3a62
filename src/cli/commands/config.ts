/**
 * `pipewright config` command group
 *
 * Subcommands:
 *   - `pipewright config show`              - display merged config (credentials masked)
 *   - `pipewright config get <key>`         - print one value by dot-notation key
 *   - `pipewright config set <key> <value>` - update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { coerceScalar, createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { ConfigError, errorMessage } from '../../core/errors.js'
import { MASKED_VALUE } from '../../utils/masking.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export interface ConfigLocationOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  /** Environment for PIPEWRIGHT_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/** Keys whose values are masked by `config get` */
const SECRET_KEY = /(token|api_key|secret|password)$/i

// ---------------------------------------------------------------------------
// Shared loading
// ---------------------------------------------------------------------------

async function loadConfigSystem(opts: ConfigLocationOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigLocationOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# Pipewright configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigLocationOptions = {}): Promise<number> {
  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: unknown or unset config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }
  if (typeof value === 'string') {
    process.stdout.write(`${SECRET_KEY.test(key) ? MASKED_VALUE : value}\n`)
  } else {
    process.stdout.write(JSON.stringify(value) + '\n')
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: ConfigLocationOptions = {}): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const value = coerceScalar(rawValue.trim(), key)
  try {
    await system.set(key, value)
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    process.stderr.write(`  Error updating configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }

  const shown = SECRET_KEY.test(key) ? MASKED_VALUE : JSON.stringify(value)
  process.stdout.write(`  Set ${key} = ${shown}\n`)
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

/**
 * Register the `config` command group on a Commander program.
 */
export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View and modify Pipewright configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .pipewright/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pipewright/ directory')
    .action(async (opts: { format: string; projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigShow({
        format: opts.format === 'json' ? 'json' : 'yaml',
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('get <key>')
    .description('Print a configuration value by dot-notation key (e.g. healing.max_attempts)')
    .option('--project-config-dir <dir>', 'Path to project .pipewright/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pipewright/ directory')
    .action(async (key: string, opts: { projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigGet(key, {
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. monitor.poll_interval_ms 45000)')
    .option('--project-config-dir <dir>', 'Path to project .pipewright/ directory')
    .option('--global-config-dir <dir>', 'Path to global .pipewright/ directory')
    .action(async (key: string, value: string, opts: { projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigSet(key, value, {
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })
}

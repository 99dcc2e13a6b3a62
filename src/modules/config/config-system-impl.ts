/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.pipewright/config.yaml)
 *     → project config      (./.pipewright/config.yaml)
 *     → environment vars    (PIPEWRIGHT_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { deepMask } from '../../utils/masking.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, errorMessage } from '../../core/errors.js'
import {
  PipewrightConfigSchema,
  PartialPipewrightConfigSchema,
  type PipewrightConfig,
  type PartialPipewrightConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of PIPEWRIGHT_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  PIPEWRIGHT_LOG_LEVEL: 'global.log_level',
  PIPEWRIGHT_DATA_DIR: 'global.data_dir',
  PIPEWRIGHT_VCS_BASE_URL: 'vcs.base_url',
  PIPEWRIGHT_VCS_TOKEN: 'vcs.token',
  PIPEWRIGHT_VCS_TIMEOUT_MS: 'vcs.request_timeout_ms',
  PIPEWRIGHT_BRANCH_PREFIX: 'vcs.branch_prefix',
  PIPEWRIGHT_MODEL_PROVIDER: 'model.provider',
  PIPEWRIGHT_MODEL_BASE_URL: 'model.base_url',
  PIPEWRIGHT_MODEL_NAME: 'model.model',
  PIPEWRIGHT_MODEL_API_KEY: 'model.api_key',
  PIPEWRIGHT_MODEL_TIMEOUT_MS: 'model.timeout_ms',
  PIPEWRIGHT_STORE_BACKEND: 'store.backend',
  PIPEWRIGHT_SQLITE_PATH: 'store.sqlite_path',
  PIPEWRIGHT_CHROMA_URL: 'store.chroma_url',
  PIPEWRIGHT_POLL_INTERVAL_MS: 'monitor.poll_interval_ms',
  PIPEWRIGHT_MAX_WAIT_MS: 'monitor.max_wait_ms',
  PIPEWRIGHT_MAX_ATTEMPTS: 'healing.max_attempts',
  PIPEWRIGHT_LEARN_CALLBACK_URL: 'normalizer.callback_url',
  PIPEWRIGHT_SERVER_HOST: 'server.host',
  PIPEWRIGHT_SERVER_PORT: 'server.port',
}

/**
 * Coerce a raw string (env var or CLI argument) to boolean/number where it
 * looks like one. With `configPath`, string-typed keys (and optional keys
 * such as vcs.token, which have no default) keep the raw string.
 */
export function coerceScalar(rawValue: string, configPath?: string): string | number | boolean {
  if (configPath !== undefined) {
    const current = getByPath(DEFAULT_CONFIG, configPath)
    if (current === undefined || typeof current === 'string') return rawValue
  }
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialPipewrightConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue, configPath))
  }

  const parsed = PartialPipewrightConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: PipewrightConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPipewrightConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.pipewright')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.pipewright')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const merged = await this._mergeSources()
    this._config = this._validate(merged, 'Configuration validation failed')
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): PipewrightConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // Unknown keys are rejected; optional scalars such as vcs.token are
    // accepted when their section exists
    const parentKey = key.split('.').slice(0, -1).join('.')
    if (existing === undefined && !isPlainObject(getByPath(this.getConfig(), parentKey))) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (isPlainObject(existing)) {
      throw new ConfigError(
        `Cannot set object key "${key}"; use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw: Record<string, unknown> = (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialPipewrightConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        issues: partial.error.issues,
      })
    }

    // The merged result must stay valid before anything is written
    const merged = setByPath(await this._mergeSources(), key, value)
    this._validate(merged, `Invalid value for "${key}"`)

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')
    await this.load()
  }

  getMasked(): PipewrightConfig {
    const masked = PipewrightConfigSchema.safeParse(deepMask(this.getConfig()))
    if (!masked.success) {
      throw new ConfigError('Failed to mask configuration', { issues: masked.error.issues })
    }
    return masked.data
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _mergeSources(): Promise<Record<string, unknown>> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) merged = deepMerge(merged, envOverrides)

    if (Object.keys(this._cliOverrides).length > 0) merged = deepMerge(merged, this._cliOverrides)

    return merged
  }

  private _validate(candidate: Record<string, unknown>, heading: string): PipewrightConfig {
    const result = PipewrightConfigSchema.safeParse(candidate)
    if (!result.success) {
      throw new ConfigError(`${heading}:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }
    return result.data
  }

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPipewrightConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }
    // An empty file is an empty overlay
    if (parsed === undefined || parsed === null) return {}

    const result = PartialPipewrightConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}

/**
 * ConfigSystem interface - public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PipewrightConfig, PartialPipewrightConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .pipewright/ directory (default: <cwd>/.pipewright) */
  projectConfigDir?: string
  /** Path to the global user-level .pipewright/ directory (default: ~/.pipewright) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialPipewrightConfig
  /** Environment to read PIPEWRIGHT_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated Pipewright configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): PipewrightConfig

  /**
   * Return a single value by dot-notation key (e.g. "monitor.poll_interval_ms").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /** The merged config with credential values masked, safe to display */
  getMasked(): PipewrightConfig

  readonly isLoaded: boolean
}

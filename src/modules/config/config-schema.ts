/**
 * Zod validation schemas for the Pipewright configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - version control, generative model and template store backends
 *  - monitor / healing / normalizer / learning behaviour
 *  - HTTP server
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory for the local SQLite store and other runtime files */
    data_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Version control
// ---------------------------------------------------------------------------

export const VcsConfigSchema = z
  .object({
    provider: z.literal('gitlab'),
    base_url: z.string().url(),
    /** Fallback token used when a request carries no credential */
    token: z.string().optional(),
    request_timeout_ms: z.number().int().positive(),
    branch_prefix: z.string().min(1),
    pipeline_file: z.string().min(1),
    image_build_file: z.string().min(1),
    commit_message: z.string().min(1),
    /** Check pipeline definitions with the CI lint endpoint before committing */
    lint_before_commit: z.boolean(),
  })
  .strict()

export type VcsConfig = z.infer<typeof VcsConfigSchema>

// ---------------------------------------------------------------------------
// Generative model
// ---------------------------------------------------------------------------

export const ModelProviderSchema = z.enum(['ollama', 'openai'])
export type ModelProvider = z.infer<typeof ModelProviderSchema>

export const ModelConfigSchema = z
  .object({
    provider: ModelProviderSchema,
    base_url: z.string().url(),
    model: z.string().min(1),
    api_key: z.string().optional(),
    timeout_ms: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
  })
  .strict()

export type ModelConfig = z.infer<typeof ModelConfigSchema>

// ---------------------------------------------------------------------------
// Template store
// ---------------------------------------------------------------------------

export const StoreBackendSchema = z.enum(['sqlite', 'chroma'])
export type StoreBackend = z.infer<typeof StoreBackendSchema>

export const StoreConfigSchema = z
  .object({
    backend: StoreBackendSchema,
    /** SQLite file, relative paths resolve against global.data_dir */
    sqlite_path: z.string().min(1),
    chroma_url: z.string().url(),
    templates_collection: z.string().min(1),
    learned_collection: z.string().min(1),
    feedback_collection: z.string().min(1),
    /** Maximum learned candidates inspected per lookup */
    learned_candidates: z.number().int().min(1).max(100),
    request_timeout_ms: z.number().int().positive(),
  })
  .strict()

export type StoreConfig = z.infer<typeof StoreConfigSchema>

// ---------------------------------------------------------------------------
// Monitoring and healing
// ---------------------------------------------------------------------------

export const MonitorConfigSchema = z
  .object({
    poll_interval_ms: z.number().int().positive(),
    max_wait_ms: z.number().int().positive(),
  })
  .strict()

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>

export const ErrorPatternConfigSchema = z
  .object({
    /** Case-insensitive regular expression matched against the log tail */
    pattern: z.string().min(1),
    error_class: z.string().min(1),
  })
  .strict()

export type ErrorPatternConfig = z.infer<typeof ErrorPatternConfigSchema>

export const HealingConfigSchema = z
  .object({
    max_attempts: z.number().int().min(0).max(50),
    /** Characters of failed-job log sent to the model */
    log_tail_chars: z.number().int().min(200),
    /** Checked before the built-in pattern table */
    extra_patterns: z.array(ErrorPatternConfigSchema),
  })
  .strict()

export type HealingConfig = z.infer<typeof HealingConfigSchema>

// ---------------------------------------------------------------------------
// Artifact normalization and learning
// ---------------------------------------------------------------------------

export const NormalizerConfigSchema = z
  .object({
    learning_stage: z.string().min(1),
    notify_stage: z.string().min(1),
    learning_job: z.string().min(1),
    callback_variable: z.string().regex(/^[A-Z_][A-Z0-9_]*$/),
    callback_url: z.string().url(),
  })
  .strict()

export type NormalizerConfig = z.infer<typeof NormalizerConfigSchema>

export const LearningConfigSchema = z
  .object({
    enabled: z.boolean(),
    /** Jobs that may be `skipped` in an otherwise successful execution */
    exempt_skipped_jobs: z.array(z.string()),
    /** Earlier fixes offered per prompt; 0 disables fix feedback in prompts */
    feedback_limit: z.number().int().min(0).max(20),
  })
  .strict()

export type LearningConfig = z.infer<typeof LearningConfigSchema>

// ---------------------------------------------------------------------------
// HTTP server
// ---------------------------------------------------------------------------

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  })
  .strict()

export type ServerConfig = z.infer<typeof ServerConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

const PipewrightConfigObjectSchema = z
  .object({
    global: GlobalSettingsSchema,
    vcs: VcsConfigSchema,
    model: ModelConfigSchema,
    store: StoreConfigSchema,
    monitor: MonitorConfigSchema,
    healing: HealingConfigSchema,
    normalizer: NormalizerConfigSchema,
    learning: LearningConfigSchema,
    server: ServerConfigSchema,
  })
  .strict()

export const PipewrightConfigSchema = PipewrightConfigObjectSchema.superRefine((config, ctx) => {
  // Every outbound call must finish before the next status poll is due
  const timeouts: [section: 'vcs' | 'model' | 'store', key: string, ms: number][] = [
    ['vcs', 'request_timeout_ms', config.vcs.request_timeout_ms],
    ['model', 'timeout_ms', config.model.timeout_ms],
    ['store', 'request_timeout_ms', config.store.request_timeout_ms],
  ]
  for (const [section, key, ms] of timeouts) {
    if (ms >= config.monitor.poll_interval_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [section, key],
        message: 'must be shorter than monitor.poll_interval_ms',
      })
    }
  }
  if (config.monitor.max_wait_ms < config.monitor.poll_interval_ms) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['monitor', 'max_wait_ms'],
      message: 'must be at least monitor.poll_interval_ms',
    })
  }
})

export type PipewrightConfig = z.infer<typeof PipewrightConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allows partial documents during load before merging)
// ---------------------------------------------------------------------------

export const PartialPipewrightConfigSchema = z
  .object({
    global: GlobalSettingsSchema.partial().optional(),
    vcs: VcsConfigSchema.partial().optional(),
    model: ModelConfigSchema.partial().optional(),
    store: StoreConfigSchema.partial().optional(),
    monitor: MonitorConfigSchema.partial().optional(),
    healing: HealingConfigSchema.partial().optional(),
    normalizer: NormalizerConfigSchema.partial().optional(),
    learning: LearningConfigSchema.partial().optional(),
    server: ServerConfigSchema.partial().optional(),
  })
  .strict()

export type PartialPipewrightConfig = z.infer<typeof PartialPipewrightConfigSchema>

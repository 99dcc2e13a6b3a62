/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, coerceScalar, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export { PipewrightConfigSchema, PartialPipewrightConfigSchema } from './config-schema.js'
export type {
  PipewrightConfig,
  PartialPipewrightConfig,
  VcsConfig,
  ModelConfig,
  StoreConfig,
  MonitorConfig,
  HealingConfig,
  NormalizerConfig,
  LearningConfig,
  ServerConfig,
  ErrorPatternConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'

/**
 * Logger utility for Pipewright
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Loggers whose level follows setLogLevel() */
const managed = new Set<pino.Logger>()
let configuredLevel: string | undefined

/** LOG_LEVEL wins over the configured level, which wins over the NODE_ENV default */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // CLI use without NODE_ENV
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  const instance = pretty
    ? pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino(baseOptions)

  if (options.level === undefined) managed.add(instance)
  return instance
}

/**
 * Apply `global.log_level` to every logger created without an explicit
 * level. A LOG_LEVEL environment variable takes precedence.
 */
export function setLogLevel(level: string): void {
  configuredLevel = level
  const effective = getDefaultLogLevel()
  for (const instance of managed) {
    instance.level = effective
  }
}

/** Root application logger */
export const logger = createLogger('pipewright')

/** Create a child logger with additional context */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}

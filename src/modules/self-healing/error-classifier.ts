/**
 * Failure classification for job logs.
 *
 * The built-in table is compiled once at module load. Patterns are tried
 * in order, configured extras first; the first match wins.
 */

import { ConfigError, errorMessage } from '../../core/errors.js'
import type { ErrorPatternConfig } from '../config/config-schema.js'

export const UNCLASSIFIED = 'unclassified'

export interface ErrorPattern {
  readonly pattern: RegExp
  readonly errorClass: string
}

export interface Classification {
  readonly errorClass: string
  /** Up to five log lines that matched the winning pattern */
  readonly evidence: readonly string[]
}

const MAX_EVIDENCE_LINES = 5

export const BUILT_IN_PATTERNS: readonly ErrorPattern[] = [
  { pattern: /manifest unknown|image not found|pull access denied/i, errorClass: 'image_not_found' },
  { pattern: /connection refused|cannot connect/i, errorClass: 'service_connection' },
  { pattern: /command not found|no such file/i, errorClass: 'missing_command' },
  { pattern: /compilation failed|build failed|compile error/i, errorClass: 'build_failure' },
  { pattern: /permission denied|access denied/i, errorClass: 'permission_error' },
  // before timeout_error: "TLS handshake timeout" is a network failure
  { pattern: /TLS handshake|x509|certificate|\bssl\b/i, errorClass: 'tls_network_error' },
  { pattern: /timeout|timed out/i, errorClass: 'timeout_error' },
  { pattern: /artifact.*not found|no artifacts/i, errorClass: 'artifact_missing' },
  { pattern: /yaml.*error|syntax error/i, errorClass: 'yaml_syntax' },
  { pattern: /invalid.*stage|unknown stage/i, errorClass: 'invalid_stage' },
]

/** @throws {ConfigError} when a configured pattern is not a valid regular expression */
export function compilePatterns(extra: readonly ErrorPatternConfig[]): ErrorPattern[] {
  return extra.map(({ pattern, error_class }) => {
    try {
      return { pattern: new RegExp(pattern, 'i'), errorClass: error_class }
    } catch (err) {
      throw new ConfigError(`Invalid healing pattern "${pattern}": ${errorMessage(err)}`, { pattern })
    }
  })
}

export class ErrorClassifier {
  private readonly _patterns: readonly ErrorPattern[]

  constructor(extra: readonly ErrorPatternConfig[] = []) {
    this._patterns = [...compilePatterns(extra), ...BUILT_IN_PATTERNS]
  }

  classify(logText: string): Classification {
    for (const { pattern, errorClass } of this._patterns) {
      if (!pattern.test(logText)) continue
      const evidence = logText
        .split('\n')
        .filter((line) => pattern.test(line))
        .map((line) => line.trim())
        .slice(0, MAX_EVIDENCE_LINES)
      return { errorClass, evidence }
    }
    return { errorClass: UNCLASSIFIED, evidence: [] }
  }
}

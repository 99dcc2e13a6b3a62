/**
 * Credential masking utilities for CLI output, status events and Pino logger redaction.
 *
 * VCS tokens and model API keys must never appear in logs, status events
 * or error messages.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify credential values inside free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // GitLab personal / project access tokens: glpat-...
  /glpat-[A-Za-z0-9_-]{20,}/g,
  // GitHub tokens: ghp_..., github_pat_...
  /gh[pousr]_[A-Za-z0-9]{30,}/g,
  /github_pat_[A-Za-z0-9_]{30,}/g,
  // OpenAI-style keys: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // PRIVATE-TOKEN header echoed into a log line
  /(PRIVATE-TOKEN:\s*)\S+/gi,
  // Bearer tokens
  /(Bearer\s+)[A-Za-z0-9._~+/-]{16,}=*/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'credential',
  'token',
  'apiKey',
  'api_key',
  '*.credential',
  '*.token',
  '*.apiKey',
  '*.api_key',
  'request.credential',
  'headers.authorization',
  'headers["private-token"]',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known credential patterns in a string with `***`.
 *
 * Best-effort scrub for log messages and error strings; it does NOT
 * guarantee removal of every possible secret format.
 */
export function maskSecrets(input: string, knownSecrets: readonly string[] = []): string {
  let result = input
  for (const secret of knownSecrets) {
    if (secret.length >= 4) {
      result = result.split(secret).join(MASKED_VALUE)
    }
  }
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, (match: string, prefix: unknown) =>
      typeof prefix === 'string' && match.startsWith(prefix) ? `${prefix}${MASKED_VALUE}` : MASKED_VALUE
    )
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

/**
 * Credential field names that should be replaced with `***` in displayed output.
 */
const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'api_key_value',
  'token',
  'credential',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 *
 * Only operates on plain objects and arrays; primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}

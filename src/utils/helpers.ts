/**
 * General utility helpers for Pipewright
 */

import { randomUUID, randomBytes, createHash } from 'node:crypto'
import { setTimeout as delay } from 'node:timers/promises'

/** Signature of an optionally abortable sleep; injected by tests */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Sleep for a given number of milliseconds.
 * Rejects with the signal's reason when aborted mid-sleep.
 */
export const sleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined)
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/** Short random hex suffix (for branch names created within the same second) */
export function randomSuffix(bytes = 3): string {
  return randomBytes(bytes).toString('hex')
}

/** Hex SHA-256 digest of a UTF-8 string */
export function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex')
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Format a date as a compact UTC timestamp: `yyyyMMdd-HHmmss`
 */
export function compactTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return (
    `${String(date.getUTCFullYear())}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

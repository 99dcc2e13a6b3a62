/**
 * Shared JSON-over-HTTP call for the model backends.
 */

import type { ZodType } from 'zod'
import { ModelTimeoutError, ModelUnavailableError, errorMessage } from '../../core/errors.js'
import { maskSecrets } from '../../utils/masking.js'

export interface ModelRequest<T> {
  readonly label: string
  readonly url: string
  readonly body: unknown
  readonly headers?: Record<string, string>
  readonly timeoutMs: number
  readonly schema: ZodType<T>
  readonly fetchImpl: typeof fetch
  readonly signal?: AbortSignal
  /** Masked out of any error message */
  readonly secrets?: readonly string[]
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError'
}

export async function postModelRequest<T>(request: ModelRequest<T>): Promise<T> {
  const { label, url, timeoutMs } = request
  const timeout = AbortSignal.timeout(timeoutMs)
  const signal = request.signal !== undefined ? AbortSignal.any([request.signal, timeout]) : timeout
  const secrets = request.secrets ?? []

  let res: Response
  let text: string
  try {
    res = await request.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...request.headers },
      body: JSON.stringify(request.body),
      signal,
    })
    text = await res.text()
  } catch (err) {
    if (isTimeout(err)) {
      throw new ModelTimeoutError(timeoutMs, { url })
    }
    throw new ModelUnavailableError(
      `${label} connection failed (${url}): ${maskSecrets(errorMessage(err), secrets)}`,
      { url },
      { cause: err },
    )
  }

  if (!res.ok) {
    throw new ModelUnavailableError(
      `${label} returned HTTP ${String(res.status)}: ${maskSecrets(text.slice(0, 200), secrets)}`,
      { url, status: res.status },
    )
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch {
    throw new ModelUnavailableError(
      `${label} returned non-JSON response (HTTP ${String(res.status)}): ${text.slice(0, 200)}`,
      { url, status: res.status },
    )
  }

  const parsed = request.schema.safeParse(data)
  if (!parsed.success) {
    throw new ModelUnavailableError(`${label} returned an unexpected response shape`, {
      url,
      issues: parsed.error.issues,
    })
  }
  return parsed.data
}

/**
 * ModelClient - boundary to the generative text model.
 *
 * The orchestrator never depends on a particular model; it sends a system
 * prompt plus a context block and receives text back.
 */

export type ModelProviderName = 'ollama' | 'openai'

export interface ModelCallOptions {
  /** Cancels the in-flight request (the per-call timeout still applies) */
  signal?: AbortSignal
}

export interface ModelClient {
  readonly provider: ModelProviderName
  readonly model: string

  /**
   * Run one completion.
   * @throws {ModelUnavailableError} when the endpoint cannot be reached or answers with an error
   * @throws {ModelTimeoutError} when no answer arrives within the configured timeout
   */
  complete(systemPrompt: string, context: string, options?: ModelCallOptions): Promise<string>
}

export interface ModelClientOptions {
  baseUrl: string
  model: string
  timeoutMs: number
  temperature: number
  apiKey?: string
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch
}

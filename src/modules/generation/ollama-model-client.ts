/**
 * Ollama backend: POST /api/chat, non-streaming.
 *
 * Default base URL: http://localhost:11434
 */

import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import type { ModelCallOptions, ModelClient, ModelClientOptions } from './model-client.js'
import { postModelRequest } from './model-http.js'

const logger = createLogger('model:ollama')

export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434'

const OllamaChatResponseSchema = z.object({
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
})

export class OllamaModelClient implements ModelClient {
  readonly provider = 'ollama'
  readonly model: string
  private readonly _baseUrl: string
  private readonly _timeoutMs: number
  private readonly _temperature: number
  private readonly _fetch: typeof fetch

  constructor(options: ModelClientOptions) {
    this._baseUrl = (options.baseUrl || OLLAMA_DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.model = options.model
    this._timeoutMs = options.timeoutMs
    this._temperature = options.temperature
    this._fetch = options.fetchImpl ?? fetch
  }

  async complete(systemPrompt: string, context: string, options: ModelCallOptions = {}): Promise<string> {
    const started = Date.now()
    const data = await postModelRequest({
      label: 'Ollama',
      url: `${this._baseUrl}/api/chat`,
      body: {
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: context },
        ],
        stream: false,
        options: { temperature: this._temperature },
      },
      timeoutMs: this._timeoutMs,
      schema: OllamaChatResponseSchema,
      fetchImpl: this._fetch,
      signal: options.signal,
    })
    logger.debug(
      { model: this.model, ms: Date.now() - started, evalCount: data.eval_count },
      'Ollama completion finished',
    )
    return data.message.content
  }
}

/**
 * OpenAI-compatible backend: POST /v1/chat/completions.
 *
 * Works against any server that speaks the chat-completions wire format
 * (vLLM, LocalAI, hosted APIs). The API key is optional.
 */

import { z } from 'zod'
import { ModelUnavailableError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ModelCallOptions, ModelClient, ModelClientOptions } from './model-client.js'
import { postModelRequest } from './model-http.js'

const logger = createLogger('model:openai')

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
})

/** Accept base URLs given with or without the /v1 suffix */
export function chatCompletionsUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '')
  return trimmed.endsWith('/v1') ? `${trimmed}/chat/completions` : `${trimmed}/v1/chat/completions`
}

export class OpenAiModelClient implements ModelClient {
  readonly provider = 'openai'
  readonly model: string
  private readonly _url: string
  private readonly _apiKey: string | undefined
  private readonly _timeoutMs: number
  private readonly _temperature: number
  private readonly _fetch: typeof fetch

  constructor(options: ModelClientOptions) {
    this._url = chatCompletionsUrl(options.baseUrl)
    this.model = options.model
    this._apiKey = options.apiKey
    this._timeoutMs = options.timeoutMs
    this._temperature = options.temperature
    this._fetch = options.fetchImpl ?? fetch
  }

  async complete(systemPrompt: string, context: string, options: ModelCallOptions = {}): Promise<string> {
    const headers: Record<string, string> = {}
    if (this._apiKey !== undefined && this._apiKey !== '') {
      headers['Authorization'] = `Bearer ${this._apiKey}`
    }

    const data = await postModelRequest({
      label: 'Chat completions endpoint',
      url: this._url,
      body: {
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: context },
        ],
        temperature: this._temperature,
      },
      headers,
      timeoutMs: this._timeoutMs,
      schema: ChatCompletionResponseSchema,
      fetchImpl: this._fetch,
      signal: options.signal,
      secrets: this._apiKey !== undefined ? [this._apiKey] : [],
    })

    const choice = data.choices[0]
    if (choice === undefined) {
      throw new ModelUnavailableError('Chat completions endpoint returned no choices', { url: this._url })
    }
    logger.debug({ model: this.model, finishReason: choice.finish_reason }, 'Completion finished')
    return choice.message.content ?? ''
  }
}

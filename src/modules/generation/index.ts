/**
 * Generation module: coordinator, model backends, prompts and validation.
 */

import type { ModelConfig } from '../config/config-schema.js'
import type { ModelClient } from './model-client.js'
import { OllamaModelClient } from './ollama-model-client.js'
import { OpenAiModelClient } from './openai-model-client.js'

export {
  createGenerationCoordinator,
  GenerationCoordinatorImpl,
  type GenerationCoordinatorOptions,
} from './generation-coordinator-impl.js'
export type { GenerationCoordinator, GenerationContext, GenerationResult } from './generation-coordinator.js'
export type { ModelClient, ModelClientOptions, ModelCallOptions, ModelProviderName } from './model-client.js'
export { OllamaModelClient, OLLAMA_DEFAULT_BASE_URL } from './ollama-model-client.js'
export { OpenAiModelClient, chatCompletionsUrl } from './openai-model-client.js'
export { validateArtifact, validatePipelineDefinition, validateImageBuildDefinition } from './pipeline-validator.js'
export {
  generationSystemPrompt,
  buildGenerationContext,
  feedbackSection,
  lintErrorSection,
  type GenerationPromptInput,
} from './prompts.js'
export { serverLintErrors, type PipelineLinter } from './server-lint.js'

/** Build the model client selected by `model.provider` */
export function createModelClient(config: ModelConfig, fetchImpl?: typeof fetch): ModelClient {
  const options = {
    baseUrl: config.base_url,
    model: config.model,
    timeoutMs: config.timeout_ms,
    temperature: config.temperature,
    apiKey: config.api_key,
    fetchImpl,
  }
  switch (config.provider) {
    case 'ollama':
      return new OllamaModelClient(options)
    case 'openai':
      return new OpenAiModelClient(options)
  }
}

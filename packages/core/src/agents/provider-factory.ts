/**
 * Provider factory — creates LLM provider instances from configuration.
 */

import { TripwireError } from '../common/index.js'
import type { LLMProvider } from './provider.js'
import { AnthropicProvider } from './anthropic-provider.js'
import { OpenAIProvider } from './openai-provider.js'
import { OllamaProvider } from './ollama-provider.js'

export type ProviderName = 'anthropic' | 'openai' | 'ollama'

export interface ProviderConfig {
  provider: ProviderName
  model?: string
  apiKey?: string
  ollamaBaseUrl?: string
  maxTokens?: number
}

/** Default model per provider — used when the config names none. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
  ollama: 'llama3.1',
}

/**
 * Create a provider instance from configuration.
 * Throws if required fields are missing (e.g., apiKey for non-Ollama providers).
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  const model = config.model ?? DEFAULT_MODELS[config.provider]
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) throw TripwireError.config('Anthropic API key is required')
      return new AnthropicProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'openai': {
      if (!config.apiKey) throw TripwireError.config('OpenAI API key is required')
      return new OpenAIProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'ollama': {
      return new OllamaProvider({ model, baseUrl: config.ollamaBaseUrl, maxTokens: config.maxTokens })
    }
    default: {
      const _exhaustive: never = config.provider
      throw TripwireError.config(`Unknown provider: ${String(_exhaustive)}`)
    }
  }
}

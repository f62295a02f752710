/**
 * Ollama provider — local LLMs via the OpenAI-compatible API at `${base}/v1`.
 */

import { TripwireError } from '../common/index.js'
import { OpenAIProvider } from './openai-provider.js'

export interface OllamaProviderOptions {
  model: string
  baseUrl?: string
  maxTokens?: number
}

/**
 * Normalize Ollama base URL: trim trailing slashes, strip /v1 suffix if present,
 * validate starts with http:// or https://. Prevents /v1/v1 double-suffix.
 */
export function normalizeOllamaUrl(url: string): string {
  let normalized = url.trim().replace(/\/+$/, '')
  if (normalized.endsWith('/v1')) {
    normalized = normalized.slice(0, -3)
  }
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    throw TripwireError.config(`Ollama URL must start with http:// or https://, got: ${normalized}`)
  }
  return normalized
}

export class OllamaProvider extends OpenAIProvider {
  override readonly name = 'ollama'

  constructor(options: OllamaProviderOptions) {
    const base = normalizeOllamaUrl(options.baseUrl ?? 'http://localhost:11434')
    super({
      apiKey: 'ollama', // Ollama ignores the key
      model: options.model,
      baseUrl: `${base}/v1`,
      maxTokens: options.maxTokens,
    })
  }
}

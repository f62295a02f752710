/**
 * LLM provider interface shared by the Anthropic, OpenAI and Ollama implementations.
 */

import type { Result } from '../common/index.js'
import type { TripwireError } from '../common/index.js'

export interface ChatMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatOptions {
  temperature?: number
  signal?: AbortSignal
}

export interface LLMProvider {
  name: string
  chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, TripwireError>>
}

/**
 * Anthropic (Claude) implementation of the LLM provider interface.
 */

import Anthropic from '@anthropic-ai/sdk'
import { Ok, Err, TripwireError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'

export interface AnthropicProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic'
  private readonly client: Anthropic
  private readonly model: string
  private readonly maxTokens: number

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey })
    this.model = options.model ?? 'claude-sonnet-4-20250514'
    this.maxTokens = options.maxTokens ?? 4096
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options: ChatOptions = {},
  ): Promise<Result<string, TripwireError>> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: systemPrompt,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          temperature: options.temperature,
        },
        { signal: options.signal },
      )

      const textBlock = response.content.find((block) => block.type === 'text')
      if (!textBlock || textBlock.type !== 'text') {
        return Err(TripwireError.llm('No text content in response'))
      }

      return Ok(textBlock.text)
    } catch (error) {
      return Err(TripwireError.llm(errorMessage(error)))
    }
  }
}

/**
 * Agents — LLM providers and structured completion.
 */

export type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'
export { AnthropicProvider } from './anthropic-provider.js'
export type { AnthropicProviderOptions } from './anthropic-provider.js'
export { OpenAIProvider } from './openai-provider.js'
export type { OpenAIProviderOptions } from './openai-provider.js'
export { OllamaProvider, normalizeOllamaUrl } from './ollama-provider.js'
export type { OllamaProviderOptions } from './ollama-provider.js'
export { createProvider, DEFAULT_MODELS } from './provider-factory.js'
export type { ProviderName, ProviderConfig } from './provider-factory.js'
export { ProviderStructuredCompleter, stripCodeFences } from './structured.js'

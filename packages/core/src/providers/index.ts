export type { LLMProvider, ChatMessage, ChatOptions } from './provider.js'
export { AnthropicProvider } from './anthropic-provider.js'
export type { AnthropicProviderOptions } from './anthropic-provider.js'
export { OpenAIProvider } from './openai-provider.js'
export type { OpenAIProviderOptions } from './openai-provider.js'
export { OllamaProvider, normalizeOllamaUrl, DEFAULT_OLLAMA_URL } from './ollama-provider.js'
export type { OllamaProviderOptions } from './ollama-provider.js'
export { GeminiProvider } from './gemini-provider.js'
export type { GeminiProviderOptions } from './gemini-provider.js'
export { createProvider, KNOWN_MODELS, DEFAULT_MODELS, PROVIDER_NAMES } from './provider-factory.js'
export type { ProviderConfig, ProviderName } from './provider-factory.js'

/**
 * Provider factory: creates LLM provider instances from configuration.
 *
 * Known model lists feed client dropdowns; custom model strings are always accepted.
 */

import { Ok, Err, StudioError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { LLMProvider } from './provider.js'
import { AnthropicProvider } from './anthropic-provider.js'
import { OpenAIProvider } from './openai-provider.js'
import { OllamaProvider, normalizeOllamaUrl, DEFAULT_OLLAMA_URL } from './ollama-provider.js'
import { GeminiProvider } from './gemini-provider.js'

export const PROVIDER_NAMES = ['anthropic', 'openai', 'ollama', 'gemini'] as const
export type ProviderName = (typeof PROVIDER_NAMES)[number]

export interface ProviderConfig {
  provider: ProviderName
  model: string
  apiKey?: string
  ollamaBaseUrl?: string
  maxTokens?: number
}

export const KNOWN_MODELS: Record<ProviderName, string[]> = {
  anthropic: ['claude-sonnet-4-20250514', 'claude-haiku-4-5-20251001'],
  openai: ['gpt-4o', 'gpt-4o-mini', 'gpt-4.1', 'o3-mini'],
  ollama: ['qwen3:30b-a3b', 'qwen3:32b', 'llama3.1', 'mistral'],
  gemini: ['gemini-2.5-flash', 'gemini-2.5-pro'],
}

/** Used when settings name a provider but no model. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
  ollama: 'qwen3:30b-a3b',
  gemini: 'gemini-2.5-flash',
}

/** Create a provider. A missing API key is an AUTH_ERROR. */
export function createProvider(config: ProviderConfig): Result<LLMProvider, StudioError> {
  const model = config.model.trim() || DEFAULT_MODELS[config.provider]
  if (model.length > 128) return Err(StudioError.validation('Model name must be at most 128 characters'))

  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) return Err(StudioError.auth('Anthropic API key is required'))
      return Ok(new AnthropicProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens }))
    }
    case 'openai': {
      if (!config.apiKey) return Err(StudioError.auth('OpenAI API key is required'))
      return Ok(new OpenAIProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens }))
    }
    case 'ollama': {
      const base = normalizeOllamaUrl(config.ollamaBaseUrl || DEFAULT_OLLAMA_URL)
      if (!base.ok) return base
      return Ok(new OllamaProvider({ model, baseUrl: base.value, maxTokens: config.maxTokens }))
    }
    case 'gemini': {
      if (!config.apiKey) return Err(StudioError.auth('Gemini API key is required'))
      return Ok(new GeminiProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens }))
    }
    default: {
      const _exhaustive: never = config.provider
      return Err(StudioError.validation(`Unknown provider: ${String(_exhaustive)}`))
    }
  }
}

import { describe, it, expect } from 'vitest'
import {
  createProvider,
  KNOWN_MODELS,
  DEFAULT_MODELS,
  PROVIDER_NAMES,
  AnthropicProvider,
  OpenAIProvider,
  OllamaProvider,
  GeminiProvider,
} from '../../src/providers/index.js'

describe('createProvider', () => {
  it('creates each provider from its settings', () => {
    const anthropic = createProvider({ provider: 'anthropic', model: 'claude-sonnet-4-20250514', apiKey: 'test-key' })
    expect(anthropic.ok && anthropic.value).toBeInstanceOf(AnthropicProvider)

    const openai = createProvider({ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' })
    expect(openai.ok && openai.value).toBeInstanceOf(OpenAIProvider)

    const gemini = createProvider({ provider: 'gemini', model: 'gemini-2.5-flash', apiKey: 'test-key' })
    expect(gemini.ok && gemini.value).toBeInstanceOf(GeminiProvider)

    const ollama = createProvider({ provider: 'ollama', model: 'llama3.1', ollamaBaseUrl: 'http://localhost:11434/v1/' })
    expect(ollama.ok && ollama.value).toBeInstanceOf(OllamaProvider)
    if (ollama.ok) expect(ollama.value.name).toBe('ollama')
  })

  it('falls back to the default model for a blank model name', () => {
    const result = createProvider({ provider: 'gemini', model: '  ', apiKey: 'test-key' })
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.model).toBe('gemini-2.5-flash')
  })

  it('requires an API key for hosted providers', () => {
    for (const provider of ['anthropic', 'openai', 'gemini'] as const) {
      const result = createProvider({ provider, model: 'x' })
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('AUTH_ERROR')
    }
  })

  it('does not need a key for Ollama but checks its URL', () => {
    expect(createProvider({ provider: 'ollama', model: 'llama3.1' }).ok).toBe(true)

    const bad = createProvider({ provider: 'ollama', model: 'llama3.1', ollamaBaseUrl: 'localhost:11434' })
    expect(bad.ok).toBe(false)
    if (!bad.ok) expect(bad.error.code).toBe('VALIDATION_ERROR')
  })

  it('rejects absurdly long model names', () => {
    const result = createProvider({ provider: 'openai', model: 'm'.repeat(129), apiKey: 'test-key' })
    expect(result.ok).toBe(false)
  })
})

describe('model lists', () => {
  it('have a default and at least one known model for every provider', () => {
    for (const name of PROVIDER_NAMES) {
      expect(KNOWN_MODELS[name].length).toBeGreaterThan(0)
      expect(KNOWN_MODELS[name]).toContain(DEFAULT_MODELS[name])
    }
  })
})

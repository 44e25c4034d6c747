/**
 * Ollama provider: local LLMs via the OpenAI-compatible API.
 *
 * Completions go to ${base}/v1; model listing uses the native ${base}/api/tags.
 */

import { z } from 'zod'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { OpenAIProvider } from './openai-provider.js'

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
})

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434'

export interface OllamaProviderOptions {
  model: string
  baseUrl?: string
  maxTokens?: number
}

/**
 * Trim trailing slashes and a trailing /v1, and require an http(s) scheme.
 */
export function normalizeOllamaUrl(url: string): Result<string, StudioError> {
  let normalized = url.trim().replace(/\/+$/, '')
  if (normalized.endsWith('/v1')) {
    normalized = normalized.slice(0, -3)
  }
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    return Err(StudioError.validation(`Ollama URL must start with http:// or https://, got: ${normalized}`))
  }
  return Ok(normalized)
}

export class OllamaProvider extends OpenAIProvider {
  override readonly name = 'ollama'
  private readonly ollamaBaseUrl: string

  /** `baseUrl` must already be normalized. */
  constructor(options: OllamaProviderOptions) {
    const base = options.baseUrl ?? DEFAULT_OLLAMA_URL
    super({
      apiKey: 'ollama', // Ollama ignores the key
      model: options.model,
      baseUrl: `${base}/v1`,
      maxTokens: options.maxTokens,
    })
    this.ollamaBaseUrl = base
  }

  /** Installed models, from the native API. */
  async listModels(): Promise<Result<string[], StudioError>> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), 5000)
    try {
      const res = await fetch(`${this.ollamaBaseUrl}/api/tags`, { signal: controller.signal })
      if (!res.ok) return Err(StudioError.service(`Ollama returned HTTP ${res.status}`))
      const data = TagsResponseSchema.safeParse(await res.json())
      if (!data.success) return Err(StudioError.service('Ollama returned an unexpected model list'))
      return Ok(data.data.models.map((m) => m.name))
    } catch (error) {
      return Err(StudioError.service(`Ollama is unreachable: ${errorMessage(error)}`))
    } finally {
      clearTimeout(timeout)
    }
  }
}

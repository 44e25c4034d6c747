/**
 * OpenAI implementation of the LLM provider interface.
 *
 * Also serves as base class for OllamaProvider (OpenAI-compatible API).
 */

import OpenAI from 'openai'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'

export interface OpenAIProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
  baseUrl?: string
}

export class OpenAIProvider implements LLMProvider {
  readonly name: string = 'openai'
  readonly model: string
  protected readonly client: OpenAI
  protected readonly maxTokens: number

  constructor(options: OpenAIProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    })
    this.model = options.model ?? 'gpt-4o'
    this.maxTokens = options.maxTokens ?? 4096
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, StudioError>> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [
            { role: 'system', content: systemPrompt },
            ...messages.map((m) => ({ role: m.role, content: m.content })),
          ],
        },
        { signal: options?.signal },
      )

      const content = response.choices?.[0]?.message?.content
      if (!content) {
        return Err(StudioError.service('No text content in response'))
      }
      return Ok(content)
    } catch (error) {
      return Err(StudioError.service(`${this.name} request failed: ${errorMessage(error)}`))
    }
  }
}

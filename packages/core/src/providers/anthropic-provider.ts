/**
 * Anthropic (Claude) implementation of the LLM provider interface.
 */

import Anthropic from '@anthropic-ai/sdk'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'

export interface AnthropicProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic'
  readonly model: string
  private readonly client: Anthropic
  private readonly maxTokens: number

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey })
    this.model = options.model ?? 'claude-sonnet-4-20250514'
    this.maxTokens = options.maxTokens ?? 4096
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, StudioError>> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: systemPrompt,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
        },
        { signal: options?.signal },
      )

      const text = response.content
        .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('')
      if (!text) {
        return Err(StudioError.service('No text content in response'))
      }
      return Ok(text)
    } catch (error) {
      return Err(StudioError.service(`Anthropic request failed: ${errorMessage(error)}`))
    }
  }
}

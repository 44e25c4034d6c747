/**
 * Google Gemini implementation of the LLM provider interface.
 */

import { GoogleGenAI } from '@google/genai'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'

export interface GeminiProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
}

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini'
  readonly model: string
  private readonly ai: GoogleGenAI
  private readonly maxTokens: number

  constructor(options: GeminiProviderOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey })
    this.model = options.model ?? 'gemini-2.5-flash'
    this.maxTokens = options.maxTokens ?? 4096
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, StudioError>> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: messages.map((m) => ({
          role: m.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: m.content }],
        })),
        config: {
          systemInstruction: systemPrompt,
          maxOutputTokens: this.maxTokens,
          abortSignal: options?.signal,
        },
      })
      const text = response.text
      if (!text) {
        return Err(StudioError.service('No text content in response'))
      }
      return Ok(text)
    } catch (error) {
      return Err(StudioError.service(`Gemini request failed: ${errorMessage(error)}`))
    }
  }
}

/**
 * LLM provider interface shared by every backend (Anthropic, OpenAI, Ollama, Gemini).
 */

import type { Result } from '../common/index.js'
import type { StudioError } from '../common/index.js'

export interface ChatMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatOptions {
  signal?: AbortSignal
}

export interface LLMProvider {
  readonly name: string
  readonly model: string
  /** One non-streaming completion. Transport and API failures come back as SERVICE_ERROR. */
  chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, StudioError>>
}

/**
 * Image rendering for generated waypoints.
 */

import { GoogleGenAI, Modality } from '@google/genai'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface RenderedImage {
  data: Uint8Array
  /** Extension without the dot, e.g. `png`. */
  ext: string
}

export interface RenderOptions {
  /** e.g. `16:9` for forward views, `1:1` for ground views. */
  aspectRatio: string
  signal?: AbortSignal
}

export interface MediaRenderer {
  render(prompt: string, options: RenderOptions): Promise<Result<RenderedImage, StudioError>>
}

const MIME_EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
}

export interface GeminiImageRendererOptions {
  apiKey: string
  model?: string
}

export class GeminiImageRenderer implements MediaRenderer {
  private readonly ai: GoogleGenAI
  private readonly model: string

  constructor(options: GeminiImageRendererOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey })
    this.model = options.model ?? 'gemini-2.5-flash-image'
  }

  async render(prompt: string, options: RenderOptions): Promise<Result<RenderedImage, StudioError>> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: `${prompt}\nAspect ratio ${options.aspectRatio}.`,
        config: {
          responseModalities: [Modality.IMAGE, Modality.TEXT],
          abortSignal: options.signal,
        },
      })
      const parts = response.candidates?.[0]?.content?.parts ?? []
      for (const part of parts) {
        const inline = part.inlineData
        if (inline?.data) {
          const ext = MIME_EXTENSIONS[inline.mimeType ?? 'image/png'] ?? 'png'
          return Ok({ data: Buffer.from(inline.data, 'base64'), ext })
        }
      }
      return Err(StudioError.service('No image generated from the prompt'))
    } catch (error) {
      return Err(StudioError.service(`Image generation failed: ${errorMessage(error)}`))
    }
  }
}

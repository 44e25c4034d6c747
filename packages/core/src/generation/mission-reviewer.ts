/**
 * Review of rendered missions by a vision model. The reviewer looks at every waypoint
 * image against the mission instruction and returns a verdict with a confidence score.
 */

import { GoogleGenAI } from '@google/genai'
import type { Part } from '@google/genai'
import { z } from 'zod'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { Mission, MissionValidation } from '../projects/index.js'
import { extractJson } from './output-parser.js'

export const DEFAULT_REVIEW_THRESHOLD = 0.75

export interface ReviewImage {
  waypointId: string
  label: string
  data: Uint8Array
  /** Extension without the dot, e.g. `png`. */
  ext: string
}

export interface ReviewRequest {
  mission: Mission
  images: ReviewImage[]
  signal?: AbortSignal
}

export interface MissionReviewer {
  review(request: ReviewRequest): Promise<Result<MissionValidation, StudioError>>
}

export type ReviewPromptPart = { kind: 'text'; text: string } | { kind: 'image'; image: ReviewImage }

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
}

export function buildReviewPrompt(mission: Mission, images: ReviewImage[]): ReviewPromptPart[] {
  const parts: ReviewPromptPart[] = [
    {
      kind: 'text',
      text: [
        'You review generated drone missions for quality.',
        'Decide whether the waypoint images match the mission instruction.',
        '',
        `Mission type: ${mission.missionType}`,
        `Instruction: "${mission.instruction}"`,
        '',
        'Give a confidence_score between 0.0 and 1.0 based on how clearly the images show the expected entities.',
        '1.0 means the entity is sharp and matches. 0.5 means it is blurry, occluded or ambiguous. 0.0 means it is missing.',
        'Set needs_human_review to true whenever you are not certain.',
      ].join('\n'),
    },
  ]

  for (const waypoint of mission.waypoints) {
    const role = waypoint.isTarget ? 'TARGET (must match)' : 'DISTRACTOR (must not match)'
    const entities = Object.entries(waypoint.gtEntities)
      .map(([key, value]) => `${key}=${value}`)
      .join(', ')
    parts.push({ kind: 'text', text: `Waypoint ${waypoint.id} [${role}] expected entities: ${entities || 'none'}` })
    for (const image of images) {
      if (image.waypointId !== waypoint.id) continue
      parts.push({ kind: 'text', text: `Image (${image.label}):` })
      parts.push({ kind: 'image', image })
    }
  }

  parts.push({
    kind: 'text',
    text: 'Reply with JSON only: {"mission_is_valid": boolean, "confidence_score": number, "needs_human_review": boolean, "reasoning": string}',
  })
  return parts
}

const ReviewReplySchema = z.object({
  mission_is_valid: z.boolean(),
  confidence_score: z.number().min(0).max(1),
  needs_human_review: z.boolean(),
  reasoning: z.string(),
})

export function parseReviewReply(text: string): Result<MissionValidation, StudioError> {
  let raw: unknown
  try {
    raw = JSON.parse(extractJson(text))
  } catch {
    return Err(StudioError.validation('Review reply is not valid JSON'))
  }
  const parsed = ReviewReplySchema.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    return Err(StudioError.validation(`Review reply is malformed at ${first.path.join('.') || '(root)'}: ${first.message}`))
  }
  return Ok({
    isValid: parsed.data.mission_is_valid,
    confidence: parsed.data.confidence_score,
    needsHumanReview: parsed.data.needs_human_review,
    reasoning: parsed.data.reasoning,
  })
}

/** A verdict below the threshold always goes to a person, whatever the model said. */
export function applyReviewThreshold(validation: MissionValidation, threshold: number): MissionValidation {
  if (validation.confidence >= threshold || validation.needsHumanReview) return validation
  return {
    ...validation,
    needsHumanReview: true,
    reasoning: `${validation.reasoning} [review forced: confidence ${validation.confidence} is below ${threshold}]`,
  }
}

/** Verdict recorded when the reviewer could not be reached or gave an unusable reply. */
export function failedReview(message: string): MissionValidation {
  return { isValid: false, confidence: 0, needsHumanReview: true, reasoning: `Review failed: ${message}` }
}

export interface GeminiMissionReviewerOptions {
  apiKey: string
  model?: string
}

export class GeminiMissionReviewer implements MissionReviewer {
  private readonly ai: GoogleGenAI
  private readonly model: string

  constructor(options: GeminiMissionReviewerOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey })
    this.model = options.model ?? 'gemini-2.5-flash-lite'
  }

  async review(request: ReviewRequest): Promise<Result<MissionValidation, StudioError>> {
    const parts: Part[] = buildReviewPrompt(request.mission, request.images).map((part) =>
      part.kind === 'text'
        ? { text: part.text }
        : {
            inlineData: {
              mimeType: MIME_TYPES[part.image.ext] ?? 'image/png',
              data: Buffer.from(part.image.data).toString('base64'),
            },
          },
    )
    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: [{ role: 'user', parts }],
        config: {
          responseMimeType: 'application/json',
          temperature: 0.1,
          abortSignal: request.signal,
        },
      })
      return parseReviewReply(response.text ?? '')
    } catch (error) {
      return Err(StudioError.service(`Mission review failed: ${errorMessage(error)}`))
    }
  }
}

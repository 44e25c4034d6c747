/**
 * Parse model output into missions.
 */

import { z } from 'zod'
import { Ok, Err, StudioError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { LandmarkCategorySchema, createMission, createWaypoint } from '../projects/index.js'
import type { DatasetSplit, Landmark, Mission } from '../projects/index.js'
import { placeLandmarks } from './random.js'
import type { LandmarkDistribution, Rng } from './random.js'

const GeneratedLandmarkSchema = z.object({
  category: z.string().transform((c) => c.toLowerCase()).pipe(LandmarkCategorySchema),
  name: z.string().min(1),
  visual_attributes: z.string().default(''),
  text_content: z.union([z.string(), z.number()]).nullish().transform((v) => (v == null ? null : String(v))),
  position: z.tuple([z.number(), z.number()]),
})

const ForwardImageSchema = z.object({
  subject_description: z.string().min(1),
  environment_context: z.string().default(''),
  lighting_and_style: z.string().default(''),
  landmarks: z.array(GeneratedLandmarkSchema),
})
export type ForwardImagePrompt = z.infer<typeof ForwardImageSchema>

const GroundImageSchema = z.object({
  surface_texture: z.string().min(1),
  obstacles_and_debris: z.string().default(''),
  lighting_angle: z.string().default(''),
})
export type GroundImagePrompt = z.infer<typeof GroundImageSchema>

const GeneratedWaypointSchema = z.object({
  forward_image: ForwardImageSchema,
  ground_image: GroundImageSchema,
  secondary_ground_image: GroundImageSchema.nullish(),
  ground_is_obstructed: z.boolean(),
  is_target: z.boolean(),
})

export const GeneratedMissionSchema = z.object({
  mission_instruction: z.string().min(1),
  waypoints: z.array(GeneratedWaypointSchema),
})
export type GeneratedMission = z.infer<typeof GeneratedMissionSchema>

/** Strip code fences and surrounding prose, keeping the outermost JSON object. */
export function extractJson(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text)
  const body = fenced ? fenced[1] : text
  const start = body.indexOf('{')
  const end = body.lastIndexOf('}')
  return start !== -1 && end > start ? body.slice(start, end + 1) : body.trim()
}

export function parseGeneratedMission(text: string, expectedWaypoints: number): Result<GeneratedMission, StudioError> {
  let raw: unknown
  try {
    raw = JSON.parse(extractJson(text))
  } catch {
    return Err(StudioError.validation('Generated content is not valid JSON'))
  }

  const parsed = GeneratedMissionSchema.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    return Err(StudioError.validation(`Generated mission is malformed at ${first.path.join('.') || '(root)'}: ${first.message}`))
  }

  const mission = parsed.data
  if (mission.waypoints.length !== expectedWaypoints) {
    return Err(
      StudioError.validation(`Generated mission has ${mission.waypoints.length} waypoints, expected ${expectedWaypoints}`),
    )
  }
  const targets = mission.waypoints.filter((w) => w.is_target).length
  if (targets !== 1) {
    return Err(StudioError.validation(`Generated mission must have exactly one target waypoint, found ${targets}`))
  }
  return Ok(mission)
}

/** One sentence that makes the building the subject and binds the number to it. */
export function forwardRenderingPrompt(image: ForwardImagePrompt): string {
  const phrases = image.landmarks.map((l) =>
    l.category === 'house_number' && l.text_content
      ? `clearly displaying the number '${l.text_content}' which is ${l.visual_attributes}`
      : `with a ${l.name} (${l.visual_attributes}) nearby`,
  )
  return `${image.subject_description}, ${phrases.join(', ')}. ${image.environment_context}. ${image.lighting_and_style}.`
}

export function groundRenderingPrompt(image: GroundImagePrompt): string {
  return `Top-down drone view looking at ${image.surface_texture}. ${image.obstacles_and_debris}. ${image.lighting_angle}.`
}

export interface ToMissionOptions {
  name: string
  missionType: string
  datasetSplit: DatasetSplit
  distribution: LandmarkDistribution
  rng: Rng
  now?: string
}

/**
 * Build a mission from parsed output. Rendering prompts are kept in each waypoint's
 * `metadata.renderPrompts`, keyed by the media label they render.
 */
export function toMission(generated: GeneratedMission, options: ToMissionOptions): Mission {
  const waypoints = generated.waypoints.map((wp, index) => {
    const landmarks = placeLandmarks(
      wp.forward_image.landmarks.map(
        (l): Landmark => ({
          category: l.category,
          name: l.name,
          visualAttributes: l.visual_attributes,
          textContent: l.text_content,
          position: l.position,
        }),
      ),
      options.distribution,
      options.rng,
    )
    const renderPrompts: Record<string, string> = {
      forward_image: forwardRenderingPrompt(wp.forward_image),
      ground_image: groundRenderingPrompt(wp.ground_image),
    }
    if (wp.secondary_ground_image) {
      renderPrompts.secondary_ground_image = groundRenderingPrompt(wp.secondary_ground_image)
    }
    const houseNumber = landmarks.find((l) => l.category === 'house_number' && l.textContent)?.textContent

    return createWaypoint(index, {
      isTarget: wp.is_target,
      groundIsObstructed: wp.ground_is_obstructed,
      landmarks,
      gtEntities: { house_number: houseNumber ?? 'N/A' },
      metadata: { renderPrompts },
    })
  })

  return createMission(
    {
      name: options.name,
      missionType: options.missionType,
      instruction: generated.mission_instruction,
      datasetSplit: options.datasetSplit,
      creationSource: 'generated',
      waypoints,
    },
    options.now,
  )
}

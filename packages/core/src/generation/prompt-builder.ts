/**
 * Prompt assembly for mission synthesis.
 *
 * The three bundled mission types get a hand-written profile; any other type is
 * described from its own states, tools and prompts.
 */

import type { MissionTypeConfig } from '../mission-types/index.js'

export interface GenerationPrompt {
  system: string
  user: string
}

const OUTPUT_FORMAT = `Return one JSON object and nothing else:
{
  "mission_instruction": string,
  "waypoints": [
    {
      "forward_image": {
        "subject_description": string,
        "environment_context": string,
        "lighting_and_style": string,
        "landmarks": [
          {
            "category": "house_number" | "human" | "obstacle" | "vehicle" | "other",
            "name": string,
            "visual_attributes": string,
            "text_content": string | null,
            "position": [x, y]
          }
        ]
      },
      "ground_image": { "surface_texture": string, "obstacles_and_debris": string, "lighting_angle": string },
      "secondary_ground_image": { ... same fields as ground_image ... } | null,
      "ground_is_obstructed": boolean,
      "is_target": boolean
    }
  ]
}
Positions are normalized image coordinates between 0 and 1.`

const SYSTEM_PROMPT = `You are a synthetic data generator for autonomous drone navigation.
You write missions for a UAV that visits candidate waypoints and must find the one target.

Navigation rules:
1. The subject_description of every forward image describes a specific house or building facade, never just a door or a sign.
2. The house number is described as mounted on that building.
3. A house_number landmark carries the exact number to render in text_content, and it must be readable.

${OUTPUT_FORMAT}`

const PROFILES: Record<string, string> = {
  locate_and_track: `Mission profile: LOCATE_AND_TRACK
- Instruction form: "Track [person] near house number [number]."
- Target waypoint forward image example:
  - subject_description: "A modern beige stucco house with a flat roof"
  - landmarks:
    - house_number: "42", "Black metal numbers mounted next to the garage"
    - human: "Person in blue jacket", "Walking on the sidewalk in front of the house"`,
  locate_and_land_safely: `Mission profile: LOCATE_AND_LAND_SAFELY
- Instruction form: "Land near [object] at house number [number]."
- Target waypoint forward image example:
  - subject_description: "A classic red brick cottage with a white porch"
  - landmarks:
    - house_number: "12", "White painted wood numbers on the porch column"
    - obstacle: "Green trashcan", "Placed near the porch steps"
- The target's ground image shows whether the landing spot is obstructed.`,
  locate_and_report: `Mission profile: LOCATE_AND_REPORT
- Instruction form: "Report detail at house number [number]."
- Target waypoint forward image example:
  - subject_description: "A large warehouse building with corrugated metal siding"
  - landmarks:
    - house_number: "405", "Large industrial font painted directly on the metal siding"`,
}

export function hasBuiltInProfile(missionType: string): boolean {
  return Object.hasOwn(PROFILES, missionType)
}

/** Profile text derived from the mission type's own state machine. */
export function describeMissionType(config: MissionTypeConfig): string {
  const lines = [`Mission profile: ${config.name.toUpperCase()}`]
  if (config.description) lines.push(`- Purpose: ${config.description}`)
  lines.push(`- The drone starts in state "${config.initialState}".`)
  for (const state of config.states) {
    const parts: string[] = []
    if (state.tools.length > 0) parts.push(`tools: ${state.tools.join(', ')}`)
    if (state.observations.length > 0) parts.push(`observes: ${state.observations.join(', ')}`)
    const firstLine = state.prompt.split('\n').find((l) => l.trim().length > 0)
    if (firstLine) parts.push(`prompt: "${firstLine.trim()}"`)
    lines.push(`- State ${state.name}${parts.length > 0 ? ` (${parts.join('; ')})` : ''}`)
  }
  const tools = new Set(config.states.flatMap((s) => s.tools))
  if (tools.has('land')) lines.push('- The mission ends with a landing; describe ground images carefully.')
  if (tools.has('track_target')) lines.push('- The target includes a person or vehicle to follow.')
  lines.push('- Write an instruction that a drone following this state machine can complete.')
  return lines.join('\n')
}

export function buildGenerationPrompt(config: MissionTypeConfig, waypoints: number): GenerationPrompt {
  const profile = PROFILES[config.name] ?? describeMissionType(config)
  const distractors = waypoints - 1
  const user = `${profile}

Generate a mission with exactly ${waypoints} waypoint${waypoints === 1 ? '' : 's'}.
Exactly one waypoint has "is_target": true${distractors > 0 ? `; the other ${distractors} are distractors with different house numbers` : ''}.

Steps:
1. Give the target house a distinct architectural style.
2. Describe how the house number is attached to that style of house.
3. Keep the instruction and the target's subject_description consistent.

Generate the mission JSON now.`
  return { system: SYSTEM_PROMPT, user }
}

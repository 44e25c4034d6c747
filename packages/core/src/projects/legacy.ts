/**
 * Migration of project documents written by earlier versions of the editor.
 *
 * Two older layouts exist:
 *   - `{ missions: [...] }` with snake_case mission/waypoint keys and media as a list or a
 *     label → path map,
 *   - `{ instruction, waypoints: [...] }`, a single implicit mission.
 */

import { RelativePathSchema, IdentifierSchema } from '../common/index.js'
import { CreationSourceSchema, DatasetSplitSchema, LandmarkSchema, PROJECT_SCHEMA_VERSION } from './schemas.js'
import type { Landmark } from './schemas.js'

type Json = Record<string, unknown>

const LEGACY_MISSION_TYPE = 'locate_and_report'

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function str(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback
}

function safeId(value: unknown, fallback: string): string {
  const raw = typeof value === 'string' || typeof value === 'number' ? String(value) : ''
  const cleaned = raw.replace(/[^A-Za-z0-9_-]/g, '_')
  return cleaned.length > 0 ? cleaned : fallback
}

/** True for documents that predate the versioned project layout. */
export function isLegacyProjectDocument(raw: unknown): boolean {
  return isRecord(raw) && raw.schemaVersion === undefined && ('missions' in raw || 'waypoints' in raw)
}

/** Media as stored by older versions: a list of paths or a label → path map. */
export function normalizeLegacyMedia(media: unknown, labels?: unknown): Record<string, string> {
  const result: Record<string, string> = {}
  const add = (label: string, path: unknown) => {
    const parsed = RelativePathSchema.safeParse(path)
    if (parsed.success) {
      result[label] = parsed.data
    } else {
      console.warn(`[project-store] dropping media "${label}" with unusable path`)
    }
  }

  if (Array.isArray(media)) {
    const labelList = Array.isArray(labels) ? labels : []
    media.forEach((path, i) => {
      const label = typeof labelList[i] === 'string' ? String(labelList[i]) : `media_${i}`
      add(label, path)
    })
  } else if (isRecord(media)) {
    for (const [label, path] of Object.entries(media)) add(label, path)
  }
  return result
}

function legacyLandmarks(raw: unknown): Landmark[] {
  if (!Array.isArray(raw)) return []
  const result: Landmark[] = []
  for (const item of raw) {
    if (!isRecord(item)) continue
    const parsed = LandmarkSchema.safeParse({
      category: item.category,
      name: item.name,
      visualAttributes: str(item.visual_attributes ?? item.visualAttributes),
      textContent: item.text_content ?? item.textContent ?? null,
      position: item.position,
    })
    if (parsed.success) result.push(parsed.data)
  }
  return result
}

function legacyGtEntities(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) return {}
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (value !== null && value !== undefined) result[key] = String(value)
  }
  return result
}

export function migrateLegacyWaypoint(raw: unknown, index: number): Json {
  const wp = isRecord(raw) ? raw : {}
  const known = new Set([
    'id',
    'is_target',
    'ground_is_obstructed',
    'gt_entities',
    'landmarks',
    'media',
    'media_labels',
    'position',
  ])
  const metadata: Json = {}
  for (const [key, value] of Object.entries(wp)) {
    if (!known.has(key)) metadata[key] = value
  }

  return {
    id: safeId(wp.id, `waypoint_${String(index + 1).padStart(2, '0')}`),
    position: isRecord(wp.position) ? wp.position : null,
    isTarget: wp.is_target === true,
    groundIsObstructed: wp.ground_is_obstructed === true,
    gtEntities: legacyGtEntities(wp.gt_entities),
    landmarks: legacyLandmarks(wp.landmarks),
    media: normalizeLegacyMedia(wp.media, wp.media_labels),
    metadata,
  }
}

export function migrateLegacyMission(raw: unknown, index: number, now: string): Json {
  const m = isRecord(raw) ? raw : {}
  const missionType = IdentifierSchema.safeParse(m.type ?? m.mission_type)
  const split = DatasetSplitSchema.safeParse(m.dataset_split)
  const source = CreationSourceSchema.safeParse(m.creation_source)
  const waypoints = Array.isArray(m.waypoints) ? m.waypoints : []

  return {
    id: safeId(m.id, `mission_${index + 1}`),
    name: str(m.name).trim() || `Mission ${index + 1}`,
    missionType: missionType.success ? missionType.data : LEGACY_MISSION_TYPE,
    instruction: str(m.mission_instruction ?? m.instruction),
    datasetSplit: split.success ? split.data : 'sft_train',
    creationSource: source.success ? source.data : 'manual',
    waypoints: waypoints.map((wp, i) => migrateLegacyWaypoint(wp, i)),
    validation: migrateLegacyValidation(m.validation_result),
    createdAt: now,
    updatedAt: now,
  }
}

function migrateLegacyValidation(raw: unknown): Json | null {
  if (!isRecord(raw)) return null
  if (typeof raw.mission_is_valid !== 'boolean') return null
  return {
    isValid: raw.mission_is_valid,
    confidence: typeof raw.confidence_score === 'number' ? Math.min(1, Math.max(0, raw.confidence_score)) : 0,
    needsHumanReview: raw.needs_human_review === true,
    reasoning: str(raw.reasoning),
  }
}

/** Convert an older project document into the current layout (unvalidated). */
export function migrateLegacyProject(
  raw: Json,
  identity: { id: string; name: string; createdAt: string },
): Json {
  const missionsRaw: unknown[] = Array.isArray(raw.missions)
    ? raw.missions
    : [
        {
          id: 'default_mission',
          name: 'Default Mission',
          type: LEGACY_MISSION_TYPE,
          instruction: raw.instruction,
          waypoints: raw.waypoints,
        },
      ]

  const missions = missionsRaw.map((m, i) => migrateLegacyMission(m, i, identity.createdAt))
  const missionTypes: string[] = []
  for (const m of missions) {
    const t = String(m.missionType)
    if (!missionTypes.includes(t)) missionTypes.push(t)
  }

  return {
    schemaVersion: PROJECT_SCHEMA_VERSION,
    id: identity.id,
    name: str(raw.name).trim() || identity.name,
    description: str(raw.description),
    createdAt: identity.createdAt,
    updatedAt: identity.createdAt,
    missionTypes,
    missions,
  }
}

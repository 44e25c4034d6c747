/**
 * Pure helpers for building and editing missions.
 */

import { v4 as uuidv4 } from 'uuid'
import type { DatasetSplit, CreationSource, Mission, Waypoint, WaypointInput } from './schemas.js'
import { WaypointSchema } from './schemas.js'

export interface NewMissionInput {
  name: string
  missionType: string
  instruction?: string
  datasetSplit?: DatasetSplit
  creationSource?: CreationSource
  waypoints?: Waypoint[]
}

export function createMission(input: NewMissionInput, now = new Date().toISOString()): Mission {
  return {
    id: uuidv4(),
    name: input.name.trim(),
    missionType: input.missionType,
    instruction: input.instruction ?? '',
    datasetSplit: input.datasetSplit ?? 'sft_train',
    creationSource: input.creationSource ?? 'manual',
    waypoints: input.waypoints ?? [],
    validation: null,
    createdAt: now,
    updatedAt: now,
  }
}

/** Waypoint with defaults filled in; `id` defaults to `waypoint_NN` from the index. */
export function createWaypoint(index: number, input: Partial<WaypointInput> = {}): Waypoint {
  return WaypointSchema.parse({
    ...input,
    id: input.id ?? `waypoint_${String(index + 1).padStart(2, '0')}`,
  })
}

/** Mission-type names referenced by the missions, in first-use order. */
export function referencedMissionTypes(missions: readonly Mission[]): string[] {
  const names: string[] = []
  for (const m of missions) {
    if (!names.includes(m.missionType)) names.push(m.missionType)
  }
  return names
}

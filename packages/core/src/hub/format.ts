/**
 * Portable dataset layout (schema version 1):
 *
 *   README.md            dataset card
 *   dataset_info.json    project metadata, mission-type documents, split list
 *   data/<split>.json    mission entries, one file per non-empty split
 *   images/...           media files
 *
 * Mission entries keep the snake_case layout mission environments read:
 * `instruction`, `state_config`, and per waypoint `id`, `gt_entities`, `is_target`,
 * `media` (list of paths) with `media_labels`.
 */

import { extname } from 'node:path'
import { z } from 'zod'
import { Ok, Err, StudioError, RelativePathSchema } from '../common/index.js'
import type { Result } from '../common/index.js'
import { configToDocument } from '../mission-types/index.js'
import type { MissionTypeConfig } from '../mission-types/index.js'
import {
  CreationSourceSchema,
  DATASET_SPLITS,
  DatasetSplitSchema,
  EntityIdSchema,
  GeoPositionSchema,
  LandmarkCategorySchema,
  MEDIA_EXTENSIONS,
} from '../projects/index.js'
import type { DatasetSplit, Mission, Project, Waypoint } from '../projects/index.js'

export const DATASET_SCHEMA_VERSION = 1
export const DATASET_INFO_FILE = 'dataset_info.json'
export const README_FILE = 'README.md'

export interface DatasetFile {
  path: string
  data: Uint8Array
}

// ── Schemas ──

const DatasetInfoSchema = z.object({
  schema_version: z.number(),
  project: z.object({
    name: z.string().trim().min(1),
    description: z.string().default(''),
    created_at: z.string().optional(),
  }),
  mission_types: z.record(z.string(), z.unknown()),
  splits: z.array(DatasetSplitSchema),
  mission_count: z.number().int().min(0).optional(),
})
export type DatasetInfo = z.infer<typeof DatasetInfoSchema>

const StringLikeSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String)

const DatasetLandmarkSchema = z.object({
  category: LandmarkCategorySchema,
  name: z.string().min(1),
  visual_attributes: z.string().default(''),
  text_content: z.string().nullable().default(null),
  position: z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)]),
})

const DatasetWaypointSchema = z.object({
  id: EntityIdSchema,
  gt_entities: z.record(z.string(), StringLikeSchema),
  is_target: z.boolean(),
  media: z.array(z.string()),
  media_labels: z.array(z.string()).optional(),
  ground_is_obstructed: z.boolean().default(false),
  position: GeoPositionSchema.nullish(),
  landmarks: z.array(DatasetLandmarkSchema).default([]),
  metadata: z.record(z.string(), z.unknown()).default({}),
})

const DatasetValidationSchema = z.object({
  mission_is_valid: z.boolean(),
  confidence_score: z.number().min(0).max(1),
  needs_human_review: z.boolean(),
  reasoning: z.string(),
})

const DatasetMissionSchema = z.object({
  id: EntityIdSchema,
  name: z.string().optional(),
  type: z.string(),
  dataset_split: DatasetSplitSchema,
  creation_source: CreationSourceSchema.optional(),
  instruction: z.string(),
  mission_instruction: z.string().optional(),
  state_config: z.unknown().optional(),
  validation_result: DatasetValidationSchema.nullish(),
  created_at: z.string().datetime().optional(),
  updated_at: z.string().datetime().optional(),
  waypoints: z.array(DatasetWaypointSchema),
})
export type DatasetMissionEntry = z.infer<typeof DatasetMissionSchema>
type DatasetWaypointEntry = z.input<typeof DatasetWaypointSchema>

function describeIssue(error: z.ZodError, where: string): string {
  const first = error.issues[0]
  const path = first.path.length > 0 ? first.path.join('.') : '(root)'
  return `${where}: ${path}: ${first.message}`
}

// ── Export ──

/** Reads a project-relative media file; NOT_FOUND for a missing file. */
export type MediaReader = (relativePath: string) => Promise<Result<Uint8Array, StudioError>>

/** Dataset path of an exported media file. */
export function exportedMediaPath(missionId: string, waypointId: string, label: string, source: string): string {
  return `images/${missionId}/${waypointId}/${label}${extname(source).toLowerCase()}`
}

function missionEntry(
  mission: Mission,
  stateConfig: unknown,
  media: Map<string, Array<[string, string]>>,
): Record<string, unknown> {
  return {
    id: mission.id,
    name: mission.name,
    type: mission.missionType,
    dataset_split: mission.datasetSplit,
    creation_source: mission.creationSource,
    instruction: mission.instruction,
    mission_instruction: mission.instruction,
    state_config: stateConfig,
    ...(mission.validation
      ? {
          validation_result: {
            mission_is_valid: mission.validation.isValid,
            confidence_score: mission.validation.confidence,
            needs_human_review: mission.validation.needsHumanReview,
            reasoning: mission.validation.reasoning,
          },
        }
      : {}),
    created_at: mission.createdAt,
    updated_at: mission.updatedAt,
    waypoints: mission.waypoints.map((wp): DatasetWaypointEntry => {
      const files = media.get(wp.id) ?? []
      return {
        id: wp.id,
        gt_entities: { ...wp.gtEntities },
        is_target: wp.isTarget,
        media: files.map(([, path]) => path),
        media_labels: files.map(([label]) => label),
        ground_is_obstructed: wp.groundIsObstructed,
        position: wp.position,
        landmarks: wp.landmarks.map((l) => ({
          category: l.category,
          name: l.name,
          visual_attributes: l.visualAttributes,
          text_content: l.textContent,
          position: l.position,
        })),
        metadata: wp.metadata,
      }
    }),
  }
}

export function renderDatasetCard(project: Project, splitCounts: Map<DatasetSplit, number>): string {
  const splits = [...splitCounts.keys()]
  const lines = ['---', 'configs:', '- config_name: default', '  data_files:']
  for (const split of splits) {
    lines.push(`  - split: ${split}`, `    path: data/${split}.json`)
  }
  lines.push('---', '', `# ${project.name}`, '')
  if (project.description) lines.push(project.description, '')
  lines.push('| Split | Missions |', '|---|---|')
  for (const [split, count] of splitCounts) lines.push(`| ${split} | ${count} |`)
  lines.push('', `Mission types: ${project.missionTypes.map((t) => `\`${t}\``).join(', ') || 'none'}`, '')
  return lines.join('\n')
}

/**
 * Serialize a project. Missing media files are left out of the dataset with a warning;
 * any other read failure aborts the export.
 */
export async function buildDataset(
  project: Project,
  missionTypes: MissionTypeConfig[],
  readMedia: MediaReader,
): Promise<Result<DatasetFile[], StudioError>> {
  const documents = new Map(missionTypes.map((c) => [c.name, configToDocument(c)]))
  const encoder = new TextEncoder()
  const files: DatasetFile[] = []
  const bySplit = new Map<DatasetSplit, Record<string, unknown>[]>()

  for (const mission of project.missions) {
    const media = new Map<string, Array<[string, string]>>()
    for (const wp of mission.waypoints) {
      const entries: Array<[string, string]> = []
      for (const [label, source] of Object.entries(wp.media)) {
        const data = await readMedia(source)
        if (!data.ok) {
          if (data.error.code !== 'NOT_FOUND') return data
          console.warn(`[hub-sync] media missing, left out of the dataset: ${source}`)
          continue
        }
        const target = exportedMediaPath(mission.id, wp.id, label, source)
        files.push({ path: target, data: data.value })
        entries.push([label, target])
      }
      media.set(wp.id, entries)
    }
    const list = bySplit.get(mission.datasetSplit) ?? []
    list.push(missionEntry(mission, documents.get(mission.missionType) ?? {}, media))
    bySplit.set(mission.datasetSplit, list)
  }

  const splitCounts = new Map<DatasetSplit, number>()
  for (const split of DATASET_SPLITS) {
    const entries = bySplit.get(split)
    if (!entries) continue
    splitCounts.set(split, entries.length)
    files.push({ path: `data/${split}.json`, data: encoder.encode(JSON.stringify(entries, null, 2) + '\n') })
  }

  const info = {
    schema_version: DATASET_SCHEMA_VERSION,
    project: { name: project.name, description: project.description, created_at: project.createdAt },
    mission_types: Object.fromEntries(documents),
    splits: [...splitCounts.keys()],
    mission_count: project.missions.length,
  }
  files.push({ path: DATASET_INFO_FILE, data: encoder.encode(JSON.stringify(info, null, 2) + '\n') })
  files.push({ path: README_FILE, data: encoder.encode(renderDatasetCard(project, splitCounts)) })
  return Ok(files)
}

// ── Import ──

function parseJsonBytes(data: Uint8Array, where: string): Result<unknown, StudioError> {
  try {
    return Ok(JSON.parse(new TextDecoder().decode(data)))
  } catch {
    return Err(StudioError.format(`${where} is not valid JSON`))
  }
}

export function parseDatasetInfo(data: Uint8Array): Result<DatasetInfo, StudioError> {
  const raw = parseJsonBytes(data, DATASET_INFO_FILE)
  if (!raw.ok) return raw
  const parsed = DatasetInfoSchema.safeParse(raw.value)
  if (!parsed.success) return Err(StudioError.format(describeIssue(parsed.error, DATASET_INFO_FILE)))
  if (parsed.data.schema_version !== DATASET_SCHEMA_VERSION) {
    return Err(
      StudioError.format(
        `Unsupported dataset schema version ${parsed.data.schema_version} (expected ${DATASET_SCHEMA_VERSION})`,
      ),
    )
  }
  return Ok(parsed.data)
}

export function parseSplitFile(data: Uint8Array, split: DatasetSplit): Result<DatasetMissionEntry[], StudioError> {
  const where = `data/${split}.json`
  const raw = parseJsonBytes(data, where)
  if (!raw.ok) return raw
  const parsed = z.array(DatasetMissionSchema).safeParse(raw.value)
  if (!parsed.success) return Err(StudioError.format(describeIssue(parsed.error, where)))
  return Ok(parsed.data)
}

export interface MediaImport {
  /** Path inside the dataset. */
  source: string
  /** Project-relative destination. */
  target: string
}

export interface ImportedMission {
  mission: Mission
  media: MediaImport[]
}

function mediaLabel(labels: string[] | undefined, index: number): string {
  const raw = labels?.[index] ?? `media_${index}`
  const cleaned = raw.replace(/\.[A-Za-z0-9]+$/, '').replace(/[^A-Za-z0-9_-]/g, '_')
  return cleaned.length > 0 ? cleaned : `media_${index}`
}

/** Map a dataset entry to a mission, planning where each media file lands in the project. */
export function entryToMission(entry: DatasetMissionEntry, now: string): Result<ImportedMission, StudioError> {
  const media: MediaImport[] = []
  const waypoints: Waypoint[] = []

  for (const wp of entry.waypoints) {
    const mediaMap: Record<string, string> = {}
    for (const [index, source] of wp.media.entries()) {
      if (!RelativePathSchema.safeParse(source).success || !source.startsWith('images/')) {
        return Err(StudioError.format(`Mission ${entry.id}: media path outside images/: ${source}`))
      }
      const ext = extname(source).slice(1).toLowerCase()
      if (!MEDIA_EXTENSIONS.has(ext)) {
        return Err(StudioError.format(`Mission ${entry.id}: unsupported media type: ${source}`))
      }
      let label = mediaLabel(wp.media_labels, index)
      while (label in mediaMap) label = `${label}_${index}`
      const target = `media/${entry.id}/${wp.id}/${label}.${ext}`
      mediaMap[label] = target
      media.push({ source, target })
    }

    waypoints.push({
      id: wp.id,
      position: wp.position ?? null,
      isTarget: wp.is_target,
      groundIsObstructed: wp.ground_is_obstructed,
      gtEntities: wp.gt_entities,
      landmarks: wp.landmarks.map((l) => ({
        category: l.category,
        name: l.name,
        visualAttributes: l.visual_attributes,
        textContent: l.text_content,
        position: l.position,
      })),
      media: mediaMap,
      metadata: wp.metadata,
    })
  }

  const validation = entry.validation_result
  return Ok({
    mission: {
      id: entry.id,
      name: entry.name?.trim() || entry.id,
      missionType: entry.type,
      instruction: entry.instruction || entry.mission_instruction || '',
      datasetSplit: entry.dataset_split,
      creationSource: 'imported',
      waypoints,
      validation: validation
        ? {
            isValid: validation.mission_is_valid,
            confidence: validation.confidence_score,
            needsHumanReview: validation.needs_human_review,
            reasoning: validation.reasoning,
          }
        : null,
      createdAt: entry.created_at ?? now,
      updatedAt: entry.updated_at ?? now,
    },
    media,
  })
}

/**
 * Zod schemas and TypeScript types for projects, missions and waypoints.
 */

import { z } from 'zod'
import { TimestampSchema, IdentifierSchema, RelativePathSchema } from '../common/index.js'

export const PROJECT_SCHEMA_VERSION = 1

/** Ids that double as directory names under a project's media folder. */
export const EntityIdSchema = z
  .string()
  .min(1, 'Id cannot be empty')
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'Id may only contain letters, numbers, "_" and "-"')

export const DatasetSplitSchema = z.enum(['sft_train', 'rl_train', 'validation'])
export type DatasetSplit = z.infer<typeof DatasetSplitSchema>
export const DATASET_SPLITS: readonly DatasetSplit[] = DatasetSplitSchema.options

export const CreationSourceSchema = z.enum(['manual', 'generated', 'imported'])
export type CreationSource = z.infer<typeof CreationSourceSchema>

export const LandmarkCategorySchema = z.enum(['house_number', 'human', 'obstacle', 'vehicle', 'other'])
export type LandmarkCategory = z.infer<typeof LandmarkCategorySchema>

export const NormalizedPointSchema = z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)])

export const LandmarkSchema = z.object({
  category: LandmarkCategorySchema,
  name: z.string().min(1),
  visualAttributes: z.string().default(''),
  textContent: z.string().nullable().default(null),
  /** Normalized [x, y] image coordinates. */
  position: NormalizedPointSchema,
})
export type Landmark = z.infer<typeof LandmarkSchema>

export const GeoPositionSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  altitude: z.number().optional(),
})
export type GeoPosition = z.infer<typeof GeoPositionSchema>

export const WaypointSchema = z.object({
  id: EntityIdSchema,
  position: GeoPositionSchema.nullable().default(null),
  isTarget: z.boolean().default(false),
  groundIsObstructed: z.boolean().default(false),
  gtEntities: z.record(z.string(), z.string()).default({}),
  landmarks: z.array(LandmarkSchema).default([]),
  /** Media label → path relative to the project directory. */
  media: z.record(z.string(), RelativePathSchema).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
})
export type Waypoint = z.infer<typeof WaypointSchema>
export type WaypointInput = z.input<typeof WaypointSchema>

export const MissionValidationSchema = z.object({
  isValid: z.boolean(),
  confidence: z.number().min(0).max(1),
  needsHumanReview: z.boolean(),
  reasoning: z.string(),
})
export type MissionValidation = z.infer<typeof MissionValidationSchema>

export const MissionSchema = z
  .object({
    id: EntityIdSchema,
    name: z.string().trim().min(1, 'Mission name is required'),
    missionType: IdentifierSchema,
    instruction: z.string().default(''),
    datasetSplit: DatasetSplitSchema.default('sft_train'),
    creationSource: CreationSourceSchema.default('manual'),
    waypoints: z.array(WaypointSchema).default([]),
    validation: MissionValidationSchema.nullable().default(null),
    createdAt: TimestampSchema,
    updatedAt: TimestampSchema,
  })
  .superRefine((mission, ctx) => {
    const seen = new Set<string>()
    mission.waypoints.forEach((wp, index) => {
      if (seen.has(wp.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate waypoint id: ${wp.id}`,
          path: ['waypoints', index, 'id'],
        })
      }
      seen.add(wp.id)
    })
  })
export type Mission = z.infer<typeof MissionSchema>
export type MissionInput = z.input<typeof MissionSchema>

export const ProjectNameSchema = z
  .string()
  .trim()
  .min(1, 'Project name is required')
  .max(120, 'Project name must be 120 characters or fewer')

export const ProjectSchema = z
  .object({
    schemaVersion: z.literal(PROJECT_SCHEMA_VERSION).default(PROJECT_SCHEMA_VERSION),
    id: EntityIdSchema,
    name: ProjectNameSchema,
    description: z.string().default(''),
    createdAt: TimestampSchema,
    updatedAt: TimestampSchema,
    missionTypes: z.array(IdentifierSchema).default([]),
    missions: z.array(MissionSchema).default([]),
  })
  .superRefine((project, ctx) => {
    const seen = new Set<string>()
    project.missions.forEach((m, index) => {
      if (seen.has(m.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate mission id: ${m.id}`,
          path: ['missions', index, 'id'],
        })
      }
      seen.add(m.id)
    })
  })
export type Project = z.infer<typeof ProjectSchema>
export type ProjectInput = z.input<typeof ProjectSchema>

export interface ProjectSummary {
  id: string
  name: string
  description: string
  missionCount: number
  createdAt: string
  updatedAt: string
}

/** A media file to be written together with the missions that reference it. */
export interface StagedMediaFile {
  /** Path relative to the project directory, as referenced by the waypoint. */
  relativePath: string
  data: Uint8Array
}

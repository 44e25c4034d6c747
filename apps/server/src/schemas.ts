/**
 * Request bodies accepted by the HTTP API.
 */

import { z } from 'zod'
import { DatasetSplitSchema, GenerationParamsSchema, MissionSchema } from '@mission-studio/core'

export const CreateProjectBodySchema = z.object({
  name: z.string(),
  description: z.string().default(''),
})

export const RenameProjectBodySchema = z.object({ name: z.string() })

/** Whole-project edits; the name changes only through rename. */
export const UpdateProjectBodySchema = z.object({
  description: z.string().optional(),
  missions: z.array(MissionSchema).optional(),
})

export const NewMissionBodySchema = z.object({
  name: z.string(),
  missionType: z.string(),
  instruction: z.string().default(''),
  datasetSplit: DatasetSplitSchema.default('sft_train'),
  waypoints: z.array(z.record(z.string(), z.unknown())).default([]),
})

export const AttachMediaBodySchema = z.object({
  ext: z.string().min(1),
  /** File contents, base64-encoded. */
  data: z.string().min(1).base64('data must be base64'),
})

export const GenerateBodySchema = z.object({
  missionType: z.string(),
  params: GenerationParamsSchema,
})

export const PushBodySchema = z.object({
  repoId: z.string().optional(),
  private: z.boolean().optional(),
  message: z.string().optional(),
})

export const PullBodySchema = z.object({
  repoId: z.string(),
  revision: z.string().optional(),
  name: z.string().optional(),
})

export const DraftOperationsBodySchema = z.object({
  operations: z.array(z.unknown()).min(1),
})

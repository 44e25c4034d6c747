/**
 * Zod schemas for the activity log.
 */

import { z } from 'zod'
import { TimestampSchema, UUIDSchema } from '../common/index.js'

export const ActivityEventTypeSchema = z.enum([
  'project_created',
  'project_deleted',
  'mission_type_saved',
  'mission_type_deleted',
  'generation_completed',
  'generation_failed',
  'hub_pushed',
  'hub_pulled',
])
export type ActivityEventType = z.infer<typeof ActivityEventTypeSchema>

export const CreateActivityInputSchema = z.object({
  projectId: z.string().nullable().default(null),
  eventType: ActivityEventTypeSchema,
  summary: z.string().min(1, 'Summary is required'),
  detail: z.record(z.string(), z.unknown()).default({}),
})
export type CreateActivityInput = z.input<typeof CreateActivityInputSchema>

export const ActivityEntrySchema = z.object({
  id: UUIDSchema,
  projectId: z.string().nullable(),
  eventType: ActivityEventTypeSchema,
  summary: z.string(),
  detail: z.record(z.string(), z.unknown()),
  createdAt: TimestampSchema,
})
export type ActivityEntry = z.infer<typeof ActivityEntrySchema>

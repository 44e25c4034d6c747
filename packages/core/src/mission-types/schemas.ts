/**
 * Zod schemas and TypeScript types for mission-type configurations.
 *
 * A mission type is a directed state machine: named states (prompt, tools,
 * observations), transitions between them and one initial state.
 */

import { z } from 'zod'
import { IdentifierSchema } from '../common/index.js'

export const TransitionKindSchema = z.enum(['condition', 'error'])
export type TransitionKind = z.infer<typeof TransitionKindSchema>

/** One output key definition, e.g. `{ justification: { type: 'string', max_length: 300 } }`. */
export const OutputKeySchema = z.record(z.string(), z.unknown())
export type OutputKey = z.infer<typeof OutputKeySchema>

export const VerifierSchema = z.record(z.string(), z.unknown())
export type Verifier = z.infer<typeof VerifierSchema>

export const StateDefinitionSchema = z.object({
  name: IdentifierSchema,
  prompt: z.string().default(''),
  tools: z.array(IdentifierSchema).default([]),
  observations: z.array(IdentifierSchema).default([]),
  outputKeys: z.array(OutputKeySchema).default([]),
  verifiers: z.array(VerifierSchema).default([]),
})
export type StateDefinition = z.infer<typeof StateDefinitionSchema>
export type StateDefinitionInput = z.input<typeof StateDefinitionSchema>

export const TransitionSchema = z.object({
  from: z.string(),
  to: z.string(),
  condition: z.string().default(''),
  kind: TransitionKindSchema.default('condition'),
})
export type Transition = z.infer<typeof TransitionSchema>
export type TransitionInput = z.input<typeof TransitionSchema>

export const ImageResolutionSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
})
export type ImageResolution = z.infer<typeof ImageResolutionSchema>

export const NodePositionSchema = z.tuple([z.number(), z.number()])
export type NodePosition = z.infer<typeof NodePositionSchema>

export const MissionTypeConfigSchema = z.object({
  name: IdentifierSchema,
  description: z.string().default(''),
  initialState: z.string(),
  states: z.array(StateDefinitionSchema),
  transitions: z.array(TransitionSchema).default([]),
  imageResolution: ImageResolutionSchema.optional(),
  /** Editor node positions keyed by state name. */
  layout: z.record(z.string(), NodePositionSchema).default({}),
})
export type MissionTypeConfig = z.infer<typeof MissionTypeConfigSchema>
export type MissionTypeConfigInput = z.input<typeof MissionTypeConfigSchema>

export interface MissionTypeIssue {
  code:
    | 'DUPLICATE_STATE'
    | 'NO_INITIAL_STATE'
    | 'MULTIPLE_INITIAL_STATES'
    | 'UNDECLARED_INITIAL_STATE'
    | 'UNDECLARED_ENDPOINT'
    | 'EMPTY_CONDITION'
    | 'DUPLICATE_ERROR_TRANSITION'
  message: string
}

/**
 * Editor operations as JSON, for clients that drive a draft over the API.
 */

import { z } from 'zod'
import { Ok, Err, StudioError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { ImageResolutionSchema, NodePositionSchema, OutputKeySchema, VerifierSchema } from '../mission-types/schemas.js'
import type { MissionTypeConfig } from '../mission-types/index.js'
import type { DraftStore } from './draft-store.js'
import { conditionFromTemplate } from './graph.js'

const ConditionSchema = z.union([
  z.string(),
  z.object({ template: z.string(), value: z.string().optional() }),
])

export const EditorOperationSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('addState'),
    name: z.string(),
    template: z.enum(['empty', 'execution', 'conclusion', 'copy']).optional(),
    copyFrom: z.string().optional(),
  }),
  z.object({ op: z.literal('renameState'), name: z.string(), newName: z.string() }),
  z.object({ op: z.literal('removeState'), name: z.string(), replacementInitial: z.string().optional() }),
  z.object({ op: z.literal('setInitialState'), name: z.string() }),
  z.object({
    op: z.literal('updateState'),
    name: z.string(),
    prompt: z.string().optional(),
    tools: z.array(z.string()).optional(),
    observations: z.array(z.string()).optional(),
    outputKeys: z.array(OutputKeySchema).optional(),
    verifiers: z.array(VerifierSchema).optional(),
  }),
  z.object({ op: z.literal('addTransition'), from: z.string(), to: z.string(), condition: ConditionSchema }),
  z.object({
    op: z.literal('updateTransition'),
    index: z.number().int().min(0),
    to: z.string().optional(),
    condition: ConditionSchema.optional(),
  }),
  z.object({ op: z.literal('removeTransition'), index: z.number().int().min(0) }),
  z.object({ op: z.literal('setErrorTransition'), from: z.string(), to: z.string() }),
  z.object({ op: z.literal('clearErrorTransition'), from: z.string() }),
  z.object({ op: z.literal('moveState'), name: z.string(), position: NodePositionSchema }),
  z.object({ op: z.literal('autoLayout') }),
  z.object({
    op: z.literal('updateMeta'),
    description: z.string().optional(),
    imageResolution: ImageResolutionSchema.nullable().optional(),
  }),
])
export type EditorOperation = z.infer<typeof EditorOperationSchema>

type ConditionInput = z.infer<typeof ConditionSchema>

function resolveCondition(condition: ConditionInput): Result<string, StudioError> {
  if (typeof condition === 'string') return Ok(condition)
  return conditionFromTemplate(condition.template, condition.value)
}

/** Parse and apply one operation. Rejections are recorded on the store like direct calls. */
export function applyOperation(store: DraftStore, input: unknown): Result<MissionTypeConfig, StudioError> {
  const parsed = EditorOperationSchema.safeParse(input)
  if (!parsed.success) {
    const error = StudioError.validation(`Invalid editor operation: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
    store.setState({ lastError: error })
    return Err(error)
  }

  const s = store.getState()
  const op = parsed.data
  switch (op.op) {
    case 'addState':
      return s.addState(op.name, op.template, op.copyFrom)
    case 'renameState':
      return s.renameState(op.name, op.newName)
    case 'removeState':
      return s.removeState(op.name, op.replacementInitial)
    case 'setInitialState':
      return s.setInitialState(op.name)
    case 'updateState': {
      const { op: _op, name, ...patch } = op
      return s.updateState(name, patch)
    }
    case 'addTransition': {
      const condition = resolveCondition(op.condition)
      if (!condition.ok) {
        store.setState({ lastError: condition.error })
        return condition
      }
      return s.addTransition(op.from, op.to, condition.value)
    }
    case 'updateTransition': {
      let condition: string | undefined
      if (op.condition !== undefined) {
        const resolved = resolveCondition(op.condition)
        if (!resolved.ok) {
          store.setState({ lastError: resolved.error })
          return resolved
        }
        condition = resolved.value
      }
      return s.updateTransition(op.index, { to: op.to, condition })
    }
    case 'removeTransition':
      return s.removeTransition(op.index)
    case 'setErrorTransition':
      return s.setErrorTransition(op.from, op.to)
    case 'clearErrorTransition':
      return s.clearErrorTransition(op.from)
    case 'moveState':
      return s.moveState(op.name, op.position)
    case 'autoLayout':
      return s.autoLayout()
    case 'updateMeta':
      return s.updateMeta({ description: op.description, imageResolution: op.imageResolution })
  }
}

/**
 * On-disk document ⇄ typed config.
 *
 * Canonical document:
 *   { description, initial_state, image_resolution?, states: { name: {...} } | [{ name, initial?, ... }],
 *     transitions: [{ from, to, condition } | { from, to, error: true }], ui_metadata?: { positions } }
 *
 * Older documents nest everything under `default_state` and keep transitions inside each
 * state (`state_transitions.conditions[].next_state`, `state_transitions.error.next_state`).
 * Those are converted on read; writes always use the canonical layout.
 */

import { z } from 'zod'
import { Ok, Err, StudioError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { validateMissionType } from './validation.js'
import type { MissionTypeConfig, StateDefinitionInput, TransitionInput } from './schemas.js'

const DocumentStateSchema = z.object({
  prompt: z.string().optional(),
  tools: z.array(z.string()).optional(),
  observations: z.array(z.string()).optional(),
  output_keys: z.array(z.record(z.string(), z.unknown())).optional(),
  verifiers: z.array(z.record(z.string(), z.unknown())).optional(),
  initial: z.boolean().optional(),
  state_transitions: z
    .object({
      conditions: z
        .array(z.object({ condition: z.union([z.string(), z.boolean()]), next_state: z.string() }))
        .optional(),
      error: z.object({ next_state: z.string() }).optional(),
    })
    .optional(),
})
type DocumentState = z.infer<typeof DocumentStateSchema>

const DocumentTransitionSchema = z.object({
  from: z.string(),
  to: z.string(),
  condition: z.union([z.string(), z.boolean()]).optional(),
  error: z.boolean().optional(),
})

const MissionTypeDocumentSchema = z.object({
  description: z.string().optional(),
  initial_state: z.string().optional(),
  image_resolution: z.object({ width: z.number(), height: z.number() }).optional(),
  states: z.union([
    z.record(z.string(), DocumentStateSchema.nullable()),
    z.array(DocumentStateSchema.extend({ name: z.string() })),
  ]),
  transitions: z.array(DocumentTransitionSchema).optional(),
  ui_metadata: z
    .object({ positions: z.record(z.string(), z.tuple([z.number(), z.number()])).optional() })
    .optional(),
})
export type MissionTypeDocument = z.input<typeof MissionTypeDocumentSchema>

/** Unwrap the `{ description, default_state }` envelope used by older documents. */
function unwrapEnvelope(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw
  if (!('default_state' in raw)) return raw
  const inner = raw.default_state
  if (typeof inner !== 'object' || inner === null) return raw
  return {
    ...inner,
    ...('description' in raw && typeof raw.description === 'string' ? { description: raw.description } : {}),
  }
}

function conditionText(value: string | boolean | undefined): string {
  if (value === undefined) return ''
  if (typeof value === 'boolean') return value ? 'True' : 'False'
  return value
}

function stateFromDocument(name: string, doc: DocumentState | null): StateDefinitionInput {
  return {
    name,
    prompt: doc?.prompt ?? '',
    tools: doc?.tools ?? [],
    observations: doc?.observations ?? [],
    outputKeys: doc?.output_keys ?? [],
    verifiers: doc?.verifiers ?? [],
  }
}

function nestedTransitions(name: string, doc: DocumentState | null): TransitionInput[] {
  const nested = doc?.state_transitions
  if (!nested) return []
  const result: TransitionInput[] = (nested.conditions ?? []).map((c) => ({
    from: name,
    to: c.next_state,
    condition: conditionText(c.condition),
    kind: 'condition',
  }))
  if (nested.error) {
    result.push({ from: name, to: nested.error.next_state, condition: '', kind: 'error' })
  }
  return result
}

/**
 * Convert a stored document into a validated config. Every failure, structural or
 * an invariant violation, is a VALIDATION_ERROR naming the mission type.
 */
export function documentToConfig(name: string, raw: unknown): Result<MissionTypeConfig, StudioError> {
  const parsed = MissionTypeDocumentSchema.safeParse(unwrapEnvelope(raw))
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ')
    return Err(StudioError.validation(`Mission type ${name}: ${detail}`))
  }
  const doc = parsed.data

  const entries: Array<[string, DocumentState | null]> = Array.isArray(doc.states)
    ? doc.states.map((s): [string, DocumentState] => [s.name, s])
    : Object.entries(doc.states)

  const states = entries.map(([stateName, s]) => stateFromDocument(stateName, s))
  const transitions: TransitionInput[] = [
    ...entries.flatMap(([stateName, s]) => nestedTransitions(stateName, s)),
    ...(doc.transitions ?? []).map(
      (t): TransitionInput => ({
        from: t.from,
        to: t.to,
        condition: t.error ? '' : conditionText(t.condition),
        kind: t.error ? 'error' : 'condition',
      }),
    ),
  ]

  const initialCandidates = new Set<string>()
  if (doc.initial_state) initialCandidates.add(doc.initial_state)
  for (const [stateName, s] of entries) {
    if (s?.initial) initialCandidates.add(stateName)
  }
  if (initialCandidates.size === 0) {
    return Err(StudioError.validation(`Mission type ${name}: No initial state is marked`))
  }
  if (initialCandidates.size > 1) {
    return Err(
      StudioError.validation(
        `Mission type ${name}: Multiple initial states are marked: ${[...initialCandidates].join(', ')}`,
      ),
    )
  }
  const [initialState] = initialCandidates

  const result = validateMissionType({
    name,
    description: doc.description ?? '',
    initialState,
    states,
    transitions,
    imageResolution: doc.image_resolution,
    layout: doc.ui_metadata?.positions ?? {},
  })
  if (!result.ok) {
    return Err(StudioError.validation(`Mission type ${name}: ${result.error.message}`))
  }
  return Ok(result.value)
}

/** Canonical document for a config. The name is carried by the file name, not the document. */
export function configToDocument(config: MissionTypeConfig): MissionTypeDocument {
  const states: Record<string, DocumentState> = {}
  for (const s of config.states) {
    states[s.name] = {
      prompt: s.prompt,
      tools: [...s.tools],
      observations: [...s.observations],
      ...(s.outputKeys.length > 0 ? { output_keys: s.outputKeys } : {}),
      ...(s.verifiers.length > 0 ? { verifiers: s.verifiers } : {}),
    }
  }

  return {
    description: config.description,
    initial_state: config.initialState,
    ...(config.imageResolution ? { image_resolution: { ...config.imageResolution } } : {}),
    states,
    transitions: config.transitions.map((t) =>
      t.kind === 'error' ? { from: t.from, to: t.to, error: true } : { from: t.from, to: t.to, condition: t.condition },
    ),
    ...(Object.keys(config.layout).length > 0 ? { ui_metadata: { positions: { ...config.layout } } } : {}),
  }
}

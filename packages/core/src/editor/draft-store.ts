/**
 * Editor draft: an in-memory copy of a mission type that the graph editor mutates.
 *
 * Every operation returns a Result. A rejected operation sets `lastError` and leaves
 * the draft as it was; nothing reaches disk until `commit`.
 */

import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import { Ok, Err, StudioError, IdentifierSchema } from '../common/index.js'
import type { Result } from '../common/index.js'
import { STATE_TEMPLATES, StateDefinitionSchema, validateMissionType } from '../mission-types/index.js'
import type {
  ImageResolution,
  MissionTypeConfig,
  MissionTypeManager,
  NodePosition,
  StateDefinition,
  StateTemplateId,
} from '../mission-types/index.js'
import { computeLayout, defaultPosition } from './graph.js'

export type AddStateTemplate = StateTemplateId | 'copy'

export type StatePatch = Partial<Omit<StateDefinition, 'name'>>

export interface TransitionPatch {
  to?: string
  condition?: string
}

export interface MetaPatch {
  description?: string
  /** `null` removes the resolution. */
  imageResolution?: ImageResolution | null
}

export interface DraftState {
  baseline: MissionTypeConfig
  draft: MissionTypeConfig
  dirty: boolean
  lastError: StudioError | null

  addState(name: string, template?: AddStateTemplate, copyFrom?: string): Result<MissionTypeConfig, StudioError>
  renameState(name: string, nextName: string): Result<MissionTypeConfig, StudioError>
  removeState(name: string, replacementInitial?: string): Result<MissionTypeConfig, StudioError>
  setInitialState(name: string): Result<MissionTypeConfig, StudioError>
  updateState(name: string, patch: StatePatch): Result<MissionTypeConfig, StudioError>
  addTransition(from: string, to: string, condition: string): Result<MissionTypeConfig, StudioError>
  updateTransition(index: number, patch: TransitionPatch): Result<MissionTypeConfig, StudioError>
  removeTransition(index: number): Result<MissionTypeConfig, StudioError>
  setErrorTransition(from: string, to: string): Result<MissionTypeConfig, StudioError>
  clearErrorTransition(from: string): Result<MissionTypeConfig, StudioError>
  moveState(name: string, position: NodePosition): Result<MissionTypeConfig, StudioError>
  autoLayout(): Result<MissionTypeConfig, StudioError>
  updateMeta(patch: MetaPatch): Result<MissionTypeConfig, StudioError>
  validate(): Result<MissionTypeConfig, StudioError>
  commit(manager: MissionTypeManager): Promise<Result<MissionTypeConfig, StudioError>>
  reset(): void
}

export type DraftStore = StoreApi<DraftState>

/** A mission type with no states, for starting a new draft. */
export function blankMissionType(name: string): MissionTypeConfig {
  return { name, description: '', initialState: '', states: [], transitions: [], layout: {} }
}

function hasState(config: MissionTypeConfig, name: string): boolean {
  return config.states.some((s) => s.name === name)
}

function requireState(config: MissionTypeConfig, name: string): Result<StateDefinition, StudioError> {
  const state = config.states.find((s) => s.name === name)
  return state ? Ok(state) : Err(StudioError.notFound('State', name))
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)]
}

function copyState(source: StateDefinition, name: string): StateDefinition {
  return {
    name,
    prompt: source.prompt,
    tools: [...source.tools],
    observations: [...source.observations],
    outputKeys: source.outputKeys.map((k) => ({ ...k })),
    verifiers: source.verifiers.map((v) => ({ ...v })),
  }
}

export function createDraftStore(config: MissionTypeConfig): DraftStore {
  return createStore<DraftState>((set, get) => {
    /** Run a pure edit against the current draft; only a successful edit is stored. */
    const apply = (
      edit: (draft: MissionTypeConfig) => Result<MissionTypeConfig, StudioError>,
    ): Result<MissionTypeConfig, StudioError> => {
      const result = edit(get().draft)
      if (result.ok) {
        set({ draft: result.value, dirty: true, lastError: null })
      } else {
        set({ lastError: result.error })
      }
      return result
    }

    return {
      baseline: config,
      draft: config,
      dirty: false,
      lastError: null,

      addState(name, template = 'empty', copyFrom) {
        return apply((d) => {
          const parsed = IdentifierSchema.safeParse(name)
          if (!parsed.success) return Err(StudioError.validation(`Invalid state name "${name}"`))
          if (hasState(d, name)) return Err(StudioError.conflict(`State already exists: ${name}`))

          let state: StateDefinition
          if (template === 'copy') {
            if (copyFrom === undefined) return Err(StudioError.validation('Copying a state needs a source state'))
            const source = requireState(d, copyFrom)
            if (!source.ok) return source
            state = copyState(source.value, name)
          } else {
            state = copyState({ name, ...STATE_TEMPLATES[template] }, name)
          }

          return Ok({
            ...d,
            initialState: d.states.length === 0 ? name : d.initialState,
            states: [...d.states, state],
            layout: { ...d.layout, [name]: defaultPosition(d.states.length) },
          })
        })
      },

      renameState(name, nextName) {
        return apply((d) => {
          const current = requireState(d, name)
          if (!current.ok) return current
          if (nextName === name) return Ok(d)
          if (!IdentifierSchema.safeParse(nextName).success) {
            return Err(StudioError.validation(`Invalid state name "${nextName}"`))
          }
          if (hasState(d, nextName)) return Err(StudioError.conflict(`State already exists: ${nextName}`))

          const swap = (s: string): string => (s === name ? nextName : s)
          const layout: Record<string, NodePosition> = {}
          for (const [key, pos] of Object.entries(d.layout)) layout[swap(key)] = pos

          return Ok({
            ...d,
            initialState: swap(d.initialState),
            states: d.states.map((s) => (s.name === name ? { ...s, name: nextName } : s)),
            transitions: d.transitions.map((t) => ({ ...t, from: swap(t.from), to: swap(t.to) })),
            layout,
          })
        })
      },

      removeState(name, replacementInitial) {
        return apply((d) => {
          const current = requireState(d, name)
          if (!current.ok) return current

          let initialState = d.initialState
          if (name === d.initialState) {
            if (d.states.length === 1) {
              initialState = ''
            } else if (replacementInitial === undefined) {
              return Err(
                StudioError.validation(`State ${name} is the initial state; choose a replacement initial state first`),
              )
            } else if (replacementInitial === name || !hasState(d, replacementInitial)) {
              return Err(StudioError.validation(`Replacement initial state is not declared: ${replacementInitial}`))
            } else {
              initialState = replacementInitial
            }
          }

          const layout = { ...d.layout }
          delete layout[name]
          return Ok({
            ...d,
            initialState,
            states: d.states.filter((s) => s.name !== name),
            transitions: d.transitions.filter((t) => t.from !== name && t.to !== name),
            layout,
          })
        })
      },

      setInitialState(name) {
        return apply((d) => {
          const state = requireState(d, name)
          if (!state.ok) return state
          return Ok({ ...d, initialState: name })
        })
      },

      updateState(name, patch) {
        return apply((d) => {
          const current = requireState(d, name)
          if (!current.ok) return current
          const merged = StateDefinitionSchema.safeParse({
            name,
            prompt: patch.prompt ?? current.value.prompt,
            tools: dedupe(patch.tools ?? current.value.tools),
            observations: dedupe(patch.observations ?? current.value.observations),
            outputKeys: patch.outputKeys ?? current.value.outputKeys,
            verifiers: patch.verifiers ?? current.value.verifiers,
          })
          if (!merged.success) {
            return Err(StudioError.validation(merged.error.issues.map((i) => i.message).join('; ')))
          }
          return Ok({ ...d, states: d.states.map((s) => (s.name === name ? merged.data : s)) })
        })
      },

      addTransition(from, to, condition) {
        return apply((d) => {
          for (const endpoint of [from, to]) {
            if (!hasState(d, endpoint)) return Err(StudioError.validation(`Transition endpoint is not declared: ${endpoint}`))
          }
          const trimmed = condition.trim()
          if (!trimmed) return Err(StudioError.validation('Transition condition must not be empty'))
          if (d.transitions.some((t) => t.kind === 'condition' && t.from === from && t.to === to)) {
            return Err(StudioError.conflict(`Transition ${from} -> ${to} already exists`))
          }
          return Ok({ ...d, transitions: [...d.transitions, { from, to, condition: trimmed, kind: 'condition' }] })
        })
      },

      updateTransition(index, patch) {
        return apply((d) => {
          const current = d.transitions[index]
          if (!current) return Err(StudioError.notFound('Transition', String(index)))
          if (current.kind === 'error') {
            return Err(StudioError.validation('Error transitions are changed with setErrorTransition'))
          }
          const to = patch.to ?? current.to
          const condition = (patch.condition ?? current.condition).trim()
          if (!hasState(d, to)) return Err(StudioError.validation(`Transition endpoint is not declared: ${to}`))
          if (!condition) return Err(StudioError.validation('Transition condition must not be empty'))
          const clash = d.transitions.some(
            (t, i) => i !== index && t.kind === 'condition' && t.from === current.from && t.to === to,
          )
          if (clash) return Err(StudioError.conflict(`Transition ${current.from} -> ${to} already exists`))
          return Ok({
            ...d,
            transitions: d.transitions.map((t, i) => (i === index ? { ...t, to, condition } : t)),
          })
        })
      },

      removeTransition(index) {
        return apply((d) => {
          if (!d.transitions[index]) return Err(StudioError.notFound('Transition', String(index)))
          return Ok({ ...d, transitions: d.transitions.filter((_, i) => i !== index) })
        })
      },

      setErrorTransition(from, to) {
        return apply((d) => {
          for (const endpoint of [from, to]) {
            if (!hasState(d, endpoint)) return Err(StudioError.validation(`Transition endpoint is not declared: ${endpoint}`))
          }
          const next = { from, to, condition: '', kind: 'error' as const }
          const existing = d.transitions.findIndex((t) => t.kind === 'error' && t.from === from)
          const transitions =
            existing === -1
              ? [...d.transitions, next]
              : d.transitions.map((t, i) => (i === existing ? next : t))
          return Ok({ ...d, transitions })
        })
      },

      clearErrorTransition(from) {
        return apply((d) => {
          if (!d.transitions.some((t) => t.kind === 'error' && t.from === from)) {
            return Err(StudioError.notFound('Error transition', from))
          }
          return Ok({ ...d, transitions: d.transitions.filter((t) => !(t.kind === 'error' && t.from === from)) })
        })
      },

      moveState(name, position) {
        return apply((d) => {
          const state = requireState(d, name)
          if (!state.ok) return state
          if (!position.every((n) => Number.isFinite(n))) {
            return Err(StudioError.validation('Node position must be finite'))
          }
          return Ok({ ...d, layout: { ...d.layout, [name]: [position[0], position[1]] } })
        })
      },

      autoLayout() {
        return apply((d) => Ok({ ...d, layout: computeLayout(d) }))
      },

      updateMeta(patch) {
        return apply((d) => {
          const next: MissionTypeConfig = { ...d }
          if (patch.description !== undefined) next.description = patch.description
          if (patch.imageResolution === null) {
            delete next.imageResolution
          } else if (patch.imageResolution !== undefined) {
            const { width, height } = patch.imageResolution
            if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
              return Err(StudioError.validation('Image resolution must be positive integers'))
            }
            next.imageResolution = { width, height }
          }
          return Ok(next)
        })
      },

      validate() {
        const result = validateMissionType(get().draft)
        set({ lastError: result.ok ? null : result.error })
        return result
      },

      async commit(manager) {
        const validated = get().validate()
        if (!validated.ok) return validated
        const saved = await manager.save(get().draft)
        if (!saved.ok) {
          set({ lastError: saved.error })
          return saved
        }
        set({ baseline: saved.value, draft: saved.value, dirty: false, lastError: null })
        return saved
      },

      reset() {
        set({ draft: get().baseline, dirty: false, lastError: null })
      },
    }
  })
}

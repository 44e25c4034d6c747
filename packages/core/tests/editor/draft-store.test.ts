import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { blankMissionType, createDraftStore } from '../../src/editor/index.js'
import type { DraftStore } from '../../src/editor/index.js'
import { MissionTypeManager } from '../../src/mission-types/index.js'

/** search -> end, search errors to error. */
function seeded(): DraftStore {
  const store = createDraftStore(blankMissionType('patrol'))
  const s = store.getState()
  s.addState('search', 'execution')
  s.addState('end')
  s.addState('error')
  s.addTransition('search', 'end', 'True')
  s.setErrorTransition('search', 'error')
  return store
}

describe('createDraftStore', () => {
  it('starts clean from the given config', () => {
    const store = createDraftStore(blankMissionType('patrol'))
    const state = store.getState()
    expect(state.dirty).toBe(false)
    expect(state.lastError).toBeNull()
    expect(state.draft).toEqual({ name: 'patrol', description: '', initialState: '', states: [], transitions: [], layout: {} })
  })

  describe('states', () => {
    it('makes the first state initial and gives it a grid position', () => {
      const store = createDraftStore(blankMissionType('patrol'))
      const result = store.getState().addState('search', 'execution')
      expect(result.ok).toBe(true)

      const { draft, dirty } = store.getState()
      expect(dirty).toBe(true)
      expect(draft.initialState).toBe('search')
      expect(draft.states[0].tools).toEqual(['next_goal'])
      expect(draft.layout).toEqual({ search: [80, 80] })

      store.getState().addState('end')
      expect(store.getState().draft.initialState).toBe('search')
      expect(store.getState().draft.layout.end).toEqual([300, 80])
    })

    it('rejects duplicates and bad names without touching the draft', () => {
      const store = seeded()
      const before = store.getState().draft

      const dup = store.getState().addState('search')
      expect(dup.ok).toBe(false)
      expect(store.getState().lastError?.message).toBe('State already exists: search')

      const bad = store.getState().addState('bad name')
      expect(bad.ok).toBe(false)
      expect(store.getState().lastError?.code).toBe('VALIDATION_ERROR')
      expect(store.getState().draft).toBe(before)
    })

    it('copies an existing state', () => {
      const store = seeded()
      expect(store.getState().addState('search_again', 'copy', 'search').ok).toBe(true)
      const copy = store.getState().draft.states.find((s) => s.name === 'search_again')
      expect(copy?.tools).toEqual(['next_goal'])

      const missingSource = store.getState().addState('x', 'copy')
      expect(missingSource.ok).toBe(false)
      if (!missingSource.ok) expect(missingSource.error.message).toBe('Copying a state needs a source state')
    })

    it('renames a state everywhere it is referenced', () => {
      const store = seeded()
      expect(store.getState().renameState('search', 'scan').ok).toBe(true)
      const { draft } = store.getState()
      expect(draft.initialState).toBe('scan')
      expect(draft.states.map((s) => s.name)).toEqual(['scan', 'end', 'error'])
      expect(draft.transitions.map((t) => t.from)).toEqual(['scan', 'scan'])
      expect(draft.layout.scan).toEqual([80, 80])
      expect(draft.layout.search).toBeUndefined()
    })

    it('needs a replacement before removing the initial state', () => {
      const store = seeded()
      const refused = store.getState().removeState('search')
      expect(refused.ok).toBe(false)
      if (!refused.ok) {
        expect(refused.error.message).toBe('State search is the initial state; choose a replacement initial state first')
      }

      const removed = store.getState().removeState('search', 'end')
      expect(removed.ok).toBe(true)
      const { draft } = store.getState()
      expect(draft.initialState).toBe('end')
      expect(draft.transitions).toEqual([])
      expect(Object.keys(draft.layout)).toEqual(['end', 'error'])
    })

    it('clears the initial state when the last state goes', () => {
      const store = createDraftStore(blankMissionType('patrol'))
      store.getState().addState('only')
      expect(store.getState().removeState('only').ok).toBe(true)
      expect(store.getState().draft.initialState).toBe('')
    })

    it('merges state patches and dedupes tool lists', () => {
      const store = seeded()
      const result = store.getState().updateState('search', { tools: ['land', 'land', 'next_goal'] })
      expect(result.ok).toBe(true)
      const search = store.getState().draft.states[0]
      expect(search.tools).toEqual(['land', 'next_goal'])
      expect(search.observations).toEqual(['current_location', 'plan', 'locations_to_be_visited'])

      const bad = store.getState().updateState('search', { observations: ['not valid'] })
      expect(bad.ok).toBe(false)
    })
  })

  describe('transitions', () => {
    it('rejects undeclared endpoints, empty conditions and duplicates', () => {
      const store = seeded()
      const s = store.getState()

      const ghost = s.addTransition('search', 'ghost', 'True')
      expect(ghost.ok).toBe(false)
      if (!ghost.ok) expect(ghost.error.message).toBe('Transition endpoint is not declared: ghost')

      const empty = s.addTransition('search', 'end', '   ')
      expect(empty.ok).toBe(false)
      if (!empty.ok) expect(empty.error.message).toBe('Transition condition must not be empty')

      const dup = s.addTransition('search', 'end', 'else')
      expect(dup.ok).toBe(false)
      if (!dup.ok) {
        expect(dup.error.code).toBe('CONFLICT')
        expect(dup.error.message).toBe('Transition search -> end already exists')
      }
    })

    it('updates condition transitions but not error transitions', () => {
      const store = seeded()
      expect(store.getState().updateTransition(0, { condition: ' else ' }).ok).toBe(true)
      expect(store.getState().draft.transitions[0].condition).toBe('else')

      const errorEdit = store.getState().updateTransition(1, { to: 'end' })
      expect(errorEdit.ok).toBe(false)
      if (!errorEdit.ok) expect(errorEdit.error.message).toBe('Error transitions are changed with setErrorTransition')

      const missing = store.getState().updateTransition(7, {})
      expect(missing.ok).toBe(false)
      if (!missing.ok) expect(missing.error.code).toBe('NOT_FOUND')
    })

    it('keeps at most one error transition per state', () => {
      const store = seeded()
      store.getState().setErrorTransition('search', 'end')
      const errors = store.getState().draft.transitions.filter((t) => t.kind === 'error')
      expect(errors).toEqual([{ from: 'search', to: 'end', condition: '', kind: 'error' }])

      expect(store.getState().clearErrorTransition('search').ok).toBe(true)
      const again = store.getState().clearErrorTransition('search')
      expect(again.ok).toBe(false)
      if (!again.ok) expect(again.error.message).toBe('Error transition not found: search')
    })

    it('removes a transition by index', () => {
      const store = seeded()
      expect(store.getState().removeTransition(0).ok).toBe(true)
      expect(store.getState().draft.transitions.map((t) => t.kind)).toEqual(['error'])
    })
  })

  describe('layout and metadata', () => {
    it('moves nodes and rejects non-finite positions', () => {
      const store = seeded()
      expect(store.getState().moveState('end', [10, 20]).ok).toBe(true)
      expect(store.getState().draft.layout.end).toEqual([10, 20])
      expect(store.getState().moveState('end', [Number.NaN, 0]).ok).toBe(false)
    })

    it('lays out the graph automatically', () => {
      const store = seeded()
      store.getState().autoLayout()
      expect(store.getState().draft.layout).toEqual({ search: [80, 80], end: [300, 80], error: [300, 220] })
    })

    it('sets and clears the image resolution', () => {
      const store = seeded()
      store.getState().updateMeta({ description: 'Perimeter', imageResolution: { width: 640, height: 480 } })
      expect(store.getState().draft.description).toBe('Perimeter')
      expect(store.getState().draft.imageResolution).toEqual({ width: 640, height: 480 })

      expect(store.getState().updateMeta({ imageResolution: { width: 0, height: 480 } }).ok).toBe(false)

      store.getState().updateMeta({ imageResolution: null })
      expect(store.getState().draft.imageResolution).toBeUndefined()
      expect(store.getState().draft.description).toBe('Perimeter')
    })
  })

  describe('validate, commit and reset', () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'studio-draft-'))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('reports a missing initial state on an empty draft', () => {
      const store = createDraftStore(blankMissionType('patrol'))
      const result = store.getState().validate()
      expect(result.ok).toBe(false)
      expect(store.getState().lastError?.message).toBe('No initial state is marked')
    })

    it('commits a valid draft and makes it the new baseline', async () => {
      const manager = new MissionTypeManager(dir)
      const store = seeded()
      const committed = await store.getState().commit(manager)
      expect(committed.ok).toBe(true)
      expect(store.getState().dirty).toBe(false)
      expect(store.getState().baseline).toEqual(store.getState().draft)

      const loaded = await manager.load('patrol')
      expect(loaded.ok).toBe(true)
      if (loaded.ok) expect(loaded.value).toEqual(store.getState().draft)
    })

    it('does not write an invalid draft', async () => {
      const manager = new MissionTypeManager(dir)
      const store = createDraftStore(blankMissionType('patrol'))
      const committed = await store.getState().commit(manager)
      expect(committed.ok).toBe(false)
      expect(await manager.exists('patrol')).toBe(false)
    })

    it('reset discards edits since the baseline', () => {
      const store = seeded()
      store.getState().reset()
      expect(store.getState().dirty).toBe(false)
      expect(store.getState().draft.states).toEqual([])
    })
  })
})

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Ok } from '../../src/common/index.js'
import { MissionTypeManager } from '../../src/mission-types/index.js'
import type { MissionTypeConfigInput, MissionTypeReference, MissionTypeReferenceIndex } from '../../src/mission-types/index.js'

const patrol: MissionTypeConfigInput = {
  name: 'patrol',
  description: 'Walk the perimeter',
  initialState: 'search',
  states: [{ name: 'search', tools: ['next_goal', 'next_goal'] }, { name: 'end' }],
  transitions: [{ from: 'search', to: 'end', condition: ' True ' }],
}

class FakeReferences implements MissionTypeReferenceIndex {
  refs: MissionTypeReference[] = []

  async findMissionTypeReferences(name: string) {
    return Ok(this.refs.filter(() => name === 'patrol'))
  }
}

describe('MissionTypeManager', () => {
  let dir: string
  let references: FakeReferences
  let manager: MissionTypeManager

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'studio-types-'))
    references = new FakeReferences()
    manager = new MissionTypeManager(dir, references)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('saves normalized configs and loads them back', async () => {
    const saved = await manager.save(patrol)
    expect(saved.ok).toBe(true)

    const loaded = await manager.load('patrol')
    expect(loaded.ok).toBe(true)
    if (!loaded.ok) return
    expect(loaded.value.states[0].tools).toEqual(['next_goal'])
    expect(loaded.value.transitions[0].condition).toBe('True')

    const onDisk = JSON.parse(await readFile(join(dir, 'patrol.json'), 'utf-8'))
    expect(onDisk.initial_state).toBe('search')
    expect(onDisk.name).toBeUndefined()
  })

  it('never writes an invalid config', async () => {
    const result = await manager.save({ ...patrol, initialState: 'ghost' })
    expect(result.ok).toBe(false)
    expect(await manager.exists('patrol')).toBe(false)
  })

  it('returns NOT_FOUND for a missing type and VALIDATION_ERROR for a bad name', async () => {
    const missing = await manager.load('nothing')
    expect(missing.ok).toBe(false)
    if (!missing.ok) expect(missing.error.code).toBe('NOT_FOUND')

    const bad = await manager.load('../escape')
    expect(bad.ok).toBe(false)
    if (!bad.ok) expect(bad.error.code).toBe('VALIDATION_ERROR')
  })

  it('reports malformed JSON as FORMAT_ERROR', async () => {
    await writeFile(join(dir, 'broken.json'), '{ not json')
    const result = await manager.load('broken')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('FORMAT_ERROR')
  })

  it('lists names sorted, skipping hidden and foreign files', async () => {
    await manager.save({ ...patrol, name: 'zulu' })
    await manager.save(patrol)
    await writeFile(join(dir, '.hidden.json'), '{}')
    await writeFile(join(dir, 'notes.txt'), 'x')
    await writeFile(join(dir, 'bad name.json'), '{}')

    const names = await manager.listNames()
    expect(names).toEqual({ ok: true, value: ['patrol', 'zulu'] })

    const seen: string[] = []
    for await (const name of manager.list()) seen.push(name)
    expect(seen.sort()).toEqual(['patrol', 'zulu'])
  })

  it('lists nothing when the directory does not exist', async () => {
    const empty = new MissionTypeManager(join(dir, 'missing'))
    expect(await empty.listNames()).toEqual({ ok: true, value: [] })
  })

  it('blocks deleting a mission type that missions still use', async () => {
    await manager.save(patrol)
    references.refs = [{ projectId: 'p1', projectName: 'Field day', missionId: 'm1', missionName: 'patrol 001' }]

    const result = await manager.delete('patrol')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('IN_USE')
      expect(result.error.message).toBe('Mission type patrol is used by 1 mission(s): Field day/patrol 001')
    }
    expect(await manager.exists('patrol')).toBe(true)
  })

  it('deletes an unused mission type', async () => {
    await manager.save(patrol)
    expect(await manager.delete('patrol')).toEqual({ ok: true, value: undefined })
    expect(await manager.exists('patrol')).toBe(false)

    const again = await manager.delete('patrol')
    expect(again.ok).toBe(false)
    if (!again.ok) expect(again.error.code).toBe('NOT_FOUND')
  })

  it('seeds defaults only into an empty directory', async () => {
    const seeded = await manager.seedDefaults()
    expect(seeded).toEqual({ ok: true, value: ['locate_and_report', 'locate_and_land_safely', 'locate_and_track'] })

    const second = await manager.seedDefaults()
    expect(second).toEqual({ ok: true, value: [] })

    const all = await manager.loadAll()
    expect(all.ok).toBe(true)
    if (all.ok) expect(all.value.map((c) => c.name)).toEqual(['locate_and_land_safely', 'locate_and_report', 'locate_and_track'])
  })
})

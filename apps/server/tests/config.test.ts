import { describe, it, expect, vi, afterEach } from 'vitest'
import { join, resolve } from 'node:path'
import { blankMissionType } from '@mission-studio/core'
import { DraftRegistry, MAX_OPEN_DRAFTS, dataPaths, parseServerConfig } from '../src/index.js'

describe('parseServerConfig', () => {
  it('uses defaults', () => {
    expect(parseServerConfig([], {})).toEqual({
      ok: true,
      value: { port: 8765, host: '127.0.0.1', dataDir: resolve('./data'), help: false },
    })
  })

  it('reads the environment', () => {
    const result = parseServerConfig([], { PORT: '9000', HOST: '0.0.0.0', MISSION_STUDIO_DATA_DIR: '/srv/studio' })
    expect(result).toEqual({ ok: true, value: { port: 9000, host: '0.0.0.0', dataDir: '/srv/studio', help: false } })
  })

  it('lets flags win over the environment', () => {
    const result = parseServerConfig(['--port', '9100', '--data-dir', '/tmp/studio'], { PORT: '9000' })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.port).toBe(9100)
      expect(result.value.dataDir).toBe('/tmp/studio')
    }
  })

  it('rejects a bad port', () => {
    const result = parseServerConfig(['--port', 'abc'], {})
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_ERROR')
      expect(result.error.message).toBe('Invalid port: abc')
    }
  })

  it('rejects an unknown flag', () => {
    const result = parseServerConfig(['--verbose'], {})
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR')
  })

  it('recognises --help', () => {
    const result = parseServerConfig(['-h'], {})
    expect(result.ok && result.value.help).toBe(true)
  })
})

describe('dataPaths', () => {
  it('lays out the data directory', () => {
    expect(dataPaths('/srv/studio')).toEqual({
      projects: join('/srv/studio', 'projects'),
      missionTypes: join('/srv/studio', 'mission_types'),
      settings: join('/srv/studio', 'settings.json'),
      database: join('/srv/studio', 'activity.db'),
    })
  })
})

describe('DraftRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('opens, finds and closes drafts', () => {
    const registry = new DraftRegistry()
    const session = registry.open(blankMissionType('patrol'))
    expect(registry.get(session.id)).toBe(session)
    expect(registry.close(session.id)).toBe(true)
    expect(registry.close(session.id)).toBe(false)
    expect(registry.size).toBe(0)
  })

  it('closes the oldest draft when too many are open', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const registry = new DraftRegistry()
    const first = registry.open(blankMissionType('patrol'))
    for (let i = 1; i < MAX_OPEN_DRAFTS; i++) registry.open(blankMissionType('patrol'))

    const next = registry.open(blankMissionType('patrol'))
    expect(registry.size).toBe(MAX_OPEN_DRAFTS)
    expect(registry.get(first.id)).toBeUndefined()
    expect(registry.get(next.id)).toBe(next)
    expect(warn).toHaveBeenCalledWith(`[drafts] closed draft ${first.id}; too many open drafts`)
  })
})

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { ActivityRepository, recordActivity } from '../../src/activity/index.js'

describe('ActivityRepository', () => {
  let db: Database.Database
  let repo: ActivityRepository

  beforeEach(() => {
    db = openDatabase(':memory:')
    repo = new ActivityRepository(db)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    db.close()
  })

  it('logs an entry with defaults', () => {
    const result = repo.log({ eventType: 'mission_type_saved', summary: 'Saved mission type patrol' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.projectId).toBeNull()
    expect(result.value.detail).toEqual({})
    expect(result.value.eventType).toBe('mission_type_saved')
  })

  it('rejects an empty summary', () => {
    const result = repo.log({ eventType: 'project_created', summary: '' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_ERROR')
      expect(result.error.message).toBe('Summary is required')
    }
  })

  it('lists a project newest first', () => {
    repo.log({ projectId: 'p1', eventType: 'project_created', summary: 'first' })
    repo.log({ projectId: 'p2', eventType: 'project_created', summary: 'other' })
    repo.log({ projectId: 'p1', eventType: 'generation_completed', summary: 'second', detail: { count: 3 } })

    const result = repo.listByProject('p1')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((e) => e.summary)).toEqual(['second', 'first'])
    expect(result.value[0].detail).toEqual({ count: 3 })
  })

  it('lists recent entries across projects with a limit', () => {
    repo.log({ projectId: 'p1', eventType: 'project_created', summary: 'one' })
    repo.log({ projectId: 'p2', eventType: 'project_created', summary: 'two' })
    repo.log({ eventType: 'mission_type_deleted', summary: 'three' })

    const result = repo.listRecent(2)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.map((e) => e.summary)).toEqual(['three', 'two'])
  })

  it('skips rows with an unknown event type', () => {
    db.prepare(
      `INSERT INTO activity_log (id, project_id, event_type, summary, detail, created_at, seq)
       VALUES ('x', 'p1', 'retired_event', 'old', '{}', '2024-01-01T00:00:00.000Z', 99)`,
    ).run()
    repo.log({ projectId: 'p1', eventType: 'hub_pushed', summary: 'pushed' })

    const result = repo.listByProject('p1')
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.map((e) => e.summary)).toEqual(['pushed'])
  })

  it('reports a database failure as DB_ERROR', () => {
    db.close()
    const result = repo.listRecent()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('DB_ERROR')
    db = openDatabase(':memory:')
  })
})

describe('recordActivity', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('does nothing without a repository', () => {
    expect(() => recordActivity(undefined, { eventType: 'project_created', summary: 'x' })).not.toThrow()
  })

  it('warns instead of failing when the entry is rejected', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const db = openDatabase(':memory:')
    recordActivity(new ActivityRepository(db), { eventType: 'project_created', summary: '' })
    expect(warn).toHaveBeenCalledWith('[activity] failed to record project_created: Summary is required')
    db.close()
  })
})

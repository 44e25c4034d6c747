/**
 * Activity log repository: project-level events for the overview screen.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { ActivityEventTypeSchema, CreateActivityInputSchema } from './schemas.js'
import type { ActivityEntry, CreateActivityInput } from './schemas.js'

interface ActivityRow {
  id: string
  project_id: string | null
  event_type: string
  summary: string
  detail: string
  created_at: string
}

function parseDetail(text: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(text)
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {}
  } catch (err) {
    console.warn(`[activity] unreadable detail column: ${errorMessage(err)}`)
    return {}
  }
}

function rowToEntry(row: ActivityRow): ActivityEntry | null {
  const eventType = ActivityEventTypeSchema.safeParse(row.event_type)
  if (!eventType.success) return null
  return {
    id: row.id,
    projectId: row.project_id,
    eventType: eventType.data,
    summary: row.summary,
    detail: parseDetail(row.detail),
    createdAt: row.created_at,
  }
}

function toEntries(rows: ActivityRow[]): ActivityEntry[] {
  return rows.map(rowToEntry).filter((e): e is ActivityEntry => e !== null)
}

export class ActivityRepository {
  constructor(private readonly db: Database.Database) {}

  log(input: CreateActivityInput): Result<ActivityEntry, StudioError> {
    const parsed = CreateActivityInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(StudioError.validation(parsed.error.issues.map((i) => i.message).join('; ')))
    }

    const entry: ActivityEntry = {
      id: uuidv4(),
      projectId: parsed.data.projectId,
      eventType: parsed.data.eventType,
      summary: parsed.data.summary,
      detail: parsed.data.detail,
      createdAt: new Date().toISOString(),
    }

    try {
      this.db
        .prepare(
          `INSERT INTO activity_log (id, project_id, event_type, summary, detail, created_at, seq)
           VALUES (?, ?, ?, ?, ?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM activity_log))`,
        )
        .run(entry.id, entry.projectId, entry.eventType, entry.summary, JSON.stringify(entry.detail), entry.createdAt)
      return Ok(entry)
    } catch (e) {
      return Err(StudioError.db(errorMessage(e)))
    }
  }

  /** Newest first. */
  listByProject(projectId: string, limit = 100): Result<ActivityEntry[], StudioError> {
    try {
      const rows = this.db
        .prepare<[string, number], ActivityRow>(
          'SELECT * FROM activity_log WHERE project_id = ? ORDER BY seq DESC LIMIT ?',
        )
        .all(projectId, limit)
      return Ok(toEntries(rows))
    } catch (e) {
      return Err(StudioError.db(errorMessage(e)))
    }
  }

  /** Newest first, across all projects. */
  listRecent(limit = 50): Result<ActivityEntry[], StudioError> {
    try {
      const rows = this.db
        .prepare<[number], ActivityRow>('SELECT * FROM activity_log ORDER BY seq DESC LIMIT ?')
        .all(limit)
      return Ok(toEntries(rows))
    } catch (e) {
      return Err(StudioError.db(errorMessage(e)))
    }
  }
}

/** Log and forget: a failed activity write is reported but never fails the caller's operation. */
export function recordActivity(repo: ActivityRepository | undefined, input: CreateActivityInput): void {
  if (!repo) return
  const result = repo.log(input)
  if (!result.ok) console.warn(`[activity] failed to record ${input.eventType}: ${result.error.message}`)
}

/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/** SQLite's own multi-statement exec, used for DDL. */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

export const migrations: Migration[] = [
  {
    version: 1,
    description: 'Activity log',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS activity_log (
          id TEXT PRIMARY KEY,
          project_id TEXT,
          event_type TEXT NOT NULL,
          summary TEXT NOT NULL,
          detail TEXT NOT NULL DEFAULT '{}',
          created_at TEXT NOT NULL,
          seq INTEGER NOT NULL DEFAULT 0
        );

        CREATE INDEX IF NOT EXISTS idx_activity_log_project ON activity_log(project_id, created_at);
        CREATE INDEX IF NOT EXISTS idx_activity_log_created ON activity_log(created_at);
        CREATE INDEX IF NOT EXISTS idx_activity_log_seq ON activity_log(seq);
      `,
      )
    },
  },
]

export function runMigrations(db: Database.Database): void {
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const current = db.prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version').get()
  const applied = current?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

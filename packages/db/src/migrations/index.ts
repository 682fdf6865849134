/**
 * Migration Runner
 *
 * Applies database migrations in order, tracking which have been applied.
 */

import type { Database } from 'better-sqlite3'
import * as migration001 from './001-initial-schema'

export interface Migration {
  version: number
  up: (db: Database) => void
}

const migrations: Migration[] = [
  {
    version: migration001.version,
    up: migration001.up,
  },
]

/**
 * Get the current schema version from the database.
 * Callers create schema_version first.
 */
function getCurrentVersion(db: Database): number {
  const result = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()
  return result?.version ?? 0
}

/**
 * Initialize the schema_version table.
 */
function initSchemaVersionTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `)
}

/**
 * Run all pending migrations.
 */
export function runMigrations(db: Database): { applied: number[]; current: number } {
  initSchemaVersionTable(db)

  const currentVersion = getCurrentVersion(db)
  const pendingMigrations = migrations.filter((m) => m.version > currentVersion)
  const applied: number[] = []

  for (const migration of pendingMigrations) {
    db.transaction(() => {
      migration.up(db)
      db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
        migration.version,
        Date.now(),
      )
    })()

    applied.push(migration.version)
  }

  return {
    applied,
    current: applied.length > 0 ? applied[applied.length - 1] : currentVersion,
  }
}

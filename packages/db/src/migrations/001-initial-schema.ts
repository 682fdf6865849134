/**
 * Migration 001: Initial Schema
 *
 * Creates all tables:
 * - replace_journal: In-flight replace sequences per slave
 * - sync_runs: Run history
 */

import type { Database } from 'better-sqlite3'

export const version = 1

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS replace_journal (
      slave TEXT NOT NULL,
      image_name TEXT NOT NULL,
      step TEXT NOT NULL CHECK (step IN ('staged', 'renamed', 'created', 'uploaded', 'aborted')),
      stale_id TEXT NOT NULL,
      new_id TEXT,
      backup_name TEXT NOT NULL,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (slave, image_name)
    )
  `)

  db.exec(`
    CREATE TABLE IF NOT EXISTS sync_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      master TEXT NOT NULL,
      slaves TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('running', 'succeeded', 'partial', 'failed')),
      dry_run INTEGER NOT NULL DEFAULT 0,
      selected INTEGER NOT NULL DEFAULT 0,
      created INTEGER NOT NULL DEFAULT 0,
      replaced INTEGER NOT NULL DEFAULT 0,
      skipped INTEGER NOT NULL DEFAULT 0,
      failed_slaves INTEGER NOT NULL DEFAULT 0,
      error TEXT,
      started_at INTEGER NOT NULL,
      finished_at INTEGER
    )
  `)

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_sync_runs_started_at ON sync_runs(started_at)
  `)
}

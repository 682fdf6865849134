/**
 * Drizzle ORM Schema
 *
 * Defines all database tables with custom column types for automatic
 * Date↔integer and JSON↔text conversion. ID types from @image-sync/core
 * are applied via $type<>() for type safety.
 */

import type { ImageId, StoreName } from '@image-sync/core'
import { customType, index, integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core'

/**
 * Custom column type: stores Date as integer (epoch ms) in SQLite.
 * Nullable columns just omit .notNull() — Drizzle handles null passthrough.
 */
const timestamp = customType<{ data: Date; driverData: number }>({
  dataType() {
    return 'integer'
  },
  toDriver(value: Date): number {
    return value.getTime()
  },
  fromDriver(value: number): Date {
    return new Date(value)
  },
})

/**
 * Custom column type: stores string[] as JSON text in SQLite.
 */
const jsonStringArray = customType<{ data: string[]; driverData: string }>({
  dataType() {
    return 'text'
  },
  toDriver(value: string[]): string {
    return JSON.stringify(value)
  },
  fromDriver(value: string): string[] {
    return JSON.parse(value) as string[]
  },
})

/**
 * One row per replace sequence in flight on a slave. The row is removed once
 * the sequence completes or its leftovers have been recovered.
 */
export const replaceJournal = sqliteTable(
  'replace_journal',
  {
    slave: text('slave').$type<StoreName>().notNull(),
    imageName: text('image_name').notNull(),
    step: text('step', {
      enum: ['staged', 'renamed', 'created', 'uploaded', 'aborted'],
    }).notNull(),
    staleId: text('stale_id').$type<ImageId>().notNull(),
    newId: text('new_id').$type<ImageId>(),
    backupName: text('backup_name').notNull(),
    updatedAt: timestamp('updated_at').notNull(),
  },
  (table) => [primaryKey({ columns: [table.slave, table.imageName] })],
)

export const syncRuns = sqliteTable(
  'sync_runs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    master: text('master').$type<StoreName>().notNull(),
    slaves: jsonStringArray('slaves').notNull(),
    status: text('status', {
      enum: ['running', 'succeeded', 'partial', 'failed'],
    }).notNull(),
    dryRun: integer('dry_run', { mode: 'boolean' }).notNull().default(false),
    selected: integer('selected').notNull().default(0),
    created: integer('created').notNull().default(0),
    replaced: integer('replaced').notNull().default(0),
    skipped: integer('skipped').notNull().default(0),
    failedSlaves: integer('failed_slaves').notNull().default(0),
    error: text('error'),
    startedAt: timestamp('started_at').notNull(),
    finishedAt: timestamp('finished_at'),
  },
  (table) => [index('idx_sync_runs_started_at').on(table.startedAt)],
)

/**
 * @image-sync/db
 *
 * SQLite persistence for the replace journal and run history, using
 * Drizzle ORM over better-sqlite3.
 *
 * Consumers use DrizzleDb + schema directly for queries.
 * Custom column types handle Date↔integer and JSON↔text conversion.
 */

export {
  closeDatabase,
  createTestDatabase,
  initDatabase,
  type DatabaseConfig,
  type DrizzleDb,
} from './database'
export { runMigrations, type Migration } from './migrations'
export * as schema from './schema'

import type * as s from './schema'

export type ReplaceJournalRow = typeof s.replaceJournal.$inferSelect
export type ReplaceJournalInsert = typeof s.replaceJournal.$inferInsert
export type SyncRunRow = typeof s.syncRuns.$inferSelect
export type SyncRunInsert = typeof s.syncRuns.$inferInsert

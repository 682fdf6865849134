/**
 * Database Initialization
 *
 * Creates and configures the SQLite database with WAL mode for performance,
 * wrapped with Drizzle ORM for type-safe queries.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3'
import { runMigrations } from './migrations'
import * as schema from './schema'

export type DrizzleDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database }

export interface DatabaseConfig {
  /** Path to the SQLite database file */
  path: string
  /** Enable WAL mode for better concurrent performance (default: true) */
  walMode?: boolean
  /** Busy timeout in milliseconds (default: 5000) */
  busyTimeout?: number
}

const DEFAULT_CONFIG: Omit<DatabaseConfig, 'path'> = {
  walMode: true,
  busyTimeout: 5000,
}

/**
 * Initialize the database with migrations and optimized settings.
 * Returns a Drizzle ORM instance wrapping the configured SQLite database.
 */
export function initDatabase(config: DatabaseConfig): DrizzleDb {
  const fullConfig = { ...DEFAULT_CONFIG, ...config }

  // Ensure parent directory exists
  mkdirSync(dirname(fullConfig.path), { recursive: true })

  const sqlite = new Database(fullConfig.path)

  if (fullConfig.walMode) {
    sqlite.pragma('journal_mode = WAL')
  }

  if (fullConfig.busyTimeout) {
    sqlite.pragma(`busy_timeout = ${fullConfig.busyTimeout}`)
  }

  sqlite.pragma('synchronous = NORMAL')

  runMigrations(sqlite)

  return drizzle(sqlite, { schema })
}

/**
 * Create an in-memory Drizzle database for testing.
 * Applies migrations and returns the Drizzle instance.
 */
export function createTestDatabase(): DrizzleDb {
  const sqlite = new Database(':memory:')
  runMigrations(sqlite)
  return drizzle(sqlite, { schema })
}

/**
 * Close the database connection, checkpointing the WAL first.
 */
export function closeDatabase(db: DrizzleDb): void {
  const raw = db.$client
  if (!raw.open) return

  if (!raw.memory) {
    raw.pragma('wal_checkpoint(TRUNCATE)')
  }
  raw.close()
}

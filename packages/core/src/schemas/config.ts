import { z } from 'zod'
import { snakeToCamelDeep } from '../case-convert'
import type { StoreName } from '../types'

/**
 * Parse duration string (e.g., "30s", "5m", "1000ms", "6h") to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)(ms|s|m|h)$/)
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`)
  }
  const value = Number.parseInt(match[1], 10)
  switch (match[2]) {
    case 'ms':
      return value
    case 's':
      return value * 1000
    case 'm':
      return value * 60 * 1000
    default:
      return value * 60 * 60 * 1000
  }
}

// Duration string pattern (e.g., "30s", "5m", "1000ms", "1h")
const durationPattern = /^[0-9]+(ms|s|m|h)$/
const duration = z.union([
  z.number().int().positive(),
  z
    .string()
    .regex(durationPattern, 'Must be a duration string (e.g., "30s", "5m", "1000ms")')
    .transform(parseDuration),
])

/**
 * Accepts a YAML list or a comma/space separated string.
 */
const nameList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(/[\s,]+/))
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  )

const regexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source)
      return true
    } catch {
      return false
    }
  },
  { message: 'Must be a valid regular expression' },
)

// =============================================================================
// Store Connection
// =============================================================================

/**
 * Connection settings for one Glance endpoint and its Keystone.
 */
export const storeConfigSchema = z.object({
  url: z.string().url().describe('Base URL of the Glance server, without port'),
  port: z.coerce.number().int().positive().default(9292),
  version: z.string().default('v2'),
  username: z.string().default('admin'),
  password: z.string().describe('Keystone password'),
  tenant: z.string().default('admin').describe('Keystone project the token is scoped to'),
  auth_url: z.string().url().optional().describe('Keystone base URL, defaults to url'),
  auth_port: z.coerce.number().int().positive().default(5000),
  auth_version: z.string().default('v3'),
  user_domain: z.string().default('default'),
  project_domain: z.string().default('default'),
  request_timeout: duration.default('30s').describe('Timeout for metadata calls'),
  transfer_timeout: duration.default('6h').describe('Timeout for image downloads and uploads'),
})

// =============================================================================
// Config File
// =============================================================================

export const baseConfigSchema = z.object({
  master: z.string().optional().describe('Name of the master store'),
  slaves: nameList.optional().describe('Names of the stores kept in sync with the master'),
  scratch_dir: z.string().optional().describe('Directory where downloaded images are cached'),
  clean: z.boolean().optional().describe('Empty the scratch directory after the run'),
  state_db: z.string().optional().describe('SQLite file holding the replace journal and run history'),
  concurrency: z.number().int().min(1).optional().describe('Slaves reconciled at the same time'),
})

export const imagesConfigSchema = z.object({
  sync_list: nameList.optional().describe('Exact image names to sync'),
  pattern: regexSource.optional().describe('Regular expression matched at the start of image names'),
})

export const syncConfigSchema = z.object({
  base: baseConfigSchema.default({}),
  images: imagesConfigSchema.default({}),
  stores: z.record(z.string(), storeConfigSchema).default({}),
})

export type StoreConfigRaw = z.infer<typeof storeConfigSchema>
export type SyncConfigRaw = z.infer<typeof syncConfigSchema>

export interface StoreConfig {
  url: string
  port: number
  version: string
  username: string
  password: string
  tenant: string
  authUrl?: string
  authPort: number
  authVersion: string
  userDomain: string
  projectDomain: string
  requestTimeout: number
  transferTimeout: number
}

export interface SyncConfig {
  base: {
    master?: StoreName
    slaves?: StoreName[]
    scratchDir?: string
    clean?: boolean
    stateDb?: string
    concurrency?: number
  }
  images: {
    syncList?: string[]
    pattern?: string
  }
  stores: Map<StoreName, StoreConfig>
}

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

function toSyncConfig(raw: SyncConfigRaw): SyncConfig {
  // Store names are user keys, so only each store's own fields are converted
  const stores = new Map<StoreName, StoreConfig>()
  for (const [name, store] of Object.entries(raw.stores)) {
    stores.set(name, snakeToCamelDeep(store))
  }
  return {
    base: snakeToCamelDeep(raw.base),
    images: snakeToCamelDeep(raw.images),
    stores,
  }
}

/**
 * Parse and validate config data (returns camelCase)
 */
export function parseSyncConfig(data: unknown): SyncConfig {
  return toSyncConfig(syncConfigSchema.parse(data ?? {}))
}

/**
 * Safely parse config data, returning result with errors (returns camelCase)
 */
export function safeParseSyncConfig(data: unknown): ParseResult<SyncConfig> {
  const result = syncConfigSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: toSyncConfig(result.data) }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}

/**
 * Config Loader
 *
 * Reads the YAML config file, interpolates ${VAR} references from the
 * environment and merges command line options over it.
 */

import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import {
  type StoreConfig,
  type StoreName,
  type SyncConfig,
  type SyncSelection,
  type ValidationError,
  safeParseSyncConfig,
} from '@image-sync/core'
import { parse as parseYaml } from 'yaml'
import type { EnvConfig } from '../config'
import { ConfigValidationError } from '../errors'

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the env var exists in process.env
 */
export function interpolateEnvVars(content: string): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
    if (varName in process.env) {
      return process.env[varName] ?? ''
    }
    return match
  })
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Load and validate a config file.
 * A missing file yields an empty config when `optional` is set.
 */
export function loadConfigFile(filePath: string, options: { optional?: boolean } = {}): SyncConfig {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    if (isNotFound(err)) {
      if (options.optional) {
        return { base: {}, images: {}, stores: new Map() }
      }
      throw new ConfigValidationError(filePath, [{ path: '/', message: 'File not found' }])
    }
    throw err
  }

  let raw: unknown
  try {
    raw = parseYaml(interpolateEnvVars(content))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigValidationError(filePath, [{ path: '/', message }])
  }

  const result = safeParseSyncConfig(raw)
  if (!result.success) {
    throw new ConfigValidationError(filePath, result.errors)
  }
  return result.data
}

/**
 * Command line options that override config file values.
 */
export interface RunOptions {
  master?: string
  slaves?: string[]
  images?: string[]
  pattern?: string
  tmpdir?: string
  clean?: boolean
  concurrency?: number
  stateDb?: string
}

/**
 * Fully resolved settings for one sync run.
 */
export interface RunSettings {
  master: StoreName
  slaves: StoreName[]
  selection: SyncSelection
  scratchDir: string
  clean: boolean
  stateDb: string
  concurrency: number
  stores: Map<StoreName, StoreConfig>
}

/**
 * Merge CLI options over the config file and environment defaults, and check
 * that every referenced store is configured. All problems are reported at once.
 */
export function resolveRunSettings(
  config: SyncConfig,
  options: RunOptions,
  env: EnvConfig,
): RunSettings {
  const errors: ValidationError[] = []

  const master = options.master ?? config.base.master
  const slaves = [...new Set(options.slaves ?? config.base.slaves ?? [])]
  const pattern = options.pattern ?? config.images.pattern
  const concurrency = options.concurrency ?? config.base.concurrency ?? 1

  if (!master) {
    errors.push({ path: 'base.master', message: 'No master store configured' })
  } else if (!config.stores.has(master)) {
    errors.push({ path: `stores.${master}`, message: `Unknown store '${master}'` })
  }

  if (slaves.length === 0) {
    errors.push({ path: 'base.slaves', message: 'No slave stores configured' })
  }
  for (const slave of slaves) {
    if (slave === master) {
      errors.push({ path: 'base.slaves', message: `Store '${slave}' is the master` })
    } else if (!config.stores.has(slave)) {
      errors.push({ path: `stores.${slave}`, message: `Unknown store '${slave}'` })
    }
  }

  if (pattern !== undefined && !isValidPattern(pattern)) {
    errors.push({ path: 'images.pattern', message: 'Must be a valid regular expression' })
  }

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    errors.push({ path: 'base.concurrency', message: 'Must be a positive integer' })
  }

  if (errors.length > 0 || !master) {
    throw new ConfigValidationError('run settings', errors)
  }

  const scratchDir = options.tmpdir ?? config.base.scratchDir
  const stateDb = options.stateDb ?? config.base.stateDb

  return {
    master,
    slaves,
    selection: {
      names: options.images ?? config.images.syncList ?? [],
      pattern,
    },
    scratchDir: scratchDir ? resolve(scratchDir) : env.scratchDir,
    clean: options.clean ?? config.base.clean ?? false,
    stateDb: stateDb ? resolve(stateDb) : env.dbPath,
    concurrency,
    stores: config.stores,
  }
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern)
    return true
  } catch {
    return false
  }
}

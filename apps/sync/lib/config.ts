import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue
}

function getEnvPath(key: string, defaultValue: string): string {
  const value = process.env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

/**
 * Process-level defaults. Values from the config file and the command line
 * take precedence.
 */
export interface EnvConfig {
  configPath: string
  scratchDir: string
  dbPath: string
  logLevel: string
}

export function readEnvConfig(): EnvConfig {
  return {
    configPath: getEnvPath('IMAGE_SYNC_CONFIG', 'image-sync.yaml'),
    scratchDir: getEnvPath('IMAGE_SYNC_SCRATCH_DIR', join(tmpdir(), 'image-sync')),
    dbPath: getEnvPath('IMAGE_SYNC_DB_PATH', 'data/image-sync.db'),
    logLevel: getEnvString('LOG_LEVEL', 'info'),
  }
}

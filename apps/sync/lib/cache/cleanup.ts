import type { Dirent } from 'node:fs'
import { readdir, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import type { Logger } from '../logger'

export interface CleanupResult {
  /** File names removed */
  removed: string[]
  /** File names that could not be removed */
  failed: string[]
}

/**
 * Remove every regular file directly under `scratchDir`. Subdirectories are
 * left alone and a missing directory is a no-op. A file that cannot be
 * removed is logged and the rest are still attempted.
 */
export async function cleanScratchDir(scratchDir: string, logger: Logger): Promise<CleanupResult> {
  const result: CleanupResult = { removed: [], failed: [] }

  let entries: Dirent[]
  try {
    entries = await readdir(scratchDir, { withFileTypes: true })
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.debug({ scratchDir }, 'Scratch directory does not exist')
      return result
    }
    throw err
  }

  for (const entry of entries) {
    if (!entry.isFile()) continue
    try {
      await unlink(join(scratchDir, entry.name))
      result.removed.push(entry.name)
    } catch (err) {
      logger.warn({ err, scratchDir, file: entry.name }, 'Failed to remove cached file')
      result.failed.push(entry.name)
    }
  }

  logger.info(
    { scratchDir, removed: result.removed.length, failed: result.failed.length },
    'Scratch directory cleaned',
  )
  return result
}


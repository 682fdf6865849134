/**
 * Local Download Cache
 *
 * Stages master image bytes in the scratch directory, one file per image id.
 * A cached file is reused only while its size equals the master's reported
 * size.
 */

import { createWriteStream } from 'node:fs'
import { mkdir, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import {
  type ImageId,
  type ImageRecord,
  type ImageStore,
  TransferFailureError,
  describeCause,
} from '@image-sync/core'
import type { Logger } from '../logger'
import { syncBytesStagedTotal } from '../metrics'

/**
 * Size of the file at `path` in bytes, or null when there is none.
 */
export async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path)
    return info.isFile() ? info.size : null
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
    throw err
  }
}

export class DownloadCache {
  readonly scratchDir: string
  private _log: Logger

  /** Transfers in progress by image id */
  private inFlight: Map<ImageId, Promise<string>> = new Map()

  constructor(scratchDir: string, logger: Logger) {
    this.scratchDir = scratchDir
    this._log = logger.child({ component: 'DownloadCache' })
  }

  pathFor(imageId: ImageId): string {
    return join(this.scratchDir, imageId)
  }

  /**
   * Return the path of a local copy of `imageId`, downloading it from `store`
   * unless a file of `sizeHint` bytes is already there.
   *
   * A failed transfer is logged and the partial file left in place; callers
   * verify the result with {@link assertStaged}. Concurrent calls for the same
   * id share one transfer.
   */
  ensureLocal(store: ImageStore, imageId: ImageId, sizeHint: number | null): Promise<string> {
    const existing = this.inFlight.get(imageId)
    if (existing) return existing

    const pending = this.stage(store, imageId, sizeHint).finally(() => {
      this.inFlight.delete(imageId)
    })
    this.inFlight.set(imageId, pending)
    return pending
  }

  private async stage(store: ImageStore, imageId: ImageId, sizeHint: number | null): Promise<string> {
    const path = this.pathFor(imageId)
    await mkdir(this.scratchDir, { recursive: true })

    const cachedSize = await fileSize(path)
    if (cachedSize !== null && sizeHint !== null && cachedSize === sizeHint) {
      this._log.debug({ imageId, path, size: cachedSize }, 'Using cached image')
      return path
    }
    if (cachedSize !== null) {
      this._log.debug({ imageId, path, size: cachedSize, expected: sizeHint }, 'Discarding stale cache file')
      await rm(path, { force: true })
    }

    this._log.info({ imageId, store: store.name, size: sizeHint }, 'Downloading image')
    try {
      await pipeline(store.downloadImage(imageId), createWriteStream(path))
      const staged = (await fileSize(path)) ?? 0
      syncBytesStagedTotal.inc(staged)
      this._log.info({ imageId, path, size: staged }, 'Image downloaded')
    } catch (err) {
      const failure = new TransferFailureError(imageId, describeCause(err), { cause: err })
      this._log.error({ err: failure, imageId, path }, 'Image download failed')
    }

    return path
  }
}

/**
 * Check that the file at `path` holds all of `image`'s bytes.
 */
export async function assertStaged(path: string, image: ImageRecord): Promise<void> {
  if (image.size === null) {
    throw new TransferFailureError(image.name, 'master reports no image data')
  }
  const size = await fileSize(path)
  if (size === null) {
    throw new TransferFailureError(image.name, `nothing staged at ${path}`)
  }
  if (size !== image.size) {
    throw new TransferFailureError(
      image.name,
      `staged ${size} of ${image.size} bytes at ${path}`,
    )
  }
}

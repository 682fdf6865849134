/**
 * Image Store Interface
 *
 * Abstracts the operations the sync engine needs from one remote image store:
 * - Glance v2 (via @image-sync/glance)
 * - in-memory stores in tests
 *
 * The reconciler works with this interface only, so the backend can be
 * swapped without touching the sync logic.
 */

import type { ImageCreateFields, ImageId, ImageRecord, StoreName } from './types'

/**
 * A finite, single-use sequence of byte chunks. Consumers must drain or
 * discard it; it cannot be restarted.
 */
export type ImageChunks = AsyncIterable<Uint8Array>

export interface ImageStore {
  /**
   * Configured name of this store.
   * @example 'region-a'
   */
  readonly name: StoreName

  /**
   * List every image on the store.
   */
  listImages(): Promise<ImageRecord[]>

  /**
   * Fetch metadata for a single image.
   */
  getImage(id: ImageId): Promise<ImageRecord>

  /**
   * Stream the image data.
   */
  downloadImage(id: ImageId): ImageChunks

  /**
   * Create an empty image. The store assigns the identifier.
   */
  createImage(fields: ImageCreateFields): Promise<ImageRecord>

  /**
   * Replace the data of a previously created image.
   */
  uploadImage(id: ImageId, data: ImageChunks): Promise<void>

  renameImage(id: ImageId, newName: string): Promise<void>

  deleteImage(id: ImageId): Promise<void>
}

/**
 * Issues auth tokens for a store connection.
 */
export interface TokenProvider {
  /**
   * Return a token, reusing a cached one when available.
   */
  getToken(): Promise<string>

  /**
   * Drop the cached token so the next call authenticates again.
   */
  invalidate(): void
}

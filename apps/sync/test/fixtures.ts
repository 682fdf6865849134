/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions and an in-memory image store for tests.
 */

import { createHash } from 'node:crypto'
import {
  type ImageChunks,
  type ImageCreateFields,
  type ImageId,
  type ImageRecord,
  type ImageStore,
  StoreError,
  type StoreName,
} from '@image-sync/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import type { Logger } from '../lib/logger'

// =============================================================================
// ID Generators
// =============================================================================

export function createImageId(): ImageId {
  return faker.string.uuid()
}

export function createImageName(): string {
  const distro = faker.helpers.arrayElement(['ubuntu', 'centos', 'debian', 'fedora', 'rocky'])
  return `${distro}-${faker.system.semver()}`
}

export function createStoreName(): StoreName {
  return `region-${faker.string.alpha({ length: 6, casing: 'lower' })}`
}

// =============================================================================
// Image Fixtures
// =============================================================================

export function md5(data: string | Buffer): string {
  return createHash('md5').update(data).digest('hex')
}

export function createImageRecord(overrides?: Partial<ImageRecord>): ImageRecord {
  const content = faker.lorem.paragraph()
  return {
    id: createImageId(),
    name: createImageName(),
    size: Buffer.byteLength(content),
    checksum: md5(content),
    containerFormat: 'bare',
    diskFormat: faker.helpers.arrayElement(['qcow2', 'raw']),
    visibility: 'private',
    protected: false,
    minRam: faker.helpers.arrayElement([0, 512, 1024]),
    minDisk: faker.number.int({ min: 0, max: 40 }),
    tags: [],
    status: 'active',
    ...overrides,
  }
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

// =============================================================================
// In-memory Image Store
// =============================================================================

export type StoreOperation =
  | 'listImages'
  | 'getImage'
  | 'downloadImage'
  | 'createImage'
  | 'uploadImage'
  | 'renameImage'
  | 'deleteImage'

interface StoredImage {
  record: ImageRecord
  data: Buffer | null
}

interface InjectedFailure {
  operation: StoreOperation
  remaining: number
  error: Error
}

const CHUNK_SIZE = 4

/**
 * ImageStore held in memory. Checksums are md5 of the data, like Glance v2.
 * Every call is appended to `calls` as `operation:arg[:arg]`.
 */
export class InMemoryImageStore implements ImageStore {
  readonly name: StoreName
  readonly calls: string[] = []
  private images: Map<ImageId, StoredImage> = new Map()
  private failures: InjectedFailure[] = []
  private truncated: Map<ImageId, number> = new Map()

  constructor(name: StoreName = createStoreName()) {
    this.name = name
  }

  /**
   * Add an active image holding `content`.
   */
  seed(name: string, content: string, overrides?: Partial<ImageRecord>): ImageRecord {
    const data = Buffer.from(content)
    const record = createImageRecord({
      name,
      size: data.length,
      checksum: md5(data),
      ...overrides,
    })
    this.images.set(record.id, { record, data })
    return { ...record }
  }

  /**
   * Make the next `times` calls of `operation` fail.
   */
  fail(operation: StoreOperation, times = 1, error?: Error): void {
    this.failures.push({
      operation,
      remaining: times,
      error: error ?? new StoreError(this.name, operation, 'injected failure'),
    })
  }

  /**
   * Make downloads of `id` stop with an error after `bytes` bytes.
   */
  truncateDownload(id: ImageId, bytes: number): void {
    this.truncated.set(id, bytes)
  }

  /** Current records, in creation order. */
  list(): ImageRecord[] {
    return [...this.images.values()].map((image) => ({ ...image.record }))
  }

  names(): string[] {
    return this.list().map((image) => image.name)
  }

  find(name: string): ImageRecord[] {
    return this.list().filter((image) => image.name === name)
  }

  dataOf(id: ImageId): string | null {
    return this.images.get(id)?.data?.toString('utf8') ?? null
  }

  async listImages(): Promise<ImageRecord[]> {
    this.calls.push('listImages')
    this.check('listImages')
    return this.list()
  }

  async getImage(id: ImageId): Promise<ImageRecord> {
    this.calls.push(`getImage:${id}`)
    this.check('getImage')
    return { ...this.get('getImage', id).record }
  }

  async *downloadImage(id: ImageId): ImageChunks {
    this.calls.push(`downloadImage:${id}`)
    this.check('downloadImage')
    const data = this.get('downloadImage', id).data ?? Buffer.alloc(0)
    const limit = this.truncated.get(id)

    const end = limit ?? data.length
    for (let offset = 0; offset < end; offset += CHUNK_SIZE) {
      yield data.subarray(offset, Math.min(offset + CHUNK_SIZE, end))
    }
    if (limit !== undefined) {
      throw new StoreError(this.name, 'downloadImage', 'connection reset')
    }
  }

  async createImage(fields: ImageCreateFields): Promise<ImageRecord> {
    this.calls.push(`createImage:${fields.name}`)
    this.check('createImage')
    const record: ImageRecord = {
      ...fields,
      id: createImageId(),
      size: null,
      checksum: undefined,
      status: 'queued',
      createdAt: new Date(),
    }
    this.images.set(record.id, { record, data: null })
    return { ...record }
  }

  async uploadImage(id: ImageId, data: ImageChunks): Promise<void> {
    this.calls.push(`uploadImage:${id}`)
    const chunks: Buffer[] = []
    for await (const chunk of data) {
      chunks.push(Buffer.from(chunk))
    }
    this.check('uploadImage')

    const image = this.get('uploadImage', id)
    const buffer = Buffer.concat(chunks)
    image.data = buffer
    image.record = { ...image.record, size: buffer.length, checksum: md5(buffer), status: 'active' }
  }

  async renameImage(id: ImageId, newName: string): Promise<void> {
    this.calls.push(`renameImage:${id}:${newName}`)
    this.check('renameImage')
    const image = this.get('renameImage', id)
    image.record = { ...image.record, name: newName }
  }

  async deleteImage(id: ImageId): Promise<void> {
    this.calls.push(`deleteImage:${id}`)
    this.check('deleteImage')
    this.get('deleteImage', id)
    this.images.delete(id)
  }

  private get(operation: StoreOperation, id: ImageId): StoredImage {
    const image = this.images.get(id)
    if (!image) {
      throw new StoreError(this.name, operation, `image ${id} not found`, 404)
    }
    return image
  }

  private check(operation: StoreOperation): void {
    const failure = this.failures.find((f) => f.operation === operation && f.remaining > 0)
    if (failure) {
      failure.remaining--
      throw failure.error
    }
  }
}

/**
 * Glance Image Store
 *
 * Implements ImageStore against the Glance v2 REST API using fetch.
 */

import {
  type ImageChunks,
  type ImageCreateFields,
  type ImageId,
  type ImageRecord,
  type ImageStore,
  StoreError,
  type StoreName,
  type TokenProvider,
  camelToSnakeDeep,
  describeCause,
} from '@image-sync/core'
import { ZodError } from 'zod'
import { glanceImageListSchema, toImageRecord } from './image-schema'

export interface GlanceImageStoreConfig {
  /**
   * Configured store name.
   * @example 'region-a'
   */
  name: StoreName

  /**
   * Glance endpoint including port and API version.
   * @example 'http://glance.example.com:9292/v2'
   */
  endpoint: string

  /** Issues the X-Auth-Token for every request. */
  tokens: TokenProvider

  /**
   * Timeout for metadata calls in milliseconds.
   * @default 30000
   */
  requestTimeoutMs?: number

  /**
   * Timeout for image downloads and uploads in milliseconds.
   * @default 21600000
   */
  transferTimeoutMs?: number

  /**
   * Page size used when listing images.
   * @default 100
   */
  pageSize?: number
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30 * 1000
const DEFAULT_TRANSFER_TIMEOUT_MS = 6 * 60 * 60 * 1000
const DEFAULT_PAGE_SIZE = 100

const JSON_PATCH_CONTENT_TYPE = 'application/openstack-images-v2.1-json-patch'

interface RequestOptions {
  method?: string
  headers?: Record<string, string>
  body?: RequestInit['body']
  timeoutMs: number
  /** Streamed bodies cannot be replayed after a 401. */
  replayable: boolean
}

export class GlanceImageStore implements ImageStore {
  readonly name: StoreName
  private endpoint: string
  private tokens: TokenProvider
  private requestTimeoutMs: number
  private transferTimeoutMs: number
  private pageSize: number

  constructor(config: GlanceImageStoreConfig) {
    this.name = config.name
    this.endpoint = config.endpoint.replace(/\/$/, '')
    this.tokens = config.tokens
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.transferTimeoutMs = config.transferTimeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE
  }

  async listImages(): Promise<ImageRecord[]> {
    const images: ImageRecord[] = []
    let url: string | undefined = `${this.endpoint}/images?limit=${this.pageSize}`

    while (url) {
      const res = await this.request('listImages', url, this.metadataRequest())
      const page = this.decodeList(await this.readJson('listImages', res))
      for (const raw of page.images) {
        images.push(this.decodeImage('listImages', raw))
      }
      // Glance returns the next page as a path relative to the server root
      url = page.next ? new URL(page.next, this.endpoint).toString() : undefined
    }

    return images
  }

  async getImage(id: ImageId): Promise<ImageRecord> {
    const res = await this.request('getImage', this.imageUrl(id), this.metadataRequest())
    return this.decodeImage('getImage', await this.readJson('getImage', res))
  }

  async *downloadImage(id: ImageId): ImageChunks {
    const res = await this.request('downloadImage', `${this.imageUrl(id)}/file`, {
      timeoutMs: this.transferTimeoutMs,
      replayable: true,
    })

    // 204: the image has no data yet
    if (res.status === 204 || !res.body) return

    const chunks: AsyncIterable<Uint8Array> = res.body
    try {
      for await (const chunk of chunks) {
        yield chunk
      }
    } catch (err) {
      throw new StoreError(this.name, 'downloadImage', describeCause(err), undefined, {
        cause: err,
      })
    }
  }

  async createImage(fields: ImageCreateFields): Promise<ImageRecord> {
    const res = await this.request('createImage', `${this.endpoint}/images`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(camelToSnakeDeep(fields)),
      timeoutMs: this.requestTimeoutMs,
      replayable: true,
    })
    return this.decodeImage('createImage', await this.readJson('createImage', res))
  }

  async uploadImage(id: ImageId, data: ImageChunks): Promise<void> {
    const res = await this.request('uploadImage', `${this.imageUrl(id)}/file`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: data,
      timeoutMs: this.transferTimeoutMs,
      replayable: false,
    })
    await res.body?.cancel()
  }

  async renameImage(id: ImageId, newName: string): Promise<void> {
    const res = await this.request('renameImage', this.imageUrl(id), {
      method: 'PATCH',
      headers: { 'Content-Type': JSON_PATCH_CONTENT_TYPE },
      body: JSON.stringify([{ op: 'replace', path: '/name', value: newName }]),
      timeoutMs: this.requestTimeoutMs,
      replayable: true,
    })
    await res.body?.cancel()
  }

  async deleteImage(id: ImageId): Promise<void> {
    const res = await this.request('deleteImage', this.imageUrl(id), {
      method: 'DELETE',
      timeoutMs: this.requestTimeoutMs,
      replayable: true,
    })
    await res.body?.cancel()
  }

  private imageUrl(id: ImageId): string {
    return `${this.endpoint}/images/${encodeURIComponent(id)}`
  }

  private metadataRequest(): RequestOptions {
    return { timeoutMs: this.requestTimeoutMs, replayable: true }
  }

  /**
   * Send an authenticated request. A 401 on a replayable request drops the
   * cached token and retries once with a fresh one.
   */
  private async request(operation: string, url: string, options: RequestOptions): Promise<Response> {
    let res = await this.send(operation, url, options)

    if (res.status === 401 && options.replayable) {
      await res.body?.cancel()
      this.tokens.invalidate()
      res = await this.send(operation, url, options)
    }

    if (!res.ok) {
      const detail = await res.text().catch(() => '')
      throw new StoreError(
        this.name,
        operation,
        `${options.method ?? 'GET'} ${url} returned ${res.status}${detail ? `: ${detail.trim()}` : ''}`,
        res.status,
      )
    }

    return res
  }

  private async send(operation: string, url: string, options: RequestOptions): Promise<Response> {
    const token = await this.tokens.getToken()
    try {
      return await fetch(url, {
        method: options.method ?? 'GET',
        headers: { ...options.headers, 'X-Auth-Token': token },
        body: options.body,
        // Required by fetch for streamed request bodies
        duplex: 'half',
        signal: AbortSignal.timeout(options.timeoutMs),
      })
    } catch (err) {
      throw new StoreError(this.name, operation, describeCause(err), undefined, { cause: err })
    }
  }

  private async readJson(operation: string, res: Response): Promise<unknown> {
    try {
      return await res.json()
    } catch (err) {
      throw new StoreError(this.name, operation, `invalid JSON response: ${describeCause(err)}`, res.status, {
        cause: err,
      })
    }
  }

  private decodeList(raw: unknown): { images: unknown[]; next?: string } {
    try {
      return glanceImageListSchema.parse(raw)
    } catch (err) {
      throw this.invalidPayload('listImages', err)
    }
  }

  private decodeImage(operation: string, raw: unknown): ImageRecord {
    try {
      return toImageRecord(raw)
    } catch (err) {
      throw this.invalidPayload(operation, err)
    }
  }

  private invalidPayload(operation: string, err: unknown): StoreError {
    const message =
      err instanceof ZodError
        ? err.issues.map((issue) => `${issue.path.join('.') || '/'}: ${issue.message}`).join('; ')
        : describeCause(err)
    return new StoreError(this.name, operation, `unexpected response: ${message}`, undefined, {
      cause: err,
    })
  }
}

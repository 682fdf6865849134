/**
 * DownloadCache Unit Tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { TransferFailureError } from '@image-sync/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { InMemoryImageStore, createImageRecord, silentLogger } from '../../test/fixtures'
import { DownloadCache, assertStaged, fileSize } from './download-cache'

describe('DownloadCache', () => {
  let scratchDir: string
  let store: InMemoryImageStore
  let cache: DownloadCache

  beforeEach(async () => {
    scratchDir = await mkdtemp(join(tmpdir(), 'cache-test-'))
    store = new InMemoryImageStore('region-a')
    cache = new DownloadCache(join(scratchDir, 'images'), silentLogger())
  })

  afterEach(async () => {
    await rm(scratchDir, { recursive: true, force: true })
  })

  function downloads(): number {
    return store.calls.filter((call) => call.startsWith('downloadImage')).length
  }

  test('downloads into <scratchDir>/<imageId>', async () => {
    const image = store.seed('ubuntu-20', 'ubuntu image bytes')

    const path = await cache.ensureLocal(store, image.id, image.size)

    expect(path).toBe(join(scratchDir, 'images', image.id))
    expect(await readFile(path, 'utf8')).toBe('ubuntu image bytes')
  })

  test('reuses a file whose size matches', async () => {
    const image = store.seed('ubuntu-20', 'ubuntu image bytes')
    await cache.ensureLocal(store, image.id, image.size)

    await cache.ensureLocal(store, image.id, image.size)

    expect(downloads()).toBe(1)
  })

  test('replaces a file whose size differs', async () => {
    const image = store.seed('ubuntu-20', 'ubuntu image bytes')
    await cache.ensureLocal(store, image.id, image.size)
    await writeFile(cache.pathFor(image.id), 'short')

    const path = await cache.ensureLocal(store, image.id, image.size)

    expect(downloads()).toBe(2)
    expect(await readFile(path, 'utf8')).toBe('ubuntu image bytes')
  })

  test('never trusts a cached file without a size hint', async () => {
    const image = store.seed('ubuntu-20', 'ubuntu image bytes')
    await cache.ensureLocal(store, image.id, image.size)

    await cache.ensureLocal(store, image.id, null)

    expect(downloads()).toBe(2)
  })

  test('shares one transfer between concurrent requests', async () => {
    const image = store.seed('ubuntu-20', 'ubuntu image bytes')

    const [first, second] = await Promise.all([
      cache.ensureLocal(store, image.id, image.size),
      cache.ensureLocal(store, image.id, image.size),
    ])

    expect(first).toBe(second)
    expect(downloads()).toBe(1)
  })

  test('returns the path and leaves the partial file when the transfer fails', async () => {
    const image = store.seed('ubuntu-20', 'x'.repeat(64))
    store.truncateDownload(image.id, 16)

    const path = await cache.ensureLocal(store, image.id, image.size)

    expect(path).toBe(cache.pathFor(image.id))
    expect(await fileSize(path)).not.toBe(64)
    await expect(assertStaged(path, image)).rejects.toBeInstanceOf(TransferFailureError)
  })

  test('returns the path when the download cannot start', async () => {
    const image = store.seed('ubuntu-20', 'ubuntu image bytes')
    store.fail('downloadImage')

    const path = await cache.ensureLocal(store, image.id, image.size)

    expect(path).toBe(cache.pathFor(image.id))
    await expect(assertStaged(path, image)).rejects.toThrow(TransferFailureError)
  })
})

describe('assertStaged', () => {
  let scratchDir: string

  beforeEach(async () => {
    scratchDir = await mkdtemp(join(tmpdir(), 'staged-test-'))
  })

  afterEach(async () => {
    await rm(scratchDir, { recursive: true, force: true })
  })

  test('accepts a file of the expected size', async () => {
    const path = join(scratchDir, 'img')
    await writeFile(path, 'abcd')

    await expect(assertStaged(path, createImageRecord({ size: 4 }))).resolves.toBeUndefined()
  })

  test('rejects a short file', async () => {
    const path = join(scratchDir, 'img')
    await writeFile(path, 'ab')

    await expect(
      assertStaged(path, createImageRecord({ name: 'centos-8', size: 4 })),
    ).rejects.toThrow(`Transfer of centos-8 failed: staged 2 of 4 bytes at ${path}`)
  })

  test('rejects a missing file', async () => {
    const path = join(scratchDir, 'missing')

    await expect(
      assertStaged(path, createImageRecord({ name: 'centos-8', size: 4 })),
    ).rejects.toThrow(`Transfer of centos-8 failed: nothing staged at ${path}`)
  })

  test('rejects an image without data', async () => {
    const path = join(scratchDir, 'img')
    await writeFile(path, '')

    await expect(
      assertStaged(path, createImageRecord({ name: 'centos-8', size: null })),
    ).rejects.toThrow('Transfer of centos-8 failed: master reports no image data')
  })
})

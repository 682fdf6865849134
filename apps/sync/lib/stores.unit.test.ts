import { parseSyncConfig } from '@image-sync/core'
import { describe, expect, test } from 'vitest'
import { InMemoryImageStore } from '../test/fixtures'
import { openStores } from './stores'

describe('openStores', () => {
  const { stores } = parseSyncConfig({
    stores: {
      'region-a': { url: 'http://glance-a.test', password: 'test-secret' },
      'region-b': { url: 'http://glance-b.test', password: 'test-secret' },
    },
  })

  test('builds the master and every slave through the factory', () => {
    const opened: string[] = []
    const result = openStores('region-a', ['region-b'], stores, (name, config) => {
      opened.push(`${name}:${config.url}`)
      return new InMemoryImageStore(name)
    })

    expect(result.master.name).toBe('region-a')
    expect(result.slaves.map((slave) => slave.name)).toEqual(['region-b'])
    expect(opened).toEqual(['region-a:http://glance-a.test', 'region-b:http://glance-b.test'])
  })

  test('rejects a store that is not configured', () => {
    expect(() => openStores('region-a', ['region-z'], stores, (name) => new InMemoryImageStore(name))).toThrow(
      'Store region-z is not configured',
    )
  })
})

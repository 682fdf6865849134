/**
 * Config Loader Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import type { EnvConfig } from '../config'
import { ConfigValidationError } from '../errors'
import { interpolateEnvVars, loadConfigFile, resolveRunSettings } from './loader'

const ENV: EnvConfig = {
  configPath: '/etc/image-sync.yaml',
  scratchDir: '/tmp/image-sync',
  dbPath: '/var/lib/image-sync/image-sync.db',
  logLevel: 'info',
}

const CONFIG_YAML = `
base:
  master: region-a
  slaves: region-b, region-c
  concurrency: 2
images:
  sync_list:
    - ubuntu-20
  pattern: centos-
stores:
  region-a:
    url: http://glance-a.test
    password: \${IMAGE_SYNC_TEST_PASSWORD}
  region-b:
    url: http://glance-b.test
    port: 9393
    password: test-secret
    auth_url: http://keystone-b.test
    request_timeout: 10s
  region-c:
    url: http://glance-c.test
    password: test-secret
`

describe('interpolateEnvVars', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  test('replaces variables that are set and keeps the rest', () => {
    vi.stubEnv('IMAGE_SYNC_TEST_USER', 'sync')

    expect(interpolateEnvVars('user: ${IMAGE_SYNC_TEST_USER}, other: ${IMAGE_SYNC_UNSET_VAR}')).toBe(
      'user: sync, other: ${IMAGE_SYNC_UNSET_VAR}',
    )
  })
})

describe('loadConfigFile', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loader-test-'))
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await rm(dir, { recursive: true, force: true })
  })

  test('parses stores with defaults and converts to camelCase', async () => {
    vi.stubEnv('IMAGE_SYNC_TEST_PASSWORD', 'test-secret')
    const file = join(dir, 'image-sync.yaml')
    await writeFile(file, CONFIG_YAML)

    const config = loadConfigFile(file)

    expect(config.base).toEqual({ master: 'region-a', slaves: ['region-b', 'region-c'], concurrency: 2 })
    expect(config.images).toEqual({ syncList: ['ubuntu-20'], pattern: 'centos-' })
    expect(config.stores.get('region-a')).toEqual({
      url: 'http://glance-a.test',
      port: 9292,
      version: 'v2',
      username: 'admin',
      password: 'test-secret',
      tenant: 'admin',
      authPort: 5000,
      authVersion: 'v3',
      userDomain: 'default',
      projectDomain: 'default',
      requestTimeout: 30_000,
      transferTimeout: 6 * 60 * 60 * 1000,
    })
    expect(config.stores.get('region-b')).toMatchObject({
      port: 9393,
      authUrl: 'http://keystone-b.test',
      requestTimeout: 10_000,
    })
  })

  test('reports every invalid field', async () => {
    const file = join(dir, 'bad.yaml')
    await writeFile(
      file,
      `
stores:
  region-a:
    url: not-a-url
images:
  pattern: "centos-("
`,
    )

    const error = (() => {
      try {
        loadConfigFile(file)
      } catch (err) {
        return err
      }
    })()

    expect(error).toBeInstanceOf(ConfigValidationError)
    expect(error).toMatchObject({
      errors: expect.arrayContaining([
        { path: 'stores.region-a.url', message: 'Invalid url' },
        { path: 'stores.region-a.password', message: 'Required' },
        { path: 'images.pattern', message: 'Must be a valid regular expression' },
      ]),
    })
  })

  test('rejects malformed YAML', async () => {
    const file = join(dir, 'broken.yaml')
    await writeFile(file, 'base: [unclosed')

    expect(() => loadConfigFile(file)).toThrow(ConfigValidationError)
  })

  test('a missing file is an error unless optional', () => {
    const file = join(dir, 'missing.yaml')

    expect(() => loadConfigFile(file)).toThrow(`Invalid configuration in ${file}:\n  - /: File not found`)
    expect(loadConfigFile(file, { optional: true })).toEqual({
      base: {},
      images: {},
      stores: new Map(),
    })
  })
})

describe('resolveRunSettings', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'settings-test-'))
    vi.stubEnv('IMAGE_SYNC_TEST_PASSWORD', 'test-secret')
    await writeFile(join(dir, 'image-sync.yaml'), CONFIG_YAML)
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await rm(dir, { recursive: true, force: true })
  })

  test('takes file values and environment defaults', () => {
    const config = loadConfigFile(join(dir, 'image-sync.yaml'))

    const settings = resolveRunSettings(config, {}, ENV)

    expect(settings).toMatchObject({
      master: 'region-a',
      slaves: ['region-b', 'region-c'],
      selection: { names: ['ubuntu-20'], pattern: 'centos-' },
      scratchDir: '/tmp/image-sync',
      clean: false,
      stateDb: '/var/lib/image-sync/image-sync.db',
      concurrency: 2,
    })
  })

  test('command line options win', () => {
    const config = loadConfigFile(join(dir, 'image-sync.yaml'))

    const settings = resolveRunSettings(
      config,
      {
        master: 'region-b',
        slaves: ['region-c', 'region-a', 'region-c'],
        images: ['debian-12'],
        pattern: 'fedora-',
        tmpdir: 'scratch',
        clean: true,
        concurrency: 1,
        stateDb: '/srv/state.db',
      },
      ENV,
    )

    expect(settings).toMatchObject({
      master: 'region-b',
      slaves: ['region-c', 'region-a'],
      selection: { names: ['debian-12'], pattern: 'fedora-' },
      scratchDir: resolve('scratch'),
      clean: true,
      stateDb: '/srv/state.db',
      concurrency: 1,
    })
  })

  test('reports every problem at once', () => {
    const config = loadConfigFile(join(dir, 'image-sync.yaml'))

    const error = (() => {
      try {
        resolveRunSettings(config, { master: 'region-x', slaves: ['region-x', 'region-y'], pattern: '(' }, ENV)
      } catch (err) {
        return err
      }
    })()

    expect(error).toBeInstanceOf(ConfigValidationError)
    expect(error).toMatchObject({
      errors: [
        { path: 'stores.region-x', message: "Unknown store 'region-x'" },
        { path: 'base.slaves', message: "Store 'region-x' is the master" },
        { path: 'stores.region-y', message: "Unknown store 'region-y'" },
        { path: 'images.pattern', message: 'Must be a valid regular expression' },
      ],
    })
  })

  test('requires a master and slaves', () => {
    expect(() => resolveRunSettings({ base: {}, images: {}, stores: new Map() }, {}, ENV)).toThrow(
      'Invalid configuration in run settings:\n  - base.master: No master store configured\n  - base.slaves: No slave stores configured',
    )
  })
})

describe('example config', () => {
  test('the shipped example file is valid', () => {
    const config = loadConfigFile(fileURLToPath(new URL('../../../../image-sync.example.yaml', import.meta.url)))

    expect(config.base.master).toBe('region-a')
    expect(config.base.slaves).toEqual(['region-b', 'region-c'])
    expect([...config.stores.keys()]).toEqual(['region-a', 'region-b', 'region-c'])
    expect(config.stores.get('region-c')?.transferTimeout).toBe(43_200_000)
  })
})

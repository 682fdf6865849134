import type { StoreConfig, StoreName } from '@image-sync/core'
import { GlanceImageStore } from './glance-store'
import { KeystoneTokenProvider } from './keystone'

/**
 * Join a base URL, port and API version: ('http://host/', 9292, 'v2') → 'http://host:9292/v2'
 */
export function serviceEndpoint(url: string, port: number, version: string): string {
  return `${url.replace(/\/$/, '')}:${port}/${version.replace(/^\//, '')}`
}

/**
 * Build a Glance store and its Keystone token provider from config.
 * Keystone defaults to the Glance host when no auth_url is configured.
 */
export function createGlanceStore(name: StoreName, config: StoreConfig): GlanceImageStore {
  const tokens = new KeystoneTokenProvider({
    store: name,
    endpoint: serviceEndpoint(config.authUrl ?? config.url, config.authPort, config.authVersion),
    username: config.username,
    password: config.password,
    project: config.tenant,
    userDomain: config.userDomain,
    projectDomain: config.projectDomain,
    timeoutMs: config.requestTimeout,
  })

  return new GlanceImageStore({
    name,
    endpoint: serviceEndpoint(config.url, config.port, config.version),
    tokens,
    requestTimeoutMs: config.requestTimeout,
    transferTimeoutMs: config.transferTimeout,
  })
}

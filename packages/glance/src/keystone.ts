/**
 * Keystone v3 Token Provider
 *
 * Password-authenticates against Keystone and caches the issued token for
 * the lifetime of the provider (one store connection).
 */

import { StoreError, type TokenProvider, describeCause } from '@image-sync/core'

export interface KeystoneConfig {
  /**
   * Name of the store this provider authenticates for (used in errors).
   * @example 'region-a'
   */
  store: string

  /**
   * Keystone endpoint including port and API version.
   * @example 'http://keystone.example.com:5000/v3'
   */
  endpoint: string

  username: string
  password: string

  /**
   * Project the token is scoped to.
   * @example 'admin'
   */
  project: string

  /** @default 'default' */
  userDomain?: string

  /** @default 'default' */
  projectDomain?: string

  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeoutMs?: number
}

export class KeystoneTokenProvider implements TokenProvider {
  private config: KeystoneConfig
  private token: string | null = null
  private pending: Promise<string> | null = null

  constructor(config: KeystoneConfig) {
    this.config = config
  }

  async getToken(): Promise<string> {
    if (this.token) return this.token
    // Concurrent callers share one authentication request
    this.pending ??= this.authenticate().finally(() => {
      this.pending = null
    })
    return this.pending
  }

  invalidate(): void {
    this.token = null
  }

  private async authenticate(): Promise<string> {
    const { store, endpoint, username, password, project, timeoutMs } = this.config
    const url = `${endpoint.replace(/\/$/, '')}/auth/tokens`

    const body = {
      auth: {
        identity: {
          methods: ['password'],
          password: {
            user: {
              name: username,
              domain: { id: this.config.userDomain ?? 'default' },
              password,
            },
          },
        },
        scope: {
          project: {
            name: project,
            domain: { id: this.config.projectDomain ?? 'default' },
          },
        },
      },
    }

    let res: Response
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs ?? 30_000),
      })
    } catch (err) {
      throw new StoreError(store, 'authenticate', describeCause(err), undefined, { cause: err })
    }

    if (!res.ok) {
      throw new StoreError(store, 'authenticate', `${res.status} ${await res.text()}`, res.status)
    }

    const token = res.headers.get('x-subject-token')
    if (!token) {
      throw new StoreError(store, 'authenticate', 'response carried no X-Subject-Token header')
    }

    this.token = token
    return token
  }
}


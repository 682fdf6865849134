/**
 * Domain Error Types
 *
 * Every error carries a `kind` so callers can decide between aborting the
 * run, aborting one slave, or continuing.
 */

import type { ReplaceStep, StoreName } from './types'

/**
 * Failure of a single call against a remote store.
 */
export class StoreError extends Error {
  readonly kind = 'store_error'

  constructor(
    readonly store: StoreName,
    readonly operation: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`[${store}] ${operation} failed: ${message}`, options)
    this.name = 'StoreError'
  }
}

/**
 * A store could not be listed or authenticated against.
 */
export class StoreUnavailableError extends Error {
  readonly kind = 'store_unavailable'

  constructor(
    readonly store: StoreName,
    options?: { cause?: unknown },
  ) {
    super(`Store ${store} is unavailable: ${describeCause(options?.cause)}`, options)
    this.name = 'StoreUnavailableError'
  }
}

/**
 * Image bytes could not be moved between a store and the scratch directory.
 */
export class TransferFailureError extends Error {
  readonly kind = 'transfer_failure'

  constructor(
    readonly image: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Transfer of ${image} failed: ${message}`, options)
    this.name = 'TransferFailureError'
  }
}

/**
 * A step of the create path failed on a slave.
 */
export class CreatePathError extends Error {
  readonly kind = 'create_path_failure'

  constructor(
    readonly store: StoreName,
    readonly image: string,
    options?: { cause?: unknown },
  ) {
    super(`Creating ${image} on ${store} failed: ${describeCause(options?.cause)}`, options)
    this.name = 'CreatePathError'
  }
}

/**
 * A step of the stale-image replace sequence failed on a slave.
 */
export class ReplaceSequenceError extends Error {
  readonly kind = 'replace_sequence_failure'

  constructor(
    readonly store: StoreName,
    readonly image: string,
    /** Last step that completed before the failure. */
    readonly lastStep: ReplaceStep | 'stale',
    options?: { cause?: unknown },
  ) {
    super(
      `Replacing ${image} on ${store} failed after step '${lastStep}': ${describeCause(options?.cause)}`,
      options,
    )
    this.name = 'ReplaceSequenceError'
  }
}

/**
 * The sync selection cannot be applied.
 */
export class InvalidSelectionError extends Error {
  readonly kind = 'invalid_selection'

  constructor(pattern: string, options?: { cause?: unknown }) {
    super(`Invalid image pattern '${pattern}': ${describeCause(options?.cause)}`, options)
    this.name = 'InvalidSelectionError'
  }
}

export type SyncError =
  | StoreError
  | StoreUnavailableError
  | TransferFailureError
  | CreatePathError
  | ReplaceSequenceError
  | InvalidSelectionError

/**
 * Type guard for domain errors raised by image-sync.
 */
export function isSyncError(err: unknown): err is SyncError {
  return (
    err instanceof StoreError ||
    err instanceof StoreUnavailableError ||
    err instanceof TransferFailureError ||
    err instanceof CreatePathError ||
    err instanceof ReplaceSequenceError ||
    err instanceof InvalidSelectionError
  )
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (cause === undefined) return 'unknown error'
  return String(cause)
}

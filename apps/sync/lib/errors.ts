/**
 * Application Error Types
 *
 * Errors raised outside the reconciliation core. Domain errors live in
 * @image-sync/core.
 */

import { type ValidationError, describeCause, isSyncError } from '@image-sync/core'

/**
 * The configuration file or the merged run settings are invalid.
 */
export class ConfigValidationError extends Error {
  readonly kind = 'config_invalid'

  constructor(
    public readonly source: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid configuration in ${source}:\n${errorList}`)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Render any thrown value as `{ kind, message }` for reports and history.
 */
export function describeError(err: unknown): { kind: string; message: string } {
  if (isSyncError(err) || err instanceof ConfigValidationError) {
    return { kind: err.kind, message: err.message }
  }
  return { kind: 'unknown', message: describeCause(err) }
}

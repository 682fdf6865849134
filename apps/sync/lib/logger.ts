/**
 * Structured Logger
 *
 * Creates the pino logger shared across all modules. Output is JSON on
 * stderr so the command output on stdout stays readable.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level, base: { service: 'image-sync' } }, pino.destination(2))
}

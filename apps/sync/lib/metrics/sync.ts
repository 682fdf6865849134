/**
 * Sync Metrics
 *
 * Metrics for reconciliation runs.
 */

import { isSyncError } from '@image-sync/core'
import { Counter, Histogram } from 'prom-client'
import { registry } from './registry'

// Runs move whole disk images and can take hours
const runBuckets = [10, 60, 300, 900, 1800, 3600, 7200, 14400, 28800]

export const syncActionsTotal = new Counter({
  name: 'image_sync_actions_total',
  help: 'Actions applied to slave images',
  labelNames: ['slave', 'action', 'status'],
  registers: [registry],
})

export const syncBytesStagedTotal = new Counter({
  name: 'image_sync_bytes_staged_total',
  help: 'Bytes downloaded from the master into the scratch directory',
  registers: [registry],
})

export const syncRollbacksTotal = new Counter({
  name: 'image_sync_rollbacks_total',
  help: 'Replace sequences rolled back after a failure',
  labelNames: ['slave'],
  registers: [registry],
})

export const syncRecoveriesTotal = new Counter({
  name: 'image_sync_recoveries_total',
  help: 'Interrupted replace sequences resolved from the journal',
  labelNames: ['slave', 'outcome'],
  registers: [registry],
})

export const syncSlaveFailuresTotal = new Counter({
  name: 'image_sync_slave_failures_total',
  help: 'Slaves aborted during a run, by error kind',
  labelNames: ['slave', 'error_type'],
  registers: [registry],
})

export const syncRunDuration = new Histogram({
  name: 'image_sync_run_duration_seconds',
  help: 'Duration of a whole reconciliation run',
  labelNames: ['status'],
  buckets: runBuckets,
  registers: [registry],
})

/**
 * Classify an error for the error_type label.
 */
export function classifySyncError(error: unknown): string {
  if (isSyncError(error)) return error.kind
  return 'unknown'
}

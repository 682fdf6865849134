/**
 * Prometheus Registry
 *
 * Central registry for all metrics. Separated to avoid circular imports.
 */

import { Gauge, Registry } from 'prom-client'

// Create a custom registry (allows isolation in tests)
export const registry = new Registry()

export const systemInfo = new Gauge({
  name: 'image_sync_info',
  help: 'Static info about the image-sync tool',
  labelNames: ['version'],
  registers: [registry],
})
systemInfo.set({ version: '0.1.0' }, 1)

export const lastRunTimestamp = new Gauge({
  name: 'image_sync_last_run_timestamp_seconds',
  help: 'Unix timestamp when the last run finished',
  registers: [registry],
})

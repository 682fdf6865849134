/**
 * Prometheus Metrics Module
 *
 * Central registry and exports for all image-sync metrics.
 * Follows Prometheus naming conventions with the image_sync_ prefix.
 */

import { rename, writeFile } from 'node:fs/promises'
import { registry } from './registry'

export { lastRunTimestamp, registry, systemInfo } from './registry'
export * from './sync'

/**
 * Write the exposition text for the node_exporter textfile collector.
 * The file is written beside the target and renamed so the collector never
 * reads a partial file.
 */
export async function writeMetricsFile(path: string): Promise<void> {
  const tmp = `${path}.${process.pid}.tmp`
  await writeFile(tmp, await registry.metrics(), 'utf-8')
  await rename(tmp, path)
}

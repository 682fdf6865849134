/**
 * Plain-text rendering of run results for the command line.
 */

import type { SlaveReport } from '@image-sync/core'
import type { SyncRunRow } from '@image-sync/db'
import type { SyncRunResult } from './run'

function countPlanned(slave: SlaveReport, action: 'create' | 'replace'): number {
  return slave.planned.filter((change) => change.action === action).length
}

function formatSlave(slave: SlaveReport, dryRun: boolean): string {
  const parts = dryRun
    ? [
        `${countPlanned(slave, 'create')} to create`,
        `${countPlanned(slave, 'replace')} to replace`,
        `${slave.skipped.length} skipped`,
      ]
    : [
        `${slave.created.length} created`,
        `${slave.replaced.length} replaced`,
        `${slave.skipped.length} skipped`,
      ]
  if (slave.recovered.length > 0) {
    parts.push(`${slave.recovered.length} recovered`)
  }
  let line = `  ${slave.slave}: ${parts.join(', ')}`
  if (slave.failure) {
    const where = slave.failure.image ? ` at ${slave.failure.image}` : ''
    line += `; aborted${where} (${slave.failure.kind}: ${slave.failure.message})`
  }
  return line
}

export function formatRunResult(result: SyncRunResult): string {
  const { report } = result
  if (!report) {
    return `Run ${result.runId} failed: ${result.error?.message ?? 'unknown error'}`
  }

  const prefix = report.dryRun ? 'Dry run' : 'Run'
  const lines = [
    `${prefix} ${result.runId} ${result.status} (master ${report.master}, ${report.selected} images selected)`,
    ...report.slaves.map((slave) => formatSlave(slave, report.dryRun)),
  ]
  return lines.join('\n')
}

export function formatHistory(runs: SyncRunRow[]): string {
  if (runs.length === 0) return 'No runs recorded'

  return runs
    .map((run) => {
      const counts = `${run.created} created, ${run.replaced} replaced, ${run.skipped} skipped`
      const dry = run.dryRun ? ' (dry run)' : ''
      const error = run.error ? ` - ${run.error}` : ''
      return `#${run.id} ${run.startedAt.toISOString()} ${run.status}${dry} ${run.master} -> ${run.slaves.join(',')}: ${counts}${error}`
    })
    .join('\n')
}

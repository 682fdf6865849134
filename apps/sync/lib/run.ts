/**
 * Sync Run
 *
 * Wires one sync run together: state database, stores, reconciler, run
 * history, optional cleanup and the metrics file.
 */

import type { ReconcileReport, RunStatus } from '@image-sync/core'
import { type DrizzleDb, closeDatabase, initDatabase } from '@image-sync/db'
import { cleanScratchDir } from './cache/cleanup'
import type { RunSettings } from './config/loader'
import { describeError } from './errors'
import { RunHistory, runStatusOf } from './history'
import type { Logger } from './logger'
import { lastRunTimestamp, syncRunDuration, writeMetricsFile } from './metrics'
import { SqliteReplaceJournal } from './reconcile/journal'
import { Reconciler } from './reconcile/engine'
import { type StoreFactory, openStores } from './stores'

export interface SyncRunOptions {
  /** Plan without touching slaves or the cache. */
  dryRun?: boolean

  /**
   * Write Prometheus exposition text here after the run.
   * @example '/var/lib/node_exporter/textfile/image_sync.prom'
   */
  metricsFile?: string

  /** Defaults to Glance stores. */
  storeFactory?: StoreFactory

  /** Defaults to the database at `settings.stateDb`, closed after the run. */
  db?: DrizzleDb
}

export interface SyncRunResult {
  runId: number
  status: RunStatus
  /** Absent when the run failed before reaching the slaves. */
  report?: ReconcileReport
  error?: { kind: string; message: string }
}

export async function runSync(
  settings: RunSettings,
  logger: Logger,
  options: SyncRunOptions = {},
): Promise<SyncRunResult> {
  const log = logger.child({ component: 'SyncRun' })
  const db = options.db ?? initDatabase({ path: settings.stateDb })
  const dryRun = options.dryRun ?? false

  try {
    const history = new RunHistory(db)
    const runId = history.start(settings.master, settings.slaves, dryRun)
    const endTimer = syncRunDuration.startTimer()
    log.info({ runId, master: settings.master, slaves: settings.slaves, dryRun }, 'Sync run started')

    let result: SyncRunResult
    try {
      const stores = openStores(settings.master, settings.slaves, settings.stores, options.storeFactory)
      const reconciler = new Reconciler(
        { scratchDir: settings.scratchDir, concurrency: settings.concurrency, dryRun },
        { logger, journal: new SqliteReplaceJournal(db) },
      )
      const report = await reconciler.run(stores.master, stores.slaves, settings.selection)
      history.finish(runId, report)
      result = { runId, status: runStatusOf(report), report }
    } catch (err) {
      const error = describeError(err)
      log.error({ err, runId }, 'Sync run failed')
      history.fail(runId, error.message)
      result = { runId, status: 'failed', error }
    }

    endTimer({ status: result.status })
    lastRunTimestamp.set(Math.floor(Date.now() / 1000))
    log.info({ runId, status: result.status }, 'Sync run finished')

    if (settings.clean && dryRun) {
      log.info({ scratchDir: settings.scratchDir }, 'Dry run, leaving the scratch directory alone')
    } else if (settings.clean) {
      await cleanScratchDir(settings.scratchDir, log)
    }
    if (options.metricsFile) {
      await writeMetricsFile(options.metricsFile)
    }

    return result
  } finally {
    if (!options.db) {
      closeDatabase(db)
    }
  }
}

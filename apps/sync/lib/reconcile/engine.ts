/**
 * Reconciliation Engine
 *
 * Drives one run: selects the master catalog once, then brings every slave
 * in line with it. A slave failure aborts that slave only; a master failure
 * aborts the run.
 */

import type {
  Catalog,
  ImageStore,
  ReconcileReport,
  SlaveReport,
  SyncSelection,
} from '@image-sync/core'
import { DownloadCache } from '../cache/download-cache'
import { type CompiledSelection, compileSelection, selectCatalog } from '../catalog/selector'
import { describeError } from '../errors'
import type { Logger } from '../logger'
import { classifySyncError, syncActionsTotal, syncSlaveFailuresTotal } from '../metrics'
import type { ReplaceJournal } from './journal'
import { planSlave } from './planner'
import { recoverSlave } from './recovery'
import { type TransferContext, createOnSlave, replaceOnSlave } from './transfer'

/**
 * Configuration for the Reconciler.
 */
export interface ReconcilerConfig {
  /**
   * Directory where master images are staged.
   * @example '/var/tmp/image-sync'
   */
  scratchDir: string

  /**
   * Number of slaves reconciled at the same time.
   * Images within one slave are always processed one after another.
   * @default 1
   */
  concurrency?: number

  /**
   * Plan and report without touching any slave or the cache.
   * @default false
   */
  dryRun?: boolean
}

export interface ReconcilerDeps {
  logger: Logger
  journal: ReplaceJournal
  /** Defaults to a cache over `scratchDir`. */
  cache?: DownloadCache
}

const DEFAULT_CONFIG = {
  concurrency: 1,
  dryRun: false,
}

export class Reconciler {
  private config: Required<ReconcilerConfig>
  private journal: ReplaceJournal
  private cache: DownloadCache
  private _log: Logger

  /** Slaves currently being reconciled */
  private runningCount = 0

  /** Slaves waiting for a slot */
  private pendingQueue: Array<() => void> = []

  constructor(config: ReconcilerConfig, deps: ReconcilerDeps) {
    this.config = {
      scratchDir: config.scratchDir,
      concurrency: config.concurrency ?? DEFAULT_CONFIG.concurrency,
      dryRun: config.dryRun ?? DEFAULT_CONFIG.dryRun,
    }
    this.journal = deps.journal
    this._log = deps.logger.child({ component: 'Reconciler' })
    this.cache = deps.cache ?? new DownloadCache(this.config.scratchDir, deps.logger)
  }

  /**
   * Reconcile every slave against the master. Throws only when the selection
   * is invalid or the master cannot be listed.
   */
  async run(master: ImageStore, slaves: ImageStore[], selection: SyncSelection): Promise<ReconcileReport> {
    const startedAt = new Date()
    const compiled = compileSelection(selection)

    const masterCatalog = await selectCatalog(master, compiled, this._log.child({ store: master.name }))
    this._log.info(
      { master: master.name, selected: masterCatalog.size, dryRun: this.config.dryRun },
      'Master catalog selected',
    )

    const unique = new Map<string, ImageStore>()
    for (const slave of slaves) {
      if (unique.has(slave.name)) {
        this._log.warn({ slave: slave.name }, 'Slave listed twice, reconciling it once')
        continue
      }
      unique.set(slave.name, slave)
    }

    const reports = await Promise.all(
      [...unique.values()].map((slave) =>
        this.withSlot(() => this.reconcileSlave(master, masterCatalog, slave, compiled)),
      ),
    )

    return {
      master: master.name,
      selected: masterCatalog.size,
      slaves: reports,
      dryRun: this.config.dryRun,
      startedAt,
      finishedAt: new Date(),
    }
  }

  /**
   * Bring one slave in line with the master catalog. Never throws: the first
   * failure is recorded in the report and the slave is abandoned.
   */
  private async reconcileSlave(
    master: ImageStore,
    masterCatalog: Catalog,
    slave: ImageStore,
    selection: CompiledSelection,
  ): Promise<SlaveReport> {
    const log = this._log.child({ slave: slave.name })
    const report: SlaveReport = {
      slave: slave.name,
      created: [],
      replaced: [],
      skipped: [],
      planned: [],
      recovered: [],
      aborted: false,
    }
    const ctx: TransferContext = { master, slave, cache: this.cache, journal: this.journal, logger: log }
    let current: string | undefined

    try {
      // Images whose earlier replace could not be resolved are left alone this run
      const held = new Set<string>()
      if (!this.config.dryRun) {
        for (const result of await recoverSlave(slave, this.journal, log)) {
          if (result.outcome === 'unresolved') held.add(result.imageName)
          else report.recovered.push(result.imageName)
        }
      }

      const slaveCatalog = await selectCatalog(slave, selection, log)
      const actions = planSlave(masterCatalog, slaveCatalog)

      for (const action of actions) {
        current = action.image.name

        if (held.has(current)) {
          log.warn({ image: current }, 'Skipping image with an unresolved journal entry')
          continue
        }

        if (action.kind === 'skip') {
          log.debug({ image: current, compareKey: action.compareKey }, 'Image up to date')
          report.skipped.push(current)
          continue
        }

        if (this.config.dryRun) {
          log.info({ image: current, action: action.kind }, 'Would apply action')
          syncActionsTotal.inc({ slave: slave.name, action: action.kind, status: 'planned' })
          report.planned.push({ image: current, action: action.kind })
        } else if (action.kind === 'create') {
          await this.apply(slave.name, 'create', () => createOnSlave(ctx, action.image))
          report.created.push(current)
        } else {
          await this.apply(slave.name, 'replace', () =>
            replaceOnSlave(ctx, action.image, action.stale),
          )
          report.replaced.push(current)
        }
      }
      current = undefined
    } catch (err) {
      const { kind, message } = describeError(err)
      log.error({ err, image: current }, 'Slave aborted')
      syncSlaveFailuresTotal.inc({ slave: slave.name, error_type: classifySyncError(err) })
      report.failure = { image: current, kind, message }
      report.aborted = true
    }

    log.info(
      {
        created: report.created.length,
        replaced: report.replaced.length,
        skipped: report.skipped.length,
        planned: report.planned.length,
        recovered: report.recovered.length,
        aborted: report.aborted,
      },
      'Slave reconciled',
    )
    return report
  }

  private async apply(slave: string, action: 'create' | 'replace', fn: () => Promise<void>): Promise<void> {
    try {
      await fn()
      syncActionsTotal.inc({ slave, action, status: 'success' })
    } catch (err) {
      syncActionsTotal.inc({ slave, action, status: 'failure' })
      throw err
    }
  }

  /**
   * Run `fn` once a slot is free.
   */
  private async withSlot<T>(fn: () => Promise<T>): Promise<T> {
    if (this.runningCount >= this.config.concurrency) {
      // The releasing slave hands its slot over with the count unchanged
      await this.waitForSlot()
    } else {
      this.runningCount++
    }

    try {
      return await fn()
    } finally {
      this.releaseSlot()
    }
  }

  /**
   * Wait for a slot to become available.
   */
  private waitForSlot(): Promise<void> {
    return new Promise((resolve) => {
      this.pendingQueue.push(resolve)
    })
  }

  /**
   * Hand the slot to the next waiting slave, or free it.
   */
  private releaseSlot(): void {
    const next = this.pendingQueue.shift()
    if (next) {
      next()
    } else {
      this.runningCount--
    }
  }
}

/**
 * One-shot form of {@link Reconciler.run}.
 */
export function reconcile(
  master: ImageStore,
  slaves: ImageStore[],
  selection: SyncSelection,
  scratchDir: string,
  options: Omit<ReconcilerConfig, 'scratchDir'> & ReconcilerDeps,
): Promise<ReconcileReport> {
  const { logger, journal, cache, ...config } = options
  return new Reconciler({ scratchDir, ...config }, { logger, journal, cache }).run(
    master,
    slaves,
    selection,
  )
}

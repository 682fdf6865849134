/**
 * Run History
 *
 * One row per sync run in SQLite via Drizzle ORM.
 */

import type { ReconcileReport, RunStatus, StoreName } from '@image-sync/core'
import { type DrizzleDb, type SyncRunRow, schema } from '@image-sync/db'
import { desc, eq } from 'drizzle-orm'

const DEFAULT_LIMIT = 10

/**
 * `partial` when any slave failed, `succeeded` otherwise.
 */
export function runStatusOf(report: ReconcileReport): RunStatus {
  return report.slaves.some((slave) => slave.failure) ? 'partial' : 'succeeded'
}

export class RunHistory {
  private db: DrizzleDb

  constructor(db: DrizzleDb) {
    this.db = db
  }

  /**
   * Record the start of a run and return its id.
   */
  start(master: StoreName, slaves: StoreName[], dryRun: boolean, startedAt = new Date()): number {
    const row = this.db
      .insert(schema.syncRuns)
      .values({ master, slaves, dryRun, status: 'running', startedAt })
      .returning({ id: schema.syncRuns.id })
      .get()
    if (!row) {
      throw new Error('Failed to record sync run')
    }
    return row.id
  }

  /**
   * Record the outcome of a run that reached every slave.
   */
  finish(id: number, report: ReconcileReport): void {
    let created = 0
    let replaced = 0
    let skipped = 0
    for (const slave of report.slaves) {
      created += slave.created.length
      replaced += slave.replaced.length
      skipped += slave.skipped.length
    }

    this.db
      .update(schema.syncRuns)
      .set({
        status: runStatusOf(report),
        selected: report.selected,
        created,
        replaced,
        skipped,
        failedSlaves: report.slaves.filter((slave) => slave.failure).length,
        finishedAt: report.finishedAt,
      })
      .where(eq(schema.syncRuns.id, id))
      .run()
  }

  /**
   * Record a run that was aborted before reaching the slaves.
   */
  fail(id: number, message: string, finishedAt = new Date()): void {
    this.db
      .update(schema.syncRuns)
      .set({ status: 'failed', error: message, finishedAt })
      .where(eq(schema.syncRuns.id, id))
      .run()
  }

  /**
   * Most recent runs first.
   */
  recent(limit = DEFAULT_LIMIT): SyncRunRow[] {
    return this.db
      .select()
      .from(schema.syncRuns)
      .orderBy(desc(schema.syncRuns.startedAt), desc(schema.syncRuns.id))
      .limit(limit)
      .all()
  }
}

/**
 * Replace Journal
 *
 * Records the last completed step of every replace sequence so a later run
 * can resolve what an interrupted one left behind.
 *
 * All state is stored in SQLite via Drizzle ORM.
 */

import type { ImageId, ReplaceStep, StoreName } from '@image-sync/core'
import { type DrizzleDb, schema } from '@image-sync/db'
import { and, asc, eq } from 'drizzle-orm'

/**
 * Steps that leave a row behind. A completed sequence removes its row.
 */
export type JournalStep = Exclude<ReplaceStep, 'completed'>

export interface JournalEntry {
  /**
   * Slave the sequence runs against.
   * @example 'region-b'
   */
  slave: StoreName

  /**
   * Original image name.
   * @example 'centos-8'
   */
  imageName: string

  step: JournalStep

  /** Id of the image being replaced. */
  staleId: ImageId

  /** Id of the replacement, once created. */
  newId?: ImageId

  /**
   * Name the stale image carries while the replacement is uploaded.
   * @example 'centos-8_sync_bak'
   */
  backupName: string

  updatedAt: Date
}

export interface ReplaceJournal {
  record(entry: Omit<JournalEntry, 'updatedAt'>): void
  pending(slave: StoreName): JournalEntry[]
  clear(slave: StoreName, imageName: string): void
}

export class SqliteReplaceJournal implements ReplaceJournal {
  private db: DrizzleDb

  constructor(db: DrizzleDb) {
    this.db = db
  }

  record(entry: Omit<JournalEntry, 'updatedAt'>): void {
    const values = {
      step: entry.step,
      staleId: entry.staleId,
      newId: entry.newId ?? null,
      backupName: entry.backupName,
      updatedAt: new Date(),
    }

    this.db
      .insert(schema.replaceJournal)
      .values({ slave: entry.slave, imageName: entry.imageName, ...values })
      .onConflictDoUpdate({
        target: [schema.replaceJournal.slave, schema.replaceJournal.imageName],
        set: values,
      })
      .run()
  }

  pending(slave: StoreName): JournalEntry[] {
    return this.db
      .select()
      .from(schema.replaceJournal)
      .where(eq(schema.replaceJournal.slave, slave))
      .orderBy(asc(schema.replaceJournal.imageName))
      .all()
      .map((row) => ({
        slave: row.slave,
        imageName: row.imageName,
        step: row.step,
        staleId: row.staleId,
        newId: row.newId ?? undefined,
        backupName: row.backupName,
        updatedAt: row.updatedAt,
      }))
  }

  clear(slave: StoreName, imageName: string): void {
    this.db
      .delete(schema.replaceJournal)
      .where(
        and(eq(schema.replaceJournal.slave, slave), eq(schema.replaceJournal.imageName, imageName)),
      )
      .run()
  }
}

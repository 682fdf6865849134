/**
 * Orphan Recovery
 *
 * Resolves replace sequences an earlier run left unfinished on a slave,
 * before the slave is diffed again:
 * - backup present, active replacement present: delete the backup
 * - backup present, no usable replacement: delete the replacement this
 *   tool created, rename the backup back to the original name
 * - backup never renamed, or gone: nothing to do
 *
 * Images carrying the original name that the journal cannot attribute to
 * an earlier run are never deleted.
 */

import {
  type ImageRecord,
  type ImageStore,
  StoreUnavailableError,
  isBackupName,
} from '@image-sync/core'
import type { Logger } from '../logger'
import { syncRecoveriesTotal } from '../metrics'
import type { JournalEntry, ReplaceJournal } from './journal'

/**
 * `unresolved`: resolving failed; the journal row is kept for the next run.
 */
export type RecoveryOutcome = 'backup_removed' | 'restored' | 'nothing' | 'unresolved'

export interface RecoveryResult {
  imageName: string
  outcome: RecoveryOutcome
}

/**
 * Resolve every journaled sequence for `slave`. A listing failure propagates.
 * A failure to resolve one entry is logged, keeps its row and does not stop
 * the others. Backup-named images with no journal row are reported, never
 * touched.
 */
export async function recoverSlave(
  slave: ImageStore,
  journal: ReplaceJournal,
  logger: Logger,
): Promise<RecoveryResult[]> {
  const entries = journal.pending(slave.name)
  let images: ImageRecord[]
  try {
    images = await slave.listImages()
  } catch (err) {
    throw new StoreUnavailableError(slave.name, { cause: err })
  }

  const tracked = new Set(entries.map((entry) => entry.staleId))
  for (const image of images) {
    if (isBackupName(image.name) && !tracked.has(image.id)) {
      logger.warn(
        { imageId: image.id, image: image.name },
        'Found backup-named image with no journal entry, leaving it alone',
      )
    }
  }

  const results: RecoveryResult[] = []
  for (const entry of entries) {
    let outcome: RecoveryOutcome
    try {
      outcome = await resolveEntry(slave, entry, images, logger)
      journal.clear(slave.name, entry.imageName)
      logger.info(
        { image: entry.imageName, step: entry.step, outcome },
        'Resolved interrupted replace sequence',
      )
    } catch (err) {
      outcome = 'unresolved'
      logger.error(
        { err, image: entry.imageName, step: entry.step },
        'Could not resolve interrupted replace sequence, keeping its journal entry',
      )
    }
    syncRecoveriesTotal.inc({ slave: slave.name, outcome })
    results.push({ imageName: entry.imageName, outcome })
  }

  return results
}

async function resolveEntry(
  slave: ImageStore,
  entry: JournalEntry,
  images: ImageRecord[],
  logger: Logger,
): Promise<RecoveryOutcome> {
  const stale = images.find((image) => image.id === entry.staleId)
  const others = images.filter((image) => image.name === entry.imageName && image.id !== entry.staleId)

  if (!stale) {
    logger.warn({ image: entry.imageName, staleId: entry.staleId }, 'Backup image is gone')
    return 'nothing'
  }

  // The rename never happened, so no replacement was created either
  if (stale.name === entry.imageName) {
    return 'nothing'
  }

  if (others.some((image) => image.status === 'active')) {
    await slave.deleteImage(stale.id)
    return 'backup_removed'
  }

  for (const image of others.filter((other) => isOwnLeftover(entry, other))) {
    await slave.deleteImage(image.id)
  }
  await slave.renameImage(stale.id, entry.imageName)
  return 'restored'
}

/**
 * Whether `image` is an unfinished replacement created by the journaled
 * sequence. A sequence interrupted right after the rename may have created
 * its replacement without journaling the id; only images created after the
 * rename was recorded qualify then.
 */
function isOwnLeftover(entry: JournalEntry, image: ImageRecord): boolean {
  if (image.status === 'active') return false
  if (entry.newId !== undefined) return image.id === entry.newId
  return entry.step === 'renamed' && image.createdAt !== undefined && image.createdAt >= entry.updatedAt
}

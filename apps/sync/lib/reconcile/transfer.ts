/**
 * Slave Mutations
 *
 * The create path and the stale-image replace sequence. Both stage the
 * master's bytes locally before the slave is touched.
 *
 * Replace sequence per (slave, image):
 *   stale → staged → renamed → created → uploaded → completed
 * Any in-flight step may move to `aborted`. The stale copy keeps the backup
 * name until the replacement is uploaded, so the slave never lacks both.
 */

import { createReadStream } from 'node:fs'
import {
  CreatePathError,
  type ImageChunks,
  type ImageId,
  type ImageRecord,
  type ImageStore,
  ReplaceSequenceError,
  type ReplaceStep,
  backupName,
  describeCause,
  toCreateFields,
} from '@image-sync/core'
import { type DownloadCache, assertStaged } from '../cache/download-cache'
import type { Logger } from '../logger'
import { syncRollbacksTotal } from '../metrics'
import type { JournalStep, ReplaceJournal } from './journal'

export interface TransferContext {
  master: ImageStore
  slave: ImageStore
  cache: DownloadCache
  journal: ReplaceJournal
  logger: Logger
}

function readStaged(path: string): ImageChunks {
  return createReadStream(path)
}

/**
 * Stage `image` from the master and check every byte arrived.
 */
async function stage(ctx: TransferContext, image: ImageRecord): Promise<string> {
  const path = await ctx.cache.ensureLocal(ctx.master, image.id, image.size)
  await assertStaged(path, image)
  return path
}

/**
 * Copy a master image the slave does not have. If the upload fails the
 * freshly created image is deleted.
 */
export async function createOnSlave(ctx: TransferContext, image: ImageRecord): Promise<void> {
  const { slave, logger } = ctx
  let created: ImageRecord | undefined

  try {
    const path = await stage(ctx, image)
    created = await slave.createImage(toCreateFields(image))
    logger.debug({ image: image.name, imageId: created.id }, 'Image created, uploading')
    await slave.uploadImage(created.id, readStaged(path))
  } catch (err) {
    logger.error({ err, image: image.name }, 'Create failed')
    if (created) {
      await deleteBestEffort(slave, created.id, logger)
    }
    throw new CreatePathError(slave.name, image.name, { cause: err })
  }

  logger.info({ image: image.name, imageId: created.id }, 'Image created')
}

/**
 * Replace the slave's stale copy of `image` with the master's bytes.
 *
 * On failure the slave is re-listed and every image still carrying the
 * original name, other than the stale one, is deleted (only while the
 * replacement upload had not completed). The backup is left for orphan
 * recovery.
 */
export async function replaceOnSlave(
  ctx: TransferContext,
  image: ImageRecord,
  stale: ImageRecord,
): Promise<void> {
  const { slave, journal, logger } = ctx
  const backup = backupName(image.name)
  let step: ReplaceStep | 'stale' = 'stale'
  let newId: ImageId | undefined

  const record = (at: JournalStep) => {
    journal.record({
      slave: slave.name,
      imageName: image.name,
      step: at,
      staleId: stale.id,
      newId,
      backupName: backup,
    })
  }

  try {
    const path = await stage(ctx, image)
    step = 'staged'
    record(step)

    await slave.renameImage(stale.id, backup)
    step = 'renamed'
    record(step)

    const created = await slave.createImage(toCreateFields(image))
    newId = created.id
    step = 'created'
    record(step)

    await slave.uploadImage(created.id, readStaged(path))
    step = 'uploaded'
    record(step)

    await slave.deleteImage(stale.id)
    step = 'completed'
    journal.clear(slave.name, image.name)
  } catch (err) {
    logger.error({ err, image: image.name, step }, 'Replace failed')
    if (step === 'staged' || step === 'renamed' || step === 'created') {
      await rollback(ctx, image.name, stale.id)
    }
    record('aborted')
    throw new ReplaceSequenceError(slave.name, image.name, step, { cause: err })
  }

  logger.info({ image: image.name, imageId: newId, replaced: stale.id }, 'Image replaced')
}

/**
 * Delete every image named `name` except the stale one. Failures are logged;
 * the caller re-raises the original error.
 */
async function rollback(ctx: TransferContext, name: string, staleId: ImageId): Promise<void> {
  const { slave, logger } = ctx
  syncRollbacksTotal.inc({ slave: slave.name })

  let images: ImageRecord[]
  try {
    images = await slave.listImages()
  } catch (err) {
    logger.error({ err, image: name }, 'Rollback could not list the slave')
    return
  }

  for (const image of images) {
    if (image.name === name && image.id !== staleId) {
      await deleteBestEffort(slave, image.id, logger)
    }
  }
}

async function deleteBestEffort(slave: ImageStore, id: ImageId, logger: Logger): Promise<void> {
  try {
    await slave.deleteImage(id)
    logger.warn({ imageId: id }, 'Deleted incomplete image')
  } catch (err) {
    logger.error({ imageId: id, error: describeCause(err) }, 'Failed to delete incomplete image')
  }
}

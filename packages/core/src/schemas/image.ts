import { z } from 'zod'
import type { ImageCreateFields, ImageRecord } from '../types'

export const imageVisibilitySchema = z.enum(['public', 'private', 'shared', 'community'])

/**
 * Transferable image fields. Anything not listed here (id, checksum, size,
 * status, store-specific properties) is stripped.
 */
export const imageCreateFieldsSchema = z
  .object({
    name: z.string().min(1),
    tags: z.array(z.string()).default([]),
    containerFormat: z.string().optional(),
    diskFormat: z.string().optional(),
    minRam: z.number().int().min(0).default(0),
    minDisk: z.number().int().min(0).default(0),
    visibility: imageVisibilitySchema.default('private'),
    protected: z.boolean().default(false),
  })
  .strip()

/**
 * Derive the fields used to recreate `image` on another store.
 */
export function toCreateFields(image: ImageRecord): ImageCreateFields {
  return imageCreateFieldsSchema.parse(image)
}

/**
 * Name given to a stale image while its replacement is being uploaded.
 */
export const BACKUP_SUFFIX = '_sync_bak'

export function backupName(name: string): string {
  return `${name}${BACKUP_SUFFIX}`
}

export function isBackupName(name: string): boolean {
  return name.endsWith(BACKUP_SUFFIX) && name.length > BACKUP_SUFFIX.length
}

/**
 * Glance v2 payload validation.
 */

import { type ImageRecord, imageVisibilitySchema, snakeToCamelDeep } from '@image-sync/core'
import { z } from 'zod'

export const glanceImageSchema = z.object({
  id: z.string(),
  name: z.string().nullable().optional(),
  size: z.number().int().min(0).nullable().optional(),
  checksum: z.string().nullable().optional(),
  container_format: z.string().nullable().optional(),
  disk_format: z.string().nullable().optional(),
  visibility: imageVisibilitySchema.optional(),
  protected: z.boolean().default(false),
  min_ram: z.number().int().min(0).nullable().default(0),
  min_disk: z.number().int().min(0).nullable().default(0),
  tags: z.array(z.string()).default([]),
  status: z.string().optional(),
  created_at: z.string().datetime({ offset: true }).nullable().optional(),
})

export const glanceImageListSchema = z.object({
  images: z.array(z.unknown()),
  /** Path of the next page, e.g. '/v2/images?marker=...' */
  next: z.string().optional(),
})

/**
 * Convert a Glance image payload to an ImageRecord.
 * Null fields become absent, a null name becomes ''.
 */
export function toImageRecord(data: unknown): ImageRecord {
  const image = snakeToCamelDeep(glanceImageSchema.parse(data))
  return {
    id: image.id,
    name: image.name ?? '',
    size: image.size ?? null,
    checksum: image.checksum ?? undefined,
    containerFormat: image.containerFormat ?? undefined,
    diskFormat: image.diskFormat ?? undefined,
    visibility: image.visibility,
    protected: image.protected,
    minRam: image.minRam ?? 0,
    minDisk: image.minDisk ?? 0,
    tags: image.tags,
    status: image.status,
    createdAt: image.createdAt ? new Date(image.createdAt) : undefined,
  }
}

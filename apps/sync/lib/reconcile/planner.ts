/**
 * Per-slave diff of a master catalog against a slave catalog.
 */

import type { Catalog, CompareKey, ImageRecord, PlannedAction } from '@image-sync/core'

/**
 * Checksums are compared when both sides carry one, sizes otherwise.
 */
export function compareKeyFor(master: ImageRecord, slave: ImageRecord): CompareKey {
  return master.checksum && slave.checksum ? 'checksum' : 'size'
}

export function isUpToDate(master: ImageRecord, slave: ImageRecord, key: CompareKey): boolean {
  return key === 'checksum' ? master.checksum === slave.checksum : master.size === slave.size
}

/**
 * Plan one action per master image, in master catalog order. Slave images
 * the master does not have are left alone.
 */
export function planSlave(masterCatalog: Catalog, slaveCatalog: Catalog): PlannedAction[] {
  const actions: PlannedAction[] = []

  for (const [name, image] of masterCatalog) {
    const existing = slaveCatalog.get(name)
    if (!existing) {
      actions.push({ kind: 'create', image })
      continue
    }

    const compareKey = compareKeyFor(image, existing)
    if (isUpToDate(image, existing, compareKey)) {
      actions.push({ kind: 'skip', image, compareKey })
    } else {
      actions.push({ kind: 'replace', image, stale: existing, compareKey })
    }
  }

  return actions
}

import type { ImageStore, StoreConfig, StoreName } from '@image-sync/core'
import { createGlanceStore } from '@image-sync/glance'

export type StoreFactory = (name: StoreName, config: StoreConfig) => ImageStore

/**
 * Build the master and slave stores named by a run.
 * Names are checked against the config before this is called.
 */
export function openStores(
  master: StoreName,
  slaves: StoreName[],
  configs: Map<StoreName, StoreConfig>,
  factory: StoreFactory = createGlanceStore,
): { master: ImageStore; slaves: ImageStore[] } {
  const open = (name: StoreName): ImageStore => {
    const config = configs.get(name)
    if (!config) {
      throw new Error(`Store ${name} is not configured`)
    }
    return factory(name, config)
  }

  return { master: open(master), slaves: slaves.map(open) }
}

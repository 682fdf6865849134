/**
 * Catalog Selector
 *
 * Builds the name-keyed view of one store restricted to the images a run
 * is scoped to.
 */

import {
  type Catalog,
  type ImageRecord,
  type ImageStore,
  InvalidSelectionError,
  StoreUnavailableError,
  type SyncSelection,
} from '@image-sync/core'
import type { Logger } from '../logger'

/**
 * Selection with its pattern compiled. Build once per run.
 */
export interface CompiledSelection {
  names: ReadonlySet<string>
  pattern?: RegExp
}

/**
 * Compile a selection. The pattern is anchored at the start of the name
 * only, so 'centos-' matches 'centos-8' and 'centos-7-minimal'.
 */
export function compileSelection(selection: SyncSelection): CompiledSelection {
  let pattern: RegExp | undefined
  if (selection.pattern !== undefined && selection.pattern !== '') {
    try {
      pattern = new RegExp(`^(?:${selection.pattern})`)
    } catch (err) {
      throw new InvalidSelectionError(selection.pattern, { cause: err })
    }
  }
  return { names: new Set(selection.names), pattern }
}

export function matchesSelection(name: string, selection: CompiledSelection): boolean {
  if (selection.names.size === 0 && !selection.pattern) return true
  if (selection.names.has(name)) return true
  return selection.pattern?.test(name) ?? false
}

/**
 * List `store` and keep the images in scope. Duplicate names resolve
 * last-seen-wins. Images without a name cannot be correlated and are left out.
 */
export async function selectCatalog(
  store: ImageStore,
  selection: SyncSelection | CompiledSelection,
  logger: Logger,
): Promise<Catalog> {
  const compiled = isCompiled(selection) ? selection : compileSelection(selection)

  let images: ImageRecord[]
  try {
    images = await store.listImages()
  } catch (err) {
    throw new StoreUnavailableError(store.name, { cause: err })
  }

  const catalog: Catalog = new Map()
  for (const image of images) {
    if (!image.name) {
      logger.debug({ store: store.name, imageId: image.id }, 'Skipping image without a name')
      continue
    }
    if (!matchesSelection(image.name, compiled)) continue

    const previous = catalog.get(image.name)
    if (previous) {
      logger.warn(
        { store: store.name, image: image.name, kept: image.id, dropped: previous.id },
        'Duplicate image name, keeping the last one listed',
      )
    }
    catalog.set(image.name, image)
  }

  logger.debug(
    { store: store.name, listed: images.length, selected: catalog.size },
    'Catalog selected',
  )
  return catalog
}

function isCompiled(selection: SyncSelection | CompiledSelection): selection is CompiledSelection {
  return selection.names instanceof Set
}

/**
 * Core types for image-sync
 */

// =============================================================================
// ID Types
// =============================================================================

/**
 * Store-assigned image identifier. Stable within one store, never shared
 * across stores.
 * @example '3f2a7c1e-9b0d-4d6a-8a51-0c2b7e9d11aa'
 */
export type ImageId = string

/**
 * Name of a configured image store.
 * @example 'region-a'
 */
export type StoreName = string

// =============================================================================
// Image Records
// =============================================================================

/**
 * Image visibility as reported by Glance.
 */
export type ImageVisibility = 'public' | 'private' | 'shared' | 'community'

/**
 * Remote metadata for one image, as observed on one store.
 */
export interface ImageRecord {
  /**
   * Identifier assigned by the store.
   * @example '3f2a7c1e-9b0d-4d6a-8a51-0c2b7e9d11aa'
   */
  id: ImageId

  /**
   * Human key used to correlate the same logical image across stores.
   * @example 'ubuntu-22.04'
   */
  name: string

  /**
   * Size of the image data in bytes. Null while the image has no data.
   */
  size: number | null

  /**
   * Store-computed checksum of the image data, if any.
   * @example 'd41d8cd98f00b204e9800998ecf8427e'
   */
  checksum?: string

  /**
   * Container format.
   * @example 'bare'
   */
  containerFormat?: string

  /**
   * Disk format.
   * @example 'qcow2'
   */
  diskFormat?: string

  visibility?: ImageVisibility

  /** Whether the image is protected from deletion. */
  protected: boolean

  /** Minimum RAM in megabytes required to boot the image. */
  minRam: number

  /** Minimum disk in gigabytes required to boot the image. */
  minDisk: number

  tags: string[]

  /**
   * Lifecycle state reported by the store.
   * @example 'active'
   * @example 'queued'
   */
  status?: string

  /** When the store created the image, if reported. */
  createdAt?: Date
}

/**
 * Transferable metadata used to create an image on a store.
 * `id` and `checksum` are never part of it: the target store assigns them.
 */
export interface ImageCreateFields {
  name: string
  tags: string[]
  containerFormat?: string
  diskFormat?: string
  minRam: number
  minDisk: number
  visibility: ImageVisibility
  protected: boolean
}

/**
 * Images of one store keyed by name, as observed at one point in time.
 */
export type Catalog = Map<string, ImageRecord>

// =============================================================================
// Selection
// =============================================================================

/**
 * Scope of a sync run. No names and no pattern selects every image.
 */
export interface SyncSelection {
  /**
   * Exact image names to include.
   * @example ['ubuntu-22.04', 'centos-8']
   */
  names: string[]

  /**
   * Regular expression matched against the start of each image name.
   * @example 'centos-'
   */
  pattern?: string
}

// =============================================================================
// Reconciliation
// =============================================================================

/**
 * Field used to decide whether a slave copy is up to date.
 */
export type CompareKey = 'checksum' | 'size'

/**
 * Action planned for one master image against one slave.
 */
export type PlannedAction =
  | { kind: 'create'; image: ImageRecord }
  | { kind: 'replace'; image: ImageRecord; stale: ImageRecord; compareKey: CompareKey }
  | { kind: 'skip'; image: ImageRecord; compareKey: CompareKey }

/**
 * Steps of the replace sequence, in order. `aborted` is reachable from any
 * in-flight step.
 * - `staged`: master bytes are in the local cache
 * - `renamed`: stale slave image carries the backup name
 * - `created`: new image exists under the original name
 * - `uploaded`: new image holds the master's bytes
 * - `completed`: backup deleted
 */
export type ReplaceStep = 'staged' | 'renamed' | 'created' | 'uploaded' | 'completed' | 'aborted'

/**
 * Failure recorded for a slave.
 */
export interface SlaveFailure {
  /** Image being processed when the slave was aborted, if any. */
  image?: string
  kind: string
  message: string
}

/**
 * Change a dry run would have made.
 */
export interface PlannedChange {
  image: string
  action: 'create' | 'replace'
}

/**
 * Outcome of reconciling one slave.
 */
export interface SlaveReport {
  slave: StoreName
  created: string[]
  replaced: string[]
  skipped: string[]
  /** Changes found by a dry run. Always empty otherwise. */
  planned: PlannedChange[]
  /** Backups restored or removed by orphan recovery before the diff. */
  recovered: string[]
  failure?: SlaveFailure
  /** True when the slave was abandoned after a failure; later images were not attempted. */
  aborted: boolean
}

/**
 * Outcome of a whole run.
 */
export interface ReconcileReport {
  master: StoreName
  /** Number of images selected on the master. */
  selected: number
  slaves: SlaveReport[]
  dryRun: boolean
  startedAt: Date
  finishedAt: Date
}

/**
 * Status of a recorded run.
 * - `running`: not finished yet (or the process died)
 * - `succeeded`: every slave reconciled
 * - `partial`: at least one slave failed
 * - `failed`: the master could not be read
 */
export type RunStatus = 'running' | 'succeeded' | 'partial' | 'failed'

export { DownloadCache, assertStaged, fileSize } from './cache/download-cache'
export { type CleanupResult, cleanScratchDir } from './cache/cleanup'
export {
  type CompiledSelection,
  compileSelection,
  matchesSelection,
  selectCatalog,
} from './catalog/selector'
export { type EnvConfig, readEnvConfig } from './config'
export {
  type RunOptions,
  type RunSettings,
  interpolateEnvVars,
  loadConfigFile,
  resolveRunSettings,
} from './config/loader'
export { ConfigValidationError, describeError } from './errors'
export { RunHistory, runStatusOf } from './history'
export { type Logger, createLogger } from './logger'
export { registry, writeMetricsFile } from './metrics'
export {
  Reconciler,
  type ReconcilerConfig,
  type ReconcilerDeps,
  reconcile,
} from './reconcile/engine'
export {
  type JournalEntry,
  type JournalStep,
  type ReplaceJournal,
  SqliteReplaceJournal,
} from './reconcile/journal'
export { compareKeyFor, isUpToDate, planSlave } from './reconcile/planner'
export { type RecoveryOutcome, type RecoveryResult, recoverSlave } from './reconcile/recovery'
export { type TransferContext, createOnSlave, replaceOnSlave } from './reconcile/transfer'
export { type SyncRunOptions, type SyncRunResult, runSync } from './run'
export { type StoreFactory, openStores } from './stores'
export { formatHistory, formatRunResult } from './report'

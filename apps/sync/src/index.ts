#!/usr/bin/env tsx
import { initDatabase, closeDatabase } from '@image-sync/db'
import { InvalidArgumentError, program } from 'commander'
import {
  RunHistory,
  cleanScratchDir,
  createLogger,
  formatHistory,
  formatRunResult,
  loadConfigFile,
  readEnvConfig,
  resolveRunSettings,
  runSync,
} from '../lib'

const env = readEnvConfig()

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

/**
 * Accept both `-s a b` and `-s a,b`.
 */
function splitNames(values: string[] | undefined): string[] | undefined {
  return values?.flatMap((value) => value.split(',')).filter((name) => name.length > 0)
}

function fail(e: unknown, fallback: string): never {
  console.error(e instanceof Error ? e.message : fallback)
  process.exit(1)
}

program
  .name('image-sync')
  .description('Replicate Glance images from a master store to slave stores')
  .version('0.1.0')

// ─────────────────────────────────────────────────────────────────────────────
// Sync
// ─────────────────────────────────────────────────────────────────────────────

interface SyncCommandOptions {
  config: string
  master?: string
  slaves?: string[]
  images?: string[]
  pattern?: string
  tmpdir?: string
  clean?: boolean
  verbose?: boolean
  concurrency?: number
  stateDb?: string
  metricsFile?: string
  dryRun?: boolean
}

program
  .command('sync', { isDefault: true })
  .description('Bring every slave in line with the master')
  .option('--config <path>', 'Config file', env.configPath)
  .option('-m, --master <name>', 'Master store')
  .option('-s, --slaves <names...>', 'Slave stores')
  .option('-i, --images <names...>', 'Image names to sync')
  .option('-p, --pattern <regex>', 'Sync images whose names start with a match')
  .option('-t, --tmpdir <dir>', 'Scratch directory for downloaded images')
  .option('-c, --clean', 'Empty the scratch directory after the run')
  .option('-v, --verbose', 'Debug logging')
  .option('--concurrency <n>', 'Slaves reconciled at the same time', parsePositiveInt)
  .option('--state-db <path>', 'SQLite file for the replace journal and run history')
  .option('--metrics-file <path>', 'Write Prometheus metrics here after the run')
  .option('--dry-run', 'Plan without changing any slave')
  .action(async (options: SyncCommandOptions) => {
    try {
      const config = loadConfigFile(options.config)
      const settings = resolveRunSettings(
        config,
        {
          master: options.master,
          slaves: splitNames(options.slaves),
          images: splitNames(options.images),
          pattern: options.pattern,
          tmpdir: options.tmpdir,
          clean: options.clean,
          concurrency: options.concurrency,
          stateDb: options.stateDb,
        },
        env,
      )
      const logger = createLogger(options.verbose ? 'debug' : env.logLevel)

      const result = await runSync(settings, logger, {
        dryRun: options.dryRun,
        metricsFile: options.metricsFile,
      })
      console.log(formatRunResult(result))
      process.exitCode = result.status === 'succeeded' ? 0 : 1
    } catch (e) {
      fail(e, 'Sync failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Maintenance
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('clean')
  .description('Remove downloaded images from the scratch directory')
  .option('--config <path>', 'Config file', env.configPath)
  .option('-t, --tmpdir <dir>', 'Scratch directory')
  .option('-v, --verbose', 'Debug logging')
  .action(async (options: { config: string; tmpdir?: string; verbose?: boolean }) => {
    try {
      const config = loadConfigFile(options.config, { optional: true })
      const scratchDir = options.tmpdir ?? config.base.scratchDir ?? env.scratchDir
      const logger = createLogger(options.verbose ? 'debug' : env.logLevel)

      const result = await cleanScratchDir(scratchDir, logger)
      console.log(`Removed ${result.removed.length} files from ${scratchDir}`)
      if (result.failed.length > 0) {
        console.error(`Could not remove: ${result.failed.join(', ')}`)
        process.exitCode = 1
      }
    } catch (e) {
      fail(e, 'Clean failed')
    }
  })

program
  .command('history')
  .description('Show recent sync runs')
  .option('--config <path>', 'Config file', env.configPath)
  .option('--state-db <path>', 'SQLite file holding the run history')
  .option('-n, --limit <n>', 'Number of runs to show', parsePositiveInt, 10)
  .action((options: { config: string; stateDb?: string; limit: number }) => {
    try {
      const config = loadConfigFile(options.config, { optional: true })
      const db = initDatabase({ path: options.stateDb ?? config.base.stateDb ?? env.dbPath })
      try {
        console.log(formatHistory(new RunHistory(db).recent(options.limit)))
      } finally {
        closeDatabase(db)
      }
    } catch (e) {
      fail(e, 'History failed')
    }
  })

program.parseAsync().catch((e: unknown) => fail(e, 'Command failed'))

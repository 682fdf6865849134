import type { SyncRunRow } from '@image-sync/db'
import { describe, expect, test } from 'vitest'
import { formatHistory, formatRunResult } from './report'

describe('formatRunResult', () => {
  test('summarises each slave', () => {
    const text = formatRunResult({
      runId: 7,
      status: 'partial',
      report: {
        master: 'region-a',
        selected: 3,
        dryRun: false,
        startedAt: new Date('2026-01-10T10:00:00Z'),
        finishedAt: new Date('2026-01-10T10:05:00Z'),
        slaves: [
          {
            slave: 'region-b',
            created: ['ubuntu-20'],
            replaced: ['centos-8'],
            skipped: ['debian-12'],
            planned: [],
            recovered: [],
            aborted: false,
          },
          {
            slave: 'region-c',
            created: [],
            replaced: [],
            skipped: [],
            planned: [],
            recovered: ['centos-8'],
            aborted: true,
            failure: { image: 'ubuntu-20', kind: 'create_path_failure', message: 'boom' },
          },
        ],
      },
    })

    expect(text).toBe(
      [
        'Run 7 partial (master region-a, 3 images selected)',
        '  region-b: 1 created, 1 replaced, 1 skipped',
        '  region-c: 0 created, 0 replaced, 0 skipped, 1 recovered; aborted at ubuntu-20 (create_path_failure: boom)',
      ].join('\n'),
    )
  })

  test('labels dry runs', () => {
    const text = formatRunResult({
      runId: 8,
      status: 'succeeded',
      report: {
        master: 'region-a',
        selected: 4,
        dryRun: true,
        startedAt: new Date(),
        finishedAt: new Date(),
        slaves: [
          {
            slave: 'region-b',
            created: [],
            replaced: [],
            skipped: ['debian-12'],
            planned: [
              { image: 'ubuntu-20', action: 'create' },
              { image: 'centos-8', action: 'replace' },
              { image: 'fedora-40', action: 'create' },
            ],
            recovered: [],
            aborted: false,
          },
        ],
      },
    })

    expect(text).toBe(
      [
        'Dry run 8 succeeded (master region-a, 4 images selected)',
        '  region-b: 2 to create, 1 to replace, 1 skipped',
      ].join('\n'),
    )
  })

  test('shows the error of a failed run', () => {
    expect(
      formatRunResult({
        runId: 9,
        status: 'failed',
        error: { kind: 'store_unavailable', message: 'Store region-a is unavailable: timeout' },
      }),
    ).toBe('Run 9 failed: Store region-a is unavailable: timeout')
  })
})

describe('formatHistory', () => {
  test('prints one line per run', () => {
    const run: SyncRunRow = {
      id: 3,
      master: 'region-a',
      slaves: ['region-b', 'region-c'],
      status: 'succeeded',
      dryRun: false,
      selected: 4,
      created: 1,
      replaced: 2,
      skipped: 1,
      failedSlaves: 0,
      error: null,
      startedAt: new Date('2026-01-10T10:00:00Z'),
      finishedAt: new Date('2026-01-10T10:05:00Z'),
    }

    expect(formatHistory([run, { ...run, id: 4, status: 'failed', dryRun: true, error: 'down' }])).toBe(
      [
        '#3 2026-01-10T10:00:00.000Z succeeded region-a -> region-b,region-c: 1 created, 2 replaced, 1 skipped',
        '#4 2026-01-10T10:00:00.000Z failed (dry run) region-a -> region-b,region-c: 1 created, 2 replaced, 1 skipped - down',
      ].join('\n'),
    )
  })

  test('says so when there are no runs', () => {
    expect(formatHistory([])).toBe('No runs recorded')
  })
})

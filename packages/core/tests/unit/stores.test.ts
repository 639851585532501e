/**
 * Unit tests for artifact, run-state and results stores
 * @module @loadramp/core/tests/unit/stores
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { isRef } from '@vue/reactivity';
import { ErrorCode, emptyMetricValues, type ResultsRow } from '@loadramp/shared';

import {
  FsArtifactStore,
  HostArtifactStore,
  MemoryArtifactStore,
  ResultsBundle,
  RunStateStore,
  deriveRunState,
  directoriesUnder,
  formatHealthRow,
  formatResultsRow,
  joinArtifactPath,
  normalizeArtifactPath,
  parseResultsTable,
  parseRunMarker,
} from '../../src/stores';
import { FakeExecutionHost, T0 } from '../helpers/fakes';

function resultsRow(timestamp: number, overrides: Partial<ResultsRow['values']>): ResultsRow {
  return { timestamp: new Date(timestamp), values: { ...emptyMetricValues(), ...overrides } };
}

// ============================================================================
// Artifact paths
// ============================================================================

describe('artifact paths', () => {
  it('normalizes separators and empty segments', () => {
    expect(normalizeArtifactPath('./R1//metrics.csv')).toBe('R1/metrics.csv');
    expect(normalizeArtifactPath('\\R1\\DONE')).toBe('R1/DONE');
    expect(joinArtifactPath('', 'R1', 'run.log')).toBe('R1/run.log');
  });

  it('lists the directories implied by file paths', () => {
    const paths = ['R1/DONE', 'R0/metrics.csv', 'ALL_DONE', 'R1/sub/x'];

    expect(directoriesUnder(paths)).toEqual(['R0', 'R1']);
    expect(directoriesUnder(paths, 'R1')).toEqual(['sub']);
  });
});

// ============================================================================
// MemoryArtifactStore
// ============================================================================

describe('MemoryArtifactStore', () => {
  let store: MemoryArtifactStore;

  beforeEach(() => {
    store = new MemoryArtifactStore();
  });

  it('reads null for a missing artifact', async () => {
    expect(await store.read('R1/DONE')).toBeNull();
    expect(await store.exists('R1/DONE')).toBe(false);
  });

  it('appends to new and existing artifacts', async () => {
    await store.append('R1/monitor.log', 'a\n');
    await store.append('./R1/monitor.log', 'b\n');

    expect(await store.read('R1/monitor.log')).toBe('a\nb\n');
  });

  it('keeps a sorted reactive view of its paths', async () => {
    expect(isRef(store.paths)).toBe(true);

    await store.write('R2/DONE', 'x');
    await store.write('ALL_DONE', 'y');
    expect(store.paths.value).toEqual(['ALL_DONE', 'R2/DONE']);

    await store.remove('R2/DONE');
    expect(store.paths.value).toEqual(['ALL_DONE']);
  });
});

// ============================================================================
// FsArtifactStore
// ============================================================================

describe('FsArtifactStore', () => {
  let root: string;
  let store: FsArtifactStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'loadramp-store-'));
    store = new FsArtifactStore(root);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('creates parent directories on write and append', async () => {
    await store.write('R1/summary.txt', 'summary\n');
    await store.append('R2/monitor.log', 'line\n');

    expect(await fs.readFile(path.join(root, 'R1', 'summary.txt'), 'utf8')).toBe('summary\n');
    expect(await store.read('R2/monitor.log')).toBe('line\n');
  });

  it('reads null for a missing file and removes quietly', async () => {
    expect(await store.read('R9/DONE')).toBeNull();
    await store.remove('R9/DONE');
    expect(await store.exists('R9/DONE')).toBe(false);
  });

  it('lists only directories, sorted', async () => {
    await store.write('R1/DONE', 'x');
    await store.write('R0/DONE', 'x');
    await store.write('ALL_DONE', 'x');

    expect(await store.listDirectories()).toEqual(['R0', 'R1']);
    expect(await new FsArtifactStore(path.join(root, 'absent')).listDirectories()).toEqual([]);
  });
});

// ============================================================================
// HostArtifactStore
// ============================================================================

describe('HostArtifactStore', () => {
  it('reads and appends through the execution host', async () => {
    const host = new FakeExecutionHost();
    const store = new HostArtifactStore(host);

    await store.append('R1/monitor.log', 'a\n');
    await store.append('R1/monitor.log', 'b\n');

    expect(host.files.get('R1/monitor.log')).toBe('a\nb\n');
    expect(await store.exists('R1/monitor.log')).toBe(true);
    expect(await store.listDirectories()).toEqual(['R1']);
  });
});

// ============================================================================
// Run state
// ============================================================================

describe('parseRunMarker', () => {
  it('reads the scenario, pid and start time', () => {
    expect(parseRunMarker('{"scenarioId":"R2","pid":51,"startedAt":"2026-01-05T10:00:00.000Z"}')).toEqual({
      scenarioId: 'R2',
      pid: 51,
      startedAt: new Date(T0),
    });
  });

  it('yields a marker without a pid for unreadable content', () => {
    expect(parseRunMarker('garbage', 'R3')).toEqual({ scenarioId: 'R3', pid: null, startedAt: new Date(0) });
  });
});

describe('deriveRunState', () => {
  const marker = { scenarioId: 'R2', pid: 51, startedAt: new Date(T0) };
  const done = { scenarioId: 'R1', finishedAt: new Date(T0) };

  it('is running only with a marker and a live pid', () => {
    expect(deriveRunState(marker, true, null).state).toBe('running');
    expect(deriveRunState(marker, false, null).state).toBe('finished');
    expect(deriveRunState({ ...marker, pid: null }, true, null).state).toBe('finished');
  });

  it('falls back to the latest completion, then idle', () => {
    expect(deriveRunState(null, false, done)).toEqual({ state: 'done', scenarioId: 'R1', finishedAt: new Date(T0) });
    expect(deriveRunState(null, false, null)).toEqual({ state: 'idle' });
  });
});

describe('RunStateStore', () => {
  let store: MemoryArtifactStore;
  let live: Set<number>;
  let runState: RunStateStore;
  const startedAt = new Date(T0);

  beforeEach(() => {
    store = new MemoryArtifactStore();
    live = new Set([100]);
    runState = new RunStateStore(store, async (pid) => live.has(pid));
  });

  it('claims a scenario marker', async () => {
    await runState.claim({ scenarioId: 'R1' }, { scenarioId: 'R1', pid: 100, startedAt });

    expect(store.peek('R1/RUNNING')).toBe('{"scenarioId":"R1","pid":100,"startedAt":"2026-01-05T10:00:00.000Z"}\n');
  });

  it('refuses a claim held by another live process', async () => {
    live.add(200);
    await runState.claim('host', { scenarioId: 'R1', pid: 200, startedAt });

    await expect(runState.claim('host', { scenarioId: 'R2', pid: 100, startedAt })).rejects.toMatchObject({
      code: ErrorCode.RUN_ALREADY_ACTIVE,
    });
  });

  it('lets the holding process claim again', async () => {
    await runState.claim('host', { scenarioId: 'ALL', pid: 100, startedAt });
    await runState.claim('host', { scenarioId: 'R1', pid: 100, startedAt });

    expect((await runState.readMarker('host'))?.scenarioId).toBe('R1');
  });

  it('binds a pid to a marker written before the process existed', async () => {
    await runState.claim('host', { scenarioId: 'R1', pid: null, startedAt });

    expect(await runState.bind('host', 100)).toBe(true);
    expect((await runState.readMarker('host'))?.pid).toBe(100);
    expect(await runState.bind('host', 300)).toBe(false);
  });

  it('takes over a live marker held by the launching process', async () => {
    live.add(5150);
    await runState.claim('host', { scenarioId: 'R1', pid: null, startedAt });
    await runState.bind('host', 5150);

    await runState.claim('host', { scenarioId: 'R1', pid: 100, startedAt }, 5150);

    expect((await runState.readMarker('host'))?.pid).toBe(100);
    expect(await runState.bind('host', 5150)).toBe(false);
  });

  it('does not bind a missing marker', async () => {
    expect(await runState.bind('host', 100)).toBe(false);
    expect(store.peek('RUNNING')).toBeUndefined();
  });

  it('releases only a marker held by the given pid', async () => {
    await runState.claim('host', { scenarioId: 'R1', pid: 100, startedAt });

    await runState.release('host', 999);
    expect(store.peek('RUNNING')).toBeDefined();

    await runState.release('host', 100);
    expect(store.peek('RUNNING')).toBeUndefined();
  });

  it('resolves a marker left by a dead process as finished', async () => {
    await runState.claim('host', { scenarioId: 'R1', pid: 404, startedAt });

    expect(await runState.resolve()).toEqual({ state: 'finished', scenarioId: 'R1', pid: 404, startedAt });
  });

  it('resolves the most recent DONE when nothing is running', async () => {
    await runState.markDone('R0', new Date(T0));
    await runState.markDone('R1', new Date(T0 + 60_000));

    expect(await runState.resolve()).toEqual({
      state: 'done',
      scenarioId: 'R1',
      finishedAt: new Date(T0 + 60_000),
    });
    expect(store.peek('R1/DONE')).toBe('2026-01-05T10:01:00.000Z\n');
  });

  it('writes, reads and clears ALL_DONE', async () => {
    await runState.markAllDone(new Date(T0));
    expect(await runState.readAllDone()).toEqual(new Date(T0));

    await runState.clearAllDone();
    expect(await runState.readAllDone()).toBeNull();
  });

  it('ignores an unreadable DONE marker', async () => {
    await store.write('R1/DONE', 'not a date\n');

    expect(await runState.readDone('R1')).toBeNull();
  });
});

// ============================================================================
// Results bundle
// ============================================================================

describe('ResultsBundle', () => {
  let store: MemoryArtifactStore;
  let bundle: ResultsBundle;

  beforeEach(() => {
    store = new MemoryArtifactStore();
    bundle = new ResultsBundle(store, 'R1');
  });

  it('formats a results row in fixed column order with empty absent cells', () => {
    const row = resultsRow(T0, { targets_discovered: 40, targets_up: 39, success_pct: 97.5 });

    expect(formatResultsRow(row)).toBe('2026-01-05T10:00:00.000Z,40,39,,97.5,,,,,,,,');
  });

  it('formats a health row', () => {
    expect(formatHealthRow({ timestamp: new Date(T0), cpuMillicores: 250, memoryMi: 512, restarts: 1 })).toBe(
      '2026-01-05T10:00:00.000Z,250,512,1',
    );
  });

  it('writes the header once, then one line per row', async () => {
    await bundle.appendResultsRow(resultsRow(T0, { success_pct: 100 }));
    await bundle.appendResultsRow(resultsRow(T0 + 30_000, { success_pct: 90 }));

    const lines = store.peek('R1/metrics.csv')?.trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines?.[0]).toBe(
      'timestamp,targets_discovered,targets_up,targets_down,success_pct,latency_p50,latency_p95,latency_max,samples_per_sec,active_series,memory_bytes,cpu_cores,out_of_order_rate',
    );
    expect((await bundle.readResultsRows()).map((row) => row.values.success_pct)).toEqual([100, 90]);
  });

  it('skips a partially written last line', () => {
    const text = 'timestamp,success_pct\n2026-01-05T10:00:00.000Z,99\n2026-01-05T10:00:30.000Z';

    const rows = parseResultsTable(text);

    expect(rows).toHaveLength(1);
    expect(rows[0]?.values.success_pct).toBe(99);
    expect(rows[0]?.values.targets_up).toBeNull();
  });

  it('returns the latest health row', async () => {
    expect(await bundle.latestHealthRow()).toBeNull();

    await bundle.appendHealthRow({ timestamp: new Date(T0), cpuMillicores: 100, memoryMi: 200, restarts: 0 });
    await bundle.appendHealthRow({ timestamp: new Date(T0 + 30_000), cpuMillicores: 110, memoryMi: 210, restarts: 1 });

    expect(await bundle.latestHealthRow()).toEqual({
      timestamp: new Date(T0 + 30_000),
      cpuMillicores: 110,
      memoryMi: 210,
      restarts: 1,
    });
  });

  it('records and reads back the outcome', async () => {
    const outcome = {
      status: 'stopped-early' as const,
      stopReason: 'Success rate below 95% for 3 consecutive samples',
      startedAt: new Date(T0),
      finishedAt: new Date(T0 + 90_000),
    };

    await bundle.writeOutcome(outcome);

    expect(await bundle.readOutcome()).toEqual(outcome);
  });

  it('reads no outcome from an unknown status', async () => {
    await store.write('R1/outcome.json', '{"status":"exploded","startedAt":"2026-01-05T10:00:00.000Z"}');

    expect(await bundle.readOutcome()).toBeNull();
  });

  it('resets every artifact except the run log', async () => {
    for (const file of ['metrics.csv', 'health.csv', 'monitor.log', 'monitor.pid', 'summary.txt', 'outcome.json', 'run.log']) {
      await store.write(`R1/${file}`, 'x');
    }

    await bundle.reset();

    expect(store.paths.value).toEqual(['R1/run.log']);
  });

  it('writes and clears the monitor marker', async () => {
    await bundle.writeMonitorMarker(4242, new Date(T0));
    expect(store.peek('R1/monitor.pid')).toBe('4242 2026-01-05T10:00:00.000Z\n');
    expect(await bundle.hasMonitorMarker()).toBe(true);

    await bundle.clearMonitorMarker();
    expect(await bundle.hasMonitorMarker()).toBe(false);
  });
});

/**
 * Unit tests for the results watcher
 * @module @loadramp/core/tests/unit/results-watcher
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { LogTarget } from '@loadramp/shared';

import { ResultsWatcher } from '../../src/services/results-watcher';
import type { MemoryArtifactStore } from '../../src/stores/artifact-store';
import type { RunStateStore } from '../../src/stores/run-state-store';
import { T0, VirtualClock, memoryRunState } from '../helpers/fakes';

/**
 * Virtual clock that runs a hook after every sleep
 */
class HookedClock extends VirtualClock {
  afterSleep: ((count: number) => Promise<void>) | null = null;

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await super.sleep(ms, signal);
    await this.afterSleep?.(this.sleeps.length);
  }
}

describe('ResultsWatcher', () => {
  const launchedAt = new Date(T0);
  let clock: HookedClock;
  let store: MemoryArtifactStore;
  let runState: RunStateStore;
  let fetched: (string | undefined)[];
  let logText: string;
  let watcher: ResultsWatcher;

  beforeEach(() => {
    clock = new HookedClock();
    ({ store, runState } = memoryRunState(new Set([5150])));
    fetched = [];
    logText = '';
    const log: LogTarget = {
      append: async (text) => {
        logText += text;
      },
    };
    watcher = new ResultsWatcher({
      runState,
      clock,
      log,
      fetchResults: async (target) => {
        fetched.push(target);
        return target ? `/local/${target}` : '/local';
      },
    });
  });

  it('copies once after the completion marker appears', async () => {
    await runState.claim('host', { scenarioId: 'R2', pid: 5150, startedAt: launchedAt });
    clock.afterSleep = async (count) => {
      if (count === 2) await runState.markDone('R2', new Date(clock.now()));
    };

    const result = await watcher.watch('R2', launchedAt);

    expect(result).toEqual({ completed: true, copied: true, localPath: '/local/R2', polls: 3 });
    expect(fetched).toEqual(['R2']);
    expect(clock.sleeps).toEqual([30_000, 30_000]);
    expect(logText).toContain('[2026-01-05T10:01:00.000Z] Results copied to /local/R2\n');
  });

  it('ignores a completion marker older than the launch', async () => {
    await runState.markDone('R2', new Date(T0 - 60_000));
    await runState.claim('host', { scenarioId: 'R2', pid: 5150, startedAt: launchedAt });
    clock.afterSleep = async () => {
      await runState.markDone('R2', new Date(clock.now()));
    };

    const result = await watcher.watch('R2', launchedAt);

    expect(result.polls).toBe(2);
  });

  it('watches ALL_DONE for a suite and copies the whole root', async () => {
    await runState.claim('host', { scenarioId: 'ALL', pid: 5150, startedAt: launchedAt });
    clock.afterSleep = async () => {
      await runState.markAllDone(new Date(clock.now()));
    };

    const result = await watcher.watch('ALL', launchedAt);

    expect(result).toEqual({ completed: true, copied: true, localPath: '/local', polls: 2 });
    expect(fetched).toEqual([undefined]);
    expect(clock.sleeps).toEqual([120_000]);
  });

  it('copies what exists when the job died without a marker', async () => {
    await runState.claim('host', { scenarioId: 'R2', pid: 6000, startedAt: launchedAt });

    const result = await watcher.watch('R2', launchedAt);

    expect(result).toEqual({ completed: false, copied: true, localPath: '/local/R2', polls: 1 });
    expect(logText).toContain('Run of R2 ended without a completion marker; copying what exists');
  });

  it('stops without copying once cancelled', async () => {
    await runState.claim('host', { scenarioId: 'R2', pid: 5150, startedAt: launchedAt });
    const abort = new AbortController();
    clock.afterSleep = async () => abort.abort();

    const result = await watcher.watch('R2', launchedAt, abort.signal);

    expect(result).toEqual({ completed: false, copied: false, localPath: null, polls: 1 });
    expect(fetched).toEqual([]);
    expect(logText).toContain('Watcher cancelled');
  });

  function flakyWatcher(failures: number, maxCopyAttempts?: number): ResultsWatcher {
    let calls = 0;
    return new ResultsWatcher({
      runState,
      clock,
      maxCopyAttempts,
      log: { append: async (text) => void (logText += text) },
      fetchResults: async (target) => {
        calls++;
        if (calls <= failures) throw new Error('tar: unexpected EOF');
        fetched.push(target);
        return `/local/${target ?? ''}`;
      },
    });
  }

  it('retries a failed copy on the next poll', async () => {
    await runState.markDone('R2', launchedAt);

    const result = await flakyWatcher(2).watch('R2', launchedAt);

    expect(result).toEqual({ completed: true, copied: true, localPath: '/local/R2', polls: 3 });
    expect(fetched).toEqual(['R2']);
    expect(clock.sleeps).toEqual([30_000, 30_000]);
    expect(logText).toContain('[2026-01-05T10:00:00.000Z] Copy attempt 1/5 failed: tar: unexpected EOF\n');
    expect(logText).toContain('[2026-01-05T10:00:30.000Z] Copy attempt 2/5 failed: tar: unexpected EOF\n');
    expect(logText).toContain('[2026-01-05T10:01:00.000Z] Results copied to /local/R2\n');
    expect(store.peek('R2/DONE')).toBe('2026-01-05T10:00:00.000Z\n');
  });

  it('gives up after the configured number of copy attempts', async () => {
    await runState.markDone('R2', launchedAt);

    const result = await flakyWatcher(10, 3).watch('R2', launchedAt);

    expect(result).toEqual({ completed: true, copied: false, localPath: null, polls: 3 });
    expect(fetched).toEqual([]);
    expect(clock.sleeps).toEqual([30_000, 30_000]);
    expect(logText).toContain('[2026-01-05T10:01:00.000Z] Giving up on R2 after 3 copy attempts\n');
  });
});

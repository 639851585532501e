/**
 * Unit tests for the health monitor
 * @module @loadramp/core/tests/unit/health-monitor
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  HealthMonitor,
  isAbnormalTermination,
  selectErrorLines,
  type HealthTickState,
} from '../../src/services/health-monitor';
import { ResultsBundle } from '../../src/stores/results-bundle';
import { MemoryArtifactStore } from '../../src/stores/artifact-store';
import { FakeHealthClient, IdleClock, T0, VirtualClock } from '../helpers/fakes';

describe('selectErrorLines', () => {
  it('keeps the last matching lines up to the limit', () => {
    const lines = ['msg="scrape failed"', 'all good', 'PANIC: runtime', 'request timeout', 'ok'];

    expect(selectErrorLines(lines, 2)).toEqual(['PANIC: runtime', 'request timeout']);
    expect(selectErrorLines(lines, 0)).toEqual([]);
  });
});

describe('isAbnormalTermination', () => {
  it('flags a new reason other than Completed', () => {
    expect(isAbnormalTermination('OOMKilled', null, 1, 0)).toBe(true);
    expect(isAbnormalTermination('Completed', null, 1, 0)).toBe(false);
    expect(isAbnormalTermination(null, 'OOMKilled', 1, 1)).toBe(false);
  });

  it('flags the same reason again only when restarts grew', () => {
    expect(isAbnormalTermination('OOMKilled', 'OOMKilled', 1, 1)).toBe(false);
    expect(isAbnormalTermination('OOMKilled', 'OOMKilled', 2, 1)).toBe(true);
  });
});

describe('HealthMonitor', () => {
  let client: FakeHealthClient;
  let monitor: HealthMonitor;
  let state: HealthTickState;

  beforeEach(() => {
    client = new FakeHealthClient();
    monitor = new HealthMonitor(client, { clock: new IdleClock(new VirtualClock()), pid: 4242 });
    state = { restarts: null, terminationReason: null };
  });

  describe('tick', () => {
    it('turns readings into a health row', async () => {
      const { row, events } = await monitor.tick(state);

      expect(row).toEqual({ timestamp: new Date(T0), cpuMillicores: 250, memoryMi: 512, restarts: 0 });
      expect(events).toEqual([]);
    });

    it('reports missing readings and writes zeros', async () => {
      client.usage = null;
      client.restarts = null;

      const { row, events } = await monitor.tick(state);

      expect(row).toMatchObject({ cpuMillicores: 0, memoryMi: 0, restarts: 0 });
      expect(events.map((event) => event.message)).toEqual(['Unavailable: resource usage, restart count']);
    });

    it('reports an abnormal termination once per restart', async () => {
      client.reason = 'OOMKilled';
      client.restarts = 1;

      const first = await monitor.tick(state);
      const second = await monitor.tick(state);
      client.restarts = 2;
      const third = await monitor.tick(state);

      expect(first.events.map((event) => event.message)).toEqual(['Last termination: OOMKilled (restarts: 1)']);
      expect(second.events).toEqual([]);
      expect(third.events.map((event) => event.type)).toEqual(['abnormal-termination']);
    });

    it('collects matching log lines', async () => {
      client.lines = ['level=info msg=ready', 'level=error msg="scrape failed"'];

      const { events } = await monitor.tick(state);

      expect(events).toEqual([
        {
          type: 'error-lines',
          timestamp: new Date(T0),
          message: '1 matching line(s)',
          lines: ['level=error msg="scrape failed"'],
        },
      ]);
    });
  });

  describe('start and stop', () => {
    let store: MemoryArtifactStore;
    let bundle: ResultsBundle;

    beforeEach(() => {
      store = new MemoryArtifactStore();
      bundle = new ResultsBundle(store, 'R1');
    });

    it('writes its marker and log header on start', async () => {
      const handle = await monitor.start('R1', bundle);

      expect(store.peek('R1/monitor.pid')).toBe('4242 2026-01-05T10:00:00.000Z\n');
      expect(store.peek('R1/monitor.log')).toBe(
        [
          '='.repeat(60),
          'Monitor started: 2026-01-05T10:00:00.000Z',
          'Scenario: R1',
          'Poll interval: 30s',
          '='.repeat(60),
          '',
        ].join('\n'),
      );

      await monitor.stop(handle);
    });

    it('samples until stopped, then clears the marker', async () => {
      client.lines = ['level=error msg="scrape failed"'];
      const handle = await monitor.start('R1', bundle);

      await vi.waitFor(async () => {
        expect(await bundle.readHealthRows()).toHaveLength(1);
      });
      await monitor.stop(handle);

      expect(await bundle.hasMonitorMarker()).toBe(false);
      const log = store.peek('R1/monitor.log') ?? '';
      expect(log).toContain('[2026-01-05T10:00:00.000Z] error-lines: 1 matching line(s)\n  level=error msg="scrape failed"\n');
      expect(log.endsWith('[2026-01-05T10:00:00.000Z] Monitor stopped\n')).toBe(true);
      expect(await bundle.readHealthRows()).toHaveLength(1);
    });
  });
});

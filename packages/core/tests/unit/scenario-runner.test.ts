/**
 * Unit tests for the scenario runner
 * @module @loadramp/core/tests/unit/scenario-runner
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode, type QueryOutcome, type ScenarioSpec } from '@loadramp/shared';

import { ScenarioRunner, type RunPhase } from '../../src/services/scenario-runner';
import { ScenarioRegistry } from '../../src/services/scenario-registry';
import { MetricPoller } from '../../src/services/metric-poller';
import { HealthMonitor } from '../../src/services/health-monitor';
import { ResultsBundle } from '../../src/stores/results-bundle';
import type { MetricProfile } from '../../src/models/metric-profile';
import type { MemoryArtifactStore } from '../../src/stores/artifact-store';
import type { RunStateStore } from '../../src/stores/run-state-store';
import {
  FakeHealthClient,
  FakeLoadController,
  FakeQueryClient,
  IdleClock,
  VirtualClock,
  memoryRunState,
  scenario,
  scriptedProfile,
  value,
} from '../helpers/fakes';

const PID = 4242;

interface Harness {
  runner: ScenarioRunner;
  clock: VirtualClock;
  loadController: FakeLoadController;
  store: MemoryArtifactStore;
  runState: RunStateStore;
  live: Set<number>;
}

function harness(
  specs: ScenarioSpec[],
  profile: () => MetricProfile,
  answers: Record<string, () => QueryOutcome> = {},
): Harness {
  const clock = new VirtualClock();
  const loadController = new FakeLoadController();
  const live = new Set<number>([PID]);
  const { store, runState } = memoryRunState(live);
  const runner = new ScenarioRunner({
    registry: new ScenarioRegistry({ scenarios: specs, suites: { test: specs.map((spec) => spec.id) } }),
    loadController,
    metricPoller: new MetricPoller(new FakeQueryClient(answers), { clock }),
    healthMonitor: new HealthMonitor(new FakeHealthClient(), { clock: new IdleClock(clock), pid: PID }),
    runState,
    store,
    profileFor: profile,
    clock,
    pid: PID,
  });
  return { runner, clock, loadController, store, runState, live };
}

describe('ScenarioRunner', () => {
  describe('run to completion', () => {
    let h: Harness;

    beforeEach(() => {
      h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));
    });

    it('collects one row per poll interval until the duration elapses', async () => {
      const outcome = await h.runner.run('T1');

      expect(outcome.status).toBe('completed');
      expect(outcome.stopReason).toBeNull();
      expect(outcome.summary.dataPoints).toBe(10);
      expect(outcome.finalSuccessPct).toBe(100);
      expect(outcome.finishedAt.toISOString()).toBe('2026-01-05T10:05:00.000Z');

      const rows = await new ResultsBundle(h.store, 'T1').readResultsRows();
      expect(rows).toHaveLength(10);
      expect(rows[0]?.timestamp.toISOString()).toBe('2026-01-05T10:00:30.000Z');
      expect(rows[0]?.values.targets_discovered).toBe(0);
      expect(rows[0]?.values.latency_p95).toBeNull();
    });

    it('skips convergence when the profile has no discovery query', async () => {
      const outcome = await h.runner.run('T1');

      expect(outcome.convergence).toEqual({ expected: 40, discovered: 0, waitedMs: 0, timedOut: false, skipped: true });
      expect(h.clock.sleeps).toEqual(Array.from({ length: 10 }, () => 30_000));
    });

    it('applies the load, then stops the controller', async () => {
      await h.runner.run('T1');

      expect(h.loadController.calls).toEqual(['setLoad:10:T1', 'stop']);
    });

    it('walks through every phase in order', async () => {
      const phases: RunPhase[] = [];
      h.runner.on('phase', ({ phase }: { phase: RunPhase }) => phases.push(phase));

      await h.runner.run('T1');

      expect(phases).toEqual(['init', 'converging', 'collecting', 'finalizing', 'finalized']);
    });

    it('writes the summary and DONE, then removes the RUNNING marker', async () => {
      await h.runner.run('T1');

      expect(h.store.peek('T1/summary.txt')).toContain('Scenario T1 summary');
      expect(h.store.peek('T1/DONE')).toBe('2026-01-05T10:05:00.000Z\n');
      expect(h.store.peek('T1/RUNNING')).toBeUndefined();
      expect(await h.runState.readMarker({ scenarioId: 'T1' })).toBeNull();
    });

    it('stops the health monitor and clears its marker', async () => {
      await h.runner.run('T1');

      expect(h.store.peek('T1/monitor.pid')).toBeUndefined();
      expect(h.store.peek('T1/monitor.log')?.endsWith('[2026-01-05T10:05:00.000Z] Monitor stopped\n')).toBe(true);
    });

    it('clears the artifacts of a previous run', async () => {
      await h.store.write('T1/metrics.csv', 'timestamp\n2020-01-01T00:00:00.000Z\n');
      await h.store.write('T1/run.log', 'kept\n');

      await h.runner.run('T1');

      const rows = await new ResultsBundle(h.store, 'T1').readResultsRows();
      expect(rows).toHaveLength(10);
      expect(h.store.peek('T1/run.log')).toBe('kept\n');
    });
  });

  describe('convergence', () => {
    const spec = scenario({ id: 'T1', durationMs: 60_000 });

    it('times out after the convergence window and keeps collecting', async () => {
      const h = harness([spec], () => scriptedProfile([], 'discovered'), { discovered: () => value(10) });
      const warnings: string[] = [];
      h.runner.on('warning', ({ message }: { message: string }) => warnings.push(message));

      const outcome = await h.runner.run('T1');

      expect(outcome.convergence).toEqual({
        expected: 40,
        discovered: 10,
        waitedMs: 180_000,
        timedOut: true,
        skipped: false,
      });
      expect(warnings).toContain('Convergence timed out after 3m: 10/40 targets discovered');
      expect(outcome.status).toBe('completed');
      expect(outcome.summary.dataPoints).toBe(2);
      expect(h.clock.sleeps).toEqual([...Array.from({ length: 18 }, () => 10_000), 30_000, 30_000]);
    });

    it('moves on as soon as the expected targets are discovered', async () => {
      let calls = 0;
      const h = harness([spec], () => scriptedProfile([], 'discovered'), {
        discovered: () => value(++calls === 1 ? 20 : 40),
      });

      const outcome = await h.runner.run('T1');

      expect(outcome.convergence).toEqual({
        expected: 40,
        discovered: 40,
        waitedMs: 10_000,
        timedOut: false,
        skipped: false,
      });
    });
  });

  describe('early endings', () => {
    it('stops early after three consecutive low samples', async () => {
      const h = harness([scenario({ id: 'T1', durationMs: 3_000_000 })], () =>
        scriptedProfile([92, 93, 96, 80, 80, 80]),
      );
      const warnings: string[] = [];
      h.runner.on('warning', ({ message }: { message: string }) => warnings.push(message));

      const outcome = await h.runner.run('T1');

      expect(outcome.status).toBe('stopped-early');
      expect(outcome.stopReason).toBe('Success rate below 95% for 3 consecutive samples');
      expect(outcome.summary.dataPoints).toBe(6);
      expect(outcome.finalSuccessPct).toBe(80);
      expect(warnings).toContain('Success rate 92.0% below 95% (1/3)');
      expect(warnings).toContain('Success rate 80.0% below 95% (3/3)');
      expect(h.store.peek('T1/DONE')).toBe('2026-01-05T10:03:00.000Z\n');
    });

    it('fails when the load cannot be applied, and still finalizes', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));
      h.loadController.failNextApply = 'configmap locked';

      const outcome = await h.runner.run('T1');

      expect(outcome.status).toBe('failed');
      expect(outcome.stopReason).toBe('Failed to apply load of size 10: configmap locked');
      expect(outcome.summary.dataPoints).toBe(0);
      expect(h.loadController.calls).toEqual(['setLoad:10:T1', 'stop']);
      expect(h.store.peek('T1/DONE')).toBe('2026-01-05T10:00:00.000Z\n');
      expect(h.store.peek('T1/RUNNING')).toBeUndefined();
    });

    it('ends as cancelled when the signal aborts during collection', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));
      const abort = new AbortController();
      let rows = 0;
      h.runner.on('row', () => {
        if (++rows === 2) abort.abort();
      });

      const outcome = await h.runner.run('T1', { signal: abort.signal });

      expect(outcome.status).toBe('cancelled');
      expect(outcome.stopReason).toBe('Cancelled by operator');
      expect(outcome.summary.dataPoints).toBe(2);
      expect(h.store.peek('T1/summary.txt')).toContain('Outcome:           CANCELLED');
      expect(h.store.peek('T1/RUNNING')).toBeUndefined();
    });
  });

  describe('RUNNING marker', () => {
    it('refuses to start while another live process holds the scenario', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));
      h.live.add(999);
      await h.runState.claim({ scenarioId: 'T1' }, { scenarioId: 'T1', pid: 999, startedAt: new Date(0) });

      await expect(h.runner.run('T1')).rejects.toMatchObject({ code: ErrorCode.RUN_ALREADY_ACTIVE });
      expect(h.loadController.calls).toEqual([]);
    });

    it('replaces a marker left by a dead process', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));
      await h.runState.claim({ scenarioId: 'T1' }, { scenarioId: 'T1', pid: 999, startedAt: new Date(0) });

      const outcome = await h.runner.run('T1');

      expect(outcome.status).toBe('completed');
      expect(h.store.peek('T1/RUNNING')).toBeUndefined();
    });
  });

  describe('refinalize', () => {
    it('rebuilds the summary and DONE marker from the recorded outcome', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));
      await h.runner.run('T1');
      await h.store.remove('T1/summary.txt');
      await h.store.remove('T1/DONE');

      const summary = await h.runner.refinalize('T1');

      expect(summary.status).toBe('completed');
      expect(summary.dataPoints).toBe(10);
      expect(h.store.peek('T1/summary.txt')).toContain('Data points:       10');
      expect(h.store.peek('T1/DONE')).toBe('2026-01-05T10:05:00.000Z\n');
    });

    it('rejects a scenario that never ran', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));

      await expect(h.runner.refinalize('T1')).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
    });

    it('rejects an unknown scenario id', async () => {
      const h = harness([scenario({ id: 'T1' })], () => scriptedProfile([]));

      await expect(h.runner.refinalize('T9')).rejects.toMatchObject({ code: ErrorCode.SCENARIO_NOT_FOUND });
    });
  });
});

/**
 * Unit tests for the summary report
 * @module @loadramp/core/tests/unit/summary-report
 */

import { describe, it, expect } from 'vitest';
import { emptyMetricValues, type HealthRow, type MetricValues, type ResultsRow } from '@loadramp/shared';

import { renderSummary, summarize, type SummaryContext } from '../../src/services/summary-report';
import { T0, scenario } from '../helpers/fakes';

const GIB = 1024 ** 3;

function row(offsetMs: number, values: Partial<MetricValues>): ResultsRow {
  return { timestamp: new Date(T0 + offsetMs), values: { ...emptyMetricValues(), ...values } };
}

function health(restarts: number): HealthRow {
  return { timestamp: new Date(T0), cpuMillicores: 100, memoryMi: 256, restarts };
}

const context: SummaryContext = {
  spec: scenario({ id: 'R2', loadSize: 100, purpose: 'Baseline at 100 nodes' }),
  expectedTargets: 400,
  status: 'completed',
  stopReason: null,
  startedAt: new Date(T0),
  finishedAt: new Date(T0 + 300_000),
};

const rows = [
  row(30_000, {
    success_pct: 100,
    latency_p50: 0.01,
    latency_p95: 0.02,
    latency_max: 0.1,
    samples_per_sec: 1000,
    memory_bytes: GIB,
    cpu_cores: 0.5,
  }),
  row(60_000, {
    success_pct: 90,
    latency_p50: 0.03,
    latency_p95: 0.06,
    latency_max: 0.2,
    samples_per_sec: 2000,
    active_series: 5000,
    memory_bytes: 2 * GIB,
    cpu_cores: 1.5,
  }),
  row(90_000, { latency_p95: 0.04, active_series: 6000 }),
];

describe('summarize', () => {
  const summary = summarize(rows, [health(0), health(2)], context);

  it('aggregates success rate over present samples', () => {
    expect(summary.successPct).toEqual({ mean: 95, min: 90, last: 90 });
    expect(summary.dataPoints).toBe(3);
  });

  it('aggregates latency', () => {
    expect(summary.latency.p50Mean).toBeCloseTo(0.02);
    expect(summary.latency.p95Mean).toBeCloseTo(0.04);
    expect(summary.latency.p95Peak).toBe(0.06);
    expect(summary.latency.maxPeak).toBe(0.2);
  });

  it('tracks first, last and peak of growing series', () => {
    expect(summary.activeSeries).toEqual({ start: 5000, end: 6000, peak: 6000 });
    expect(summary.memoryBytes).toEqual({ start: GIB, end: 2 * GIB, peak: 2 * GIB });
    expect(summary.samplesPerSec).toEqual({ mean: 1500, last: 2000 });
    expect(summary.cpuCores).toEqual({ mean: 1, peak: 1.5 });
  });

  it('takes restarts from the last health row', () => {
    expect(summary.restarts).toBe(2);
    expect(summarize(rows, [], context).restarts).toBeNull();
  });

  it('carries the scenario and its timing', () => {
    expect(summary).toMatchObject({
      scenarioId: 'R2',
      loadSize: 100,
      expectedTargets: 400,
      plannedDurationMs: 300_000,
      actualDurationMs: 300_000,
      generatedAt: new Date(T0 + 300_000),
    });
  });
});

describe('renderSummary', () => {
  it('renders one line per aggregate', () => {
    const lines = renderSummary(summarize(rows, [health(2)], context)).split('\n');

    expect(lines).toContain('Scenario R2 summary');
    expect(lines).toContain('Purpose:           Baseline at 100 nodes');
    expect(lines).toContain('Load size:         100 (expected targets: 400)');
    expect(lines).toContain('Outcome:           COMPLETED');
    expect(lines).toContain('Stop reason:       -');
    expect(lines).toContain('Duration:          5m of 5m planned');
    expect(lines).toContain('Success rate (%):  mean 95.0, min 90.0, last 90.0');
    expect(lines).toContain('Latency (s):       p50 mean 0.0200, p95 mean 0.0400, p95 peak 0.0600, max peak 0.2000');
    expect(lines).toContain('Samples/sec:       mean 1500.0, last 2000.0');
    expect(lines).toContain('Active series:     start 5000, end 6000, peak 6000');
    expect(lines).toContain('Memory (GB):       start 1.00, end 2.00, peak 2.00');
    expect(lines).toContain('CPU (cores):       mean 1.000, peak 1.500');
    expect(lines).toContain('Restarts:          2');
    expect(lines).toContain('Generated: 2026-01-05T10:05:00.000Z');
  });

  it('prints N/A for a scenario without samples', () => {
    const text = renderSummary(
      summarize([], [], { ...context, status: 'failed', stopReason: 'Failed to apply load of size 100: denied' }),
    );

    expect(text).toContain('Outcome:           FAILED\n');
    expect(text).toContain('Stop reason:       Failed to apply load of size 100: denied\n');
    expect(text).toContain('Success rate (%):  mean N/A, min N/A, last N/A\n');
    expect(text).toContain('Latency (s):       p50 mean N/A, p95 mean N/A, p95 peak N/A, max peak N/A\n');
    expect(text).toContain('Restarts:          N/A\n');
    expect(text.endsWith(`${'='.repeat(60)}\n`)).toBe(true);
  });
});

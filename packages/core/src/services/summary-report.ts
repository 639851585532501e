/**
 * Summary report
 * @module @loadramp/core/services/summary-report
 */

import type { HealthRow, ResultsRow, ScenarioSpec, ScenarioStatus, Summary } from '@loadramp/shared';
import { BYTES_PER_GIB, first, formatDuration, formatValue, last, max, mean, min } from '@loadramp/shared';

export interface SummaryContext {
  spec: ScenarioSpec;
  expectedTargets: number;
  status: ScenarioStatus;
  stopReason: string | null;
  startedAt: Date;
  finishedAt: Date;
  generatedAt?: Date;
}

/**
 * Aggregate a finished scenario's tables
 */
export function summarize(rows: readonly ResultsRow[], healthRows: readonly HealthRow[], context: SummaryContext): Summary {
  const column = (name: keyof ResultsRow['values']): (number | null)[] => rows.map((row) => row.values[name]);
  const success = column('success_pct');
  const series = column('active_series');
  const memory = column('memory_bytes');
  const samples = column('samples_per_sec');
  const cpu = column('cpu_cores');
  const p95 = column('latency_p95');

  return {
    scenarioId: context.spec.id,
    purpose: context.spec.purpose,
    endpointClass: context.spec.endpointClass,
    loadSize: context.spec.loadSize,
    expectedTargets: context.expectedTargets,
    status: context.status,
    stopReason: context.stopReason,
    plannedDurationMs: context.spec.durationMs,
    actualDurationMs: Math.max(0, context.finishedAt.getTime() - context.startedAt.getTime()),
    dataPoints: rows.length,
    successPct: { mean: mean(success), min: min(success), last: last(success) },
    latency: {
      p50Mean: mean(column('latency_p50')),
      p95Mean: mean(p95),
      p95Peak: max(p95),
      maxPeak: max(column('latency_max')),
    },
    samplesPerSec: { mean: mean(samples), last: last(samples) },
    activeSeries: { start: first(series), end: last(series), peak: max(series) },
    memoryBytes: { start: first(memory), end: last(memory), peak: max(memory) },
    cpuCores: { mean: mean(cpu), peak: max(cpu) },
    restarts: healthRows[healthRows.length - 1]?.restarts ?? null,
    generatedAt: context.generatedAt ?? context.finishedAt,
  };
}

function gib(bytes: number | null): number | null {
  return bytes === null ? null : bytes / BYTES_PER_GIB;
}

function count(value: number | null): string {
  return value === null ? 'N/A' : String(Math.round(value));
}

const STATUS_LABELS: Record<ScenarioStatus, string> = {
  completed: 'COMPLETED',
  'stopped-early': 'STOPPED EARLY',
  failed: 'FAILED',
  cancelled: 'CANCELLED',
};

/**
 * Render the human readable report written to summary.txt
 */
export function renderSummary(summary: Summary): string {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    `Scenario ${summary.scenarioId} summary`,
    rule,
    `Purpose:           ${summary.purpose}`,
    `Endpoint:          ${summary.endpointClass}`,
    `Load size:         ${summary.loadSize} (expected targets: ${summary.expectedTargets})`,
    `Outcome:           ${STATUS_LABELS[summary.status]}`,
    `Stop reason:       ${summary.stopReason ?? '-'}`,
    `Duration:          ${formatDuration(summary.actualDurationMs)} of ${formatDuration(summary.plannedDurationMs)} planned`,
    `Data points:       ${summary.dataPoints}`,
    '',
    `Success rate (%):  mean ${formatValue(summary.successPct.mean, 1)}, min ${formatValue(summary.successPct.min, 1)}, last ${formatValue(summary.successPct.last, 1)}`,
    `Latency (s):       p50 mean ${formatValue(summary.latency.p50Mean, 4)}, p95 mean ${formatValue(summary.latency.p95Mean, 4)}, p95 peak ${formatValue(summary.latency.p95Peak, 4)}, max peak ${formatValue(summary.latency.maxPeak, 4)}`,
    `Samples/sec:       mean ${formatValue(summary.samplesPerSec.mean, 1)}, last ${formatValue(summary.samplesPerSec.last, 1)}`,
    `Active series:     start ${count(summary.activeSeries.start)}, end ${count(summary.activeSeries.end)}, peak ${count(summary.activeSeries.peak)}`,
    `Memory (GB):       start ${formatValue(gib(summary.memoryBytes.start), 2)}, end ${formatValue(gib(summary.memoryBytes.end), 2)}, peak ${formatValue(gib(summary.memoryBytes.peak), 2)}`,
    `CPU (cores):       mean ${formatValue(summary.cpuCores.mean, 3)}, peak ${formatValue(summary.cpuCores.peak, 3)}`,
    `Restarts:          ${summary.restarts ?? 'N/A'}`,
    '',
    `Generated: ${summary.generatedAt.toISOString()}`,
    rule,
  ];
  return `${lines.join('\n')}\n`;
}

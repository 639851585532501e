/**
 * Metric profiles
 * @module @loadramp/core/models/metric-profile
 *
 * A profile maps every results column to how its value is obtained on a
 * tick: an instant query, a reading taken in process, or a value derived
 * from the other columns of the same row.
 */

import type { MetricColumn, MetricValues } from '@loadramp/shared';
import { percentile, round } from '@loadramp/shared';
import type { PushCycleStats } from './push-jobs';

export type MetricDefinition =
  | {
      column: MetricColumn;
      kind: 'query';
      expression: string;
      /** An empty result means zero rather than absent (counts) */
      emptyAsZero?: boolean;
    }
  | { column: MetricColumn; kind: 'sample'; read: () => number | null }
  | { column: MetricColumn; kind: 'derived'; derive: (values: MetricValues) => number | null };

export interface MetricProfile {
  name: string;
  definitions: MetricDefinition[];
  /** Counts currently discovered targets; absent where discovery does not apply */
  discoveryExpression?: string;
}

/**
 * Percentage of healthy targets, one decimal. Absent when the total is
 * absent or zero.
 */
export function successRate(up: number | null, total: number | null): number | null {
  if (up === null || total === null || total === 0) {
    return null;
  }
  return round((up / total) * 100, 1);
}

export interface ScrapeProfileOptions {
  /** Job label regex of the synthetic targets */
  jobPattern: string;
  /** Job label of the collector's own metrics */
  serverJob: string;
}

export function scrapeProfile({ jobPattern, serverJob }: ScrapeProfileOptions): MetricProfile {
  const targets = `job=~"${jobPattern}"`;
  const server = `job="${serverJob}"`;
  return {
    name: 'scrape',
    discoveryExpression: `count(up{${targets}})`,
    definitions: [
      { column: 'targets_discovered', kind: 'query', expression: `count(up{${targets}})`, emptyAsZero: true },
      { column: 'targets_up', kind: 'query', expression: `count(up{${targets}} == 1)`, emptyAsZero: true },
      { column: 'targets_down', kind: 'query', expression: `count(up{${targets}} == 0)`, emptyAsZero: true },
      {
        column: 'success_pct',
        kind: 'derived',
        derive: (values) => successRate(values.targets_up, values.targets_discovered),
      },
      { column: 'latency_p50', kind: 'query', expression: `quantile(0.5, scrape_duration_seconds{${targets}})` },
      { column: 'latency_p95', kind: 'query', expression: `quantile(0.95, scrape_duration_seconds{${targets}})` },
      { column: 'latency_max', kind: 'query', expression: `max(scrape_duration_seconds{${targets}})` },
      { column: 'samples_per_sec', kind: 'query', expression: 'rate(prometheus_tsdb_head_samples_appended_total[5m])' },
      { column: 'active_series', kind: 'query', expression: 'prometheus_tsdb_head_series' },
      { column: 'memory_bytes', kind: 'query', expression: `process_resident_memory_bytes{${server}}` },
      { column: 'cpu_cores', kind: 'query', expression: `rate(process_cpu_seconds_total{${server}}[5m])` },
      { column: 'out_of_order_rate', kind: 'query', expression: 'rate(prometheus_tsdb_out_of_order_samples_total[5m])' },
    ],
  };
}

export interface PushProfileOptions {
  /** Job label under which the collector scrapes the gateway */
  gatewayJob: string;
  /** Latest completed push cycle, or null before the first one */
  latestCycle: () => PushCycleStats | null;
}

function cycleLatencySeconds(cycle: PushCycleStats | null, pct: number): number | null {
  if (!cycle) return null;
  const value = percentile(cycle.latenciesMs, pct);
  return value === null ? null : value / 1000;
}

/**
 * Each column reads a completed cycle once; later polls see null until the
 * next cycle completes.
 */
function freshCycleReader(latestCycle: () => PushCycleStats | null): (column: MetricColumn) => PushCycleStats | null {
  const consumed = new Map<MetricColumn, PushCycleStats>();
  return (column) => {
    const cycle = latestCycle();
    if (!cycle || consumed.get(column) === cycle) return null;
    consumed.set(column, cycle);
    return cycle;
  };
}

export function pushProfile({ gatewayJob, latestCycle }: PushProfileOptions): MetricProfile {
  const gateway = `job="${gatewayJob}"`;
  const fresh = freshCycleReader(latestCycle);
  return {
    name: 'push',
    definitions: [
      { column: 'targets_discovered', kind: 'sample', read: () => fresh('targets_discovered')?.attempted ?? null },
      { column: 'targets_up', kind: 'sample', read: () => fresh('targets_up')?.succeeded ?? null },
      { column: 'targets_down', kind: 'sample', read: () => fresh('targets_down')?.failed ?? null },
      {
        column: 'success_pct',
        kind: 'derived',
        derive: (values) => successRate(values.targets_up, values.targets_discovered),
      },
      { column: 'latency_p50', kind: 'sample', read: () => cycleLatencySeconds(fresh('latency_p50'), 50) },
      { column: 'latency_p95', kind: 'sample', read: () => cycleLatencySeconds(fresh('latency_p95'), 95) },
      { column: 'latency_max', kind: 'sample', read: () => cycleLatencySeconds(fresh('latency_max'), 100) },
      {
        column: 'samples_per_sec',
        kind: 'sample',
        read: () => {
          const cycle = fresh('samples_per_sec');
          if (!cycle || cycle.elapsedMs <= 0) return null;
          return round(cycle.attempted / (cycle.elapsedMs / 1000), 3);
        },
      },
      { column: 'active_series', kind: 'query', expression: `scrape_samples_scraped{${gateway}}` },
      { column: 'memory_bytes', kind: 'query', expression: `process_resident_memory_bytes{${gateway}}` },
      { column: 'cpu_cores', kind: 'query', expression: `rate(process_cpu_seconds_total{${gateway}}[5m])` },
    ],
  };
}

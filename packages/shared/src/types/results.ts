/**
 * Metric results table types
 * @module @loadramp/shared/types/results
 */

/**
 * Fixed column order of the results table (after the timestamp).
 */
export const METRIC_COLUMNS = [
  'targets_discovered',
  'targets_up',
  'targets_down',
  'success_pct',
  'latency_p50',
  'latency_p95',
  'latency_max',
  'samples_per_sec',
  'active_series',
  'memory_bytes',
  'cpu_cores',
  'out_of_order_rate',
] as const;

export type MetricColumn = (typeof METRIC_COLUMNS)[number];

/**
 * One value per column; null means the sample was absent.
 */
export type MetricValues = Record<MetricColumn, number | null>;

/**
 * One sample of the backend, all values taken on the same tick.
 */
export interface ResultsRow {
  timestamp: Date;
  values: MetricValues;
}

export const RESULTS_HEADER: readonly string[] = ['timestamp', ...METRIC_COLUMNS];

/**
 * Build a row with every column absent.
 */
export function emptyMetricValues(): MetricValues {
  return {
    targets_discovered: null,
    targets_up: null,
    targets_down: null,
    success_pct: null,
    latency_p50: null,
    latency_p95: null,
    latency_max: null,
    samples_per_sec: null,
    active_series: null,
    memory_bytes: null,
    cpu_cores: null,
    out_of_order_rate: null,
  };
}

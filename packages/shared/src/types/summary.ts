/**
 * Scenario outcome and summary types
 * @module @loadramp/shared/types/summary
 */

import type { EndpointClass } from './scenario.js';

export type ScenarioStatus = 'completed' | 'stopped-early' | 'failed' | 'cancelled';

/**
 * Aggregates over one finished scenario. Every statistic is null when no
 * sample of its column was present.
 */
export interface Summary {
  scenarioId: string;
  purpose: string;
  endpointClass: EndpointClass;
  loadSize: number;
  expectedTargets: number;
  status: ScenarioStatus;
  stopReason: string | null;
  plannedDurationMs: number;
  actualDurationMs: number;
  dataPoints: number;
  successPct: { mean: number | null; min: number | null; last: number | null };
  latency: { p50Mean: number | null; p95Mean: number | null; p95Peak: number | null; maxPeak: number | null };
  samplesPerSec: { mean: number | null; last: number | null };
  activeSeries: { start: number | null; end: number | null; peak: number | null };
  memoryBytes: { start: number | null; end: number | null; peak: number | null };
  cpuCores: { mean: number | null; peak: number | null };
  restarts: number | null;
  generatedAt: Date;
}

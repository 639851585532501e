/**
 * Built-in scenario catalog
 * @module @loadramp/core/models/scenario-catalog
 *
 * Two ramps ship with loadramp: the scrape ramp (R-series) grows the number
 * of discovered targets; the push ramps (C, I, N and P series) grow the
 * number of identities pushing to the gateway.
 */

import type { EndpointClass, JobSet, ScenarioSpec } from '@loadramp/shared';

const SECOND = 1000;
const MINUTE = 60 * SECOND;

/** Sampling interval of the scrape ramp */
export const SCRAPE_POLL_INTERVAL_MS = 30 * SECOND;

/** Push cycle (and sampling) interval of the push ramps */
export const PUSH_INTERVAL_MS = 60 * SECOND;

function scrapeStep(id: string, loadSize: number, durationMs: number, purpose: string): ScenarioSpec {
  return {
    id,
    endpointClass: 'scrape',
    loadSize,
    jobSet: 'node+cluster',
    jitterMs: 0,
    pollIntervalMs: SCRAPE_POLL_INTERVAL_MS,
    durationMs,
    purpose,
    podMultiplier: 1,
    soak: false,
  };
}

interface PushStepOptions {
  jobSet?: JobSet;
  podMultiplier?: number;
  soak?: boolean;
}

function pushStep(
  id: string,
  endpointClass: EndpointClass,
  loadSize: number,
  jitterSeconds: number,
  durationMs: number,
  purpose: string,
  options: PushStepOptions = {},
): ScenarioSpec {
  return {
    id,
    endpointClass,
    loadSize,
    jobSet: options.jobSet ?? 'node+cluster',
    jitterMs: jitterSeconds * SECOND,
    pollIntervalMs: PUSH_INTERVAL_MS,
    durationMs,
    purpose,
    podMultiplier: options.podMultiplier ?? 1,
    soak: options.soak ?? false,
  };
}

// ============================================================================
// Scrape ramp
// ============================================================================

export const SCRAPE_RAMP: readonly ScenarioSpec[] = [
  scrapeStep('R0', 10, 15 * MINUTE, 'Sanity baseline'),
  scrapeStep('R1', 50, 20 * MINUTE, 'Early scaling'),
  scrapeStep('R2', 100, 30 * MINUTE, 'Mid-scale pressure'),
  scrapeStep('R3', 200, 45 * MINUTE, 'Near target scale'),
  scrapeStep('R4', 250, 45 * MINUTE, 'Push ceiling'),
];

// ============================================================================
// Push ramps
// ============================================================================

export const PUSH_RAMP: readonly ScenarioSpec[] = [
  pushStep('C0', 'cluster-ip', 10, 5, 5 * MINUTE, 'Sanity: correctness, URLs, payload validity'),
  pushStep('C1', 'cluster-ip', 100, 20, 10 * MINUTE, 'Early baseline, resource profile'),
  pushStep('C2', 'cluster-ip', 250, 20, 10 * MINUTE, 'Ramp step'),
  pushStep('C3', 'cluster-ip', 500, 20, 15 * MINUTE, 'Ramp step'),
  pushStep('C4', 'cluster-ip', 750, 20, 15 * MINUTE, 'Ramp step'),
  pushStep('C5', 'cluster-ip', 1000, 20, 20 * MINUTE, 'Target ramp: stability at 1000'),
  pushStep('C6', 'cluster-ip', 1000, 20, 120 * MINUTE, 'Soak: detect slow degradation (2h)', { soak: true }),
  pushStep('C7', 'cluster-ip', 1000, 0, 20 * MINUTE, 'Spike: worst-case thundering herd'),

  pushStep('I0', 'ingress', 10, 5, 5 * MINUTE, 'Sanity: TLS, endpoint reachability'),
  pushStep('I1', 'ingress', 100, 20, 10 * MINUTE, 'Baseline over TLS'),
  pushStep('I2', 'ingress', 250, 20, 10 * MINUTE, 'Ramp step'),
  pushStep('I3', 'ingress', 500, 20, 15 * MINUTE, 'Ramp step'),
  pushStep('I4', 'ingress', 750, 20, 15 * MINUTE, 'Ramp step'),
  pushStep('I5', 'ingress', 1000, 20, 20 * MINUTE, 'Target ramp over TLS'),
  pushStep('I6', 'ingress', 1000, 20, 120 * MINUTE, 'Soak over TLS (2h)', { soak: true }),
  pushStep('I7', 'ingress', 1000, 0, 20 * MINUTE, 'Spike over TLS'),

  pushStep('N1', 'cluster-ip', 1000, 20, 20 * MINUTE, 'Node-level only, in-cluster', { jobSet: 'node' }),
  pushStep('N2', 'ingress', 1000, 20, 20 * MINUTE, 'Node-level only, ingress', { jobSet: 'node' }),

  pushStep('P1', 'cluster-ip', 0, 5, 30 * MINUTE, 'Baseline cluster-level impact', { jobSet: 'cluster', podMultiplier: 1 }),
  pushStep('P2', 'cluster-ip', 0, 5, 30 * MINUTE, 'Pod metrics inflated x10', { jobSet: 'cluster', podMultiplier: 10 }),
  pushStep('P3', 'cluster-ip', 0, 5, 30 * MINUTE, 'Pod metrics inflated x50', { jobSet: 'cluster', podMultiplier: 50 }),
  pushStep('P4', 'cluster-ip', 0, 5, 30 * MINUTE, 'Pod metrics inflated x100', { jobSet: 'cluster', podMultiplier: 100 }),
];

export const SCENARIO_CATALOG: readonly ScenarioSpec[] = [...SCRAPE_RAMP, ...PUSH_RAMP];

/**
 * Named suites; each lists scenario ids in execution order.
 */
export const SUITES = {
  scrape: SCRAPE_RAMP.map((spec) => spec.id),
  push: PUSH_RAMP.map((spec) => spec.id),
} as const;

export type SuiteName = keyof typeof SUITES;

export function isSuiteName(value: string): value is SuiteName {
  return value === 'scrape' || value === 'push';
}

/**
 * Scenario the soak overlay inherits its settings from
 */
export const SOAK_BASE_ID = 'R4';

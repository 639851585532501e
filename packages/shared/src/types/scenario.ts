/**
 * Scenario types for loadramp
 *
 * A scenario is one fixed step of a load ramp: how much synthetic load to
 * apply, how long to hold it and how often to sample the backend.
 *
 * @module @loadramp/shared/types/scenario
 */

/**
 * Which backend a scenario exercises.
 * - scrape: pull-based collector discovering synthetic targets
 * - cluster-ip: push gateway reached through its in-cluster service address
 * - ingress: push gateway reached through the external ingress address
 */
export type EndpointClass = 'scrape' | 'cluster-ip' | 'ingress';

/**
 * Metric job categories a push scenario emits.
 */
export type JobCategory = 'node' | 'cluster';

/**
 * Combination of job categories enabled for a scenario.
 */
export type JobSet = 'node' | 'cluster' | 'node+cluster';

/**
 * Immutable description of one load step.
 */
export interface ScenarioSpec {
  /** Stable identifier, e.g. "R2" or "C3" */
  readonly id: string;
  readonly endpointClass: EndpointClass;
  /** Number of synthetic identities (nodes) to simulate */
  readonly loadSize: number;
  readonly jobSet: JobSet;
  /** Maximum random delay before each push, in milliseconds */
  readonly jitterMs: number;
  /** Interval between metric samples (and push cycles), in milliseconds */
  readonly pollIntervalMs: number;
  /** How long to hold the load, in milliseconds */
  readonly durationMs: number;
  /** Human readable intent of the step */
  readonly purpose: string;
  /** Multiplier applied to cluster-level payloads */
  readonly podMultiplier: number;
  /** Long-duration endurance run */
  readonly soak: boolean;
}

/**
 * Row shown by `scenario list`.
 */
export interface ScenarioListing {
  id: string;
  endpointClass: EndpointClass;
  loadSize: number;
  expectedTargets: number;
  durationMs: number;
  purpose: string;
}

/**
 * Identifier reserved for the soak overlay.
 */
export const SOAK_SCENARIO_ID = 'R5';

/**
 * Target name meaning "the whole suite" for detached execution.
 */
export const ALL_SCENARIOS = 'ALL';

/**
 * Expands a job set into its categories.
 */
export function jobCategories(jobSet: JobSet): JobCategory[] {
  switch (jobSet) {
    case 'node':
      return ['node'];
    case 'cluster':
      return ['cluster'];
    case 'node+cluster':
      return ['node', 'cluster'];
  }
}

/**
 * Whether a scenario drives load by pushing rather than target discovery.
 */
export function isPushScenario(spec: Pick<ScenarioSpec, 'endpointClass'>): boolean {
  return spec.endpointClass !== 'scrape';
}

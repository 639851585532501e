/**
 * Scenario registry
 * @module @loadramp/core/services/scenario-registry
 */

import type { ScenarioListing, ScenarioSpec } from '@loadramp/shared';
import {
  RunError,
  SOAK_SCENARIO_ID,
  ValidationError,
  formatDuration,
  jobCategories,
  validateScenarioSpec,
  validateSoakInput,
} from '@loadramp/shared';
import { CLUSTER_LEVEL_JOBS, NODE_LEVEL_JOBS } from '../models/push-jobs';
import { SCENARIO_CATALOG, SOAK_BASE_ID, SUITES } from '../models/scenario-catalog';

export interface ScenarioRegistryOptions {
  /** Scenario definitions in declared order (default: built-in catalog) */
  scenarios?: readonly ScenarioSpec[];
  /** Named suites (default: built-in suites) */
  suites?: Readonly<Record<string, readonly string[]>>;
  /** Emitters per synthetic node on the scrape path (default: 4) */
  emitterCount?: number;
}

/**
 * Read-only catalog of scenarios.
 */
export class ScenarioRegistry {
  private readonly scenarios: ReadonlyMap<string, ScenarioSpec>;
  private readonly suites: Readonly<Record<string, readonly string[]>>;
  private readonly emitterCount: number;

  constructor(options: ScenarioRegistryOptions = {}) {
    const entries = new Map<string, ScenarioSpec>();
    for (const spec of options.scenarios ?? SCENARIO_CATALOG) {
      const report = validateScenarioSpec(spec);
      if (!report.valid) {
        throw ValidationError.multiple(
          report.errors.map((issue) => ({ field: `${spec.id}.${issue.field}`, message: issue.message, rule: issue.code })),
        );
      }
      if (entries.has(spec.id)) {
        throw ValidationError.constraint(`Duplicate scenario id: ${spec.id}`, 'id');
      }
      entries.set(spec.id, Object.freeze({ ...spec }));
    }
    this.scenarios = entries;
    this.suites = options.suites ?? SUITES;
    this.emitterCount = options.emitterCount ?? 4;
  }

  /**
   * Find a scenario by id
   */
  lookup(id: string): ScenarioSpec | undefined {
    return this.scenarios.get(id);
  }

  /**
   * Find a scenario by id or throw a not-found error
   */
  require(id: string): ScenarioSpec {
    const spec = this.lookup(id);
    if (!spec) {
      throw RunError.scenarioNotFound(id, this.ids());
    }
    return spec;
  }

  has(id: string): boolean {
    return this.scenarios.has(id);
  }

  /**
   * Scenario ids in declared order
   */
  ids(): string[] {
    return [...this.scenarios.keys()];
  }

  list(): ScenarioListing[] {
    return [...this.scenarios.values()].map((spec) => ({
      id: spec.id,
      endpointClass: spec.endpointClass,
      loadSize: spec.loadSize,
      expectedTargets: this.expectedTargets(spec),
      durationMs: spec.durationMs,
      purpose: spec.purpose,
    }));
  }

  suiteNames(): string[] {
    return Object.keys(this.suites);
  }

  /**
   * Scenario ids of a named suite
   */
  suite(name: string): string[] {
    const ids = this.suites[name];
    if (!ids) {
      throw ValidationError.field('suite', `Unknown suite "${name}". Known: ${this.suiteNames().join(', ')}`);
    }
    return [...ids];
  }

  /**
   * Targets (scrape) or pushes per cycle (push) a scenario should produce
   */
  expectedTargets(spec: ScenarioSpec): number {
    if (spec.endpointClass === 'scrape') {
      return spec.loadSize * this.emitterCount;
    }
    let pushes = 0;
    for (const category of jobCategories(spec.jobSet)) {
      pushes += category === 'node' ? spec.loadSize * NODE_LEVEL_JOBS.length : CLUSTER_LEVEL_JOBS.length;
    }
    return pushes;
  }

  /**
   * Synthesize the soak scenario: the base scenario's settings with the
   * given size and duration.
   */
  soak(size: number, durationMs: number, baseId: string = SOAK_BASE_ID): ScenarioSpec {
    const report = validateSoakInput(size, durationMs);
    if (!report.valid) {
      throw ValidationError.multiple(
        report.errors.map((issue) => ({ field: issue.field, message: issue.message, rule: issue.code })),
      );
    }
    const base = this.require(baseId);
    return Object.freeze({
      ...base,
      id: SOAK_SCENARIO_ID,
      loadSize: size,
      durationMs,
      soak: true,
      purpose: `Soak at ${size} for ${formatDuration(durationMs)}`,
    });
  }
}

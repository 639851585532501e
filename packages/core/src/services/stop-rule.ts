/**
 * Stop-rule evaluator
 * @module @loadramp/core/services/stop-rule
 *
 * Ends a scenario early once the success rate stays below the threshold
 * for a number of consecutive samples. A sample without a success rate
 * breaks the streak.
 */

import type { HealthRow, ResultsRow } from '@loadramp/shared';
import { formatValue } from '@loadramp/shared';

export interface StopRuleOptions {
  /** Minimum healthy success rate in percent (default: 95) */
  threshold?: number;
  /** Consecutive samples below threshold that stop the run (default: 3) */
  maxConsecutive?: number;
}

export type StopDecision =
  | { action: 'continue'; warnings: string[] }
  | { action: 'stop'; reason: string; warnings: string[] };

export class StopRuleEvaluator {
  readonly threshold: number;
  readonly maxConsecutive: number;
  private consecutive = 0;
  private lastRestarts: number | null = null;

  constructor(options: StopRuleOptions = {}) {
    this.threshold = options.threshold ?? 95;
    this.maxConsecutive = options.maxConsecutive ?? 3;
  }

  /** Samples below threshold in the current streak */
  get streak(): number {
    return this.consecutive;
  }

  reset(): void {
    this.consecutive = 0;
    this.lastRestarts = null;
  }

  evaluate(row: ResultsRow, health: HealthRow | null = null): StopDecision {
    const warnings: string[] = [];
    const success = row.values.success_pct;

    if (health) {
      if (this.lastRestarts !== null && health.restarts > this.lastRestarts) {
        warnings.push(`Workload restarted (restarts: ${this.lastRestarts} -> ${health.restarts})`);
      }
      this.lastRestarts = health.restarts;
    }

    if (success === null) {
      this.consecutive = 0;
      warnings.push('Success rate unavailable');
      return { action: 'continue', warnings };
    }

    if (success >= this.threshold) {
      this.consecutive = 0;
      return { action: 'continue', warnings };
    }

    this.consecutive++;
    warnings.push(
      `Success rate ${formatValue(success, 1)}% below ${this.threshold}% (${this.consecutive}/${this.maxConsecutive})`,
    );
    if (this.consecutive >= this.maxConsecutive) {
      return {
        action: 'stop',
        reason: `Success rate below ${this.threshold}% for ${this.consecutive} consecutive samples`,
        warnings,
      };
    }
    return { action: 'continue', warnings };
  }
}

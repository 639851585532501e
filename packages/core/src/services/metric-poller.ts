/**
 * Metric poller
 * @module @loadramp/core/services/metric-poller
 *
 * Takes one sample of every column in a metric profile and appends it to
 * the results table. A failed or timed-out query makes its column absent;
 * it never fails the tick.
 */

import type { IMetricQueryClient, MetricValues, QueryOutcome, ResultsRow } from '@loadramp/shared';
import { createServiceLogger, emptyMetricValues, errorMessage, systemClock, type Clock } from '@loadramp/shared';
import type { MetricProfile } from '../models/metric-profile';
import type { ResultsBundle } from '../stores/results-bundle';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'metric-poller' },
);

export interface MetricPollerOptions {
  /** Per-query timeout (default: 10000) */
  queryTimeoutMs?: number;
  clock?: Clock;
}

export class MetricPoller {
  private readonly queryTimeoutMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly client: IMetricQueryClient,
    options: MetricPollerOptions = {},
  ) {
    this.queryTimeoutMs = options.queryTimeoutMs ?? 10_000;
    this.clock = options.clock ?? systemClock;
  }

  private async runQuery(expression: string): Promise<QueryOutcome> {
    try {
      return await this.client.query(expression, { timeoutMs: this.queryTimeoutMs });
    } catch (error) {
      return { kind: 'error', message: errorMessage(error) };
    }
  }

  /**
   * Sample every column of `profile`. All values share one timestamp.
   */
  async sample(profile: MetricProfile): Promise<ResultsRow> {
    const timestamp = new Date(this.clock.now());
    const values: MetricValues = emptyMetricValues();

    await Promise.all(
      profile.definitions.map(async (definition) => {
        if (definition.kind === 'query') {
          const outcome = await this.runQuery(definition.expression);
          switch (outcome.kind) {
            case 'value':
              values[definition.column] = outcome.value;
              break;
            case 'empty':
              values[definition.column] = definition.emptyAsZero ? 0 : null;
              break;
            case 'error':
              logger.debug('Query failed', { column: definition.column, error: outcome.message });
              values[definition.column] = null;
              break;
          }
        } else if (definition.kind === 'sample') {
          values[definition.column] = definition.read();
        }
      }),
    );

    for (const definition of profile.definitions) {
      if (definition.kind === 'derived') {
        values[definition.column] = definition.derive(values);
      }
    }

    return { timestamp, values };
  }

  /**
   * Sample and append the row to the bundle's results table
   */
  async poll(profile: MetricProfile, bundle: ResultsBundle): Promise<ResultsRow> {
    const row = await this.sample(profile);
    await bundle.appendResultsRow(row);
    return row;
  }

  /**
   * Number of targets the collector currently knows; 0 when unknown
   */
  async countDiscovered(expression: string): Promise<number> {
    const outcome = await this.runQuery(expression);
    return outcome.kind === 'value' ? outcome.value : 0;
  }
}

/**
 * Metric query client types
 * @module @loadramp/shared/types/metric-query
 */

/**
 * Outcome of one instant query.
 * - value: a numeric sample
 * - empty: the query matched nothing
 * - error: transport failure, timeout or non-success response
 */
export type QueryOutcome =
  | { kind: 'value'; value: number }
  | { kind: 'empty' }
  | { kind: 'error'; message: string };

export interface QueryOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface IMetricQueryClient {
  query(expression: string, options?: QueryOptions): Promise<QueryOutcome>;
}

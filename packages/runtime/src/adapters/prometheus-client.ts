/**
 * Prometheus instant-query client
 * @module @loadramp/runtime/adapters/prometheus-client
 */

import type { IMetricQueryClient, QueryOptions, QueryOutcome } from '@loadramp/shared';
import { errorMessage, isRecord } from '@loadramp/shared';
import { HttpAdapter } from './http-adapter';

function sampleValue(sample: unknown): QueryOutcome {
  if (!Array.isArray(sample) || sample.length < 2) {
    return { kind: 'error', message: 'Malformed sample' };
  }
  const text: unknown = sample[1];
  if (typeof text !== 'string') {
    return { kind: 'error', message: 'Malformed sample value' };
  }
  const value = Number(text);
  return Number.isFinite(value) ? { kind: 'value', value } : { kind: 'empty' };
}

/**
 * Reduce a `/api/v1/query` response body to one scalar. Vectors yield
 * their first element; an empty vector or a NaN value is empty.
 */
export function parseQueryResponse(body: unknown): QueryOutcome {
  if (!isRecord(body)) {
    return { kind: 'error', message: 'Malformed response' };
  }
  if (body.status !== 'success') {
    return { kind: 'error', message: typeof body.error === 'string' ? body.error : 'Query failed' };
  }
  const data = body.data;
  if (!isRecord(data) || !Array.isArray(data.result)) {
    return { kind: 'error', message: 'Malformed response data' };
  }

  switch (data.resultType) {
    case 'scalar':
      return sampleValue(data.result);
    case 'vector': {
      const first: unknown = data.result[0];
      if (first === undefined) return { kind: 'empty' };
      return isRecord(first) ? sampleValue(first.value) : { kind: 'error', message: 'Malformed vector element' };
    }
    default:
      return { kind: 'error', message: `Unsupported result type: ${String(data.resultType)}` };
  }
}

export class PrometheusQueryClient implements IMetricQueryClient {
  private readonly http: HttpAdapter;

  constructor(baseUrl: string, timeoutMs = 10_000) {
    this.http = new HttpAdapter({ baseUrl, timeout: timeoutMs });
  }

  async query(expression: string, options: QueryOptions = {}): Promise<QueryOutcome> {
    try {
      const response = await this.http.get<unknown>('/api/v1/query', {
        params: { query: expression },
        timeout: options.timeoutMs,
        signal: options.signal,
        throwOnError: false,
      });
      if (response.status !== 200 && !isRecord(response.data)) {
        return { kind: 'error', message: `HTTP ${response.status}` };
      }
      return parseQueryResponse(response.data);
    } catch (error) {
      return { kind: 'error', message: errorMessage(error) };
    }
  }
}

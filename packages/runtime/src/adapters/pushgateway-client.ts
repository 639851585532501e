/**
 * Pushgateway client
 * @module @loadramp/runtime/adapters/pushgateway-client
 */

import type { IPushClient, PushResult } from '@loadramp/shared';
import { createServiceLogger, errorMessage, isRecord } from '@loadramp/shared';
import { HttpAdapter } from './http-adapter';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'pushgateway-client' },
);

const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4';

/**
 * Grouping key path of one metric group
 */
export function groupPath(job: string, instance?: string): string {
  const base = `/metrics/job/${encodeURIComponent(job)}`;
  return instance ? `${base}/instance/${encodeURIComponent(instance)}` : base;
}

function trimSlash(endpoint: string): string {
  return endpoint.replace(/\/+$/, '');
}

/**
 * Grouping labels of every group listed by `/api/v1/metrics`
 */
export function listedGroups(body: unknown): { job: string; instance?: string }[] {
  if (!isRecord(body) || !Array.isArray(body.data)) return [];
  const groups: { job: string; instance?: string }[] = [];
  for (const group of body.data) {
    if (!isRecord(group) || !isRecord(group.labels)) continue;
    const { job, instance } = group.labels;
    if (typeof job !== 'string' || job === '') continue;
    groups.push(typeof instance === 'string' && instance !== '' ? { job, instance } : { job });
  }
  return groups;
}

export class PushgatewayClient implements IPushClient {
  private readonly http: HttpAdapter;

  constructor(timeoutMs = 30_000) {
    this.http = new HttpAdapter({ timeout: timeoutMs });
  }

  async push(endpoint: string, job: string, instance: string, payload: string, signal?: AbortSignal): Promise<PushResult> {
    const body = payload.endsWith('\n') ? payload : `${payload}\n`;
    const started = Date.now();
    try {
      const response = await this.http.post<string>(`${trimSlash(endpoint)}${groupPath(job, instance)}`, body, {
        headers: { 'Content-Type': EXPOSITION_CONTENT_TYPE },
        responseType: 'text',
        throwOnError: false,
        signal,
      });
      const ok = response.status >= 200 && response.status < 300;
      return {
        ok,
        statusCode: response.status,
        latencyMs: response.duration,
        ...(ok ? {} : { error: `HTTP ${response.status}` }),
      };
    } catch (error) {
      return { ok: false, statusCode: null, latencyMs: Date.now() - started, error: errorMessage(error) };
    }
  }

  async wipe(endpoint: string): Promise<number> {
    const base = trimSlash(endpoint);
    const listing = await this.http.get<unknown>(`${base}/api/v1/metrics`);
    let deleted = 0;
    for (const group of listedGroups(listing.data)) {
      try {
        await this.http.delete(`${base}${groupPath(group.job, group.instance)}`);
        deleted++;
      } catch (error) {
        logger.warn('Failed to delete metric group', { job: group.job, instance: group.instance, error: errorMessage(error) });
      }
    }
    return deleted;
  }
}

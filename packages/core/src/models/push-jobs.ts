/**
 * Push job definitions
 * @module @loadramp/core/models/push-jobs
 */

import type { JobCategory } from '@loadramp/shared';

/**
 * Which identity field a push job uses as its instance label
 */
export type InstanceKind = 'node-ip' | 'node-name' | 'cluster';

export interface PushJob {
  name: string;
  /** Payload file name under the payload directory */
  file: string;
  category: JobCategory;
  instanceKind: InstanceKind;
}

export const NODE_LEVEL_JOBS: readonly PushJob[] = [
  { name: 'gpu-exporter', file: 'gpu-exporter.prom', category: 'node', instanceKind: 'node-ip' },
  { name: 'node-exporter', file: 'node-exporter.prom', category: 'node', instanceKind: 'node-ip' },
  { name: 'node_metrics', file: 'node-metrics.prom', category: 'node', instanceKind: 'node-name' },
  { name: 'hpc_metrics', file: 'hpc-metrics.prom', category: 'node', instanceKind: 'node-name' },
];

export const CLUSTER_LEVEL_JOBS: readonly PushJob[] = [
  { name: 'pod_metrics', file: 'pod-metrics.prom', category: 'cluster', instanceKind: 'cluster' },
];

/** Instance label used by cluster-level pushes */
export const CLUSTER_INSTANCE = 'pod-mapper-load-test';

/**
 * Stable identity of one simulated node
 */
export interface NodeIdentity {
  ip: string;
  name: string;
}

/**
 * Identity of the i-th simulated node. Addresses fill 10.0.10.1 through
 * 10.0.10.254 before moving to the next /24.
 */
export function nodeIdentity(index: number): NodeIdentity {
  const subnet = 10 + Math.floor(index / 254);
  const host = 1 + (index % 254);
  return {
    ip: `10.0.${subnet}.${host}`,
    name: `load-node-${String(index).padStart(4, '0')}`,
  };
}

export function nodeIdentities(count: number): NodeIdentity[] {
  return Array.from({ length: count }, (_, i) => nodeIdentity(i));
}

export function instanceFor(job: PushJob, node: NodeIdentity | null): string {
  switch (job.instanceKind) {
    case 'node-ip':
      return node?.ip ?? CLUSTER_INSTANCE;
    case 'node-name':
      return node?.name ?? CLUSTER_INSTANCE;
    case 'cluster':
      return CLUSTER_INSTANCE;
  }
}

/**
 * Replicate the sample lines of a pod payload `multiplier` times, giving
 * each batch its own namespace and pod names. Comment lines are kept once.
 */
export function inflatePodPayload(payload: string, multiplier: number): string {
  if (multiplier <= 1) {
    return payload;
  }
  const lines = payload.trim().split('\n');
  const inflated: string[] = [];
  for (let batch = 0; batch < multiplier; batch++) {
    const tag = String(batch).padStart(3, '0');
    for (const line of lines) {
      if (line.startsWith('#') || line.trim() === '') {
        if (batch === 0) inflated.push(line);
        continue;
      }
      inflated.push(
        line.replace(/namespace="[^"]*"/g, `namespace="ns-batch-${tag}"`).replace(/pod="/g, `pod="inflated-${tag}-`),
      );
    }
  }
  return inflated.join('\n');
}

/**
 * Outcome of one push cycle
 */
export interface PushCycleStats {
  cycle: number;
  startedAt: Date;
  elapsedMs: number;
  attempted: number;
  succeeded: number;
  failed: number;
  latenciesMs: number[];
  /** Most frequent error message of the cycle, if any push failed */
  topError: string | null;
}

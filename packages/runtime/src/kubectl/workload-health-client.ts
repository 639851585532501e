/**
 * Workload health client backed by kubectl
 * @module @loadramp/runtime/kubectl/workload-health-client
 */

import type { IWorkloadHealthClient, ResourceUsage, WorkloadSettings } from '@loadramp/shared';
import { isRecord, parseJson } from '@loadramp/shared';
import type { CommandRunner } from './kubectl';

const CPU_UNITS: Record<string, number> = { n: 1e-6, u: 1e-3, m: 1 };

const MEMORY_UNITS: Record<string, number> = {
  '': 1,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
};

/**
 * Parse a Kubernetes CPU quantity ("250m", "2", "1500000n") to millicores
 */
export function parseCpuMillicores(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)([num]?)$/.exec(text.trim());
  if (!match) return null;
  const amount = Number(match[1]);
  const unit = match[2] ?? '';
  return unit === '' ? amount * 1000 : amount * (CPU_UNITS[unit] ?? 1);
}

/**
 * Parse a Kubernetes memory quantity ("512Mi", "1Gi", "1000000") to bytes
 */
export function parseMemoryBytes(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)(Ki|Mi|Gi|Ti|K|M|G|T)?$/.exec(text.trim());
  if (!match) return null;
  const factor = MEMORY_UNITS[match[2] ?? ''];
  return factor === undefined ? null : Math.round(Number(match[1]) * factor);
}

/**
 * Container status of `container` in a pod's JSON, if present
 */
export function containerStatus(podJson: unknown, container: string): Record<string, unknown> | null {
  if (!isRecord(podJson) || !isRecord(podJson.status) || !Array.isArray(podJson.status.containerStatuses)) {
    return null;
  }
  for (const status of podJson.status.containerStatuses) {
    if (isRecord(status) && status.name === container) return status;
  }
  return null;
}

export class KubectlWorkloadHealthClient implements IWorkloadHealthClient {
  constructor(
    private readonly kubectl: CommandRunner,
    private readonly settings: WorkloadSettings,
  ) {}

  private async podName(): Promise<string | null> {
    const result = await this.kubectl.run([
      'get',
      'pods',
      '-n',
      this.settings.namespace,
      '-l',
      this.settings.podSelector,
      '-o',
      'jsonpath={.items[0].metadata.name}',
    ]);
    const name = result.stdout.trim();
    return result.exitCode === 0 && name !== '' ? name : null;
  }

  private async status(): Promise<Record<string, unknown> | null> {
    const pod = await this.podName();
    if (!pod) return null;
    const result = await this.kubectl.run(['get', 'pod', pod, '-n', this.settings.namespace, '-o', 'json']);
    if (result.exitCode !== 0) return null;
    return containerStatus(parseJson(result.stdout), this.settings.container);
  }

  async resourceUsage(): Promise<ResourceUsage | null> {
    const pod = await this.podName();
    if (!pod) return null;
    const result = await this.kubectl.run(['top', 'pod', pod, '-n', this.settings.namespace, '--no-headers']);
    if (result.exitCode !== 0) return null;
    const fields = result.stdout.trim().split(/\s+/);
    const cpu = parseCpuMillicores(fields[1] ?? '');
    const memory = parseMemoryBytes(fields[2] ?? '');
    return cpu === null || memory === null ? null : { cpuMillicores: cpu, memoryBytes: memory };
  }

  async restartCount(): Promise<number | null> {
    const restarts = (await this.status())?.restartCount;
    return typeof restarts === 'number' ? restarts : null;
  }

  async lastTerminationReason(): Promise<string | null> {
    const status = await this.status();
    const lastState = status?.lastState;
    if (!isRecord(lastState) || !isRecord(lastState.terminated)) return null;
    const reason = lastState.terminated.reason;
    return typeof reason === 'string' ? reason : null;
  }

  async recentLogLines(sinceSeconds: number): Promise<string[]> {
    const pod = await this.podName();
    if (!pod) return [];
    const result = await this.kubectl.run([
      'logs',
      pod,
      '-n',
      this.settings.namespace,
      '-c',
      this.settings.container,
      `--since=${Math.max(1, Math.round(sinceSeconds))}s`,
    ]);
    if (result.exitCode !== 0) return [];
    return result.stdout.split('\n').filter((line) => line.trim() !== '');
  }
}

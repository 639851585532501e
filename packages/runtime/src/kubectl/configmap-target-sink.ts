/**
 * Target sink that writes file-based discovery documents into a ConfigMap
 * @module @loadramp/runtime/kubectl/configmap-target-sink
 */

import type { ITargetConfigSink, TargetSet } from '@loadramp/shared';
import { createServiceLogger, isRecord, parseJson } from '@loadramp/shared';
import { runChecked, type CommandRunner } from './kubectl';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'configmap-target-sink' },
);

/** Metadata the API server owns; it must not be sent back */
const SERVER_MANAGED_FIELDS = ['resourceVersion', 'uid', 'creationTimestamp', 'managedFields', 'generation'];

export function targetKey(emitter: string): string {
  return `targets-${emitter}.json`;
}

/**
 * Build the ConfigMap to apply: existing data and metadata kept, one key
 * per emitter replaced, server-managed metadata dropped.
 */
export function buildConfigMap(
  existing: unknown,
  name: string,
  namespace: string,
  targetSet: TargetSet,
): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  const data: Record<string, unknown> = {};

  if (isRecord(existing)) {
    if (isRecord(existing.metadata)) {
      for (const [key, value] of Object.entries(existing.metadata)) {
        if (!SERVER_MANAGED_FIELDS.includes(key)) metadata[key] = value;
      }
    }
    if (isRecord(existing.data)) Object.assign(data, existing.data);
  }

  for (const [emitter, descriptors] of Object.entries(targetSet)) {
    data[targetKey(emitter)] = JSON.stringify(descriptors, null, 2);
  }

  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: { ...metadata, name, namespace },
    data,
  };
}

export class ConfigMapTargetSink implements ITargetConfigSink {
  constructor(
    private readonly kubectl: CommandRunner,
    private readonly namespace: string,
    private readonly configMap: string,
  ) {}

  async apply(targetSet: TargetSet): Promise<void> {
    const current = await this.kubectl.run(['get', 'configmap', this.configMap, '-n', this.namespace, '-o', 'json']);
    const existing = current.exitCode === 0 ? parseJson(current.stdout) : undefined;
    const manifest = buildConfigMap(existing, this.configMap, this.namespace, targetSet);
    await runChecked(this.kubectl, ['apply', '-f', '-'], { input: JSON.stringify(manifest) });
    logger.debug('Target ConfigMap applied', { configMap: this.configMap, emitters: Object.keys(targetSet).length });
  }
}

/**
 * Configuration resolution and validation
 * @module @loadramp/shared/validation/config-validation
 *
 * Layers are plain objects read from JSON files, the environment or flags.
 * Unknown keys are ignored; values of the wrong type are reported rather
 * than merged.
 */

import { DEFAULT_CONFIG } from '../types/config.js';
import type { HostKind, LoadRampConfig } from '../types/config.js';
import { isLogLevel } from '../logging/logger.js';
import { isRecord, reportOf } from './types.js';
import type { FieldIssue, ValidationReport } from './types.js';

type Section = Record<string, unknown>;

class LayerReader {
  readonly issues: FieldIssue[] = [];

  constructor(private readonly source: string) {}

  private section(layer: Section, name: string): Section | undefined {
    const value = layer[name];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      this.issues.push({ field: name, message: `${this.source}: expected an object`, code: 'INVALID_TYPE' });
      return undefined;
    }
    return value;
  }

  string(layer: Section | undefined, key: string, path: string, fallback: string): string {
    const value = layer?.[key];
    if (value === undefined) return fallback;
    if (typeof value === 'string') return value;
    this.issues.push({ field: path, message: `${this.source}: expected a string`, code: 'INVALID_TYPE' });
    return fallback;
  }

  nullableString(layer: Section | undefined, key: string, path: string, fallback: string | null): string | null {
    if (layer?.[key] === null) return null;
    return this.string(layer, key, path, fallback ?? '') || fallback;
  }

  number(layer: Section | undefined, key: string, path: string, fallback: number): number {
    const value = layer?.[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
    this.issues.push({ field: path, message: `${this.source}: expected a number`, code: 'INVALID_TYPE' });
    return fallback;
  }

  boolean(layer: Section | undefined, key: string, path: string, fallback: boolean): boolean {
    const value = layer?.[key];
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === 'false') return value === 'true';
    this.issues.push({ field: path, message: `${this.source}: expected a boolean`, code: 'INVALID_TYPE' });
    return fallback;
  }

  stringList(layer: Section | undefined, key: string, path: string, fallback: string[]): string[] {
    const value = layer?.[key];
    if (value === undefined) return fallback;
    if (typeof value === 'string') return value.split(/[\s,]+/).filter((item) => item.length > 0);
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) return value;
    this.issues.push({ field: path, message: `${this.source}: expected a list of strings`, code: 'INVALID_TYPE' });
    return fallback;
  }

  hostKind(layer: Section | undefined, fallback: HostKind): HostKind {
    const value = layer?.kind;
    if (value === undefined) return fallback;
    if (value === 'pod' || value === 'local') return value;
    this.issues.push({ field: 'host.kind', message: `${this.source}: expected "pod" or "local"`, code: 'INVALID_VALUE' });
    return fallback;
  }

  merge(base: LoadRampConfig, layer: unknown): LoadRampConfig {
    if (layer === undefined || layer === null) return base;
    if (!isRecord(layer)) {
      this.issues.push({ field: 'config', message: `${this.source}: expected an object`, code: 'INVALID_TYPE' });
      return base;
    }

    const prometheus = this.section(layer, 'prometheus');
    const workload = this.section(layer, 'workload');
    const targets = this.section(layer, 'targets');
    const pushgateway = this.section(layer, 'pushgateway');
    const host = this.section(layer, 'host');
    const timing = this.section(layer, 'timing');

    let logLevel = base.logLevel;
    if (layer.logLevel !== undefined) {
      if (isLogLevel(layer.logLevel)) {
        logLevel = layer.logLevel;
      } else {
        this.issues.push({ field: 'logLevel', message: `${this.source}: unknown log level`, code: 'INVALID_VALUE' });
      }
    }

    const t = base.timing;
    return {
      resultsDir: this.string(layer, 'resultsDir', 'resultsDir', base.resultsDir),
      logLevel,
      prometheus: {
        url: this.string(prometheus, 'url', 'prometheus.url', base.prometheus.url),
        queryTimeoutMs: this.number(prometheus, 'queryTimeoutMs', 'prometheus.queryTimeoutMs', base.prometheus.queryTimeoutMs),
        jobPattern: this.string(prometheus, 'jobPattern', 'prometheus.jobPattern', base.prometheus.jobPattern),
        serverJob: this.string(prometheus, 'serverJob', 'prometheus.serverJob', base.prometheus.serverJob),
      },
      workload: {
        namespace: this.string(workload, 'namespace', 'workload.namespace', base.workload.namespace),
        podSelector: this.string(workload, 'podSelector', 'workload.podSelector', base.workload.podSelector),
        container: this.string(workload, 'container', 'workload.container', base.workload.container),
      },
      targets: {
        configMap: this.string(targets, 'configMap', 'targets.configMap', base.targets.configMap),
        emitters: this.stringList(targets, 'emitters', 'targets.emitters', base.targets.emitters),
        port: this.number(targets, 'port', 'targets.port', base.targets.port),
      },
      pushgateway: {
        clusterIpEndpoint: this.string(pushgateway, 'clusterIpEndpoint', 'pushgateway.clusterIpEndpoint', base.pushgateway.clusterIpEndpoint),
        ingressEndpoint: this.string(pushgateway, 'ingressEndpoint', 'pushgateway.ingressEndpoint', base.pushgateway.ingressEndpoint),
        payloadDir: this.string(pushgateway, 'payloadDir', 'pushgateway.payloadDir', base.pushgateway.payloadDir),
        maxInFlight: this.number(pushgateway, 'maxInFlight', 'pushgateway.maxInFlight', base.pushgateway.maxInFlight),
        pushTimeoutMs: this.number(pushgateway, 'pushTimeoutMs', 'pushgateway.pushTimeoutMs', base.pushgateway.pushTimeoutMs),
        wipeOnDrain: this.boolean(pushgateway, 'wipeOnDrain', 'pushgateway.wipeOnDrain', base.pushgateway.wipeOnDrain),
        gatewayJob: this.string(pushgateway, 'gatewayJob', 'pushgateway.gatewayJob', base.pushgateway.gatewayJob),
      },
      host: {
        kind: this.hostKind(host, base.host.kind),
        namespace: this.string(host, 'namespace', 'host.namespace', base.host.namespace),
        podName: this.string(host, 'podName', 'host.podName', base.host.podName),
        manifestPath: this.nullableString(host, 'manifestPath', 'host.manifestPath', base.host.manifestPath),
        remoteDir: this.string(host, 'remoteDir', 'host.remoteDir', base.host.remoteDir),
        readyTimeoutMs: this.number(host, 'readyTimeoutMs', 'host.readyTimeoutMs', base.host.readyTimeoutMs),
        entrypoint: this.stringList(host, 'entrypoint', 'host.entrypoint', base.host.entrypoint),
      },
      timing: {
        convergenceTimeoutMs: this.number(timing, 'convergenceTimeoutMs', 'timing.convergenceTimeoutMs', t.convergenceTimeoutMs),
        convergenceStepMs: this.number(timing, 'convergenceStepMs', 'timing.convergenceStepMs', t.convergenceStepMs),
        settleMs: this.number(timing, 'settleMs', 'timing.settleMs', t.settleMs),
        healthIntervalMs: this.number(timing, 'healthIntervalMs', 'timing.healthIntervalMs', t.healthIntervalMs),
        stopThresholdPct: this.number(timing, 'stopThresholdPct', 'timing.stopThresholdPct', t.stopThresholdPct),
        stopConsecutive: this.number(timing, 'stopConsecutive', 'timing.stopConsecutive', t.stopConsecutive),
        soakDurationMs: this.number(timing, 'soakDurationMs', 'timing.soakDurationMs', t.soakDurationMs),
        watchIntervalMs: this.number(timing, 'watchIntervalMs', 'timing.watchIntervalMs', t.watchIntervalMs),
        watchSuiteIntervalMs: this.number(timing, 'watchSuiteIntervalMs', 'timing.watchSuiteIntervalMs', t.watchSuiteIntervalMs),
      },
    };
  }
}

/**
 * A named configuration layer
 */
export interface ConfigLayer {
  source: string;
  values: unknown;
}

export interface ResolvedConfig {
  config: LoadRampConfig;
  /** Type mismatches found while merging layers */
  issues: FieldIssue[];
}

/**
 * Merge layers over the defaults, later layers winning.
 */
export function resolveConfig(layers: ConfigLayer[], base: LoadRampConfig = DEFAULT_CONFIG): ResolvedConfig {
  let config = base;
  const issues: FieldIssue[] = [];
  for (const layer of layers) {
    const reader = new LayerReader(layer.source);
    config = reader.merge(config, layer.values);
    issues.push(...reader.issues);
  }
  return { config, issues };
}

function validateUrl(value: string, field: string): FieldIssue | null {
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return { field, message: 'URL must use http or https', code: 'INVALID_FORMAT' };
    }
    return null;
  } catch {
    return { field, message: `Invalid URL: ${value}`, code: 'INVALID_FORMAT' };
  }
}

function positive(value: number, field: string): FieldIssue | null {
  return value > 0 ? null : { field, message: 'Must be positive', code: 'OUT_OF_RANGE' };
}

/**
 * Check a resolved configuration for values the runners cannot work with
 */
export function validateConfig(config: LoadRampConfig): ValidationReport {
  const { timing } = config;
  const issues: (FieldIssue | null)[] = [
    config.resultsDir.trim() === '' ? { field: 'resultsDir', message: 'Results directory is required', code: 'REQUIRED' } : null,
    validateUrl(config.prometheus.url, 'prometheus.url'),
    validateUrl(config.pushgateway.clusterIpEndpoint, 'pushgateway.clusterIpEndpoint'),
    validateUrl(config.pushgateway.ingressEndpoint, 'pushgateway.ingressEndpoint'),
    positive(config.prometheus.queryTimeoutMs, 'prometheus.queryTimeoutMs'),
    config.targets.emitters.length === 0
      ? { field: 'targets.emitters', message: 'At least one emitter is required', code: 'REQUIRED' }
      : null,
    Number.isInteger(config.pushgateway.maxInFlight) && config.pushgateway.maxInFlight >= 1
      ? null
      : { field: 'pushgateway.maxInFlight', message: 'Must be a positive integer', code: 'OUT_OF_RANGE' },
    positive(config.pushgateway.pushTimeoutMs, 'pushgateway.pushTimeoutMs'),
    config.host.entrypoint.length === 0
      ? { field: 'host.entrypoint', message: 'Entrypoint command is required', code: 'REQUIRED' }
      : null,
    positive(timing.convergenceTimeoutMs, 'timing.convergenceTimeoutMs'),
    positive(timing.convergenceStepMs, 'timing.convergenceStepMs'),
    timing.settleMs >= 0 ? null : { field: 'timing.settleMs', message: 'Cannot be negative', code: 'OUT_OF_RANGE' },
    positive(timing.healthIntervalMs, 'timing.healthIntervalMs'),
    timing.stopThresholdPct >= 0 && timing.stopThresholdPct <= 100
      ? null
      : { field: 'timing.stopThresholdPct', message: 'Expected value between 0 and 100', code: 'OUT_OF_RANGE' },
    Number.isInteger(timing.stopConsecutive) && timing.stopConsecutive >= 1
      ? null
      : { field: 'timing.stopConsecutive', message: 'Must be a positive integer', code: 'OUT_OF_RANGE' },
    positive(timing.soakDurationMs, 'timing.soakDurationMs'),
    positive(timing.watchIntervalMs, 'timing.watchIntervalMs'),
    positive(timing.watchSuiteIntervalMs, 'timing.watchSuiteIntervalMs'),
  ];
  return reportOf(issues);
}

/**
 * Runtime configuration types
 * @module @loadramp/shared/types/config
 */

import type { LogLevel } from '../logging/logger.js';

export interface PrometheusSettings {
  /** Base URL of the scrape collector's HTTP API */
  url: string;
  /** Per-query timeout in milliseconds */
  queryTimeoutMs: number;
  /** Job label regex matching the synthetic targets */
  jobPattern: string;
  /** Job label of the collector's own metrics */
  serverJob: string;
}

export interface WorkloadSettings {
  namespace: string;
  /** Label selector of the workload under test */
  podSelector: string;
  container: string;
}

export interface TargetSettings {
  /** ConfigMap holding the file-based discovery documents */
  configMap: string;
  /** Emitter categories; each synthetic node exposes one target per emitter */
  emitters: string[];
  port: number;
}

export interface PushgatewaySettings {
  clusterIpEndpoint: string;
  ingressEndpoint: string;
  /** Directory holding one payload file per push job */
  payloadDir: string;
  maxInFlight: number;
  pushTimeoutMs: number;
  /** Delete every metric group when load is drained */
  wipeOnDrain: boolean;
  /** Job label under which the collector scrapes the gateway itself */
  gatewayJob: string;
}

export type HostKind = 'pod' | 'local';

export interface HostSettings {
  kind: HostKind;
  namespace: string;
  podName: string;
  /** Manifest applied when the host pod does not exist */
  manifestPath: string | null;
  /** Working directory on the host; results live under `<remoteDir>/results` */
  remoteDir: string;
  readyTimeoutMs: number;
  /** Command that starts the loadramp CLI on the host */
  entrypoint: string[];
}

export interface TimingSettings {
  convergenceTimeoutMs: number;
  convergenceStepMs: number;
  settleMs: number;
  healthIntervalMs: number;
  stopThresholdPct: number;
  stopConsecutive: number;
  soakDurationMs: number;
  watchIntervalMs: number;
  watchSuiteIntervalMs: number;
}

export interface LoadRampConfig {
  resultsDir: string;
  logLevel: LogLevel;
  prometheus: PrometheusSettings;
  workload: WorkloadSettings;
  targets: TargetSettings;
  pushgateway: PushgatewaySettings;
  host: HostSettings;
  timing: TimingSettings;
}

/**
 * Partial configuration as read from a file or flags.
 */
export type LoadRampConfigInput = {
  [K in keyof LoadRampConfig]?: LoadRampConfig[K] extends object ? Partial<LoadRampConfig[K]> : LoadRampConfig[K];
};

export const DEFAULT_CONFIG: LoadRampConfig = {
  resultsDir: './results',
  logLevel: 'info',
  prometheus: {
    url: 'http://localhost:9090',
    queryTimeoutMs: 10_000,
    jobPattern: 'scale-test.*',
    serverJob: 'prometheus',
  },
  workload: {
    namespace: 'monitoring',
    podSelector: 'app.kubernetes.io/name=prometheus',
    container: 'prometheus',
  },
  targets: {
    configMap: 'scale-test-targets',
    emitters: ['node-exporter', 'gpu-exporter', 'node-metrics', 'hpc-metrics'],
    port: 8080,
  },
  pushgateway: {
    clusterIpEndpoint: 'http://pushgateway.monitoring.svc:9091',
    ingressEndpoint: 'http://pushgateway.example.internal',
    payloadDir: './payloads',
    maxInFlight: 200,
    pushTimeoutMs: 30_000,
    wipeOnDrain: true,
    gatewayJob: 'pushgateway',
  },
  host: {
    kind: 'pod',
    namespace: 'monitoring',
    podName: 'loadramp-runner',
    manifestPath: null,
    remoteDir: '/opt/loadramp',
    readyTimeoutMs: 120_000,
    entrypoint: ['loadramp'],
  },
  timing: {
    convergenceTimeoutMs: 180_000,
    convergenceStepMs: 10_000,
    settleMs: 90_000,
    healthIntervalMs: 30_000,
    stopThresholdPct: 95,
    stopConsecutive: 3,
    soakDurationMs: 6 * 60 * 60 * 1000,
    watchIntervalMs: 30_000,
    watchSuiteIntervalMs: 120_000,
  },
};

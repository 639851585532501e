/**
 * Workload health types
 * @module @loadramp/shared/types/health
 */

/**
 * One health sample of the workload under test.
 * Absent readings are recorded as 0.
 */
export interface HealthRow {
  timestamp: Date;
  cpuMillicores: number;
  memoryMi: number;
  restarts: number;
}

export const HEALTH_HEADER: readonly string[] = [
  'timestamp',
  'cpu_millicores',
  'memory_mi',
  'restarts',
];

export type HealthEventType = 'abnormal-termination' | 'error-lines' | 'sample-failed';

/**
 * Notable observation written to the monitor log.
 */
export interface HealthEvent {
  type: HealthEventType;
  timestamp: Date;
  message: string;
  lines?: string[];
}

/**
 * Point-in-time resource consumption.
 */
export interface ResourceUsage {
  cpuMillicores: number;
  memoryBytes: number;
}

/**
 * Typed view of the workload's orchestrator.
 * Each call resolves null (or an empty list) when the reading is unavailable.
 */
export interface IWorkloadHealthClient {
  resourceUsage(): Promise<ResourceUsage | null>;
  restartCount(): Promise<number | null>;
  /** Reason of the last container termination, e.g. "OOMKilled" */
  lastTerminationReason(): Promise<string | null>;
  /** Log lines emitted during the last `sinceSeconds` seconds */
  recentLogLines(sinceSeconds: number): Promise<string[]>;
}

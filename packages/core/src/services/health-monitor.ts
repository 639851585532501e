/**
 * Health monitor
 * @module @loadramp/core/services/health-monitor
 *
 * Samples the workload under test on a fixed interval while a scenario
 * runs: resource usage and restarts go to the health table, notable
 * events (abnormal termination, error log lines, failed readings) go to
 * the monitor log.
 */

import type { HealthEvent, HealthRow, IWorkloadHealthClient } from '@loadramp/shared';
import {
  RunLogSink,
  createServiceLogger,
  errorMessage,
  formatDuration,
  systemClock,
  withTimeout,
  type Clock,
} from '@loadramp/shared';
import type { ResultsBundle } from '../stores/results-bundle';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'health-monitor' },
);

/** Log lines that indicate trouble */
export const ERROR_LINE_PATTERN = /error|fail|panic|timeout|oom/i;

const BYTES_PER_MI = 1024 * 1024;
const BANNER = '='.repeat(60);

export interface HealthMonitorOptions {
  /** Sampling interval (default: 30000) */
  intervalMs?: number;
  /** Bound on each reading (default: 10000) */
  sampleTimeoutMs?: number;
  /** Error lines kept per tick (default: 5) */
  errorLineLimit?: number;
  clock?: Clock;
  /** Process id written to the liveness marker */
  pid?: number;
}

/**
 * Handle of a running monitor
 */
export interface MonitorHandle {
  readonly scenarioId: string;
  readonly startedAt: Date;
  /** @internal */
  readonly abort: AbortController;
  /** @internal */
  readonly loop: Promise<void>;
}

/**
 * Readings carried from one tick to the next
 */
export interface HealthTickState {
  restarts: number | null;
  terminationReason: string | null;
}

/**
 * Keep the last `limit` lines that match the error pattern
 */
export function selectErrorLines(lines: readonly string[], limit: number): string[] {
  const matches = lines.filter((line) => ERROR_LINE_PATTERN.test(line));
  return limit <= 0 ? [] : matches.slice(-limit);
}

/**
 * Whether a termination reason is a new abnormal one
 */
export function isAbnormalTermination(
  reason: string | null,
  previousReason: string | null,
  restarts: number | null,
  previousRestarts: number | null,
): boolean {
  if (reason === null || reason === 'Completed') return false;
  if (reason !== previousReason) return true;
  return restarts !== null && previousRestarts !== null && restarts > previousRestarts;
}

export class HealthMonitor {
  private readonly intervalMs: number;
  private readonly sampleTimeoutMs: number;
  private readonly errorLineLimit: number;
  private readonly clock: Clock;
  private readonly pid: number;

  constructor(
    private readonly client: IWorkloadHealthClient,
    options: HealthMonitorOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 30_000;
    this.sampleTimeoutMs = options.sampleTimeoutMs ?? 10_000;
    this.errorLineLimit = options.errorLineLimit ?? 5;
    this.clock = options.clock ?? systemClock;
    this.pid = options.pid ?? process.pid;
  }

  /**
   * Start monitoring. Resolves once the liveness marker and the log header
   * are written.
   */
  async start(scenarioId: string, bundle: ResultsBundle): Promise<MonitorHandle> {
    const startedAt = new Date(this.clock.now());
    await bundle.writeMonitorMarker(this.pid, startedAt);

    const sink = new RunLogSink(
      { append: (text) => bundle.appendMonitorLog(text) },
      { now: () => new Date(this.clock.now()) },
    );
    sink.writeRaw(
      BANNER,
      `Monitor started: ${startedAt.toISOString()}`,
      `Scenario: ${scenarioId}`,
      `Poll interval: ${formatDuration(this.intervalMs)}`,
      BANNER,
    );
    await sink.flush();

    const abort = new AbortController();
    const loop = this.runLoop(scenarioId, bundle, sink, abort.signal);
    logger.debug('Health monitor started', { scenarioId });
    return { scenarioId, startedAt, abort, loop };
  }

  /**
   * Stop monitoring. No health row or log line is written after this
   * resolves and the liveness marker is gone.
   */
  async stop(handle: MonitorHandle): Promise<void> {
    handle.abort.abort();
    await handle.loop;
    logger.debug('Health monitor stopped', { scenarioId: handle.scenarioId });
  }

  private async runLoop(scenarioId: string, bundle: ResultsBundle, sink: RunLogSink, signal: AbortSignal): Promise<void> {
    const state: HealthTickState = { restarts: null, terminationReason: null };
    try {
      while (!signal.aborted) {
        try {
          const { row, events } = await this.tick(state);
          if (signal.aborted) break;
          await bundle.appendHealthRow(row);
          for (const event of events) {
            sink.write(`${event.type}: ${event.message}`);
            if (event.lines) {
              sink.writeRaw(...event.lines.map((line) => `  ${line}`));
            }
          }
        } catch (error) {
          logger.warn('Health sample failed', { scenarioId, error: errorMessage(error) });
          sink.write(`sample-failed: ${errorMessage(error)}`);
        }
        await this.clock.sleep(this.intervalMs, signal);
      }
    } finally {
      sink.write('Monitor stopped');
      await sink.close().catch((error: unknown) => {
        logger.warn('Monitor log write failed', { scenarioId, error: errorMessage(error) });
      });
      await bundle.clearMonitorMarker();
    }
  }

  /**
   * Take one sample and derive its events
   */
  async tick(state: HealthTickState): Promise<{ row: HealthRow; events: HealthEvent[] }> {
    const timestamp = new Date(this.clock.now());
    const [usage, restarts, reason, lines] = await Promise.all([
      withTimeout(this.client.resourceUsage(), this.sampleTimeoutMs, null),
      withTimeout(this.client.restartCount(), this.sampleTimeoutMs, null),
      withTimeout(this.client.lastTerminationReason(), this.sampleTimeoutMs, null),
      withTimeout(this.client.recentLogLines(Math.ceil(this.intervalMs / 1000)), this.sampleTimeoutMs, []),
    ]);

    const events: HealthEvent[] = [];
    if (usage === null || restarts === null) {
      const missing = [usage === null ? 'resource usage' : null, restarts === null ? 'restart count' : null]
        .filter((name): name is string => name !== null)
        .join(', ');
      events.push({ type: 'sample-failed', timestamp, message: `Unavailable: ${missing}` });
    }

    if (isAbnormalTermination(reason, state.terminationReason, restarts, state.restarts)) {
      events.push({
        type: 'abnormal-termination',
        timestamp,
        message: `Last termination: ${reason} (restarts: ${restarts ?? 'unknown'})`,
      });
    }

    const errorLines = selectErrorLines(lines, this.errorLineLimit);
    if (errorLines.length > 0) {
      events.push({ type: 'error-lines', timestamp, message: `${errorLines.length} matching line(s)`, lines: errorLines });
    }

    state.terminationReason = reason;
    if (restarts !== null) state.restarts = restarts;

    return {
      row: {
        timestamp,
        cpuMillicores: usage?.cpuMillicores ?? 0,
        memoryMi: usage ? Math.floor(usage.memoryBytes / BYTES_PER_MI) : 0,
        restarts: restarts ?? 0,
      },
      events,
    };
  }
}

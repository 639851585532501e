/**
 * Results watcher
 * @module @loadramp/core/services/results-watcher
 *
 * Runs beside a detached launch: polls the host for the completion marker
 * of the launched target and copies its results once, then exits.
 */

import type { LogTarget } from '@loadramp/shared';
import {
  ALL_SCENARIOS,
  RunLogSink,
  createServiceLogger,
  errorMessage,
  formatDuration,
  systemClock,
  type Clock,
} from '@loadramp/shared';
import type { RunStateStore } from '../stores/run-state-store';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'results-watcher' },
);

export const WATCHER_LOG = 'auto_copy.log';

export interface ResultsWatcherDeps {
  runState: RunStateStore;
  /** Copies the results of a scenario, or of everything when no id is given */
  fetchResults: (target?: string) => Promise<string>;
  log: LogTarget;
  clock?: Clock;
  /** Poll interval for a single scenario (default: 30000) */
  intervalMs?: number;
  /** Poll interval for a suite (default: 120000) */
  suiteIntervalMs?: number;
  /** Copies tried before giving up (default: 5) */
  maxCopyAttempts?: number;
}

export interface WatchResult {
  /** The completion marker was seen */
  completed: boolean;
  copied: boolean;
  localPath: string | null;
  polls: number;
}

export class ResultsWatcher {
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private readonly suiteIntervalMs: number;
  private readonly maxCopyAttempts: number;

  constructor(private readonly deps: ResultsWatcherDeps) {
    this.clock = deps.clock ?? systemClock;
    this.intervalMs = deps.intervalMs ?? 30_000;
    this.suiteIntervalMs = deps.suiteIntervalMs ?? 120_000;
    this.maxCopyAttempts = Math.max(1, deps.maxCopyAttempts ?? 5);
  }

  /**
   * Whether `target` has completed since `launchedAt`
   */
  async isComplete(target: string, launchedAt: Date): Promise<boolean> {
    const finishedAt =
      target === ALL_SCENARIOS
        ? await this.deps.runState.readAllDone()
        : ((await this.deps.runState.readDone(target))?.finishedAt ?? null);
    return finishedAt !== null && finishedAt.getTime() >= launchedAt.getTime();
  }

  /**
   * Poll until `target` completes, the job dies or the signal aborts.
   * Results are copied at most once; a failed copy is retried on the next
   * poll until `maxCopyAttempts` is reached.
   */
  async watch(target: string, launchedAt: Date, signal?: AbortSignal): Promise<WatchResult> {
    const interval = target === ALL_SCENARIOS ? this.suiteIntervalMs : this.intervalMs;
    const sink = new RunLogSink(this.deps.log, { now: () => new Date(this.clock.now()) });
    sink.write(`Watching ${target} (launched ${launchedAt.toISOString()}, every ${formatDuration(interval)})`);

    let polls = 0;
    let attempts = 0;
    let announced = false;
    try {
      while (!signal?.aborted) {
        polls++;
        const completed = await this.isComplete(target, launchedAt);
        const ended = !completed && (await this.deps.runState.resolve()).state === 'finished';

        if (completed || ended) {
          if (ended && !announced) {
            sink.write(`Run of ${target} ended without a completion marker; copying what exists`);
            announced = true;
          }
          attempts++;
          try {
            const localPath = await this.deps.fetchResults(target === ALL_SCENARIOS ? undefined : target);
            sink.write(`Results copied to ${localPath}`);
            logger.info('Results copied', { target, localPath, polls, attempts });
            return { completed, copied: true, localPath, polls };
          } catch (error) {
            sink.write(`Copy attempt ${attempts}/${this.maxCopyAttempts} failed: ${errorMessage(error)}`);
            logger.warn('Results copy failed', { target, attempts, error: errorMessage(error) });
            if (attempts >= this.maxCopyAttempts) {
              sink.write(`Giving up on ${target} after ${attempts} copy attempts`);
              return { completed, copied: false, localPath: null, polls };
            }
          }
        }

        await this.clock.sleep(interval, signal);
      }
      sink.write('Watcher cancelled');
      return { completed: false, copied: false, localPath: null, polls };
    } finally {
      await sink.close();
    }
  }
}

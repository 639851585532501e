/**
 * Suite Sequencer
 * @module @loadramp/core/services/suite-sequencer
 *
 * Runs scenarios strictly one after another. Between two scenarios the load
 * is drained and the backend is given a settle period; a failed scenario is
 * recorded and the suite moves on. An optional soak run at the highest
 * stable size closes the suite.
 */

import type { ScenarioSpec, ScenarioStatus } from '@loadramp/shared';
import {
  RunLogSink,
  ValidationError,
  createServiceLogger,
  errorMessage,
  formatDuration,
  formatValue,
  systemClock,
  type Clock,
} from '@loadramp/shared';
import type { ArtifactStore } from '../stores/artifact-store';
import type { RunStateStore } from '../stores/run-state-store';
import type { LoadController } from './load-controller';
import type { ScenarioRegistry } from './scenario-registry';
import type { ScenarioOutcome, ScenarioRunOptions } from './scenario-runner';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'suite-sequencer' },
);

/** Master log of a suite, relative to the results root */
export const SUITE_LOG = 'run_all.log';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Anything that can run a scenario to its terminal state
 */
export interface ScenarioExecutor {
  run(target: string | ScenarioSpec, options?: ScenarioRunOptions): Promise<ScenarioOutcome>;
}

export interface SuiteSequencerDeps {
  registry: ScenarioRegistry;
  runner: ScenarioExecutor;
  loadController: LoadController;
  runState: RunStateStore;
  store: ArtifactStore;
  clock?: Clock;
  /** Pause after draining, before the next scenario (default: 90000) */
  settleMs?: number;
  /** Default soak duration (default: 6h) */
  soakDurationMs?: number;
  /** Success rate a run must end at to count as stable (default: 95) */
  stableThreshold?: number;
  /** Mirror the master log to stdout */
  echo?: boolean;
}

export interface SuiteRunOptions {
  /** Skip every scenario declared before this one */
  resumeFrom?: string;
  /** Append a soak run at the highest stable size */
  includeSoak?: boolean;
  /** Soak size; defaults to the highest stable size */
  soakSize?: number;
  soakDurationMs?: number;
  /** Leave out scenarios declared as soak runs */
  skipDeclaredSoak?: boolean;
  signal?: AbortSignal;
}

export interface SuiteEntry {
  scenarioId: string;
  loadSize: number;
  status: ScenarioStatus;
  stopReason: string | null;
  finalSuccessPct: number | null;
  elapsedMs: number;
}

export interface SuiteResult {
  entries: SuiteEntry[];
  /** Declared scenarios that were not run */
  skipped: string[];
  highestStableSize: number | null;
  soak: SuiteEntry | null;
  startedAt: Date;
  finishedAt: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Whether a run counts toward the highest stable size
 */
export function isStableRun(entry: SuiteEntry, threshold = 95): boolean {
  return (
    (entry.status === 'completed' || entry.status === 'stopped-early') &&
    entry.finalSuccessPct !== null &&
    entry.finalSuccessPct >= threshold
  );
}

export function highestStableSize(entries: readonly SuiteEntry[], threshold = 95): number | null {
  let highest: number | null = null;
  for (const entry of entries) {
    if (isStableRun(entry, threshold) && (highest === null || entry.loadSize > highest)) {
      highest = entry.loadSize;
    }
  }
  return highest;
}

// ─────────────────────────────────────────────────────────────────────────────
// Suite Sequencer
// ─────────────────────────────────────────────────────────────────────────────

export class SuiteSequencer {
  private readonly clock: Clock;
  private readonly settleMs: number;
  private readonly soakDurationMs: number;
  private readonly stableThreshold: number;

  constructor(private readonly deps: SuiteSequencerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.settleMs = deps.settleMs ?? 90_000;
    this.soakDurationMs = deps.soakDurationMs ?? 6 * 60 * 60 * 1000;
    this.stableThreshold = deps.stableThreshold ?? 95;
  }

  /**
   * Run `scenarioIds` in order
   */
  async runAll(scenarioIds: readonly string[], options: SuiteRunOptions = {}): Promise<SuiteResult> {
    const { registry, runState, store } = this.deps;
    const signal = options.signal;

    const declared = scenarioIds
      .map((id) => registry.require(id))
      .filter((spec) => !(options.skipDeclaredSoak && spec.soak));

    let resumeIndex = 0;
    if (options.resumeFrom !== undefined) {
      resumeIndex = declared.findIndex((spec) => spec.id === options.resumeFrom);
      if (resumeIndex < 0) {
        throw ValidationError.field('resumeFrom', `Scenario ${options.resumeFrom} is not part of this suite`);
      }
    }

    const startedAt = new Date(this.clock.now());
    const sink = new RunLogSink(
      { append: (text) => store.append(SUITE_LOG, text) },
      { echo: this.deps.echo ?? false, now: () => new Date(this.clock.now()) },
    );
    const entries: SuiteEntry[] = [];
    const skipped = declared.slice(0, resumeIndex).map((spec) => spec.id);
    let soak: SuiteEntry | null = null;

    await runState.clearAllDone();

    try {
      sink.writeRaw('='.repeat(60), `Suite started: ${startedAt.toISOString()}`, '='.repeat(60));
      sink.write(`Scenarios: ${declared.map((spec) => spec.id).join(', ')}`);
      if (skipped.length > 0) {
        sink.write(`Resuming from ${options.resumeFrom}; skipping ${skipped.join(', ')}`);
        logger.info('Resuming suite', { resumeFrom: options.resumeFrom, skipped });
      }

      for (let index = resumeIndex; index < declared.length; index++) {
        const spec = declared[index];
        if (!spec) continue;
        if (signal?.aborted) {
          skipped.push(...declared.slice(index).map((remaining) => remaining.id));
          break;
        }

        const previous = declared[index - 1];
        if (previous) {
          await this.drainAndSettle(previous, sink, signal);
          if (signal?.aborted) {
            skipped.push(...declared.slice(index).map((remaining) => remaining.id));
            break;
          }
        }

        entries.push(await this.runOne(spec, sink, signal));
      }

      const highest = highestStableSize(entries, this.stableThreshold);
      if (options.includeSoak && !signal?.aborted) {
        const last = declared[declared.length - 1];
        if (highest === null) {
          sink.write('No scenario reached a stable success rate; soak skipped');
        } else if (last) {
          await this.drainAndSettle(last, sink, signal);
          if (!signal?.aborted) {
            const soakSpec = registry.soak(options.soakSize ?? highest, options.soakDurationMs ?? this.soakDurationMs);
            soak = await this.runOne(soakSpec, sink, signal);
          }
        }
      }

      const finishedAt = new Date(this.clock.now());
      sink.writeRaw(
        '='.repeat(60),
        `Suite finished: ${finishedAt.toISOString()}`,
        `Total time: ${formatDuration(finishedAt.getTime() - startedAt.getTime())}`,
        `Highest stable N: ${highest ?? 'none'}`,
        '='.repeat(60),
      );
      return { entries, skipped, highestStableSize: highest, soak, startedAt, finishedAt };
    } finally {
      await runState.markAllDone(new Date(this.clock.now()));
      await sink.close();
    }
  }

  private async runOne(spec: ScenarioSpec, sink: RunLogSink, signal?: AbortSignal): Promise<SuiteEntry> {
    const begin = this.clock.now();
    sink.writeRaw('', `>>> ${spec.id}: ${spec.purpose} (N=${spec.loadSize}, ${formatDuration(spec.durationMs)})`);
    sink.write(`Starting ${spec.id}`);

    let entry: SuiteEntry;
    try {
      const outcome = await this.deps.runner.run(spec, { signal });
      entry = {
        scenarioId: spec.id,
        loadSize: spec.loadSize,
        status: outcome.status,
        stopReason: outcome.stopReason,
        finalSuccessPct: outcome.finalSuccessPct,
        elapsedMs: this.clock.now() - begin,
      };
    } catch (error) {
      logger.error('Scenario could not run', error instanceof Error ? error : undefined, { scenarioId: spec.id });
      entry = {
        scenarioId: spec.id,
        loadSize: spec.loadSize,
        status: 'failed',
        stopReason: errorMessage(error),
        finalSuccessPct: null,
        elapsedMs: this.clock.now() - begin,
      };
    }

    const minutes = (entry.elapsedMs / 60_000).toFixed(1);
    const reason = entry.stopReason ? ` (${entry.stopReason})` : '';
    sink.write(
      `Finished ${spec.id}: ${entry.status}${reason} in ${minutes} min, final success ${formatValue(entry.finalSuccessPct, 1)}%`,
    );
    return entry;
  }

  private async drainAndSettle(previous: ScenarioSpec, sink: RunLogSink, signal?: AbortSignal): Promise<void> {
    const drained = await this.deps.loadController.drain(previous);
    if (drained.success) {
      sink.write(`Load drained; settling for ${formatDuration(this.settleMs)}`);
    } else {
      const message = drained.error?.message ?? 'unknown error';
      logger.warn('Drain failed', { scenarioId: previous.id, error: message });
      sink.write(`Drain failed: ${message}; settling for ${formatDuration(this.settleMs)}`);
    }
    await this.clock.sleep(this.settleMs, signal);
  }
}

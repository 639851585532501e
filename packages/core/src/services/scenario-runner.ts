/**
 * Scenario Runner
 * @module @loadramp/core/services/scenario-runner
 *
 * Executes one scenario through Init → Converging → Collecting →
 * Finalized. Finalization runs exactly once whatever ends the collection
 * loop (duration reached, stop rule, cancellation, error): the monitor is
 * stopped, the summary is written, then DONE, then the RUNNING marker is
 * released.
 */

import { EventEmitter } from 'events';
import type { ResultsRow, ScenarioSpec, ScenarioStatus, Summary } from '@loadramp/shared';
import {
  ErrorCode,
  LoadRampError,
  RunError,
  createServiceLogger,
  errorMessage,
  formatDuration,
  systemClock,
  type Clock,
} from '@loadramp/shared';
import type { MetricProfile } from '../models/metric-profile';
import type { ArtifactStore } from '../stores/artifact-store';
import { ResultsBundle, type RecordedOutcome } from '../stores/results-bundle';
import type { RunStateStore } from '../stores/run-state-store';
import type { HealthMonitor, MonitorHandle } from './health-monitor';
import type { LoadController } from './load-controller';
import type { MetricPoller } from './metric-poller';
import type { ScenarioRegistry } from './scenario-registry';
import { StopRuleEvaluator, type StopRuleOptions } from './stop-rule';
import { renderSummary, summarize } from './summary-report';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'scenario-runner' },
);

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type RunPhase = 'init' | 'converging' | 'collecting' | 'finalizing' | 'finalized';

export interface ConvergenceOptions {
  /** Longest wait for discovery (default: 180000) */
  timeoutMs?: number;
  /** Delay between discovery checks (default: 10000) */
  stepMs?: number;
}

export interface ConvergenceResult {
  expected: number;
  discovered: number;
  waitedMs: number;
  timedOut: boolean;
  /** No discovery applies to this scenario */
  skipped: boolean;
}

export interface ScenarioRunnerDeps {
  registry: ScenarioRegistry;
  loadController: LoadController;
  metricPoller: MetricPoller;
  healthMonitor: HealthMonitor;
  runState: RunStateStore;
  store: ArtifactStore;
  profileFor: (spec: ScenarioSpec) => MetricProfile;
  clock?: Clock;
  /** Process id recorded in the RUNNING marker */
  pid?: number;
  stopRule?: StopRuleOptions;
  convergence?: ConvergenceOptions;
}

export interface ScenarioRunOptions {
  signal?: AbortSignal;
}

export interface ScenarioOutcome {
  scenarioId: string;
  loadSize: number;
  status: ScenarioStatus;
  stopReason: string | null;
  startedAt: Date;
  finishedAt: Date;
  convergence: ConvergenceResult | null;
  /** Last present success rate of the run */
  finalSuccessPct: number | null;
  summary: Summary;
}

interface CollectResult {
  status: ScenarioStatus;
  stopReason: string | null;
}

const CANCELLED_REASON = 'Cancelled by operator';

// ─────────────────────────────────────────────────────────────────────────────
// Scenario Runner
// ─────────────────────────────────────────────────────────────────────────────

export class ScenarioRunner extends EventEmitter {
  private readonly deps: ScenarioRunnerDeps;
  private readonly clock: Clock;
  private readonly pid: number;
  private readonly convergenceTimeoutMs: number;
  private readonly convergenceStepMs: number;

  constructor(deps: ScenarioRunnerDeps) {
    super();
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.pid = deps.pid ?? process.pid;
    this.convergenceTimeoutMs = deps.convergence?.timeoutMs ?? 180_000;
    this.convergenceStepMs = deps.convergence?.stepMs ?? 10_000;
  }

  private setPhase(scenarioId: string, phase: RunPhase): void {
    logger.debug('Phase', { scenarioId, phase });
    this.emit('phase', { scenarioId, phase });
  }

  private warn(scenarioId: string, message: string): void {
    logger.warn(message, { scenarioId });
    this.emit('warning', { scenarioId, message });
  }

  /**
   * Run a scenario to its terminal state
   */
  async run(target: string | ScenarioSpec, options: ScenarioRunOptions = {}): Promise<ScenarioOutcome> {
    const { registry, runState, store, loadController, healthMonitor } = this.deps;
    const spec = typeof target === 'string' ? registry.require(target) : target;
    const signal = options.signal;
    const scope = { scenarioId: spec.id };
    const startedAt = new Date(this.clock.now());

    await runState.claim(scope, { scenarioId: spec.id, pid: this.pid, startedAt });
    logger.info('Scenario started', {
      scenarioId: spec.id,
      loadSize: spec.loadSize,
      duration: formatDuration(spec.durationMs),
    });

    const bundle = new ResultsBundle(store, spec.id);
    const profile = this.deps.profileFor(spec);
    let monitor: MonitorHandle | null = null;
    let convergence: ConvergenceResult | null = null;
    let result: CollectResult;

    try {
      this.setPhase(spec.id, 'init');
      await runState.clearDone(spec.id);
      await bundle.reset();
      monitor = await healthMonitor.start(spec.id, bundle);

      this.setPhase(spec.id, 'converging');
      const applied = await loadController.setLoad(spec.loadSize, spec);
      if (!applied.success) {
        throw RunError.applyFailed(spec.loadSize, new Error(applied.error?.message ?? 'unknown error'));
      }
      convergence = await this.converge(spec, profile, signal);

      this.setPhase(spec.id, 'collecting');
      result = await this.collect(spec, profile, bundle, signal);
    } catch (error) {
      if (signal?.aborted) {
        result = { status: 'cancelled', stopReason: CANCELLED_REASON };
      } else {
        logger.error('Scenario failed', error instanceof Error ? error : undefined, { scenarioId: spec.id });
        result = { status: 'failed', stopReason: errorMessage(error) };
      }
    }

    try {
      this.setPhase(spec.id, 'finalizing');
      const outcome = await this.finalize(spec, bundle, monitor, { ...result, startedAt }, convergence);
      this.setPhase(spec.id, 'finalized');
      return outcome;
    } finally {
      await runState.release(scope, this.pid);
    }
  }

  /**
   * Wait until the backend has discovered the applied load, bounded by the
   * convergence timeout. A timeout is a warning, not a failure.
   */
  async converge(spec: ScenarioSpec, profile: MetricProfile, signal?: AbortSignal): Promise<ConvergenceResult> {
    const expected = this.deps.registry.expectedTargets(spec);
    const expression = profile.discoveryExpression;
    if (!expression || expected === 0) {
      return { expected, discovered: 0, waitedMs: 0, timedOut: false, skipped: true };
    }

    const begin = this.clock.now();
    for (;;) {
      const discovered = await this.deps.metricPoller.countDiscovered(expression);
      const waitedMs = this.clock.now() - begin;
      if (discovered >= expected) {
        logger.info('Load converged', { scenarioId: spec.id, discovered, expected, waitedMs });
        return { expected, discovered, waitedMs, timedOut: false, skipped: false };
      }
      if (waitedMs >= this.convergenceTimeoutMs) {
        this.warn(
          spec.id,
          `Convergence timed out after ${formatDuration(waitedMs)}: ${discovered}/${expected} targets discovered`,
        );
        return { expected, discovered, waitedMs, timedOut: true, skipped: false };
      }
      await this.clock.sleep(Math.min(this.convergenceStepMs, this.convergenceTimeoutMs - waitedMs), signal);
      if (signal?.aborted) {
        throw RunError.cancelled(spec.id);
      }
    }
  }

  private async collect(
    spec: ScenarioSpec,
    profile: MetricProfile,
    bundle: ResultsBundle,
    signal?: AbortSignal,
  ): Promise<CollectResult> {
    const stopRule = new StopRuleEvaluator(this.deps.stopRule);
    const begin = this.clock.now();

    for (;;) {
      await this.clock.sleep(spec.pollIntervalMs, signal);
      if (signal?.aborted) {
        return { status: 'cancelled', stopReason: CANCELLED_REASON };
      }

      const row: ResultsRow = await this.deps.metricPoller.poll(profile, bundle);
      this.emit('row', { scenarioId: spec.id, row });

      const decision = stopRule.evaluate(row, await bundle.latestHealthRow());
      for (const warning of decision.warnings) {
        this.warn(spec.id, warning);
      }
      if (decision.action === 'stop') {
        logger.warn('Stop rule triggered', { scenarioId: spec.id, reason: decision.reason });
        return { status: 'stopped-early', stopReason: decision.reason };
      }
      if (this.clock.now() - begin >= spec.durationMs) {
        return { status: 'completed', stopReason: null };
      }
    }
  }

  private async finalize(
    spec: ScenarioSpec,
    bundle: ResultsBundle,
    monitor: MonitorHandle | null,
    result: CollectResult & { startedAt: Date },
    convergence: ConvergenceResult | null,
  ): Promise<ScenarioOutcome> {
    if (monitor) {
      try {
        await this.deps.healthMonitor.stop(monitor);
      } catch (error) {
        logger.error('Health monitor did not stop cleanly', error instanceof Error ? error : undefined, {
          scenarioId: spec.id,
        });
      }
    }
    await this.deps.loadController.stop();

    const finishedAt = new Date(this.clock.now());
    const recorded: RecordedOutcome = {
      status: result.status,
      stopReason: result.stopReason,
      startedAt: result.startedAt,
      finishedAt,
    };
    await bundle.writeOutcome(recorded);
    const summary = await this.writeSummary(spec, bundle, recorded);
    await this.deps.runState.markDone(spec.id, finishedAt);

    logger.info('Scenario finished', {
      scenarioId: spec.id,
      status: result.status,
      dataPoints: summary.dataPoints,
      elapsed: formatDuration(summary.actualDurationMs),
    });

    return {
      scenarioId: spec.id,
      loadSize: spec.loadSize,
      status: result.status,
      stopReason: result.stopReason,
      startedAt: result.startedAt,
      finishedAt,
      convergence,
      finalSuccessPct: summary.successPct.last,
      summary,
    };
  }

  private async writeSummary(spec: ScenarioSpec, bundle: ResultsBundle, recorded: RecordedOutcome): Promise<Summary> {
    const summary = summarize(await bundle.readResultsRows(), await bundle.readHealthRows(), {
      spec,
      expectedTargets: this.deps.registry.expectedTargets(spec),
      status: recorded.status,
      stopReason: recorded.stopReason,
      startedAt: recorded.startedAt,
      finishedAt: recorded.finishedAt,
      generatedAt: new Date(this.clock.now()),
    });
    await bundle.writeSummary(renderSummary(summary));
    return summary;
  }

  /**
   * Rebuild the summary and DONE marker of a finished scenario from its
   * recorded outcome and current tables
   */
  async refinalize(target: string | ScenarioSpec): Promise<Summary> {
    const spec = typeof target === 'string' ? this.deps.registry.require(target) : target;
    const bundle = new ResultsBundle(this.deps.store, spec.id);
    const recorded = await bundle.readOutcome();
    if (!recorded) {
      throw new LoadRampError(`No recorded outcome for ${spec.id}`, ErrorCode.NOT_FOUND, { scenarioId: spec.id });
    }
    const summary = await this.writeSummary(spec, bundle, recorded);
    await this.deps.runState.markDone(spec.id, recorded.finishedAt);
    return summary;
  }
}

/**
 * Detached Execution Controller
 * @module @loadramp/core/services/detached-controller
 *
 * Launches scenarios (or the whole suite) on an execution host so they
 * outlive the operator's session, and reports on them afterwards. All
 * state lives in marker artifacts on the host; `status()` derives it
 * from those markers and a liveness check on the recorded pid.
 */

import path from 'path';
import type { IExecutionHost, IWatcherLauncher, RunState } from '@loadramp/shared';
import {
  ALL_SCENARIOS,
  ErrorCode,
  LoadRampError,
  RunError,
  SOAK_SCENARIO_ID,
  ValidationError,
  createServiceLogger,
  errorMessage,
  systemClock,
  validateSoakInput,
  type Clock,
} from '@loadramp/shared';
import type { SuiteName } from '../models/scenario-catalog';
import { joinArtifactPath } from '../stores/artifact-store';
import { HostArtifactStore } from '../stores/host-artifact-store';
import { BUNDLE_FILES } from '../stores/results-bundle';
import { RunStateStore } from '../stores/run-state-store';
import type { ScenarioRegistry } from './scenario-registry';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'detached-controller' },
);

/** Output of a detached suite, relative to the results root */
export const SUITE_OUTPUT_LOG = 'run_all_output.log';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LaunchOptions {
  /** Run in the background (default: true) */
  detach?: boolean;
  suite?: SuiteName;
  resumeFrom?: string;
  withSoak?: boolean;
  skipSoak?: boolean;
  /** Soak size and duration when the target is the soak scenario */
  soakSize?: number;
  soakDurationMs?: number;
}

export interface LaunchResult {
  target: string;
  detached: boolean;
  /** Pid of the job on the host; null for attached runs */
  pid: number | null;
  /** Pid of the local results watcher, when one was started */
  watcherPid: number | null;
  logPath: string;
  /** Exit code of an attached run */
  exitCode: number | null;
}

export interface DetachedControllerDeps {
  host: IExecutionHost;
  registry: ScenarioRegistry;
  watcher: IWatcherLauncher;
  /** Local directory results are copied into */
  localResultsDir: string;
  clock?: Clock;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Where the output of a launched target is written on the host
 */
export function logPathFor(target: string): string {
  return target === ALL_SCENARIOS ? SUITE_OUTPUT_LOG : joinArtifactPath(target, BUNDLE_FILES.runLog);
}

/**
 * Arguments of the hidden `job` command that runs `target` on the host
 */
export function jobArgs(target: string, options: LaunchOptions = {}): string[] {
  const args = ['job', target];
  if (options.suite) args.push('--suite', options.suite);
  if (options.resumeFrom) args.push('--from', options.resumeFrom);
  if (options.withSoak) args.push('--with-soak');
  if (options.skipSoak) args.push('--skip-soak');
  if (options.soakSize !== undefined) args.push('--size', String(options.soakSize));
  if (options.soakDurationMs !== undefined) args.push('--duration', `${Math.round(options.soakDurationMs / 1000)}s`);
  return args;
}

// ─────────────────────────────────────────────────────────────────────────────
// Detached Controller
// ─────────────────────────────────────────────────────────────────────────────

export class DetachedController {
  readonly runState: RunStateStore;
  private readonly host: IExecutionHost;
  private readonly clock: Clock;

  constructor(private readonly deps: DetachedControllerDeps) {
    this.host = deps.host;
    this.clock = deps.clock ?? systemClock;
    this.runState = new RunStateStore(new HostArtifactStore(deps.host), (pid) => deps.host.isAlive(pid));
  }

  /**
   * Reject targets that are neither a scenario, the soak overlay nor ALL
   */
  validateTarget(target: string, options: LaunchOptions = {}): void {
    if (target === ALL_SCENARIOS) return;
    if (target === SOAK_SCENARIO_ID) {
      const report = validateSoakInput(options.soakSize, options.soakDurationMs);
      if (!report.valid) {
        throw ValidationError.multiple(
          report.errors.map((issue) => ({ field: issue.field, message: issue.message, rule: issue.code })),
        );
      }
      return;
    }
    this.deps.registry.require(target);
  }

  private async ensureHost(): Promise<void> {
    try {
      await this.host.ensureReady();
    } catch (error) {
      throw RunError.hostUnavailable(this.host.name, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Start `target` on the host. Detached launches return once the job is
   * running and the watcher is started; attached launches stream output,
   * then copy results.
   */
  async launch(target: string, options: LaunchOptions = {}): Promise<LaunchResult> {
    this.validateTarget(target, options);
    await this.ensureHost();

    const current = await this.runState.resolve();
    if (current.state === 'running') {
      throw RunError.alreadyRunning(current.scenarioId, current.pid);
    }

    const args = jobArgs(target, options);
    const logPath = logPathFor(target);

    if (options.detach === false) {
      logger.info('Running attached', { target, host: this.host.name });
      const exitCode = await this.host.runAttached(args);
      await this.fetchResults(target === ALL_SCENARIOS ? undefined : target);
      return { target, detached: false, pid: null, watcherPid: null, logPath, exitCode };
    }

    const launchedAt = new Date(this.clock.now());
    await this.runState.claim('host', { scenarioId: target, pid: null, startedAt: launchedAt });

    let pid: number;
    try {
      pid = await this.host.spawnDetached(args, logPath);
    } catch (error) {
      await this.runState.release('host');
      throw RunError.hostCommandFailed(this.host.name, args.join(' '), errorMessage(error));
    }
    await this.runState.bind('host', pid);
    logger.info('Launched detached run', { target, pid, host: this.host.name });

    const watcherPid = await this.deps.watcher.launch(target, launchedAt);
    return { target, detached: true, pid, watcherPid, logPath, exitCode: null };
  }

  status(): Promise<RunState> {
    return this.runState.resolve();
  }

  /**
   * Follow the output of `target`, or of whatever the host is running
   */
  async followLogs(target?: string, signal?: AbortSignal): Promise<void> {
    let resolved = target;
    if (resolved === undefined) {
      const marker = await this.runState.readMarker('host');
      resolved = marker?.scenarioId ?? ALL_SCENARIOS;
    }
    await this.host.followFile(logPathFor(resolved), signal);
  }

  /**
   * Copy one scenario's folder, or the whole results root, to the local
   * results directory. Returns the local path written.
   */
  async fetchResults(target?: string): Promise<string> {
    const remote = target ?? '';
    const local = target ? path.join(this.deps.localResultsDir, target) : this.deps.localResultsDir;
    try {
      await this.host.copyDirectory(remote, local);
    } catch (error) {
      throw new LoadRampError(
        `Failed to copy results${target ? ` of ${target}` : ''}: ${errorMessage(error)}`,
        ErrorCode.RESULTS_COPY_FAILED,
        { target: target ?? ALL_SCENARIOS },
        error instanceof Error ? error : undefined,
      );
    }
    logger.info('Results copied', { target: target ?? ALL_SCENARIOS, local });
    return local;
  }

  openShell(): Promise<void> {
    return this.host.openShell();
  }

  /**
   * Tear down the host. Refuses while a run is live unless forced.
   */
  async cleanup(force = false): Promise<void> {
    const current = await this.runState.resolve();
    if (current.state === 'running' && !force) {
      throw RunError.alreadyRunning(current.scenarioId, current.pid);
    }
    await this.host.destroy();
    logger.info('Host removed', { host: this.host.name });
  }
}

/**
 * Detached job
 * @module @loadramp/core/services/detached-job
 *
 * Body of a launch on the execution host: holds the host RUNNING marker
 * for its own pid while a scenario or the suite runs, and releases it
 * however the run ends.
 */

import type { ScenarioStatus } from '@loadramp/shared';
import { ALL_SCENARIOS, SOAK_SCENARIO_ID, createServiceLogger, systemClock, type Clock } from '@loadramp/shared';
import { SUITES, type SuiteName } from '../models/scenario-catalog';
import type { RunStateStore } from '../stores/run-state-store';
import type { ScenarioRegistry } from './scenario-registry';
import type { ScenarioExecutor, SuiteSequencer } from './suite-sequencer';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'detached-job' },
);

export interface DetachedJobDeps {
  registry: ScenarioRegistry;
  runner: ScenarioExecutor;
  sequencer: Pick<SuiteSequencer, 'runAll'>;
  runState: RunStateStore;
  clock?: Clock;
  pid?: number;
  /** Pid of the launcher; the host marker it was bound to is taken over */
  parentPid?: number;
}

export interface DetachedJobOptions {
  suite?: SuiteName;
  resumeFrom?: string;
  withSoak?: boolean;
  skipSoak?: boolean;
  soakSize?: number;
  soakDurationMs?: number;
  signal?: AbortSignal;
}

/**
 * Exit code of a finished scenario
 */
export function exitCodeForStatus(status: ScenarioStatus): number {
  switch (status) {
    case 'completed':
    case 'stopped-early':
      return 0;
    case 'cancelled':
      return 130;
    case 'failed':
      return 1;
  }
}

/**
 * Run `target` under the host marker. Resolves with the process exit code.
 */
export async function runDetachedJob(
  target: string,
  options: DetachedJobOptions,
  deps: DetachedJobDeps,
): Promise<number> {
  const clock = deps.clock ?? systemClock;
  const pid = deps.pid ?? process.pid;
  const parentPid = deps.parentPid ?? process.ppid;

  await deps.runState.claim('host', { scenarioId: target, pid, startedAt: new Date(clock.now()) }, parentPid);
  logger.info('Job started', { target, pid });

  try {
    if (target === ALL_SCENARIOS) {
      const result = await deps.sequencer.runAll(SUITES[options.suite ?? 'scrape'], {
        resumeFrom: options.resumeFrom,
        includeSoak: options.withSoak,
        soakSize: options.soakSize,
        soakDurationMs: options.soakDurationMs,
        skipDeclaredSoak: options.skipSoak,
        signal: options.signal,
      });
      if (options.signal?.aborted) return 130;
      return result.entries.some((entry) => entry.status === 'failed') ? 1 : 0;
    }

    const spec =
      target === SOAK_SCENARIO_ID
        ? deps.registry.soak(options.soakSize ?? -1, options.soakDurationMs ?? 0)
        : deps.registry.require(target);
    const outcome = await deps.runner.run(spec, { signal: options.signal });
    return exitCodeForStatus(outcome.status);
  } finally {
    await deps.runState.release('host', pid);
    logger.info('Job finished', { target, pid });
  }
}

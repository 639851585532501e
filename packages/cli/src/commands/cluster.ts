/**
 * Cluster Commands
 *
 * Detached execution on the runner host: launch, status, logs, results,
 * shell, cleanup and the background results watcher
 * @module @loadramp/cli/commands/cluster
 */

import { Command } from 'commander';
import { DETACHED_SIGNALS, ValidationError, createShutdownController, type RunState } from '@loadramp/shared';
import type { CliContext } from '../context.js';
import { getOutputFormat, info, keyValue, output, statusBadge, success, warn } from '../output.js';
import { parseSuiteFlags, type SuiteFlags } from './args.js';

interface LaunchFlags extends SuiteFlags {
  attach?: boolean;
}

/**
 * Key-value view of a run state
 */
export function describeRunState(state: RunState): Record<string, unknown> {
  switch (state.state) {
    case 'idle':
      return { State: statusBadge('idle') };
    case 'running':
      return { State: statusBadge('running'), Scenario: state.scenarioId, PID: state.pid, Started: state.startedAt };
    case 'finished':
      return {
        State: statusBadge('finished'),
        Scenario: state.scenarioId,
        PID: state.pid,
        Started: state.startedAt,
        Note: 'process ended without a completion marker',
      };
    case 'done':
      return { State: statusBadge('done'), Scenario: state.scenarioId, Finished: state.finishedAt };
  }
}

export function parseSince(text: string): Date {
  const since = new Date(text);
  if (Number.isNaN(since.getTime())) {
    throw ValidationError.invalidFormat('since', 'an ISO timestamp', text);
  }
  return since;
}

async function launchHandler(context: CliContext, target: string, flags: LaunchFlags): Promise<void> {
  const result = await context.detached().launch(target, { ...parseSuiteFlags(flags), detach: !flags.attach });

  if (!result.detached) {
    process.exitCode = result.exitCode ?? 1;
    return;
  }

  if (getOutputFormat() === 'json') {
    output(result);
    return;
  }
  success(`Launched ${result.target} (pid ${result.pid ?? 'unknown'})`);
  info(`Output: ${result.logPath}`);
  if (result.watcherPid === null) {
    warn('Results watcher did not start; fetch results with `loadramp cluster results`');
  } else {
    info(`Results watcher pid ${result.watcherPid}`);
  }
}

export function createClusterCommand(getContext: () => CliContext): Command {
  const cluster = new Command('cluster').description('Run scenarios detached on the runner host');

  cluster
    .command('launch <target>')
    .description('Start a scenario id, R5 or ALL on the host')
    .option('--attach', 'Stream output and wait instead of detaching')
    .option('-s, --suite <name>', 'Suite run by ALL: scrape or push')
    .option('--from <id>', 'Resume ALL from this scenario')
    .option('--with-soak', 'Append a soak run to ALL')
    .option('--skip-soak', 'Leave declared soak scenarios out of ALL')
    .option('--size <n>', 'Soak size')
    .option('--duration <duration>', 'Soak duration')
    .action((target: string, flags: LaunchFlags) => launchHandler(getContext(), target, flags));

  cluster
    .command('status')
    .description('Show what the host is running')
    .action(async () => {
      const state = await getContext().detached().status();
      if (getOutputFormat() === 'json') {
        output(state);
      } else {
        keyValue(describeRunState(state));
      }
    });

  cluster
    .command('logs [target]')
    .description('Follow the output of a scenario, ALL, or the current run')
    .action(async (target: string | undefined) => {
      const shutdown = createShutdownController();
      const unbind = shutdown.bindProcessSignals();
      try {
        await getContext().detached().followLogs(target, shutdown.signal);
      } finally {
        unbind();
      }
    });

  cluster
    .command('results [target]')
    .description('Copy results of one scenario, or all of them, from the host')
    .action(async (target: string | undefined) => {
      const localPath = await getContext().detached().fetchResults(target);
      success(`Results copied to ${localPath}`);
    });

  cluster
    .command('shell')
    .description('Open an interactive shell on the host')
    .action(() => getContext().detached().openShell());

  cluster
    .command('cleanup')
    .description('Remove the runner host')
    .option('-f, --force', 'Remove it even while a run is active')
    .action(async (flags: { force?: boolean }) => {
      await getContext().detached().cleanup(flags.force ?? false);
      success('Host removed');
    });

  cluster
    .command('watch <target>', { hidden: true })
    .description('Copy results once a launched target completes')
    .requiredOption('--since <timestamp>', 'Launch time of the target')
    .action(async (target: string, flags: { since: string }) => {
      const shutdown = createShutdownController();
      const unbind = shutdown.bindProcessSignals(DETACHED_SIGNALS);
      try {
        const result = await getContext().watcher().watch(target, parseSince(flags.since), shutdown.signal);
        process.exitCode = result.copied ? 0 : shutdown.signal.aborted ? 130 : 1;
      } finally {
        unbind();
      }
    });

  return cluster;
}

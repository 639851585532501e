/**
 * Job Command
 *
 * Entry point of a detached run on the host. Not meant to be typed by hand.
 * @module @loadramp/cli/commands/job
 */

import { Command } from 'commander';
import { runDetachedJob } from '@loadramp/core';
import { DETACHED_SIGNALS, createShutdownController } from '@loadramp/shared';
import type { CliContext } from '../context.js';
import { parseSuiteFlags, type SuiteFlags } from './args.js';

export function createJobCommand(getContext: () => CliContext): Command {
  return new Command('job')
    .description('Run a target under the host marker')
    .argument('<target>', 'Scenario id, R5 or ALL')
    .option('-s, --suite <name>', 'Suite run by ALL')
    .option('--from <id>', 'Resume ALL from this scenario')
    .option('--with-soak', 'Append a soak run to ALL')
    .option('--skip-soak', 'Leave declared soak scenarios out of ALL')
    .option('--size <n>', 'Soak size')
    .option('--duration <duration>', 'Soak duration')
    .action(async (target: string, flags: SuiteFlags) => {
      const context = getContext();
      const shutdown = createShutdownController();
      const unbind = shutdown.bindProcessSignals(DETACHED_SIGNALS);
      try {
        process.exitCode = await runDetachedJob(
          target,
          { ...parseSuiteFlags(flags), signal: shutdown.signal },
          {
            registry: context.registry,
            runner: context.runner,
            sequencer: context.sequencer,
            runState: context.runState,
          },
        );
      } finally {
        unbind();
      }
    });
}

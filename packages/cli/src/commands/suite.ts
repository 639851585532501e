/**
 * Suite Command
 *
 * Runs a whole suite in the foreground
 * @module @loadramp/cli/commands/suite
 */

import { Command } from 'commander';
import { SUITES, type SuiteEntry, type SuiteResult } from '@loadramp/core';
import { createShutdownController, formatValue } from '@loadramp/shared';
import type { CliContext } from '../context.js';
import { getOutputFormat, info, output, table } from '../output.js';
import { parseSuiteFlags, type SuiteFlags } from './args.js';

function entryRow(entry: SuiteEntry): Record<string, string | number> {
  return {
    scenario: entry.scenarioId,
    load: entry.loadSize,
    status: entry.status,
    final: formatValue(entry.finalSuccessPct, 1),
    minutes: (entry.elapsedMs / 60_000).toFixed(1),
    reason: entry.stopReason ?? '',
  };
}

/**
 * Exit code of a suite: 130 when interrupted, 1 when any run failed
 */
export function suiteExitCode(result: SuiteResult, interrupted: boolean): number {
  if (interrupted) return 130;
  return result.entries.some((entry) => entry.status === 'failed') ? 1 : 0;
}

export function createSuiteCommand(getContext: () => CliContext): Command {
  return new Command('suite')
    .description('Run every scenario of a suite in declared order')
    .option('-s, --suite <name>', 'Suite to run: scrape or push', 'scrape')
    .option('--from <id>', 'Resume from this scenario')
    .option('--with-soak', 'Append a soak run at the highest stable size')
    .option('--skip-soak', 'Leave out scenarios declared as soak runs')
    .option('--size <n>', 'Soak size (default: highest stable size)')
    .option('--duration <duration>', 'Soak duration')
    .action(async (flags: SuiteFlags) => {
      const context = getContext();
      const parsed = parseSuiteFlags(flags);
      const shutdown = createShutdownController();
      const unbind = shutdown.bindProcessSignals();

      info(`Running suite ${parsed.suite ?? 'scrape'}`);
      let result: SuiteResult;
      try {
        result = await context.sequencer.runAll(SUITES[parsed.suite ?? 'scrape'], {
          resumeFrom: parsed.resumeFrom,
          includeSoak: parsed.withSoak,
          soakSize: parsed.soakSize,
          soakDurationMs: parsed.soakDurationMs,
          skipDeclaredSoak: parsed.skipSoak,
          signal: shutdown.signal,
        });
      } finally {
        unbind();
      }

      if (getOutputFormat() === 'json') {
        output(result);
      } else {
        const rows = [...result.entries, ...(result.soak ? [result.soak] : [])].map(entryRow);
        table(rows, [
          { key: 'scenario', header: 'Scenario' },
          { key: 'load', header: 'Load' },
          { key: 'status', header: 'Status' },
          { key: 'final', header: 'Final %' },
          { key: 'minutes', header: 'Minutes' },
          { key: 'reason', header: 'Stop reason' },
        ]);
        info(`Highest stable size: ${result.highestStableSize ?? 'none'}`);
      }
      process.exitCode = suiteExitCode(result, shutdown.isShutdownRequested());
    });
}

/**
 * Run Commands
 *
 * Runs one scenario, or a soak run, in the foreground
 * @module @loadramp/cli/commands/run
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { exitCodeForStatus, renderSummary, type ScenarioOutcome, type RunPhase } from '@loadramp/core';
import { createShutdownController, formatValue, type ResultsRow, type ScenarioSpec } from '@loadramp/shared';
import type { CliContext } from '../context.js';
import { getOutputFormat, info, output, statusBadge, warn } from '../output.js';
import { parseDurationArg, parseSize } from './args.js';

/**
 * One progress line per collected sample
 */
export function formatProgressRow(row: ResultsRow): string {
  const { values } = row;
  return [
    row.timestamp.toISOString(),
    `success ${formatValue(values.success_pct, 1)}%`,
    `up ${formatValue(values.targets_up, 0)}/${formatValue(values.targets_discovered, 0)}`,
    `p95 ${formatValue(values.latency_p95, 4)}s`,
  ].join('  ');
}

/**
 * Runs `spec` until it reaches a terminal state or the process is interrupted
 */
export async function runForeground(context: CliContext, spec: ScenarioSpec): Promise<ScenarioOutcome> {
  const { runner } = context;
  const shutdown = createShutdownController();
  const unbind = shutdown.bindProcessSignals();

  const onPhase = ({ phase }: { phase: RunPhase }): void => info(`${spec.id}: ${phase}`);
  const onWarning = ({ message }: { message: string }): void => warn(`${spec.id}: ${message}`);
  const onRow = ({ row }: { row: ResultsRow }): void => {
    if (getOutputFormat() !== 'json') {
      console.log(chalk.gray(formatProgressRow(row)));
    }
  };

  runner.on('phase', onPhase);
  runner.on('warning', onWarning);
  runner.on('row', onRow);
  try {
    return await runner.run(spec, { signal: shutdown.signal });
  } finally {
    runner.off('phase', onPhase);
    runner.off('warning', onWarning);
    runner.off('row', onRow);
    unbind();
  }
}

function report(outcome: ScenarioOutcome): void {
  if (getOutputFormat() === 'json') {
    output(outcome);
  } else {
    console.log(`${outcome.scenarioId}: ${statusBadge(outcome.status)}`);
    output(renderSummary(outcome.summary));
  }
  process.exitCode = exitCodeForStatus(outcome.status);
}

export function createRunCommand(getContext: () => CliContext): Command {
  return new Command('run')
    .description('Run one scenario in the foreground')
    .argument('<id>', 'Scenario id, e.g. R2 or C3')
    .action(async (id: string) => {
      const context = getContext();
      report(await runForeground(context, context.registry.require(id)));
    });
}

export function createSoakCommand(getContext: () => CliContext): Command {
  return new Command('soak')
    .description('Hold a custom load size for a long duration')
    .argument('<size>', 'Number of synthetic nodes')
    .argument('<duration>', 'Duration such as 6h or 90m')
    .action(async (sizeText: string, durationText: string) => {
      const context = getContext();
      const spec = context.registry.soak(parseSize(sizeText), parseDurationArg(durationText));
      report(await runForeground(context, spec));
    });
}

export function createFinalizeCommand(getContext: () => CliContext): Command {
  return new Command('finalize')
    .description('Rebuild the summary and DONE marker of a finished scenario')
    .argument('<id>', 'Scenario id')
    .action(async (id: string) => {
      const summary = await getContext().runner.refinalize(id);
      output(getOutputFormat() === 'json' ? summary : renderSummary(summary));
    });
}

/**
 * Scenario Commands
 *
 * Catalog browsing: list, describe, suites
 * @module @loadramp/cli/commands/scenario
 */

import { Command } from 'commander';
import { formatDuration } from '@loadramp/shared';
import type { CliContext } from '../context.js';
import { keyValue, table } from '../output.js';

interface ListOptions {
  suite?: string;
}

async function listHandler(context: CliContext, options: ListOptions): Promise<void> {
  const { registry } = context;
  const ids = options.suite ? new Set(registry.suite(options.suite)) : null;
  const rows = registry
    .list()
    .filter((listing) => ids === null || ids.has(listing.id))
    .map((listing) => ({ ...listing, duration: formatDuration(listing.durationMs) }));

  table(rows, [
    { key: 'id', header: 'ID' },
    { key: 'endpointClass', header: 'Endpoint' },
    { key: 'loadSize', header: 'Load' },
    { key: 'expectedTargets', header: 'Expected' },
    { key: 'duration', header: 'Duration' },
    { key: 'purpose', header: 'Purpose' },
  ]);
}

async function describeHandler(context: CliContext, id: string): Promise<void> {
  const spec = context.registry.require(id);
  keyValue({
    ID: spec.id,
    Purpose: spec.purpose,
    Endpoint: spec.endpointClass,
    'Load size': spec.loadSize,
    'Expected targets': context.registry.expectedTargets(spec),
    'Job set': spec.jobSet,
    'Poll interval': formatDuration(spec.pollIntervalMs),
    Duration: formatDuration(spec.durationMs),
    'Jitter (ms)': spec.jitterMs,
    'Pod multiplier': spec.podMultiplier,
    Soak: spec.soak,
  });
}

async function suitesHandler(context: CliContext): Promise<void> {
  const { registry } = context;
  table(
    registry.suiteNames().map((name) => ({ name, scenarios: registry.suite(name).join(' ') })),
    [
      { key: 'name', header: 'Suite' },
      { key: 'scenarios', header: 'Scenarios' },
    ],
  );
}

export function createScenarioCommand(getContext: () => CliContext): Command {
  const scenario = new Command('scenario').description('Browse the scenario catalog');

  scenario
    .command('list')
    .alias('ls')
    .description('List scenarios in declared order')
    .option('-s, --suite <name>', 'Only scenarios of a suite')
    .action((options: ListOptions) => listHandler(getContext(), options));

  scenario
    .command('describe <id>')
    .description('Show every setting of a scenario')
    .action((id: string) => describeHandler(getContext(), id));

  scenario
    .command('suites')
    .description('List named suites')
    .action(() => suitesHandler(getContext()));

  return scenario;
}

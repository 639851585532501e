/**
 * loadramp CLI program
 * @module @loadramp/cli/program
 */

import { Command } from 'commander';
import { setProcessLogLevel, type LoadRampConfig } from '@loadramp/shared';
import { loadConfig } from './config.js';
import { createContext, type CliContext } from './context.js';
import { disableColor, isOutputFormat, setOutputFormat } from './output.js';
import {
  createCleanupCommand,
  createClusterCommand,
  createConfigCommand,
  createFinalizeCommand,
  createJobCommand,
  createRunCommand,
  createScenarioCommand,
  createSoakCommand,
  createSuiteCommand,
} from './commands/index.js';

export const VERSION = '0.1.0';

const DESCRIPTION = `
loadramp

Ramps synthetic load against a Prometheus scrape collector or a
Pushgateway, samples the backend and records results per scenario.

Examples:
  $ loadramp scenario list
  $ loadramp run R2
  $ loadramp suite --suite push --from C3
  $ loadramp cluster launch ALL --with-soak
  $ loadramp cluster logs
`;

export interface GlobalOptions {
  output?: string;
  color?: boolean;
  resultsDir?: string;
  prometheusUrl?: string;
  namespace?: string;
  host?: string;
  logLevel?: string;
}

/**
 * Maps global flags to dotted configuration settings
 */
export function flagSettings(options: GlobalOptions): Record<string, string | undefined> {
  return {
    resultsDir: options.resultsDir,
    'prometheus.url': options.prometheusUrl,
    'workload.namespace': options.namespace,
    'host.kind': options.host,
    logLevel: options.logLevel,
  };
}

export interface ProgramOptions {
  /** Replaces the wiring of runtime adapters */
  createContext?: (config: LoadRampConfig) => CliContext;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** User config file (default: ~/.loadramp/config.json) */
  userFile?: string;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  const build = options.createContext ?? ((config: LoadRampConfig) => createContext(config, { echo: true }));

  let config: LoadRampConfig | undefined;
  let context: CliContext | undefined;

  const getConfig = (): LoadRampConfig => {
    config ??= loadConfig({
      flags: flagSettings(program.opts<GlobalOptions>()),
      env: options.env,
      cwd: options.cwd,
      userFile: options.userFile,
    });
    setProcessLogLevel(config.logLevel);
    return config;
  };
  const getContext = (): CliContext => {
    context ??= build(getConfig());
    return context;
  };

  program
    .name('loadramp')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', 'Output format: json, table, plain', 'table')
    .option('--results-dir <dir>', 'Local results directory')
    .option('--prometheus-url <url>', 'Scrape collector URL')
    .option('--namespace <namespace>', 'Namespace of the workload under test')
    .option('--host <kind>', 'Detached execution host: pod or local')
    .option('--log-level <level>', 'debug, info, warn, error or fatal')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      }
      if (opts.color === false) {
        disableColor();
      }
    });

  program.addCommand(createScenarioCommand(getContext));
  program.addCommand(createRunCommand(getContext));
  program.addCommand(createSoakCommand(getContext));
  program.addCommand(createFinalizeCommand(getContext));
  program.addCommand(createSuiteCommand(getContext));
  program.addCommand(createClusterCommand(getContext));
  program.addCommand(createJobCommand(getContext), { hidden: true });
  program.addCommand(createConfigCommand(getConfig));
  program.addCommand(createCleanupCommand(getContext));

  return program;
}

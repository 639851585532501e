/**
 * CLI Configuration
 *
 * Layers, lowest precedence first: built-in defaults, the user file, the
 * project file, LOADRAMP_* environment variables, command-line flags.
 * @module @loadramp/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  DEFAULT_CONFIG,
  ValidationError,
  isRecord,
  resolveConfig,
  validateConfig,
  type ConfigLayer,
  type FieldIssue,
  type LoadRampConfig,
} from '@loadramp/shared';

export const CONFIG_DIR = path.join(os.homedir(), '.loadramp');

export const USER_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export const PROJECT_CONFIG_FILE = 'loadramp.config.json';

/**
 * Environment variables and the setting each one overrides
 */
export const ENV_SETTINGS: Readonly<Record<string, string>> = {
  LOADRAMP_RESULTS_DIR: 'resultsDir',
  LOADRAMP_LOG_LEVEL: 'logLevel',
  LOADRAMP_PROMETHEUS_URL: 'prometheus.url',
  LOADRAMP_NAMESPACE: 'workload.namespace',
  LOADRAMP_CLUSTER_IP_ENDPOINT: 'pushgateway.clusterIpEndpoint',
  LOADRAMP_INGRESS_ENDPOINT: 'pushgateway.ingressEndpoint',
  LOADRAMP_PAYLOAD_DIR: 'pushgateway.payloadDir',
  LOADRAMP_HOST_KIND: 'host.kind',
  LOADRAMP_HOST_POD: 'host.podName',
};

export interface LoadConfigOptions {
  /** Overrides from command-line flags, keyed by dotted setting name */
  flags?: Record<string, string | undefined>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  userFile?: string;
}

/**
 * Reads a JSON config file. Missing files give no layer.
 */
export function readConfigFile(file: string): ConfigLayer | null {
  if (!fs.existsSync(file)) {
    return null;
  }
  const content = fs.readFileSync(file, 'utf-8');
  try {
    return { source: file, values: JSON.parse(content) };
  } catch (err) {
    throw ValidationError.invalidFormat(file, 'a JSON object', err instanceof Error ? err.message : undefined);
  }
}

/**
 * Parses a value typed on the command line: numbers, booleans, null and
 * JSON lists keep their type, everything else stays a string.
 */
export function parseSettingValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (/^(true|false|null|-?\d+(\.\d+)?)$/.test(trimmed) || trimmed.startsWith('[')) {
    return JSON.parse(trimmed);
  }
  return raw;
}

/**
 * Returns a copy of `values` with the dotted `key` set. Only settings that
 * exist in the defaults are accepted.
 */
export function setSetting(values: Record<string, unknown>, key: string, value: unknown): Record<string, unknown> {
  const [section, field, ...rest] = key.split('.');
  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };

  if (!section || rest.length > 0 || !(section in defaults)) {
    throw ValidationError.field(key, `Unknown setting: ${key}`);
  }

  if (field === undefined) {
    if (isRecord(defaults[section])) {
      throw ValidationError.field(key, `${key} is a section; set one of its fields`);
    }
    return { ...values, [section]: value };
  }

  const sectionDefaults = defaults[section];
  if (!isRecord(sectionDefaults) || !(field in sectionDefaults)) {
    throw ValidationError.field(key, `Unknown setting: ${key}`);
  }
  const current = values[section];
  return { ...values, [section]: { ...(isRecord(current) ? current : {}), [field]: value } };
}

/**
 * Builds the layer of environment overrides
 */
export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  let values: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_SETTINGS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      values = setSetting(values, key, value);
    }
  }
  return { source: 'environment', values };
}

/**
 * Builds the layer of command-line overrides
 */
export function flagLayer(flags: Record<string, string | undefined>): ConfigLayer {
  let values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) {
      values = setSetting(values, key, value);
    }
  }
  return { source: 'flags', values };
}

function toValidationError(issues: FieldIssue[]): ValidationError {
  return ValidationError.multiple(issues.map((issue) => ({ field: issue.field, message: issue.message, rule: issue.code })));
}

/**
 * Loads and validates the merged configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadRampConfig {
  const cwd = options.cwd ?? process.cwd();
  const layers = [
    readConfigFile(options.userFile ?? USER_CONFIG_FILE),
    readConfigFile(path.join(cwd, PROJECT_CONFIG_FILE)),
    envLayer(options.env ?? process.env),
    flagLayer(options.flags ?? {}),
  ].filter((layer): layer is ConfigLayer => layer !== null);

  const { config, issues } = resolveConfig(layers);
  if (issues.length > 0) {
    throw toValidationError(issues);
  }

  const report = validateConfig(config);
  if (!report.valid) {
    throw toValidationError(report.errors);
  }

  return { ...config, resultsDir: path.resolve(cwd, config.resultsDir) };
}

/**
 * Writes one setting to the user config file
 */
export function saveUserSetting(key: string, raw: string, file: string = USER_CONFIG_FILE): Record<string, unknown> {
  const existing = readConfigFile(file)?.values;
  const updated = setSetting(isRecord(existing) ? existing : {}, key, parseSettingValue(raw));

  const { issues } = resolveConfig([{ source: file, values: updated }]);
  if (issues.length > 0) {
    throw toValidationError(issues);
  }

  fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
  fs.writeFileSync(file, JSON.stringify(updated, null, 2) + '\n', { mode: 0o600 });
  return updated;
}

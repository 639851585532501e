/**
 * Argument parsing shared by the run, suite, cluster and job commands
 * @module @loadramp/cli/commands/args
 */

import { isSuiteName, type SuiteName } from '@loadramp/core';
import { ValidationError, parseDuration, validateLoadSize } from '@loadramp/shared';

export function parseSize(text: string, field = 'size'): number {
  const size = /^\d+$/.test(text.trim()) ? Number(text) : Number.NaN;
  const issue = validateLoadSize(size, field);
  if (issue) {
    throw ValidationError.field(field, `${issue.message} (got "${text}")`, issue.code);
  }
  return size;
}

export function parseDurationArg(text: string, field = 'duration'): number {
  const ms = parseDuration(text);
  if (ms === null || ms <= 0) {
    throw ValidationError.invalidFormat(field, 'a duration such as 300s, 20m or 6h', text);
  }
  return ms;
}

export function parseSuite(text: string | undefined): SuiteName | undefined {
  if (text === undefined) return undefined;
  if (!isSuiteName(text)) {
    throw ValidationError.invalidFormat('suite', '"scrape" or "push"', text);
  }
  return text;
}

/**
 * Options accepted wherever a suite or soak run can be started
 */
export interface SuiteFlags {
  suite?: string;
  from?: string;
  withSoak?: boolean;
  skipSoak?: boolean;
  size?: string;
  duration?: string;
}

export interface ParsedSuiteFlags {
  suite?: SuiteName;
  resumeFrom?: string;
  withSoak?: boolean;
  skipSoak?: boolean;
  soakSize?: number;
  soakDurationMs?: number;
}

export function parseSuiteFlags(flags: SuiteFlags): ParsedSuiteFlags {
  return {
    suite: parseSuite(flags.suite),
    resumeFrom: flags.from,
    withSoak: flags.withSoak,
    skipSoak: flags.skipSoak,
    soakSize: flags.size === undefined ? undefined : parseSize(flags.size),
    soakDurationMs: flags.duration === undefined ? undefined : parseDurationArg(flags.duration),
  };
}

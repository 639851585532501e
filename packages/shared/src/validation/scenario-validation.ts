/**
 * Scenario and load argument validation
 * @module @loadramp/shared/validation/scenario-validation
 */

import type { EndpointClass, JobSet } from '../types/scenario.js';
import { isRecord, reportOf } from './types.js';
import type { FieldIssue, ValidationReport } from './types.js';

const VALID_ENDPOINT_CLASSES: EndpointClass[] = ['scrape', 'cluster-ip', 'ingress'];
const VALID_JOB_SETS: JobSet[] = ['node', 'cluster', 'node+cluster'];

/**
 * Letter followed by letters, digits, hyphens or underscores
 */
const SCENARIO_ID_PATTERN = /^[A-Za-z][A-Za-z0-9_-]{0,31}$/;

export function validateScenarioId(id: unknown): FieldIssue | null {
  if (id === undefined || id === null || id === '') {
    return { field: 'id', message: 'Scenario id is required', code: 'REQUIRED' };
  }
  if (typeof id !== 'string') {
    return { field: 'id', message: 'Scenario id must be a string', code: 'INVALID_TYPE' };
  }
  if (!SCENARIO_ID_PATTERN.test(id)) {
    return {
      field: 'id',
      message: 'Scenario id must start with a letter and contain only letters, digits, hyphens and underscores',
      code: 'INVALID_FORMAT',
    };
  }
  return null;
}

export function validateLoadSize(size: unknown, field = 'loadSize'): FieldIssue | null {
  if (typeof size !== 'number' || !Number.isInteger(size)) {
    return { field, message: 'Load size must be an integer', code: 'INVALID_TYPE' };
  }
  if (size < 0) {
    return { field, message: 'Load size cannot be negative', code: 'OUT_OF_RANGE' };
  }
  return null;
}

export function validateDurationMs(durationMs: unknown, field = 'durationMs'): FieldIssue | null {
  if (typeof durationMs !== 'number' || !Number.isFinite(durationMs)) {
    return { field, message: 'Duration must be a number of milliseconds', code: 'INVALID_TYPE' };
  }
  if (durationMs <= 0) {
    return { field, message: 'Duration must be positive', code: 'OUT_OF_RANGE' };
  }
  return null;
}

/**
 * Validate a candidate scenario definition
 */
export function validateScenarioSpec(input: unknown): ValidationReport {
  if (!isRecord(input)) {
    return reportOf([{ field: 'input', message: 'Scenario must be an object', code: 'REQUIRED' }]);
  }

  const issues: (FieldIssue | null)[] = [
    validateScenarioId(input.id),
    validateLoadSize(input.loadSize),
    validateDurationMs(input.durationMs),
    validateDurationMs(input.pollIntervalMs, 'pollIntervalMs'),
  ];

  const endpointClass = input.endpointClass;
  if (typeof endpointClass !== 'string' || !VALID_ENDPOINT_CLASSES.some((c) => c === endpointClass)) {
    issues.push({
      field: 'endpointClass',
      message: `Endpoint class must be one of: ${VALID_ENDPOINT_CLASSES.join(', ')}`,
      code: 'INVALID_VALUE',
    });
  }

  const jobSet = input.jobSet;
  if (typeof jobSet !== 'string' || !VALID_JOB_SETS.some((s) => s === jobSet)) {
    issues.push({
      field: 'jobSet',
      message: `Job set must be one of: ${VALID_JOB_SETS.join(', ')}`,
      code: 'INVALID_VALUE',
    });
  }

  if (typeof input.jitterMs !== 'number' || input.jitterMs < 0) {
    issues.push({ field: 'jitterMs', message: 'Jitter must be a non-negative number', code: 'OUT_OF_RANGE' });
  }

  if (typeof input.podMultiplier !== 'number' || !Number.isInteger(input.podMultiplier) || input.podMultiplier < 1) {
    issues.push({ field: 'podMultiplier', message: 'Pod multiplier must be a positive integer', code: 'OUT_OF_RANGE' });
  }

  if (
    typeof input.pollIntervalMs === 'number' &&
    typeof input.durationMs === 'number' &&
    input.pollIntervalMs > input.durationMs
  ) {
    issues.push({
      field: 'pollIntervalMs',
      message: 'Poll interval cannot exceed the scenario duration',
      code: 'CONSTRAINT_VIOLATION',
    });
  }

  return reportOf(issues);
}

/**
 * Validate soak overlay arguments
 */
export function validateSoakInput(size: unknown, durationMs: unknown): ValidationReport {
  return reportOf([validateLoadSize(size, 'size'), validateDurationMs(durationMs, 'duration')]);
}

/**
 * Validation module - re-exports all validators
 * @module @loadramp/shared/validation
 */

export type { FieldIssue, ValidationReport } from './types.js';
export { reportOf, isRecord } from './types.js';

export {
  validateScenarioId,
  validateLoadSize,
  validateDurationMs,
  validateScenarioSpec,
  validateSoakInput,
} from './scenario-validation.js';

export { resolveConfig, validateConfig } from './config-validation.js';
export type { ConfigLayer, ResolvedConfig } from './config-validation.js';

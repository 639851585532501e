/**
 * Error classes for loadramp
 * @module @loadramp/shared/errors
 */

export { LoadRampError, ErrorCode, exitCodeFor, isLoadRampError, wrapError, errorMessage } from './base-error.js';
export type { ErrorMeta } from './base-error.js';

export { ValidationError, isValidationError } from './validation-error.js';
export type { ValidationErrorDetail } from './validation-error.js';

export { RunError, isRunError } from './run-error.js';

/**
 * Validation error class
 * @module @loadramp/shared/errors/validation-error
 */

import { LoadRampError, ErrorCode } from './base-error.js';
import type { ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Input validation failure: bad arguments, bad configuration or an
 * unknown resume point.
 */
export class ValidationError extends LoadRampError {
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  static field(field: string, message: string, rule?: string): ValidationError {
    return new ValidationError(`Validation failed for field: ${field}`, [{ field, message, rule }]);
  }

  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', rule: 'required' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  static invalidFormat(field: string, expected: string, received?: unknown): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field}`,
      [{ field, message: `Expected ${expected}`, rule: 'format', expected, received }],
      { field },
      ErrorCode.INVALID_FORMAT,
    );
  }

  static outOfRange(field: string, min?: number, max?: number, received?: number): ValidationError {
    let expected = '';
    if (min !== undefined && max !== undefined) {
      expected = `between ${min} and ${max}`;
    } else if (min !== undefined) {
      expected = `at least ${min}`;
    } else if (max !== undefined) {
      expected = `at most ${max}`;
    }

    return new ValidationError(
      `Value out of range for field: ${field}`,
      [{ field, message: `Expected value ${expected}`, rule: 'range', expected, received }],
      { field },
      ErrorCode.OUT_OF_RANGE,
    );
  }

  static multiple(errors: ValidationErrorDetail[]): ValidationError {
    const fieldNames = errors.map((e) => e.field).join(', ');
    return new ValidationError(`Validation failed for fields: ${fieldNames}`, errors);
  }

  static constraint(message: string, field?: string): ValidationError {
    const details: ValidationErrorDetail[] = field ? [{ field, message, rule: 'constraint' }] : [];
    return new ValidationError(message, details, { field }, ErrorCode.CONSTRAINT_VIOLATION);
  }

  hasFieldError(field: string): boolean {
    return this.details.some((d) => d.field === field);
  }

  getFieldErrors(field: string): ValidationErrorDetail[] {
    return this.details.filter((d) => d.field === field);
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

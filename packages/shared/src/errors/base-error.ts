/**
 * Base error class with error codes
 * @module @loadramp/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  TIMEOUT = 1003,
  CANCELLED = 1004,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,
  CONSTRAINT_VIOLATION = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,
  CONFLICT = 5002,

  // Run errors (6xxx)
  SCENARIO_NOT_FOUND = 6000,
  RUN_ALREADY_ACTIVE = 6001,
  RUN_CANCELLED = 6002,
  RUN_FAILED = 6003,

  // Load errors (7xxx)
  LOAD_APPLY_FAILED = 7000,
  PAYLOAD_UNAVAILABLE = 7001,

  // Host errors (8xxx)
  HOST_UNAVAILABLE = 8000,
  HOST_COMMAND_FAILED = 8001,
  RESULTS_COPY_FAILED = 8002,

  // Backend query errors (9xxx)
  QUERY_FAILED = 9000,
  HEALTH_SAMPLE_FAILED = 9001,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Scenario involved */
  scenarioId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all loadramp errors
 */
export class LoadRampError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Process exit code the CLI reports for this error */
  public readonly exitCode: number;
  public readonly meta: ErrorMeta;
  public readonly timestamp: Date;
  /** Original error if this wraps another */
  public readonly cause?: Error;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, meta: ErrorMeta = {}, cause?: Error) {
    super(message);
    this.name = 'LoadRampError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.exitCode = exitCodeFor(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  isRetryable(): boolean {
    return [
      ErrorCode.TIMEOUT,
      ErrorCode.QUERY_FAILED,
      ErrorCode.HEALTH_SAMPLE_FAILED,
      ErrorCode.HOST_UNAVAILABLE,
    ].includes(this.code);
  }
}

/**
 * Map an error code to a process exit code
 */
export function exitCodeFor(code: ErrorCode): number {
  if (code === ErrorCode.CANCELLED || code === ErrorCode.RUN_CANCELLED) {
    return 130;
  }
  const category = Math.floor(code / 1000);
  return category === 2 ? 2 : 1;
}

export function isLoadRampError(error: unknown): error is LoadRampError {
  return error instanceof LoadRampError;
}

/**
 * Wrap an unknown error as a LoadRampError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): LoadRampError {
  if (isLoadRampError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new LoadRampError(error.message, code, {}, error);
  }

  return new LoadRampError(String(error), code);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

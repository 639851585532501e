/**
 * loadramp - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @loadramp/shared
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Logging
export {
  Logger,
  createServiceLogger,
  isTestEnvironment,
  isLogLevel,
  setProcessLogLevel,
  formatPretty,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';
export {
  RunLogSink,
  fileLogTarget,
  type LogTarget,
  type RunLogSinkOptions,
} from './logging/run-log-sink.js';

// Utilities
export * from './utils/index.js';

/**
 * Utilities
 * @module @loadramp/shared/utils
 */

export { systemClock, withTimeout } from './clock.js';
export type { Clock } from './clock.js';
export { formatCsvRow, parseCsv, parseNumericCell, parseJson } from './csv.js';
export type { CsvCell, ParsedCsv } from './csv.js';
export { presentValues, mean, min, max, first, last, percentile, round } from './stats.js';
export { BYTES_PER_GIB, formatValue, formatDuration, parseDuration } from './format.js';
export { DETACHED_SIGNALS, createShutdownController } from './lifecycle.js';
export type { ShutdownController, ShutdownHandler } from './lifecycle.js';

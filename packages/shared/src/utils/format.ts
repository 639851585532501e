/**
 * Formatting helpers shared by reports and the CLI.
 * @module @loadramp/shared/utils/format
 */

export const BYTES_PER_GIB = 1024 ** 3;

/**
 * Format a possibly absent number with fixed decimals; absent prints "N/A".
 */
export function formatValue(value: number | null, decimals: number): string {
  return value === null ? 'N/A' : value.toFixed(decimals);
}

/**
 * Render a duration as the largest whole units, e.g. "1h 30m" or "45s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  if (minutes > 0) {
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }
  return `${seconds}s`;
}

/**
 * Parse a duration such as "300", "300s", "20m" or "6h" into milliseconds.
 * Bare numbers are seconds. Returns null for anything else.
 */
export function parseDuration(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/.exec(text.trim());
  if (!match) return null;
  const amount = Number(match[1]);
  switch (match[2]) {
    case 'ms':
      return Math.round(amount);
    case 'm':
      return Math.round(amount * 60_000);
    case 'h':
      return Math.round(amount * 3_600_000);
    default:
      return Math.round(amount * 1000);
  }
}

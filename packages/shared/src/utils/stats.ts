/**
 * Aggregates over sample series. Absent samples are ignored; an empty
 * series yields null.
 * @module @loadramp/shared/utils/stats
 */

export function presentValues(values: readonly (number | null)[]): number[] {
  return values.filter((value): value is number => value !== null && Number.isFinite(value));
}

export function mean(values: readonly (number | null)[]): number | null {
  const present = presentValues(values);
  if (present.length === 0) return null;
  return present.reduce((sum, value) => sum + value, 0) / present.length;
}

export function min(values: readonly (number | null)[]): number | null {
  const present = presentValues(values);
  return present.length === 0 ? null : Math.min(...present);
}

export function max(values: readonly (number | null)[]): number | null {
  const present = presentValues(values);
  return present.length === 0 ? null : Math.max(...present);
}

export function first(values: readonly (number | null)[]): number | null {
  return presentValues(values)[0] ?? null;
}

export function last(values: readonly (number | null)[]): number | null {
  const present = presentValues(values);
  return present[present.length - 1] ?? null;
}

/**
 * Percentile with linear interpolation between closest ranks.
 * @param pct - percentile in [0, 100]
 */
export function percentile(values: readonly (number | null)[], pct: number): number | null {
  const sorted = presentValues(values).sort((a, b) => a - b);
  if (sorted.length === 0) return null;
  const rank = (pct / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.min(lower + 1, sorted.length - 1);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (rank - lower);
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Numeric helpers for dashboard metrics.
 * Empty inputs and zero denominators give null, never NaN or Infinity.
 */

export function percentage(part: number, whole: number): number | null {
  if (whole === 0) return null;
  return (part / whole) * 100;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Continuous percentile (linear interpolation between closest ranks),
 * the same definition as SQL PERCENTILE_CONT.
 */
export function percentileCont(values: readonly number[], fraction: number): number | null {
  if (values.length === 0) return null;
  if (fraction < 0 || fraction > 1) {
    throw new RangeError(`Percentile fraction must be within [0, 1], got ${fraction}`);
  }

  const sorted = [...values].sort((a, b) => a - b);
  const position = fraction * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number | null {
  return percentileCont(values, 0.5);
}

/**
 * Math helpers
 *
 * Guarded aggregate functions used by the rebalance pass and queue-wait
 * statistics.
 */

/**
 * Average of `values`, or `defaultValue` when empty
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])   // => 2
 * safeAverage([], 100)     // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }
  const sum = values.reduce((acc, val) => acc + val, 0);
  return sum / values.length;
}

export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }
  return numerator / denominator;
}

/**
 * Nearest-rank percentile (p in 0..100) of `values`
 *
 * @example
 * ```typescript
 * percentile([10, 20, 30, 40], 50)   // => 20
 * percentile([10, 20, 30, 40], 95)   // => 40
 * ```
 */
export function percentile(values: readonly number[], p: number, defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const clamped = Math.min(100, Math.max(0, p));
  const rank = Math.max(1, Math.ceil((clamped / 100) * sorted.length));
  return sorted[rank - 1] ?? defaultValue;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

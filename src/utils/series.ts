/**
 * Helpers over recorded series. Sessions can hold hundreds of thousands of
 * entries, so nothing here spreads a collection into call arguments.
 */

/**
 * The last `count` items; empty when `count` is zero or negative
 */
export function takeLast<T>(items: readonly T[], count: number): T[] {
  return count > 0 ? items.slice(-count) : [];
}

/**
 * Smallest and largest value, or undefined for an empty series
 */
export function valueRange(values: Iterable<number>): { min: number; max: number } | undefined {
  let range: { min: number; max: number } | undefined;
  for (const value of values) {
    if (!range) {
      range = { min: value, max: value };
    } else if (value < range.min) {
      range.min = value;
    } else if (value > range.max) {
      range.max = value;
    }
  }
  return range;
}

export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

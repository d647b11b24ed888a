/**
 * Arithmetic mean in sample order. Callers guarantee a non-empty array.
 */
export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

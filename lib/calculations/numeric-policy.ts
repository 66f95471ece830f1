/**
 * Numeric policies for derived ratios. An undefined input or a
 * non-positive divisor yields `null`, never 0 or Infinity.
 */

export function isDefined(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function safeRatio(numerator: number | null, denominator: number | null): number | null {
  if (!isDefined(numerator) || !isDefined(denominator) || denominator <= 0) {
    return null;
  }
  return numerator / denominator;
}

export function scale(value: number | null, factor: number): number | null {
  return isDefined(value) ? value * factor : null;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

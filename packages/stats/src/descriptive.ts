/**
 * Descriptive statistics over plain number arrays.
 *
 * Variance and standard deviation use the sample (n - 1) denominator, the
 * convention of common statistical libraries. These functions do not throw:
 * an empty input yields NaN for every aggregate, and a single value yields
 * NaN for variance and standard deviation. Callers that must reject short
 * inputs check the length first (see computeFeatureStats).
 */

import type { FeatureStats } from '@stocker/contracts';

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return NaN;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Sample variance: sum of squared deviations divided by n - 1.
 *
 * @example
 * ```typescript
 * sampleVariance([2, 4, 4, 4, 5, 5, 7, 9]); // 32 / 7 ≈ 4.571
 * sampleVariance([5]);                      // NaN
 * ```
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) {
    return NaN;
  }
  const m = mean(values);
  let sumSquares = 0;
  for (const value of values) {
    sumSquares += (value - m) * (value - m);
  }
  return sumSquares / (values.length - 1);
}

export function sampleStandardDeviation(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values));
}

export function min(values: readonly number[]): number {
  if (values.length === 0) {
    return NaN;
  }
  let result = Infinity;
  for (const value of values) {
    if (value < result) result = value;
  }
  return result;
}

export function max(values: readonly number[]): number {
  if (values.length === 0) {
    return NaN;
  }
  let result = -Infinity;
  for (const value of values) {
    if (value > result) result = value;
  }
  return result;
}

/**
 * All five aggregates of one column in a single call.
 */
export function summarize(values: readonly number[]): FeatureStats {
  const variance = sampleVariance(values);
  return {
    mean: mean(values),
    variance,
    standardDeviation: Math.sqrt(variance),
    min: min(values),
    max: max(values),
  };
}

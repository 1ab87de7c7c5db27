/**
 * @fileoverview Statistic shapes shared by instruments and baskets.
 *
 * @module @stocker/contracts/stats
 */

/** Raw price columns of a bar. */
export const PRICE_FEATURES = ['open', 'close', 'high', 'low'] as const;

/** Every column statistics are computed for, raw and derived. */
export const FEATURES = [...PRICE_FEATURES, 'closeOpen', 'highLow'] as const;

export type PriceFeature = (typeof PRICE_FEATURES)[number];

export type Feature = (typeof FEATURES)[number];

/**
 * Descriptive statistics of one column.
 *
 * Variance and standard deviation use the sample (n - 1) convention, so a
 * single-bar series yields NaN for both.
 *
 * @invariant min <= mean <= max for non-empty input
 */
export interface FeatureStats {
  mean: number;
  variance: number;
  standardDeviation: number;
  min: number;
  max: number;
}

/** Per-feature statistics of one instrument. */
export type StatSet = Record<Feature, FeatureStats>;

/** Statistics a basket averages across its members. */
export type AveragedStats = Pick<FeatureStats, 'mean' | 'variance' | 'standardDeviation'>;

/** Basket-level statistics, restricted to the raw price columns. */
export type BasketStatSet = Record<PriceFeature, AveragedStats>;

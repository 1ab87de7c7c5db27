/**
 * StatSet computation for one series, and basket-level averaging.
 */

import { EmptyBasketError, InsufficientDataError } from '@stocker/contracts';
import type {
  AveragedStats,
  BasketStatSet,
  DerivedBar,
  Feature,
  FeatureStats,
  PriceFeature,
  StatSet,
} from '@stocker/contracts';
import { summarize, mean } from './descriptive.js';

/**
 * Extracts one column of a derived series.
 */
export function column(series: readonly DerivedBar[], feature: Feature): number[] {
  return series.map((bar) => bar[feature]);
}

/**
 * Statistics of one feature over a non-empty series.
 *
 * @throws {InsufficientDataError} If the series is empty
 */
export function computeFeatureStats(
  series: readonly DerivedBar[],
  feature: Feature,
  ticker?: string
): FeatureStats {
  if (series.length === 0) {
    throw new InsufficientDataError(`Cannot compute ${feature} statistics over an empty series`, {
      required: 1,
      received: 0,
      ticker,
      feature,
    });
  }
  return summarize(column(series, feature));
}

/**
 * Statistics of every feature (raw and derived) over a non-empty series.
 *
 * @throws {InsufficientDataError} If the series is empty
 *
 * @example
 * ```typescript
 * const stats = computeStatSet(deriveSeries(bars), 'TSLA');
 * stats.closeOpen.mean; // average intraday move
 * ```
 */
export function computeStatSet(series: readonly DerivedBar[], ticker?: string): StatSet {
  if (series.length === 0) {
    throw new InsufficientDataError('Cannot compute statistics over an empty series', {
      required: 1,
      received: 0,
      ticker,
    });
  }

  const statsOf = (feature: Feature): FeatureStats => summarize(column(series, feature));
  return {
    open: statsOf('open'),
    close: statsOf('close'),
    high: statsOf('high'),
    low: statsOf('low'),
    closeOpen: statsOf('closeOpen'),
    highLow: statsOf('highLow'),
  };
}

/**
 * Basket-level statistics: for each price feature, the unweighted mean across
 * members of each member's own mean, variance and standard deviation.
 *
 * Averages of already-aggregated values differ from pooled statistics over
 * the members' raw bars unless every member has the same bar count.
 *
 * @throws {EmptyBasketError} If no stat sets are given
 */
export function averageStatSets(statSets: readonly StatSet[]): BasketStatSet {
  if (statSets.length === 0) {
    throw new EmptyBasketError('Cannot average statistics of an empty basket', { members: 0 });
  }

  const averageOf = (feature: PriceFeature): AveragedStats => ({
    mean: mean(statSets.map((set) => set[feature].mean)),
    variance: mean(statSets.map((set) => set[feature].variance)),
    standardDeviation: mean(statSets.map((set) => set[feature].standardDeviation)),
  });

  return {
    open: averageOf('open'),
    close: averageOf('close'),
    high: averageOf('high'),
    low: averageOf('low'),
  };
}

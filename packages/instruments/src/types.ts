/**
 * Shared collaborator and option types for instruments, baskets and comparisons.
 */

import type {
  AveragedStats,
  DerivedBar,
  Feature,
  FeatureStats,
  Interval,
  MarketDataProvider,
  PriceFeature,
} from '@stocker/contracts';
import type { Logger } from '@stocker/logger';

/**
 * Collaborators every entity needs.
 */
export interface InstrumentContext {
  /** Source of metadata and series */
  provider: MarketDataProvider;

  /** Parent logger; entities log through component-scoped children */
  logger: Logger;
}

export interface InstrumentOptions {
  /**
   * Bar size.
   * @default Interval.D1
   */
  interval?: Interval;
}

/**
 * The three return figures a comparison exposes.
 */
export interface ComparisonReturns {
  /** Focal instrument's return percentage */
  instrument: number;

  /** Unweighted mean of basket member returns */
  basket: number;

  /** Risk-free instrument's return percentage */
  riskFree: number;
}

/** Cached series as entities expose it; bars and the array are frozen. */
export type FrozenSeries = readonly Readonly<DerivedBar>[];

/** Cached per-feature statistics of an instrument, frozen at every level. */
export type FrozenStatSet = Readonly<Record<Feature, Readonly<FeatureStats>>>;

/** Cached basket statistics, frozen at every level. */
export type FrozenBasketStatSet = Readonly<Record<PriceFeature, Readonly<AveragedStats>>>;

/**
 * @fileoverview Main entry point for @stocker/contracts package.
 *
 * Exports all types, interfaces, classes, and utilities shared across the
 * Stocker suite.
 *
 * @module @stocker/contracts
 */

// Intervals
export { Interval, DEFAULT_INTERVAL, isValidInterval, parseInterval, getIntervalLabel } from './intervals.js';

// Market data types
export type { OhlcBar, DerivedBar, InstrumentMetadata, SeriesRequest, MarketDataProvider } from './market.js';

// Statistic shapes
export { FEATURES, PRICE_FEATURES } from './stats.js';
export type {
  Feature,
  PriceFeature,
  FeatureStats,
  StatSet,
  AveragedStats,
  BasketStatSet,
} from './stats.js';

// Date range helpers
export { isIsoDate, assertDateRange, isWithinRange, toEpochMillis, toEpochSeconds } from './dates.js';

// Error classes and guards
export {
  StockerError,
  DataUnavailableError,
  InsufficientDataError,
  EmptyBasketError,
  InvalidDateRangeError,
  ProviderRequestError,
  isStockerError,
  isDataUnavailableError,
  isInsufficientDataError,
  isEmptyBasketError,
  isProviderRequestError,
} from './errors.js';

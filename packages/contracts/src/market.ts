/**
 * @fileoverview Market data types and the provider contract.
 *
 * Provider-agnostic interfaces for OHLC bars, instrument metadata and series
 * queries. Pure data structures, no I/O.
 *
 * @module @stocker/contracts/market
 */

import type { Interval } from './intervals.js';

/**
 * A single OHLC bar for one trading period.
 *
 * @invariant high >= max(open, close) and low <= min(open, close), assumed from the provider
 * @invariant timestamp is valid ISO 8601 string (UTC)
 *
 * @example
 * ```typescript
 * const bar: OhlcBar = {
 *   timestamp: '2023-01-03T14:30:00.000Z',
 *   open: 118.47,
 *   high: 118.8,
 *   low: 104.64,
 *   close: 108.1,
 *   volume: 231402800
 * };
 * ```
 */
export interface OhlcBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  timestamp: string;

  open: number;
  high: number;
  low: number;
  close: number;

  /** Traded volume; 0 when the provider reports none */
  volume: number;
}

/**
 * An OHLC bar with the per-bar derived columns.
 *
 * @invariant closeOpen === close - open
 * @invariant highLow === high - low
 */
export interface DerivedBar extends OhlcBar {
  /** close - open */
  closeOpen: number;

  /** high - low */
  highLow: number;
}

/**
 * Descriptive metadata for an instrument.
 */
export interface InstrumentMetadata {
  /** Symbol as the provider knows it */
  symbol: string;

  /** Provider-reported beta; null when the provider has none (many ETFs) */
  beta: number | null;

  /** Trading currency, when reported */
  currency?: string;
}

/**
 * Parameters for a historical series query.
 *
 * @invariant startDate < endDate
 *
 * @example
 * ```typescript
 * const request: SeriesRequest = {
 *   ticker: 'TSLA',
 *   startDate: '2023-01-01',
 *   endDate: '2023-06-01',
 *   interval: Interval.D1
 * };
 * ```
 */
export interface SeriesRequest {
  /** Normalized ticker */
  ticker: string;

  /** Start of range, `yyyy-mm-dd`, inclusive */
  startDate: string;

  /** End of range, `yyyy-mm-dd`, exclusive */
  endDate: string;

  /** Bar size */
  interval: Interval;
}

/**
 * Source of instrument metadata and OHLC series.
 *
 * Implementations reject with `DataUnavailableError` for unknown tickers and
 * for ranges with no bars. Returned series are sorted by timestamp ascending
 * and contain only bars inside `[startDate, endDate)`.
 */
export interface MarketDataProvider {
  /** Provider identifier used in logs and errors */
  readonly name: string;

  getMetadata(ticker: string): Promise<InstrumentMetadata>;

  getSeries(request: SeriesRequest): Promise<OhlcBar[]>;
}

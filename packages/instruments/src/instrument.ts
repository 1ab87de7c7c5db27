/**
 * @fileoverview A single ticker's series, derived columns, statistics and return.
 *
 * Every change of ticker, range or interval refetches the full series and
 * recomputes everything through one build routine. The new state replaces the
 * old one in a single assignment once it is complete, so a failed refetch
 * leaves the instrument exactly as it was.
 *
 * @module @stocker/instruments/instrument
 */

import { DEFAULT_INTERVAL, DataUnavailableError, FEATURES, assertDateRange } from '@stocker/contracts';
import type { DerivedBar, InstrumentMetadata, Interval, MarketDataProvider } from '@stocker/contracts';
import type { Logger } from '@stocker/logger';
import { computeStatSet, deriveSeries, returnPct } from '@stocker/stats';
import { normalizeTicker } from './ticker.js';
import type { FrozenSeries, FrozenStatSet, InstrumentContext, InstrumentOptions } from './types.js';

interface InstrumentParams {
  ticker: string;
  startDate: string;
  endDate: string;
  interval: Interval;
}

interface InstrumentState extends InstrumentParams {
  metadata: InstrumentMetadata;
  series: FrozenSeries;
  statistics: FrozenStatSet;
  returnPct: number;
}

/**
 * Plain summary of an instrument, for logs and serialization.
 */
export interface InstrumentSummary {
  ticker: string;
  startDate: string;
  endDate: string;
  interval: Interval;
  beta: number | null;
  barCount: number;
  returnPct: number;
  statistics: FrozenStatSet;
}

/**
 * Fetches and derives a series, rejecting empty responses.
 */
async function fetchDerivedSeries(
  provider: MarketDataProvider,
  params: InstrumentParams
): Promise<DerivedBar[]> {
  assertDateRange(params.startDate, params.endDate);

  const bars = await provider.getSeries(params);
  if (bars.length === 0) {
    throw new DataUnavailableError(`No bars for "${params.ticker}"`, {
      ticker: params.ticker,
      provider: provider.name,
      startDate: params.startDate,
      endDate: params.endDate,
    });
  }
  return deriveSeries(bars);
}

/**
 * Builds a complete instrument state. Metadata is refetched unless supplied.
 * The series and statistics come back frozen; they are shared with callers.
 */
async function buildState(
  provider: MarketDataProvider,
  logger: Logger,
  params: InstrumentParams,
  knownMetadata?: InstrumentMetadata
): Promise<InstrumentState> {
  assertDateRange(params.startDate, params.endDate);
  const startTime = Date.now();

  const [metadata, derived] = await Promise.all([
    knownMetadata ?? provider.getMetadata(params.ticker),
    fetchDerivedSeries(provider, params),
  ]);

  const series: FrozenSeries = Object.freeze(derived.map((bar) => Object.freeze(bar)));
  const computed = computeStatSet(series, params.ticker);
  for (const feature of FEATURES) {
    Object.freeze(computed[feature]);
  }
  const statistics: FrozenStatSet = Object.freeze(computed);
  const change = returnPct(series, params.ticker);

  if (!Number.isFinite(change)) {
    logger.warn('Return percentage is not finite', {
      symbol: params.ticker,
      firstOpen: series[0]?.open,
      returnPct: String(change),
    });
  }

  logger.info('Instrument built', {
    symbol: params.ticker,
    startDate: params.startDate,
    endDate: params.endDate,
    interval: params.interval,
    count: series.length,
    duration_ms: Date.now() - startTime,
  });

  return { ...params, metadata, series, statistics, returnPct: change };
}

/**
 * One ticker over one date range.
 *
 * @example
 * ```typescript
 * const tsla = await Instrument.create('tsla', '2023-01-01', '2023-06-01', { provider, logger });
 * tsla.ticker;                      // 'TSLA'
 * tsla.statistics().close.mean;     // average close over the range
 * await tsla.setEndDate('2023-09-01');
 * ```
 */
export class Instrument {
  private state: InstrumentState;
  private readonly provider: MarketDataProvider;
  private readonly logger: Logger;

  private constructor(provider: MarketDataProvider, logger: Logger, state: InstrumentState) {
    this.provider = provider;
    this.logger = logger;
    this.state = state;
  }

  /**
   * Fetches metadata and the series for `[startDate, endDate)` and computes
   * statistics.
   *
   * @throws {DataUnavailableError} If the ticker is unknown or the range has no bars
   * @throws {InvalidDateRangeError} If the range is malformed
   */
  static async create(
    ticker: string,
    startDate: string,
    endDate: string,
    context: InstrumentContext,
    options: InstrumentOptions = {}
  ): Promise<Instrument> {
    const logger = context.logger.child({ component: 'instrument' });
    const params: InstrumentParams = {
      ticker: normalizeTicker(ticker),
      startDate,
      endDate,
      interval: options.interval ?? DEFAULT_INTERVAL,
    };
    const state = await buildState(context.provider, logger, params);
    return new Instrument(context.provider, logger, state);
  }

  get ticker(): string {
    return this.state.ticker;
  }

  get startDate(): string {
    return this.state.startDate;
  }

  get endDate(): string {
    return this.state.endDate;
  }

  get interval(): Interval {
    return this.state.interval;
  }

  get metadata(): InstrumentMetadata {
    return this.state.metadata;
  }

  get beta(): number | null {
    return this.state.metadata.beta;
  }

  /** Derived series of the most recent fetch; frozen */
  get series(): FrozenSeries {
    return this.state.series;
  }

  get barCount(): number {
    return this.state.series.length;
  }

  /** (last close - first open) / first open */
  get returnPct(): number {
    return this.state.returnPct;
  }

  /**
   * Statistics of the most recently fetched series. Never fetches.
   */
  statistics(): FrozenStatSet {
    return this.state.statistics;
  }

  /**
   * Switches to another ticker over the same range and interval, refetching
   * metadata and series.
   */
  async setTicker(ticker: string): Promise<void> {
    this.state = await buildState(this.provider, this.logger, {
      ...this.params(),
      ticker: normalizeTicker(ticker),
    });
  }

  async setStartDate(startDate: string): Promise<void> {
    this.state = await buildState(this.provider, this.logger, { ...this.params(), startDate }, this.state.metadata);
  }

  async setEndDate(endDate: string): Promise<void> {
    this.state = await buildState(this.provider, this.logger, { ...this.params(), endDate }, this.state.metadata);
  }

  async setInterval(interval: Interval): Promise<void> {
    this.state = await buildState(this.provider, this.logger, { ...this.params(), interval }, this.state.metadata);
  }

  /**
   * Refetches metadata and series for the current ticker, range and interval.
   */
  async refresh(): Promise<void> {
    this.state = await buildState(this.provider, this.logger, this.params());
  }

  /**
   * Fetches a derived series for any range without touching this instrument.
   *
   * @throws {DataUnavailableError} If the range has no bars
   */
  async fetchSeries(startDate: string, endDate: string): Promise<DerivedBar[]> {
    return fetchDerivedSeries(this.provider, { ...this.params(), startDate, endDate });
  }

  toJSON(): InstrumentSummary {
    return {
      ticker: this.state.ticker,
      startDate: this.state.startDate,
      endDate: this.state.endDate,
      interval: this.state.interval,
      beta: this.state.metadata.beta,
      barCount: this.state.series.length,
      returnPct: this.state.returnPct,
      statistics: this.state.statistics,
    };
  }

  private params(): InstrumentParams {
    const { ticker, startDate, endDate, interval } = this.state;
    return { ticker, startDate, endDate, interval };
  }
}

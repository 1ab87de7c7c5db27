/**
 * @fileoverview A fixed group of instruments plus a separate risk-free instrument.
 *
 * @module @stocker/instruments/basket
 */

import { DEFAULT_INTERVAL, EmptyBasketError, PRICE_FEATURES } from '@stocker/contracts';
import type { Interval } from '@stocker/contracts';
import { averageReturnPct, averageStatSets } from '@stocker/stats';
import { Instrument } from './instrument.js';
import type { FrozenBasketStatSet, InstrumentContext, InstrumentOptions } from './types.js';

/**
 * Instruments sharing one date range and interval, summarized by unweighted
 * averages of their own statistics. The risk-free instrument is kept apart and
 * never enters the averages.
 *
 * A basket has no mutators. Build a new one to change the range.
 *
 * @example
 * ```typescript
 * const basket = await Basket.create(['msft', 'tsla', 'spy'], 'spti', '2023-01-01', '2023-06-01', context);
 * basket.tickers;            // ['MSFT', 'TSLA', 'SPY']
 * basket.riskFreeTicker;     // 'SPTI'
 * basket.statistics().close.mean;
 * ```
 */
export class Basket {
  private readonly memberList: readonly Instrument[];
  private readonly riskFreeInstrument: Instrument;
  private readonly range: { startDate: string; endDate: string; interval: Interval };
  private readonly stats: FrozenBasketStatSet;
  private readonly avgReturn: number;

  private constructor(
    members: readonly Instrument[],
    riskFree: Instrument,
    range: { startDate: string; endDate: string; interval: Interval }
  ) {
    this.memberList = members;
    this.riskFreeInstrument = riskFree;
    this.range = range;
    const averaged = averageStatSets(members.map((member) => member.statistics()));
    for (const feature of PRICE_FEATURES) {
      Object.freeze(averaged[feature]);
    }
    this.stats = Object.freeze(averaged);
    this.avgReturn = averageReturnPct(members.map((member) => member.returnPct));
  }

  /**
   * Builds every member and the risk-free instrument concurrently. The first
   * failure rejects the whole construction.
   *
   * @throws {EmptyBasketError} If `tickers` is empty, before anything is fetched
   * @throws {DataUnavailableError} If any ticker has no data for the range
   */
  static async create(
    tickers: readonly string[],
    riskFreeTicker: string,
    startDate: string,
    endDate: string,
    context: InstrumentContext,
    options: InstrumentOptions = {}
  ): Promise<Basket> {
    if (tickers.length === 0) {
      throw new EmptyBasketError('A basket needs at least one ticker', {
        riskFreeTicker,
        startDate,
        endDate,
      });
    }

    const logger = context.logger.child({ component: 'basket' });
    const interval = options.interval ?? DEFAULT_INTERVAL;
    const startTime = Date.now();

    const [riskFree, members] = await Promise.all([
      Instrument.create(riskFreeTicker, startDate, endDate, context, { interval }),
      Promise.all(tickers.map((ticker) => Instrument.create(ticker, startDate, endDate, context, { interval }))),
    ]);

    const basket = new Basket(members, riskFree, { startDate, endDate, interval });

    logger.info('Basket built', {
      members: basket.tickers,
      riskFree: riskFree.ticker,
      startDate,
      endDate,
      interval,
      duration_ms: Date.now() - startTime,
    });

    return basket;
  }

  /** Members in caller order */
  get members(): readonly Instrument[] {
    return this.memberList;
  }

  get riskFree(): Instrument {
    return this.riskFreeInstrument;
  }

  get tickers(): string[] {
    return this.memberList.map((member) => member.ticker);
  }

  get riskFreeTicker(): string {
    return this.riskFreeInstrument.ticker;
  }

  get startDate(): string {
    return this.range.startDate;
  }

  get endDate(): string {
    return this.range.endDate;
  }

  get interval(): Interval {
    return this.range.interval;
  }

  get size(): number {
    return this.memberList.length;
  }

  /**
   * Per price feature, the mean across members of each member's mean,
   * variance and standard deviation. Frozen.
   */
  statistics(): FrozenBasketStatSet {
    return this.stats;
  }

  /** Unweighted mean of member return percentages. */
  averageReturnPct(): number {
    return this.avgReturn;
  }

  riskFreeReturnPct(): number {
    return this.riskFreeInstrument.returnPct;
  }
}

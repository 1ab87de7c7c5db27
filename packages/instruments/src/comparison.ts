/**
 * @fileoverview One instrument set against a basket over the same range.
 *
 * @module @stocker/instruments/comparison
 */

import { DEFAULT_INTERVAL, EmptyBasketError } from '@stocker/contracts';
import { Basket } from './basket.js';
import { Instrument } from './instrument.js';
import type { ComparisonReturns, InstrumentContext, InstrumentOptions } from './types.js';

export class Comparison {
  private readonly focal: Instrument;
  private readonly group: Basket;

  private constructor(instrument: Instrument, basket: Basket) {
    this.focal = instrument;
    this.group = basket;
  }

  /**
   * Builds the instrument and the basket concurrently with a shared range
   * and interval. Either failure rejects the construction.
   *
   * @throws {EmptyBasketError} If `basketTickers` is empty, before anything is fetched
   * @throws {DataUnavailableError} If any ticker has no data for the range
   */
  static async create(
    ticker: string,
    basketTickers: readonly string[],
    riskFreeTicker: string,
    startDate: string,
    endDate: string,
    context: InstrumentContext,
    options: InstrumentOptions = {}
  ): Promise<Comparison> {
    if (basketTickers.length === 0) {
      throw new EmptyBasketError('A comparison needs at least one basket ticker', {
        ticker,
        riskFreeTicker,
      });
    }

    const logger = context.logger.child({ component: 'comparison' });
    const interval = options.interval ?? DEFAULT_INTERVAL;

    const [instrument, basket] = await Promise.all([
      Instrument.create(ticker, startDate, endDate, context, { interval }),
      Basket.create(basketTickers, riskFreeTicker, startDate, endDate, context, { interval }),
    ]);

    logger.info('Comparison built', {
      symbol: instrument.ticker,
      basket: basket.tickers,
      riskFree: basket.riskFreeTicker,
    });

    return new Comparison(instrument, basket);
  }

  get instrument(): Instrument {
    return this.focal;
  }

  get basket(): Basket {
    return this.group;
  }

  returns(): ComparisonReturns {
    return {
      instrument: this.focal.returnPct,
      basket: this.group.averageReturnPct(),
      riskFree: this.group.riskFreeReturnPct(),
    };
  }
}

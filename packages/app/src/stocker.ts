/**
 * Wires configuration into a logger, a provider and entity factories.
 */

import type { AxiosInstance } from 'axios';
import type { Interval, MarketDataProvider } from '@stocker/contracts';
import { createLogger, type Logger } from '@stocker/logger';
import { YahooProvider } from '@stocker/provider-yahoo';
import { Basket, Comparison, Instrument, type InstrumentContext } from '@stocker/instruments';
import type { Config } from './config/index.js';

export interface StockerOverrides {
  /** Replaces the configured logger */
  logger?: Logger;

  /** Replaces the Yahoo provider entirely */
  provider?: MarketDataProvider;

  /** HTTP client handed to the Yahoo provider; ignored when `provider` is set */
  httpClient?: AxiosInstance;
}

export interface FactoryOptions {
  /** Defaults to `market.interval` */
  interval?: Interval;
}

export interface Stocker {
  readonly config: Config;
  readonly logger: Logger;
  readonly provider: MarketDataProvider;

  instrument(ticker: string, startDate: string, endDate: string, options?: FactoryOptions): Promise<Instrument>;

  /** Risk-free ticker defaults to `market.riskFreeTicker` */
  basket(
    tickers: readonly string[],
    startDate: string,
    endDate: string,
    options?: FactoryOptions & { riskFreeTicker?: string }
  ): Promise<Basket>;

  comparison(
    ticker: string,
    basketTickers: readonly string[],
    startDate: string,
    endDate: string,
    options?: FactoryOptions & { riskFreeTicker?: string }
  ): Promise<Comparison>;
}

/**
 * Builds the logger and provider described by `config`.
 *
 * @example
 * ```typescript
 * const stocker = createStocker(loadConfig());
 * const comparison = await stocker.comparison('tsla', ['msft', 'spy'], '2023-01-01', '2023-06-01');
 * comparison.returns();
 * ```
 */
export function createStocker(config: Config, overrides: StockerOverrides = {}): Stocker {
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });

  const provider =
    overrides.provider ??
    new YahooProvider({
      chartBaseUrl: config.provider.chartBaseUrl,
      summaryBaseUrl: config.provider.summaryBaseUrl,
      timeoutMs: config.provider.timeoutMs,
      fixturePath: config.provider.fixturePath,
      httpClient: overrides.httpClient,
      logger,
    });

  const context: InstrumentContext = { provider, logger };
  const defaults = config.market;

  return {
    config,
    logger,
    provider,

    instrument: (ticker, startDate, endDate, options = {}) =>
      Instrument.create(ticker, startDate, endDate, context, {
        interval: options.interval ?? defaults.interval,
      }),

    basket: (tickers, startDate, endDate, options = {}) =>
      Basket.create(tickers, options.riskFreeTicker ?? defaults.riskFreeTicker, startDate, endDate, context, {
        interval: options.interval ?? defaults.interval,
      }),

    comparison: (ticker, basketTickers, startDate, endDate, options = {}) =>
      Comparison.create(
        ticker,
        basketTickers,
        options.riskFreeTicker ?? defaults.riskFreeTicker,
        startDate,
        endDate,
        context,
        { interval: options.interval ?? defaults.interval }
      ),
  };
}

/**
 * @fileoverview Parser utilities for Yahoo Finance data.
 *
 * Converts validated chart and quoteSummary bodies into the OhlcBar and
 * InstrumentMetadata shapes defined in @stocker/contracts.
 *
 * @module @stocker/provider-yahoo/parser
 */

import { DataUnavailableError } from '@stocker/contracts';
import type { InstrumentMetadata, OhlcBar } from '@stocker/contracts';
import type { YahooChartResponse, YahooQuoteSummaryResponse } from './types.js';

const PROVIDER = 'yahoo';

/**
 * Result of parsing a chart response.
 */
export interface ParseResult {
  bars: OhlcBar[];

  /** Rows dropped because an OHLC value was null (halts, non-trading rows) */
  skipped: number;
}

/**
 * Zips chart timestamps and quote arrays into bars.
 *
 * Rows with a null open, high, low or close are dropped; a null volume
 * becomes 0. Timestamps are epoch seconds and become ISO 8601 strings.
 *
 * @throws {DataUnavailableError} If the body carries an error or no rows
 *
 * @example
 * ```typescript
 * const { bars, skipped } = parseChartResponse(body, 'TSLA');
 * ```
 */
export function parseChartResponse(response: YahooChartResponse, ticker: string): ParseResult {
  const { chart } = response;
  if (chart.error) {
    throw new DataUnavailableError(`Yahoo has no chart for "${ticker}": ${chart.error.description}`, {
      ticker,
      provider: PROVIDER,
      yahooCode: chart.error.code,
    });
  }

  const result = chart.result?.[0];
  const timestamps = result?.timestamp;
  const quote = result?.indicators?.quote?.[0];
  if (!timestamps || timestamps.length === 0 || !quote) {
    throw new DataUnavailableError(`Yahoo returned no bars for "${ticker}"`, {
      ticker,
      provider: PROVIDER,
    });
  }

  const bars: OhlcBar[] = [];
  let skipped = 0;

  timestamps.forEach((seconds, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];

    if (open == null || high == null || low == null || close == null) {
      skipped++;
      return;
    }

    bars.push({
      timestamp: new Date(seconds * 1000).toISOString(),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  return { bars, skipped };
}

/**
 * Extracts metadata from a quoteSummary body.
 *
 * Beta comes from `summaryDetail.beta`, falling back to
 * `defaultKeyStatistics.beta`, else null.
 *
 * @throws {DataUnavailableError} If the body carries an error or no result
 */
export function parseQuoteSummary(
  response: YahooQuoteSummaryResponse,
  ticker: string
): InstrumentMetadata {
  const { quoteSummary } = response;
  if (quoteSummary.error) {
    throw new DataUnavailableError(
      `Yahoo has no summary for "${ticker}": ${quoteSummary.error.description}`,
      { ticker, provider: PROVIDER, yahooCode: quoteSummary.error.code }
    );
  }

  const result = quoteSummary.result?.[0];
  if (!result) {
    throw new DataUnavailableError(`Yahoo returned no summary for "${ticker}"`, {
      ticker,
      provider: PROVIDER,
    });
  }

  const beta = result.summaryDetail?.beta?.raw ?? result.defaultKeyStatistics?.beta?.raw ?? null;
  const currency = result.summaryDetail?.currency;

  return currency === undefined ? { symbol: ticker, beta } : { symbol: ticker, beta, currency };
}

/**
 * @fileoverview Public API for @stocker/provider-yahoo package.
 *
 * @module @stocker/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@stocker/provider-yahoo';
 * import { Interval } from '@stocker/contracts';
 *
 * const provider = new YahooProvider();
 * const bars = await provider.getSeries({
 *   ticker: 'MSFT',
 *   startDate: '2023-01-01',
 *   endDate: '2023-06-01',
 *   interval: Interval.D1
 * });
 * ```
 */

export { YahooProvider, DEFAULT_CHART_BASE_URL, DEFAULT_SUMMARY_BASE_URL } from './yahoo-provider.js';

export { parseChartResponse, parseQuoteSummary } from './parser.js';

export { chartResponseSchema, quoteSummaryResponseSchema } from './types.js';
export type { YahooChartResponse, YahooQuoteSummaryResponse, YahooProviderOptions } from './types.js';
export type { ParseResult } from './parser.js';

/**
 * @stocker/instruments
 *
 * Instruments, baskets and comparisons built on a `MarketDataProvider`.
 *
 * @example
 * ```typescript
 * import { Comparison } from "@stocker/instruments";
 *
 * const comparison = await Comparison.create(
 *   "tsla", ["msft", "spy"], "spti", "2023-01-01", "2023-06-01", { provider, logger }
 * );
 * comparison.returns(); // { instrument, basket, riskFree }
 * ```
 *
 * @packageDocumentation
 */

export { Instrument } from './instrument.js';
export type { InstrumentSummary } from './instrument.js';
export { Basket } from './basket.js';
export { Comparison } from './comparison.js';
export { normalizeTicker } from './ticker.js';
export type { InstrumentContext, InstrumentOptions, ComparisonReturns } from './types.js';

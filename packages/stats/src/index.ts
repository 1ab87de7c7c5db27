/**
 * @stocker/stats
 *
 * Pure, I/O-free functions that turn an OHLC series into derived columns,
 * descriptive statistics and return figures, and that average per-instrument
 * statistics into basket statistics.
 *
 * @example
 * ```typescript
 * import { deriveSeries, computeStatSet, returnPct } from "@stocker/stats";
 *
 * const series = deriveSeries(bars);
 * const stats = computeStatSet(series, "TSLA");
 * const change = returnPct(series, "TSLA");
 * ```
 *
 * @packageDocumentation
 */

export {
  mean,
  sampleVariance,
  sampleStandardDeviation,
  min,
  max,
  summarize,
} from './descriptive.js';

export { deriveBar, deriveSeries } from './derive.js';

export { column, computeFeatureStats, computeStatSet, averageStatSets } from './statset.js';

export { returnPct, averageReturnPct } from './returns.js';

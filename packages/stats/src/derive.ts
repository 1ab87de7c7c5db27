/**
 * Per-bar derived columns.
 *
 * deriveBar reads only the raw open/high/low/close fields, so running it on
 * a bar that already carries closeOpen/highLow recomputes the same values
 * instead of compounding them.
 */

import type { DerivedBar, OhlcBar } from '@stocker/contracts';

export function deriveBar(bar: OhlcBar): DerivedBar {
  return {
    timestamp: bar.timestamp,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    closeOpen: bar.close - bar.open,
    highLow: bar.high - bar.low,
  };
}

/**
 * Returns a new series with closeOpen and highLow on every bar.
 * The input is not modified.
 *
 * @example
 * ```typescript
 * const [bar] = deriveSeries([{ timestamp, open: 10, high: 12, low: 9, close: 11, volume: 0 }]);
 * // bar.closeOpen === 1, bar.highLow === 3
 * ```
 */
export function deriveSeries(bars: readonly OhlcBar[]): DerivedBar[] {
  return bars.map(deriveBar);
}

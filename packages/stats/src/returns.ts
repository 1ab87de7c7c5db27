/**
 * Period return figures.
 */

import { EmptyBasketError, InsufficientDataError } from '@stocker/contracts';
import type { OhlcBar } from '@stocker/contracts';
import { mean } from './descriptive.js';

/**
 * Fractional change from the first bar's open to the last bar's close.
 *
 * A first open of 0 is not guarded: the result follows IEEE division
 * (Infinity, -Infinity or NaN).
 *
 * @throws {InsufficientDataError} If the series is empty
 *
 * @example
 * ```typescript
 * returnPct([{ open: 100, close: 104, ... }, { open: 104, close: 110, ... }]); // 0.1
 * ```
 */
export function returnPct(series: readonly OhlcBar[], ticker?: string): number {
  const first = series[0];
  const last = series[series.length - 1];
  if (first === undefined || last === undefined) {
    throw new InsufficientDataError('Return percentage needs at least one bar', {
      required: 1,
      received: 0,
      ticker,
    });
  }
  return (last.close - first.open) / first.open;
}

/**
 * Unweighted mean of member return percentages.
 *
 * @throws {EmptyBasketError} If no returns are given
 */
export function averageReturnPct(returns: readonly number[]): number {
  if (returns.length === 0) {
    throw new EmptyBasketError('Cannot average returns of an empty basket', { members: 0 });
  }
  return mean(returns);
}

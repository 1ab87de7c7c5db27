/**
 * Ticker normalization.
 */

import { DataUnavailableError } from '@stocker/contracts';

/**
 * Canonical form of a user-supplied ticker: the first whitespace-delimited
 * token, uppercased.
 *
 * @throws {DataUnavailableError} If nothing remains after trimming
 *
 * @example
 * ```typescript
 * normalizeTicker('tsla')        // → 'TSLA'
 * normalizeTicker(' msft corp')  // → 'MSFT'
 * normalizeTicker('brk-b\tclass')  // → 'BRK-B'
 * ```
 */
export function normalizeTicker(raw: string): string {
  const [token] = raw.trim().split(/\s+/);
  if (!token) {
    throw new DataUnavailableError('Ticker cannot be empty', { ticker: raw });
  }
  return token.toUpperCase();
}

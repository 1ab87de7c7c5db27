/**
 * @fileoverview Bar intervals for historical series queries.
 *
 * Values match the interval strings of the Yahoo Finance chart endpoint.
 *
 * @module @stocker/contracts/intervals
 */

/**
 * Supported bar sizes.
 *
 * @invariant Ordered from smallest to largest duration
 */
export enum Interval {
  /** Daily bars */
  D1 = '1d',
  /** 5-day bars */
  D5 = '5d',
  /** Weekly bars */
  W1 = '1wk',
  /** Monthly bars */
  MO1 = '1mo',
  /** Quarterly bars */
  MO3 = '3mo',
}

export const DEFAULT_INTERVAL = Interval.D1;

const INTERVAL_VALUES: readonly string[] = Object.values(Interval);

const INTERVAL_LABELS: Record<Interval, string> = {
  [Interval.D1]: 'Daily',
  [Interval.D5]: '5 Days',
  [Interval.W1]: 'Weekly',
  [Interval.MO1]: 'Monthly',
  [Interval.MO3]: 'Quarterly',
};

/**
 * Validates whether a string is a valid Interval value.
 *
 * @example
 * ```typescript
 * isValidInterval('1wk')  // true
 * isValidInterval('1h')   // false
 * ```
 */
export function isValidInterval(value: string): value is Interval {
  return INTERVAL_VALUES.includes(value);
}

/**
 * Parses an interval string, throwing on unknown values.
 */
export function parseInterval(value: string): Interval {
  const normalized = value.trim().toLowerCase();
  if (!isValidInterval(normalized)) {
    throw new Error(
      `Invalid interval: ${value}. Supported: ${INTERVAL_VALUES.join(', ')}`
    );
  }
  return normalized;
}

export function getIntervalLabel(interval: Interval): string {
  return INTERVAL_LABELS[interval];
}

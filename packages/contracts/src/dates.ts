/**
 * @fileoverview Date range helpers.
 *
 * Ranges are `yyyy-mm-dd` calendar dates interpreted at 00:00 UTC, start
 * inclusive and end exclusive.
 *
 * @module @stocker/contracts/dates
 */

import { InvalidDateRangeError } from './errors.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True if `value` is a real calendar date written as `yyyy-mm-dd`.
 *
 * @example
 * ```typescript
 * isIsoDate('2023-01-01')  // true
 * isIsoDate('2023-02-30')  // false
 * isIsoDate('01/01/2023')  // false
 * ```
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const date = new Date(`${value}T00:00:00.000Z`);
  // Date rolls 2023-02-30 over to March, so compare the components back
  return !isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

/**
 * Milliseconds since epoch of `yyyy-mm-dd` at 00:00 UTC.
 */
export function toEpochMillis(date: string): number {
  return Date.parse(`${date}T00:00:00.000Z`);
}

/**
 * Seconds since epoch of `yyyy-mm-dd` at 00:00 UTC.
 */
export function toEpochSeconds(date: string): number {
  return Math.floor(toEpochMillis(date) / 1000);
}

/**
 * Throws `InvalidDateRangeError` unless both dates are `yyyy-mm-dd` and start < end.
 */
export function assertDateRange(startDate: string, endDate: string): void {
  if (!isIsoDate(startDate)) {
    throw new InvalidDateRangeError(`Invalid start date: "${startDate}" (expected yyyy-mm-dd)`, {
      startDate,
      endDate,
    });
  }
  if (!isIsoDate(endDate)) {
    throw new InvalidDateRangeError(`Invalid end date: "${endDate}" (expected yyyy-mm-dd)`, {
      startDate,
      endDate,
    });
  }
  if (toEpochMillis(startDate) >= toEpochMillis(endDate)) {
    throw new InvalidDateRangeError(
      `Invalid date range: start (${startDate}) must be before end (${endDate})`,
      { startDate, endDate }
    );
  }
}

/**
 * True if an ISO timestamp falls inside `[startDate, endDate)`.
 */
export function isWithinRange(timestamp: string, startDate: string, endDate: string): boolean {
  const time = Date.parse(timestamp);
  return time >= toEpochMillis(startDate) && time < toEpochMillis(endDate);
}

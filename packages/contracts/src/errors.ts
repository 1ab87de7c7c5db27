/**
 * @fileoverview Error taxonomy for the Stocker suite.
 *
 * Every error carries a machine-readable code, an optional structured payload
 * and the ISO timestamp of its creation.
 *
 * @module @stocker/contracts/errors
 */

/**
 * Base error class for all Stocker errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new StockerError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class StockerError extends Error {
  /** Machine-readable error code (e.g., 'DATA_UNAVAILABLE'). */
  readonly code: string;

  /** Structured context for debugging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the provider has no data for a ticker or range: unknown symbol,
 * empty range, or an empty response.
 *
 * @example
 * ```typescript
 * throw new DataUnavailableError('No data for "ZZZZINVALID"', {
 *   ticker: 'ZZZZINVALID',
 *   provider: 'yahoo',
 * });
 * ```
 */
export class DataUnavailableError extends StockerError {
  constructor(
    message: string,
    data: {
      ticker: string;
      provider?: string;
      startDate?: string;
      endDate?: string;
      [key: string]: unknown;
    }
  ) {
    super('DATA_UNAVAILABLE', message, data);
  }
}

/**
 * Thrown when statistics or returns are requested over a series with too few bars.
 */
export class InsufficientDataError extends StockerError {
  constructor(
    message: string,
    data: {
      required: number;
      received: number;
      ticker?: string;
      [key: string]: unknown;
    }
  ) {
    super('INSUFFICIENT_DATA', message, data);
  }
}

/**
 * Thrown when a basket is built, or averaged, with zero member instruments.
 */
export class EmptyBasketError extends StockerError {
  constructor(message: string, data: Record<string, unknown> = {}) {
    super('EMPTY_BASKET', message, data);
  }
}

/**
 * Thrown when a date is not `yyyy-mm-dd` or a range does not satisfy start < end.
 */
export class InvalidDateRangeError extends StockerError {
  constructor(message: string, data: { startDate: string; endDate?: string }) {
    super('INVALID_DATE_RANGE', message, data);
  }
}

/**
 * Thrown when a provider request fails for a reason other than missing data
 * (network failure, timeout, 5xx, malformed body).
 */
export class ProviderRequestError extends StockerError {
  constructor(
    message: string,
    data: {
      provider: string;
      ticker: string;
      status?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_REQUEST_FAILED', message, data);
  }
}

/**
 * Type guard to check if an error is a StockerError.
 *
 * @example
 * ```typescript
 * try {
 *   await Instrument.create('tsla', '2023-01-01', '2023-06-01', context);
 * } catch (err) {
 *   if (isStockerError(err)) {
 *     logger.error('Instrument failed', { code: err.code });
 *   }
 * }
 * ```
 */
export function isStockerError(error: unknown): error is StockerError {
  return error instanceof StockerError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isEmptyBasketError(error: unknown): error is EmptyBasketError {
  return error instanceof EmptyBasketError;
}

export function isProviderRequestError(error: unknown): error is ProviderRequestError {
  return error instanceof ProviderRequestError;
}

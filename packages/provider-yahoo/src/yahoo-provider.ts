/**
 * @fileoverview Yahoo Finance data provider implementation.
 *
 * Implements the MarketDataProvider contract from @stocker/contracts against
 * the Yahoo Finance chart and quoteSummary endpoints, or against recorded
 * responses on disk when a fixture path is configured.
 *
 * @module @stocker/provider-yahoo
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ZodType } from 'zod';
import {
  DataUnavailableError,
  ProviderRequestError,
  assertDateRange,
  isValidInterval,
  isWithinRange,
  toEpochSeconds,
} from '@stocker/contracts';
import type {
  InstrumentMetadata,
  MarketDataProvider,
  OhlcBar,
  SeriesRequest,
} from '@stocker/contracts';
import type { Logger } from '@stocker/logger';
import { parseChartResponse, parseQuoteSummary } from './parser.js';
import { chartResponseSchema, quoteSummaryResponseSchema } from './types.js';
import type { YahooProviderOptions } from './types.js';

export const DEFAULT_CHART_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
export const DEFAULT_SUMMARY_BASE_URL = 'https://query2.finance.yahoo.com/v10/finance/quoteSummary';
const DEFAULT_TIMEOUT_MS = 10_000;

/** HTTP statuses Yahoo uses for unknown symbols and ranges without data */
const NO_DATA_STATUSES = new Set([400, 404]);

/** Uppercase symbols, including index (^GSPC), FX (EURUSD=X) and class (BRK-B, BRK.B) forms */
const TICKER_PATTERN = /^[A-Z0-9.^=-]+$/;

/**
 * Yahoo Finance data provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ logger });
 * const bars = await provider.getSeries({
 *   ticker: 'TSLA',
 *   startDate: '2023-01-01',
 *   endDate: '2023-06-01',
 *   interval: Interval.D1
 * });
 * ```
 */
export class YahooProvider implements MarketDataProvider {
  readonly name = 'yahoo';

  private readonly http: AxiosInstance;
  private readonly chartBaseUrl: string;
  private readonly summaryBaseUrl: string;
  private readonly fixturePath?: string;
  private readonly logger?: Logger;

  constructor(options: YahooProviderOptions = {}) {
    this.http = options.httpClient ?? axios.create({ timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS });
    this.chartBaseUrl = options.chartBaseUrl ?? DEFAULT_CHART_BASE_URL;
    this.summaryBaseUrl = options.summaryBaseUrl ?? DEFAULT_SUMMARY_BASE_URL;
    this.fixturePath = options.fixturePath;
    this.logger = options.logger?.child({ component: 'provider-yahoo', provider: this.name });
  }

  /**
   * Fetches instrument metadata (beta, currency).
   *
   * @throws {DataUnavailableError} If Yahoo does not know the ticker
   * @throws {ProviderRequestError} On transport failures or malformed bodies
   */
  async getMetadata(ticker: string): Promise<InstrumentMetadata> {
    this.validateTicker(ticker);
    const startTime = Date.now();

    const body = this.fixturePath
      ? await this.loadFixture(`${ticker}-summary.json`, ticker)
      : await this.request(`${this.summaryBaseUrl}/${encodeURIComponent(ticker)}`, ticker, {
          modules: 'summaryDetail,defaultKeyStatistics',
        });

    const metadata = parseQuoteSummary(this.validate(quoteSummaryResponseSchema, body, ticker), ticker);

    this.logger?.debug('Metadata fetched', {
      symbol: ticker,
      operation: 'getMetadata',
      beta: metadata.beta,
      duration_ms: Date.now() - startTime,
    });

    return metadata;
  }

  /**
   * Fetches bars in `[startDate, endDate)`, sorted ascending.
   *
   * @throws {InvalidDateRangeError} If the range is malformed
   * @throws {DataUnavailableError} If Yahoo does not know the ticker or has no bars in range
   * @throws {ProviderRequestError} On transport failures or malformed bodies
   */
  async getSeries(request: SeriesRequest): Promise<OhlcBar[]> {
    this.validateRequest(request);
    const { ticker, startDate, endDate, interval } = request;
    const startTime = Date.now();

    const body = this.fixturePath
      ? await this.loadFixture(`${ticker}-chart-${interval}.json`, ticker)
      : await this.request(`${this.chartBaseUrl}/${encodeURIComponent(ticker)}`, ticker, {
          period1: toEpochSeconds(startDate),
          period2: toEpochSeconds(endDate),
          interval,
          includePrePost: false,
          events: 'div,splits',
        });

    const { bars, skipped } = parseChartResponse(this.validate(chartResponseSchema, body, ticker), ticker);

    const inRange = bars
      .filter((bar) => isWithinRange(bar.timestamp, startDate, endDate))
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));

    if (inRange.length === 0) {
      throw new DataUnavailableError(`No ${interval} bars for "${ticker}" in [${startDate}, ${endDate})`, {
        ticker,
        provider: this.name,
        startDate,
        endDate,
      });
    }

    this.logger?.debug('Series fetched', {
      symbol: ticker,
      operation: 'getSeries',
      interval,
      count: inRange.length,
      skipped,
      duration_ms: Date.now() - startTime,
    });

    return inRange;
  }

  private validateTicker(ticker: string): void {
    if (!TICKER_PATTERN.test(ticker)) {
      throw new DataUnavailableError(`Invalid ticker "${ticker}": expected an uppercase symbol`, {
        ticker,
        provider: this.name,
      });
    }
  }

  private validateRequest(request: SeriesRequest): void {
    this.validateTicker(request.ticker);

    if (!isValidInterval(request.interval)) {
      throw new ProviderRequestError(`Invalid interval: ${request.interval}`, {
        provider: this.name,
        ticker: request.ticker,
      });
    }

    assertDateRange(request.startDate, request.endDate);
  }

  /**
   * GETs a Yahoo endpoint and maps transport failures onto the error taxonomy.
   */
  private async request(
    url: string,
    ticker: string,
    params: Record<string, string | number | boolean>
  ): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined && NO_DATA_STATUSES.has(status)) {
          throw new DataUnavailableError(`Yahoo has no data for "${ticker}" (HTTP ${status})`, {
            ticker,
            provider: this.name,
            status,
          });
        }
        throw new ProviderRequestError(`Yahoo request failed for "${ticker}": ${error.message}`, {
          provider: this.name,
          ticker,
          status,
          url,
        });
      }
      throw error;
    }
  }

  /**
   * Reads a recorded response. A missing file means the ticker is unknown.
   */
  private async loadFixture(fileName: string, ticker: string): Promise<unknown> {
    const fixturePath = this.fixturePath;
    if (!fixturePath) {
      throw new Error('Fixture path not configured');
    }

    const filePath = join(fixturePath, fileName);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new DataUnavailableError(`No fixture for "${ticker}"`, {
          ticker,
          provider: this.name,
          fixture: filePath,
        });
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new ProviderRequestError(`Fixture is not valid JSON: ${filePath}`, {
        provider: this.name,
        ticker,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private validate<T>(schema: ZodType<T>, body: unknown, ticker: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ProviderRequestError(`Malformed Yahoo response for "${ticker}"`, {
        provider: this.name,
        ticker,
        issues,
      });
    }
    return result.data;
  }
}

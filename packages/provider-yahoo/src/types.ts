/**
 * @fileoverview Yahoo Finance provider-specific types.
 *
 * Response shapes are zod schemas so that bodies coming off the wire are
 * validated before any field is read.
 *
 * @module @stocker/provider-yahoo/types
 */

import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import type { Logger } from '@stocker/logger';

const nullableNumbers = z.array(z.number().nullable());

const yahooErrorSchema = z
  .object({
    code: z.string(),
    description: z.string(),
  })
  .nullable()
  .optional();

/**
 * Body of `GET /v8/finance/chart/{symbol}`.
 */
export const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z
            .object({
              symbol: z.string(),
              currency: z.string().nullable().optional(),
            })
            .optional(),
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              quote: z
                .array(
                  z.object({
                    open: nullableNumbers.optional(),
                    high: nullableNumbers.optional(),
                    low: nullableNumbers.optional(),
                    close: nullableNumbers.optional(),
                    volume: nullableNumbers.optional(),
                  })
                )
                .optional(),
            })
            .optional(),
        })
      )
      .nullable()
      .optional(),
    error: yahooErrorSchema,
  }),
});

export type YahooChartResponse = z.infer<typeof chartResponseSchema>;

const rawValueSchema = z.object({ raw: z.number().optional() }).optional();

/**
 * Body of `GET /v10/finance/quoteSummary/{symbol}?modules=summaryDetail,defaultKeyStatistics`.
 */
export const quoteSummaryResponseSchema = z.object({
  quoteSummary: z.object({
    result: z
      .array(
        z.object({
          summaryDetail: z
            .object({
              beta: rawValueSchema,
              currency: z.string().optional(),
            })
            .optional(),
          defaultKeyStatistics: z
            .object({
              beta: rawValueSchema,
            })
            .optional(),
        })
      )
      .nullable()
      .optional(),
    error: yahooErrorSchema,
  }),
});

export type YahooQuoteSummaryResponse = z.infer<typeof quoteSummaryResponseSchema>;

/**
 * Options for YahooProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * Chart endpoint base URL.
   * @default 'https://query1.finance.yahoo.com/v8/finance/chart'
   */
  chartBaseUrl?: string;

  /**
   * quoteSummary endpoint base URL.
   * @default 'https://query2.finance.yahoo.com/v10/finance/quoteSummary'
   */
  summaryBaseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /**
   * HTTP client; one is created from the options above when omitted.
   */
  httpClient?: AxiosInstance;

  /**
   * Directory of recorded responses. When set, no HTTP request is made:
   * `{TICKER}-chart-{interval}.json` and `{TICKER}-summary.json` are read instead.
   */
  fixturePath?: string;

  /**
   * Logger for request-level debug output.
   */
  logger?: Logger;
}

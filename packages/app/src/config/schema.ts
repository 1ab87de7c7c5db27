/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { Interval } from '@stocker/contracts';
import { DEFAULT_CHART_BASE_URL, DEFAULT_SUMMARY_BASE_URL } from '@stocker/provider-yahoo';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  provider: z
    .object({
      chartBaseUrl: z.string().url().default(DEFAULT_CHART_BASE_URL),
      summaryBaseUrl: z.string().url().default(DEFAULT_SUMMARY_BASE_URL),
      timeoutMs: z.coerce.number().int().positive().default(10000),
      fixturePath: z.string().min(1).optional(),
    })
    .default({}),

  market: z
    .object({
      interval: z.string().trim().toLowerCase().pipe(z.nativeEnum(Interval)).default(Interval.D1),
      riskFreeTicker: z.string().trim().min(1).default('SPTI'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  YAHOO_CHART_BASE_URL: 'provider.chartBaseUrl',
  YAHOO_SUMMARY_BASE_URL: 'provider.summaryBaseUrl',
  YAHOO_TIMEOUT_MS: 'provider.timeoutMs',
  YAHOO_FIXTURE_PATH: 'provider.fixturePath',
  MARKET_INTERVAL: 'market.interval',
  MARKET_RISK_FREE_TICKER: 'market.riskFreeTicker',
};

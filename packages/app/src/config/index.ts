/**
 * Configuration loading and management
 */

import { StockerError } from '@stocker/contracts';
import type { Logger } from '@stocker/logger';
import { configSchema, envMapping, type Config } from './schema.js';

interface RawConfig {
  [key: string]: string | RawConfig;
}

/**
 * Thrown when environment values fail validation. The message lists every
 * invalid path.
 */
export class ConfigValidationError extends StockerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Configuration validation failed:\n${issues.join('\n')}`, { issues });
    this.issues = issues;
  }
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {ConfigValidationError} If any value is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig({ LOG_LEVEL: 'debug', MARKET_INTERVAL: '1wk' });
 * config.market.interval; // Interval.W1
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    // Blank variables count as unset
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigValidationError(issues);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: string): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    return;
  }

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    provider: {
      mode: config.provider.fixturePath ? 'fixture' : 'http',
      timeoutMs: config.provider.timeoutMs,
    },
    market: {
      interval: config.market.interval,
      riskFreeTicker: config.market.riskFreeTicker,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';

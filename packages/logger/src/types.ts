/**
 * @fileoverview Type definitions for the Stocker logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures surfaced to the caller
 * - 'warn': Suspicious results (e.g. a non-finite return)
 * - 'info': Instrument and basket builds
 * - 'debug': Individual provider requests
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/stocker.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress all output. Useful in tests.
   * @default false
   */
  silent?: boolean;
}

/**
 * Child logger context fields, included in every entry of the child.
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  provider?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;

/**
 * @fileoverview Main logger factory for the Stocker suite.
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - JSON output in production, pretty-print otherwise (overridable)
 * - Console and optional file transports
 * - Sensitive field names are redacted before formatting
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const instrumentLogger = logger.child({ component: 'instrument', symbol: 'TSLA' });
 * instrumentLogger.info('Instrument built', { count: 103 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // Files are always JSON; colour codes do not belong on disk
        format: format.combine(redactPII(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always include `context`.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'provider-yahoo' });
 * providerLogger.debug('Series fetched', { symbol: 'MSFT', count: 103 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * @fileoverview Custom Winston formats for the Stocker logger.
 * Includes secret redaction, standard fields and pretty-print output.
 */

import { format } from 'winston';

/**
 * Field name patterns whose values never reach a log line.
 * Matches are case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /crumb/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ ticker: 'TSLA', apiKey: 'test-secret' });
 * // { ticker: 'TSLA', apiKey: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  // Errors keep their prototype so format.errors() can still read the stack
  if (value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(field);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must come first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { baseUrl: 'https://example.test', apiKey: 'test-secret' });
 * // {"level":"info","message":"Provider configured","baseUrl":"https://example.test","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Winston format that adds an ISO 8601 timestamp and error stacks.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders one entry as a single human-readable line.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Instrument built component=instrument symbol=TSLA count=103
 * ```
 */
export function renderLine(info: Record<string, unknown>): string {
  const { timestamp, level, message, component, symbol, stack, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${String(component)}`);
  if (symbol) context.push(`symbol=${String(symbol)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (key === 'splat') {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(timestamp)}] ${String(level)}: ${String(message)}${contextStr}`;

  return stack ? `${baseMsg}\n${String(stack)}` : baseMsg;
}

/**
 * Winston format for human-readable pretty-print output.
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);

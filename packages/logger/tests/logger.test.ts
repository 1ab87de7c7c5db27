/**
 * @fileoverview Tests for logger creation, formats and redaction
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import winston from 'winston';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import { redactSensitiveFields, isSensitiveFieldName, renderLine } from '../src/formats.js';
import type { Logger, LoggerConfig } from '../src/types.js';

/**
 * Builds a JSON logger whose output lands in memory.
 */
function captureLogger(config: Omit<LoggerConfig, 'json' | 'console'>): {
  logger: Logger;
  entries: () => Promise<unknown[]>;
} {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });

  const logger = createLogger({ ...config, json: true, console: false });
  logger.add(new winston.transports.Stream({ stream }));

  return {
    logger,
    entries: async () => {
      await new Promise((resolve) => setImmediate(resolve));
      return chunks
        .join('')
        .split('\n')
        .filter((line) => line.trim().length > 0)
        .map((line): unknown => JSON.parse(line));
    },
  };
}

describe('createLogger', () => {
  it('should create a logger with the configured level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      const logger = createLogger({ level, console: false });
      expect(logger.level).toBe(level);
    }
  });

  it('should honour the silent flag', () => {
    const logger = createLogger({ level: 'debug', silent: true });

    expect(logger.silent).toBe(true);
  });

  it('should write structured JSON entries with a timestamp', async () => {
    const { logger, entries } = captureLogger({ level: 'info' });

    logger.info('Instrument built', { symbol: 'TSLA', count: 103 });

    const [entry] = await entries();
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Instrument built',
      symbol: 'TSLA',
      count: 103,
    });
    expect(entry).toHaveProperty('timestamp');
  });

  it('should respect log level filtering', async () => {
    const { logger, entries } = captureLogger({ level: 'warn' });

    logger.debug('Debug message');
    logger.info('Info message');
    logger.warn('Warn message');
    logger.error('Error message');

    const logged = await entries();
    expect(logged).toHaveLength(2);
    expect(logged[0]).toMatchObject({ level: 'warn', message: 'Warn message' });
    expect(logged[1]).toMatchObject({ level: 'error', message: 'Error message' });
  });

  it('should include child context in every entry', async () => {
    const { logger, entries } = captureLogger({ level: 'info' });

    const child = createChildLogger(logger, { component: 'basket', symbol: 'SPTI' });
    child.info('Basket built');

    const [entry] = await entries();
    expect(entry).toMatchObject({ component: 'basket', symbol: 'SPTI', message: 'Basket built' });
  });

  it('should redact sensitive metadata', async () => {
    const { logger, entries } = captureLogger({ level: 'info' });

    logger.info('Provider configured', {
      baseUrl: 'https://example.test',
      apiKey: 'test-secret',
      headers: { cookie: 'test-cookie', accept: 'application/json' },
    });

    const [entry] = await entries();
    expect(entry).toMatchObject({
      baseUrl: 'https://example.test',
      apiKey: '[REDACTED]',
      headers: { cookie: '[REDACTED]', accept: 'application/json' },
    });
  });
});

describe('redactSensitiveFields', () => {
  it('should redact nested objects and arrays without mutating input', () => {
    const input = {
      ticker: 'TSLA',
      auth: { token: 'test-token', user: 'alice' },
      attempts: [{ password: 'test-password' }],
    };

    expect(redactSensitiveFields(input)).toEqual({
      ticker: 'TSLA',
      auth: { token: '[REDACTED]', user: 'alice' },
      attempts: [{ password: '[REDACTED]' }],
    });
    expect(input.auth.token).toBe('test-token');
  });

  it('should pass primitives through', () => {
    expect(redactSensitiveFields(42)).toBe(42);
    expect(redactSensitiveFields(null)).toBeNull();
    expect(redactSensitiveFields('plain')).toBe('plain');
  });

  it('should match field names case-insensitively', () => {
    expect(isSensitiveFieldName('API_KEY')).toBe(true);
    expect(isSensitiveFieldName('crumb')).toBe(true);
    expect(isSensitiveFieldName('ticker')).toBe(false);
  });
});

describe('renderLine', () => {
  it('should render context fields after the message', () => {
    const line = renderLine({
      timestamp: '2023-01-01T00:00:00.000Z',
      level: 'info',
      message: 'Instrument built',
      component: 'instrument',
      symbol: 'TSLA',
      count: 103,
    });

    expect(line).toBe(
      '[2023-01-01T00:00:00.000Z] info: Instrument built component=instrument symbol=TSLA count=103'
    );
  });

  it('should append the stack on a new line', () => {
    const line = renderLine({
      timestamp: '2023-01-01T00:00:00.000Z',
      level: 'error',
      message: 'Build failed',
      stack: 'Error: Build failed\n    at test',
    });

    expect(line).toBe(
      '[2023-01-01T00:00:00.000Z] error: Build failed\nError: Build failed\n    at test'
    );
  });
});

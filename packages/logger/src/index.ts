/**
 * @fileoverview Public API exports for @stocker/logger
 * Structured logging for the Stocker suite
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats and redaction
export { redactPII, redactSensitiveFields, isSensitiveFieldName, renderLine } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';

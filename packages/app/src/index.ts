/**
 * Main exports for @stocker/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, ConfigValidationError } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config } from './config/schema.js';

// Wiring
export { createStocker } from './stocker.js';
export type { Stocker, StockerOverrides, FactoryOptions } from './stocker.js';

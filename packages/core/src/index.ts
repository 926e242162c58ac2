/**
 * @waypost/core - Shared types, utilities, and constants
 */

// Types
export * from './types/index.js';

// Constants
export * from './constants/index.js';

// Config
export {
  loadConfig,
  parseConfig,
  validateConfig,
  defaultConfig,
  ConfigError,
  waypostConfigSchema,
} from './config/index.js';

// Logger
export { createLogger, createFetchLogger, logger } from './logger/index.js';
export type { Logger, LogContext } from './logger/index.js';

// Utils
export * from './utils/index.js';

/**
 * @adsync/utils
 * 
 * Shared utilities package containing:
 * - Logger factory
 * - Atomic file writes
 * - Timeouts
 * - Type guards
 */

// File operations
export { safeWriteFile, safeReadFile } from './file.js';

// Type guards
export { isObject, isArray, toError } from './guards.js';

// Time utilities
export { withTimeout, TimeoutError } from './time.js';

// Logger
export {
  logger,
  createLogger,
  createServiceLogger,
  type Logger,
  type LoggerOptions,
} from './logger.js';

/**
 * @ytp-forge/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  createTempDir,
  safeReadFile,
  isRegularFile,
  listFiles,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getBasename,
} from './path.js';

// Type guards
export {
  isString,
  isNonEmptyString,
  isDefined,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';

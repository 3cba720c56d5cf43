/**
 * @chaptercut/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Size formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  LineSplitter,
  OutputCollector,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  getFileSizeBytes,
  getFreeDiskBytes,
  pathExists,
  copyFile,
  removePath,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  chapterFilename,
  getExtension,
} from './path.js';

// Type guards
export {
  isString,
  isObject,
  errorMessage,
} from './guards.js';

// Time utilities
export {
  formatMegabytes,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';

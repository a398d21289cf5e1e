/**
 * @blobpack/utils
 *
 * Shared utilities package containing:
 * - File operations and streaming hashes
 * - Path utilities
 * - Logger
 */

// File operations
export {
  calculateFileHash,
  getFileSizeBytes,
  pathExists,
  isDirectory,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  isWithin,
} from './path.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';

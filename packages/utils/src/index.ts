/**
 * @capture-relay/utils
 *
 * Shared utilities package containing:
 * - Logger
 * - Retry logic
 * - File and path helpers
 * - Time helpers
 */

// Logger
export {
  logger,
  buildLogger,
  createLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';

// Retry logic
export { retryWithBackoff, backoffDelay, type RetryOptions, type RetryOutcome } from './retry.js';

// File operations
export { safeFileSize, isMissingPathError } from './file.js';

// Path utilities
export { getExtension, isDigits } from './path.js';

// Time utilities
export { sleep, formatDuration, formatBytes } from './time.js';

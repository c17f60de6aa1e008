/**
 * @mediakit/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - Path utilities
 * - Type guards
 * - Time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  isBrokenPipe,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  getBasename,
} from './path.js';

// Type guards
export { isErrnoException } from './guards.js';

// Time utilities
export {
  parseTimecode,
  formatSeconds,
} from './time.js';

// Logger
export {
  logger,
  createLogger,
  buildLoggerOptions,
  loggerSettingsFromEnv,
  type Logger,
  type LoggerSettings,
} from './logger.js';

/**
 * Mirror Xref - Utilities Module
 * @module utils
 *
 * Re-exports all utility functions and types.
 */

// Error handling
export {
  XrefError,
  ConfigError,
  ManifestError,
  LookupError,
  CacheError,
  ErrorCodes,
  isXrefError,
  wrapError,
  type ErrorCode,
} from './errors.js';

// Logging
export {
  Logger,
  logger,
  createLogger,
  isLogLevel,
  type ChildLogger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

// Path utilities
export {
  normalizePath,
  createIgnoreFilter,
  isDirectory,
  DEFAULT_IGNORE_PATTERNS,
} from './paths.js';

/**
 * Mirror Xref - Centralized Logging
 * @module utils/logger
 *
 * Single logging interface for consistent output.
 *
 * IMPORTANT: Engine modules log through this logger (or a child of it),
 * never through console directly. The CLI prints its own results.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface LoggerOptions {
  /** Minimum level to output */
  level?: LogLevel;
  /** Output format: 'pretty' for CLI, 'json' for piped output */
  format?: 'pretty' | 'json';
  /** Enable colored output (pretty format only) */
  colors?: boolean;
  /** Custom output function (for testing) */
  output?: (entry: LogEntry) => void;
}

/**
 * Logger bound to a base context
 */
export interface ChildLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

// =============================================================================
// Log Level Priorities
// =============================================================================

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(levelPriority, value);
}

// =============================================================================
// ANSI Colors
// =============================================================================

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

// =============================================================================
// Logger Class
// =============================================================================

export class Logger implements ChildLogger {
  private level: LogLevel;
  private format: 'pretty' | 'json';
  private useColors: boolean;
  private customOutput?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || this.getDefaultLevel();
    this.format = options.format || this.getDefaultFormat();
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.customOutput = options.output;
  }

  /**
   * Get default log level from environment
   */
  private getDefaultLevel(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLevel)) {
      return envLevel;
    }
    return 'info';
  }

  /**
   * Get default format from environment
   */
  private getDefaultFormat(): 'pretty' | 'json' {
    if (process.env.LOG_FORMAT === 'json') {
      return 'json';
    }
    // JSON for non-TTY (piped output)
    return process.stdout.isTTY ? 'pretty' : 'json';
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private formatContext(context: LogContext): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      const formatted =
        typeof value === 'string' ? value : JSON.stringify(value);
      parts.push(`${key}=${formatted}`);
    }
    return parts.join(' ');
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private getLevelIndicator(level: LogLevel): string {
    const indicators: Record<LogLevel, { symbol: string; color: keyof typeof colors }> = {
      debug: { symbol: '●', color: 'gray' },
      info: { symbol: '●', color: 'blue' },
      warn: { symbol: '▲', color: 'yellow' },
      error: { symbol: '✗', color: 'red' },
    };
    const { symbol, color } = indicators[level];
    return this.colorize(symbol, color);
  }

  private output(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    if (this.customOutput) {
      this.customOutput(entry);
      return;
    }

    if (this.format === 'json') {
      const output = level === 'error' ? process.stderr : process.stdout;
      output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const indicator = this.getLevelIndicator(level);
    const timestamp = this.colorize(new Date().toLocaleTimeString(), 'dim');
    const contextStr = entry.context
      ? ` ${this.colorize(this.formatContext(entry.context), 'gray')}`
      : '';

    const output = level === 'error' ? process.stderr : process.stdout;
    output.write(`${indicator} ${timestamp} ${message}${contextStr}\n`);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  debug(message: string, context?: LogContext): void {
    this.output('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.output('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.output('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.output('error', message, context);
  }

  /**
   * Create a child logger with additional context
   */
  child(baseContext: LogContext): ChildLogger {
    return {
      debug: (msg, ctx) => this.debug(msg, { ...baseContext, ...ctx }),
      info: (msg, ctx) => this.info(msg, { ...baseContext, ...ctx }),
      warn: (msg, ctx) => this.warn(msg, { ...baseContext, ...ctx }),
      error: (msg, ctx) => this.error(msg, { ...baseContext, ...ctx }),
    };
  }

  /**
   * Configure logger settings
   */
  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.format) this.format = options.format;
    if (options.colors !== undefined) this.useColors = options.colors;
    if (options.output) this.customOutput = options.output;
  }
}

// =============================================================================
// Singleton Export
// =============================================================================

/**
 * Global logger instance
 *
 * Usage:
 * ```typescript
 * import { logger } from './utils/logger.js';
 *
 * logger.info('State built', { exports: 412 });
 * logger.warn('Manifest skipped', { path, reason: 'invalid JSON' });
 * ```
 */
export const logger = new Logger();

/**
 * Create a new logger instance with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

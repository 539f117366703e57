/**
 * Persona Bot Structured Logger
 *
 * Provides consistent logging across the application with different log levels.
 */

import { CONFIG } from './config';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Log level mapping
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Parse a level name ("INFO", "debug", ...) into a LogLevel
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LOG_LEVEL_MAP[name.toLowerCase()];
}

// Level used by loggers that have not been given one explicitly
let defaultLevel: LogLevel = parseLogLevel(CONFIG.logging.level) ?? LogLevel.INFO;

/**
 * Change the level of every logger without an explicit level
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/**
 * Log entry structure
 */
interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: string;
  data?: unknown;
  error?: LoggedError;
}

interface LoggedError {
  message: string;
  stack?: string;
  code?: string;
}

type ConsoleMethod = (message: string) => void;

/**
 * Logger class
 */
export class Logger {
  private explicitLevel?: LogLevel;
  private pretty: boolean;
  private context?: string;

  constructor(context?: string) {
    this.pretty = CONFIG.logging.pretty;
    this.context = context;
  }

  get level(): LogLevel {
    return this.explicitLevel ?? defaultLevel;
  }

  /**
   * Pin this logger to a level regardless of the default
   */
  setLevel(level: LogLevel): void {
    this.explicitLevel = level;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    const childContext = this.context ? `${this.context}:${context}` : context;
    const child = new Logger(childContext);
    if (this.explicitLevel !== undefined) {
      child.setLevel(this.explicitLevel);
    }
    return child;
  }

  /**
   * Debug log
   */
  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  /**
   * Info log
   */
  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  /**
   * Warning log
   */
  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Error log
   */
  error(message: string, error?: unknown, data?: unknown): void {
    let errorData: LoggedError | undefined;
    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      errorData = { message: error.message, stack: error.stack, code };
    } else if (error !== undefined) {
      errorData = { message: String(error) };
    }

    this.log(LogLevel.ERROR, message, data, errorData);
  }

  /**
   * Internal log method
   */
  private log(level: LogLevel, message: string, data?: unknown, error?: LoggedError): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: this.context,
      data,
      error,
    };

    const output = this.pretty ? this.formatPretty(entry) : this.formatJSON(entry);
    const logFn = this.getLogFunction(level);
    logFn(output);
  }

  /**
   * Format log entry as JSON
   */
  private formatJSON(entry: LogEntry): string {
    return JSON.stringify(entry);
  }

  /**
   * Format log entry as pretty text
   */
  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [
      `[${entry.timestamp}]`,
      `[${entry.level}]`,
    ];

    if (entry.context) {
      parts.push(`[${entry.context}]`);
    }

    parts.push(entry.message);

    if (entry.data) {
      parts.push('\n  Data:', JSON.stringify(entry.data, null, 2));
    }

    if (entry.error) {
      parts.push('\n  Error:', entry.error.message);
      if (entry.error.code) {
        parts.push(`(${entry.error.code})`);
      }
      if (entry.error.stack) {
        parts.push('\n', entry.error.stack);
      }
    }

    return parts.join(' ');
  }

  /**
   * Get appropriate console method for log level
   */
  private getLogFunction(level: LogLevel): ConsoleMethod {
    switch (level) {
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      case LogLevel.ERROR:
        return console.error;
      default:
        return console.log;
    }
  }
}

/**
 * Create default logger instance
 */
export const logger = new Logger('PersonaBot');

/**
 * Create logger for specific module
 */
export const createLogger = (context: string): Logger => {
  return new Logger(context);
};

/**
 * Export default logger
 */
export default logger;

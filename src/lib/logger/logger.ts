/**
 * Centralized Logger
 *
 * Structured console logging with levels and per-service context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: unknown;
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLevelName(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Get the current log level from environment
 */
export function getLogLevel(): LogLevel | 'silent' {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLevelName(envLevel)) {
    return envLevel;
  }
  // Default to 'debug' in development, 'info' in production
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Check if a log level should be output
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLogLevel()];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function describeObject(value: object): string {
  try {
    return JSON.stringify(value);
  } catch {
    // Circular structures
    return Object.prototype.toString.call(value);
  }
}

/**
 * Format error for logging
 * Handles both Error instances and plain values
 */
export function formatError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined;

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  // Plain objects thrown or rejected by libraries
  if (isPlainObject(error)) {
    const message = error.message ?? error.error ?? error.reason ?? error.code;
    return {
      name: String(error.name ?? error.type ?? 'UnknownError'),
      message: message !== undefined ? String(message) : describeObject(error),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Output log entry to console
 */
function outputLog(entry: LogEntry): void {
  const serviceStr = entry.context?.service ? `[${entry.context.service}] ` : '';
  const logArgs: unknown[] = [`${serviceStr}${entry.message}`];

  if (entry.data !== undefined) {
    logArgs.push(entry.data);
  }

  if (entry.error) {
    logArgs.push(entry.error);
  }

  if (entry.context) {
    // service is already in the prefix
    const { service: _service, ...restContext } = entry.context;
    if (Object.keys(restContext).length > 0) {
      logArgs.push(restContext);
    }
  }

  switch (entry.level) {
    case 'debug':
      console.debug(...logArgs);
      break;
    case 'info':
      console.info(...logArgs);
      break;
    case 'warn':
      console.warn(...logArgs);
      break;
    case 'error':
      console.error(...logArgs);
      break;
  }
}

/**
 * Logger class for creating scoped loggers
 */
export class Logger {
  private context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({
      ...this.context,
      ...additionalContext,
    });
  }

  private log(level: LogLevel, message: string, error?: unknown, data?: unknown): void {
    if (!shouldLog(level)) return;
    outputLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      error: formatError(error),
      data,
    });
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, undefined, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, undefined, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, undefined, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.log('error', message, error, data);
  }

  /**
   * Log an async operation with timing
   */
  async withTiming<T>(operationName: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    this.debug(`Starting: ${operationName}`);
    try {
      const result = await fn();
      this.debug(`Completed: ${operationName}`, { duration: `${Date.now() - startTime}ms` });
      return result;
    } catch (error) {
      this.error(`Failed: ${operationName}`, error);
      throw error;
    }
  }
}

/**
 * Create a logger for a specific service
 */
export function createLogger(service: string): Logger {
  return new Logger({ service });
}

/**
 * Default logger instance
 */
export const logger = new Logger();

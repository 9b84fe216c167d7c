/**
 * @roamer/shared
 *
 * Logger, error base classes and async helpers used across Roamer packages.
 */

import chalk from 'chalk';

// ============================================================================
// Logger
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  silent?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.silent = options.silent ?? false;
  }

  /**
   * Derive a logger that shares this one's level and silence but prepends
   * an extra tag, e.g. the device serial of a session.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      silent: this.silent,
      prefix: this.prefix ? `${this.prefix} ${prefix}` : prefix,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return this.shouldLog(level);
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.silent) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(this.formatMessage(message)));
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage(message));
    }
  }

  success(message: string): void {
    if (this.shouldLog('info')) {
      console.log(chalk.green(this.formatMessage(`✓ ${message}`)));
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.log(chalk.yellow(this.formatMessage(`⚠ ${message}`)));
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(this.formatMessage(`✗ ${message}`)));
    }
  }

  step(number: number, total: number, message: string): void {
    if (this.shouldLog('info')) {
      console.log(chalk.cyan(`[${number}/${total}]`), this.formatMessage(message));
    }
  }
}

// ============================================================================
// Errors
// ============================================================================

export class RoamerError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RoamerError';
  }
}

export class ConfigError extends RoamerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends RoamerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends RoamerError {
  constructor(
    message: string,
    public timeoutMs: number
  ) {
    super(message, 'TIMEOUT', { timeoutMs });
    this.name = 'TimeoutError';
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Total number of attempts, including the first one */
  retries?: number;
  delay?: number;
  backoff?: number;
  /** Return false to give up immediately on a given error */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 3, delay = 1000, backoff = 2, shouldRetry, onRetry } = options;

  let lastError: Error = new Error('retry() called with zero attempts');

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (shouldRetry && !shouldRetry(lastError, attempt)) {
        throw lastError;
      }

      if (attempt < retries) {
        onRetry?.(lastError, attempt);
        await sleep(delay * Math.pow(backoff, attempt - 1));
      }
    }
  }

  throw lastError;
}

/**
 * Race a promise-returning call against a deadline. The callee receives an
 * AbortSignal that fires when the deadline passes so it can cancel its work.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label = 'operation'
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${label} timed out after ${formatDuration(timeoutMs)}`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Format duration in milliseconds to human readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`;
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel | Uppercase<LogLevel>;
  maxLogs?: number;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find(level => level === normalized) ?? fallback;
}

function safeStringify(data: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    data,
    (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      return value;
    },
    2
  );
}

interface LevelState {
  minLevel: LogLevel;
}

export class Logger {
  private logs: LogEntry[] = [];
  private readonly maxLogs: number;
  private readonly state: LevelState;
  private readonly context?: string;

  constructor(options: LoggerOptions = {}, state?: LevelState) {
    this.context = options.context;
    this.maxLogs = options.maxLogs ?? 1000;
    this.state = state ?? {
      minLevel: parseLogLevel(options.level, parseLogLevel(process.env.LOG_LEVEL))
    };
  }

  /**
   * Logger with a nested context label; level changes on either apply to both
   */
  child(options: { subContext: string }): Logger {
    const context = this.context ? `${this.context}:${options.subContext}` : options.subContext;
    return new Logger({ context, maxLogs: this.maxLogs }, this.state);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.state.minLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + safeStringify(entry.data).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, detail?: Error | Record<string, unknown>): void {
    const error = detail instanceof Error ? detail : undefined;
    const data = detail instanceof Error ? undefined : detail;
    this.log({ timestamp: new Date(), level: 'error', message, error, data, context: this.context });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : [...this.logs];
  }

  clear(): void {
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.state.minLevel;
  }
}

// Singleton instance
export const logger = new Logger();

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: string; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context
    };
  }
}

/**
 * A file could not be read while computing its digest
 */
export class HashError extends AppError {
  constructor(public filePath: string, cause: string) {
    super(`Could not hash file: ${cause}`, 'IO_ERROR', { filePath });
    this.name = 'HashError';
  }
}

/**
 * Run-level failure raised before any filesystem mutation
 */
export class FatalRunError extends AppError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'FatalRunError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  const scoped = context ? logger.child({ subContext: context }) : logger;

  if (error instanceof AppError) {
    scoped.error(error.message, error);
    return error;
  }

  if (error instanceof Error) {
    scoped.error(error.message, error);
    return new AppError(error.message, 'INTERNAL_ERROR');
  }

  scoped.error(String(error));
  return new AppError(String(error), 'UNKNOWN_ERROR');
}

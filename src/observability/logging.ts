/**
 * Secret Resolver Observability - Logging
 *
 * Secret values never reach a logger: only names, versions and timings do.
 * Context keys that usually carry credentials are masked before output as a
 * second line of protection.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * No-op logger
 */
export class NoOpLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _error?: Error, _context?: Record<string, unknown>): void {
    // No-op
  }
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export const REDACTED = '[REDACTED]';

const SENSITIVE_KEY = /(^|_)(value|secret|token|password|authorization)$/i;

/**
 * Copy of `context` with credential-like keys masked
 */
export function redactContext(
  context: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!context) {
    return undefined;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = SENSITIVE_KEY.test(key) ? REDACTED : value;
  }
  return result;
}

export interface ConsoleLoggerOptions {
  /** Default: info */
  minLevel?: LogLevel;
  /** `text` (default) or one JSON object per line */
  format?: 'text' | 'json';
}

/**
 * Console logger
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly format: 'text' | 'json';

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.format = options.format ?? 'text';
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!isLevelEnabled(level, this.minLevel)) {
      return;
    }

    const line = this.render(level, message, redactContext(context), error);
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
        console.error(line);
        break;
    }
  }

  private render(
    level: LogLevel,
    message: string,
    context: Record<string, unknown> | undefined,
    error: Error | undefined
  ): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...context,
        ...(error ? { error: error.message, error_name: error.name } : {}),
      });
    }

    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    const errorStr = error ? ` (${error.name}: ${error.message})` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}${errorStr}`;
  }
}

/**
 * Logger that merges fixed context into every entry before delegating
 */
export class ContextLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly context: Record<string, unknown>
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.inner.debug(message, this.merge(context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.inner.info(message, this.merge(context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.inner.warn(message, this.merge(context));
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.inner.error(message, error, this.merge(context));
  }

  private merge(context?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...context };
  }
}

export function withContext(logger: Logger, context: Record<string, unknown>): Logger {
  return logger instanceof NoOpLogger ? logger : new ContextLogger(logger, context);
}

/**
 * In-memory logger for testing
 */
export class InMemoryLogger implements Logger {
  private entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.record(LogLevel.ERROR, message, context, error);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  /** Messages logged at `level`, or at any level */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries = [];
  }

  private record(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    this.entries.push({ level, message, timestamp: new Date(), context: redactContext(context), error });
  }
}

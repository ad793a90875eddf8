/**
 * Structured logger with JSON output and correlation IDs
 */

import { randomUUID } from 'node:crypto';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LogContext {
  correlationId?: string;
  component?: string;
  operation?: string;
  url?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogOutput = (entry: LogEntry) => void;

const writeToStderr: LogOutput = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export class Logger {
  private static instance: Logger | undefined;
  private correlationId: string;
  private context: LogContext;
  private logLevel: LogLevel;
  private outputStream: LogOutput;

  private constructor(
    logLevel: LogLevel = LogLevel.INFO,
    context: LogContext = {},
    outputStream?: LogOutput
  ) {
    this.logLevel = logLevel;
    this.correlationId = context.correlationId || randomUUID();
    this.context = { ...context, correlationId: this.correlationId };
    this.outputStream = outputStream || writeToStderr;
  }

  /**
   * Get singleton instance
   */
  static getInstance(logLevel?: LogLevel, context?: LogContext): Logger {
    if (!Logger.instance) {
      const level = logLevel ?? Logger.parseLogLevel(process.env.LOG_LEVEL);
      Logger.instance = new Logger(level, context);
    }
    return Logger.instance;
  }

  /**
   * Standalone logger that does not touch the singleton (tests, embedders)
   */
  static create(logLevel: LogLevel, context: LogContext = {}, outputStream?: LogOutput): Logger {
    return new Logger(logLevel, context, outputStream);
  }

  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * Create a child logger with additional context.
   * Children share the parent's output stream and level at creation time.
   */
  child(context: LogContext): Logger {
    return new Logger(
      this.logLevel,
      {
        ...this.context,
        ...context,
        correlationId: context.correlationId || this.correlationId,
      },
      (entry) => this.outputStream(entry)
    );
  }

  forOperation(operation: string, context?: LogContext): Logger {
    return this.child({
      ...context,
      operation,
      operationId: randomUUID(),
    });
  }

  private formatEntry(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: this.correlationId,
      context: this.context,
    };

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.outputStream(this.formatEntry('ERROR', message, metadata, error));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.outputStream(this.formatEntry('WARN', message, metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.outputStream(this.formatEntry('INFO', message, metadata));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.outputStream(this.formatEntry('DEBUG', message, metadata));
    }
  }

  /**
   * Log an outbound request made while probing or downloading a source
   */
  logRequest(method: string, url: string, duration: number, status?: number, error?: Error): void {
    const metadata = { method, url, duration, status };

    if (error) {
      this.debug(`Request failed: ${method} ${url}`, { ...metadata, reason: error.message });
    } else if (status !== undefined && status >= 400) {
      this.debug(`Request returned error status: ${method} ${url}`, metadata);
    } else {
      this.debug(`Request completed: ${method} ${url}`, metadata);
    }
  }

  /**
   * Start timing an operation; the returned function logs and returns the duration
   */
  startTimer(operation: string): () => number {
    const start = Date.now();
    this.debug(`Starting operation: ${operation}`);

    return () => {
      const duration = Date.now() - start;
      this.debug(`Operation completed: ${operation}`, { duration });
      return duration;
    };
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Set output stream (useful for testing)
   */
  setOutputStream(stream: LogOutput): void {
    this.outputStream = stream;
  }
}

export function getLogger(): Logger {
  return Logger.getInstance();
}

/**
 * Logger scoped to one component, derived from the process-wide instance
 */
export function createLogger(component: string, context?: LogContext): Logger {
  return getLogger().child({ ...context, component });
}

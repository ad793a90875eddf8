/**
 * Custom error classes and error handling utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

export type ExtractionErrorCode =
  | 'DOWNLOAD_FAILED'
  | 'PARSE_FAILED'
  | 'RENDER_TIMEOUT'
  | 'RENDER_FAILED'
  | 'BROWSER_UNAVAILABLE'
  | 'INTERNAL';

/**
 * Unrecoverable technical failure while extracting a single source.
 * "Nothing found" is never reported through this error.
 */
export class ExtractionError extends BaseError {
  constructor(
    public readonly sourceUrl: string,
    message: string,
    public readonly code: ExtractionErrorCode = 'INTERNAL',
    public readonly cause?: unknown
  ) {
    super(`Extraction failed for ${sourceUrl}: ${message}`, {
      sourceUrl,
      code,
      cause: cause === undefined ? undefined : describeError(cause),
    });
  }
}

function unavailableReason(cause: unknown): string {
  return cause === undefined ? 'not installed' : describeError(cause);
}

/**
 * The headless browser capability is missing from the runtime.
 * JavaScript-rendered sources have no fallback, so this is reported by name.
 */
export class BrowserUnavailableError extends ExtractionError {
  constructor(sourceUrl: string, cause?: unknown) {
    super(
      sourceUrl,
      `headless browser unavailable (${unavailableReason(cause)}); ` +
        'install it with "npx playwright install chromium"',
      'BROWSER_UNAVAILABLE',
      cause
    );
  }
}

/**
 * Error thrown when a source configuration or call argument is invalid
 */
export class ValidationError extends BaseError {
  constructor(
    public readonly field: string,
    message: string,
    public readonly value?: unknown
  ) {
    super(message, { field, value });
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly missingFields?: string[]
  ) {
    super(`Configuration error: ${message}`, {
      missingFields,
    });
  }
}

/**
 * Aggregate of per-source failures from one batch
 */
export class AggregateError extends BaseError {
  constructor(
    message: string,
    public readonly errors: Error[]
  ) {
    super(message, {
      errorCount: errors.length,
      errors: errors.map((e) => ({
        name: e.name,
        message: e.message,
      })),
    });
  }

  getErrorsOfType<T extends Error>(errorClass: new (...args: never[]) => T): T[] {
    return this.errors.filter((e): e is T => e instanceof errorClass);
  }

  getSummary(): { total: number; byType: Record<string, number> } {
    const byType: Record<string, number> = {};
    this.errors.forEach((e) => {
      byType[e.name] = (byType[e.name] || 0) + 1;
    });
    return { total: this.errors.length, byType };
  }

  hasError(predicate: (error: Error) => boolean): boolean {
    return this.errors.some(predicate);
  }
}

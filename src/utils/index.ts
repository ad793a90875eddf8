/**
 * Central export point for utility modules
 */

export {
  AggregateError,
  BaseError,
  BrowserUnavailableError,
  ConfigurationError,
  describeError,
  ExtractionError,
  toError,
  ValidationError,
  type ExtractionErrorCode,
} from './errors';
export {
  defaultHttpClient,
  fetchHead,
  fetchText,
  fetchTextPrefix,
  HttpRequestError,
  type HeadResult,
  type HttpClient,
  type HttpRequestOptions,
} from './http';
export {
  createLogger,
  getLogger,
  Logger,
  LogLevel,
  type LogContext,
  type LogEntry,
  type LogOutput,
} from './logger';
export {
  DEFAULT_DELAY_MS,
  DEFAULT_REQUESTS_PER_MINUTE,
  DomainRateLimiter,
  extractHost,
} from './rate-limiter';
export type { DomainRateLimiterOptions } from './rate-limiter';
export { cleanHtml, formatRecordDate, getDomainName, normalizeWhitespace, parseDate } from './text';
export {
  BROWSER_USER_AGENTS,
  UserAgentProvider,
  type UserAgentProviderOptions,
} from './user-agent';

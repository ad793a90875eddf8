/**
 * Per-host request pacing.
 *
 * Each call reserves the next free slot for its host before sleeping, so two
 * callers for the same host can never both see "no wait needed" inside one
 * interval, while callers for different hosts never wait on each other.
 */

import { createLogger, type Logger } from './logger';

export const DEFAULT_REQUESTS_PER_MINUTE = 20;
export const DEFAULT_DELAY_MS = 2000;

export interface DomainRateLimiterOptions {
  requestsPerMinute?: number;
  /** Used as the interval when requestsPerMinute <= 0 */
  defaultDelayMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function extractHost(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return url;
  }
}

export class DomainRateLimiter {
  readonly minIntervalMs: number;
  private readonly lastGranted = new Map<string, number>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: DomainRateLimiterOptions = {}) {
    const requestsPerMinute = options.requestsPerMinute ?? DEFAULT_REQUESTS_PER_MINUTE;
    const defaultDelayMs = options.defaultDelayMs ?? DEFAULT_DELAY_MS;

    this.minIntervalMs = requestsPerMinute > 0 ? 60000 / requestsPerMinute : defaultDelayMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('rate-limiter');
  }

  /**
   * Resolve once a request to the URL's host may be issued.
   * `customDelayMs` can only lengthen the interval for this call.
   */
  async wait(url: string, customDelayMs?: number): Promise<void> {
    const host = extractHost(url);
    const requiredMs = Math.max(this.minIntervalMs, customDelayMs ?? 0);

    // Read and write of the slot happen without yielding, which makes them atomic
    const now = this.now();
    const previous = this.lastGranted.get(host);
    const grantedAt = previous === undefined ? now : Math.max(now, previous + requiredMs);
    this.lastGranted.set(host, grantedAt);

    const waitMs = grantedAt - now;
    if (waitMs > 0) {
      this.logger.debug(`Rate limiting ${host}`, { host, waitMs: Math.round(waitMs) });
      await this.sleep(waitMs);
    }
  }

  /**
   * Time of the last granted request for a host, if any
   */
  lastRequestAt(url: string): number | undefined {
    return this.lastGranted.get(extractHost(url));
  }

  reset(): void {
    this.lastGranted.clear();
  }
}

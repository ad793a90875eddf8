import { load as loadXml } from 'cheerio';
import type { SourceType } from '../types';
import { describeError } from '../utils/errors';
import { defaultHttpClient, type HttpClient } from '../utils/http';
import { createLogger, type Logger } from '../utils/logger';
import { UserAgentProvider } from '../utils/user-agent';

export const DEFAULT_DETECTION_TIMEOUT_MS = 10000;
export const DEFAULT_SNIFF_BYTES = 5000;
export const DEFAULT_DYNAMIC_MARKERS: readonly string[] = [
  '__NEXT_DATA__',
  'vue-server-renderer',
  'ng-version',
];

const FEED_MARKERS = ['<rss', '<feed', 'xmlns:atom', 'xmlns="http://www.w3.org/2005/Atom'];
const FEED_CONTENT_TYPES = ['xml', 'rss', 'atom'];
const FEED_ROOT_ELEMENTS = new Set(['rss', 'feed', 'rdf:rdf']);

const PLATFORM_PATTERNS: ReadonlyArray<{ type: SourceType; patterns: RegExp[] }> = [
  {
    type: 'reddit',
    patterns: [/reddit\.com\/r\/\w+/i, /reddit\.com\/user\/\w+/i],
  },
  {
    type: 'stackoverflow',
    patterns: [
      /stackoverflow\.com\/questions/i,
      /stackoverflow\.com\/search/i,
      /stackoverflow\.com\/questions\/tagged/i,
    ],
  },
];

const FEED_PATH_PATTERNS = [/\/feed\/?$/i, /\/rss\/?$/i, /\/atom\/?$/i, /\.xml$/i, /\.rss$/i];

export interface SourceDetectorOptions {
  http?: HttpClient;
  userAgents?: UserAgentProvider;
  timeoutMs?: number;
  sniffBytes?: number;
  dynamicMarkers?: readonly string[];
  logger?: Logger;
}

/**
 * Classifies a URL with layered heuristics, cheapest first:
 * platform patterns, feed-shaped paths, a HEAD probe, then a body sniff.
 */
export class SourceDetector {
  private readonly http: HttpClient;
  private readonly userAgents: UserAgentProvider;
  private readonly timeoutMs: number;
  private readonly sniffBytes: number;
  private readonly dynamicMarkers: readonly string[];
  private readonly logger: Logger;

  constructor(options: SourceDetectorOptions = {}) {
    this.http = options.http ?? defaultHttpClient;
    this.userAgents = options.userAgents ?? new UserAgentProvider();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DETECTION_TIMEOUT_MS;
    this.sniffBytes = options.sniffBytes ?? DEFAULT_SNIFF_BYTES;
    this.dynamicMarkers = options.dynamicMarkers ?? DEFAULT_DYNAMIC_MARKERS;
    this.logger = options.logger ?? createLogger('source-detector');
  }

  /**
   * Never rejects; anything unexpected falls back to static-html
   */
  async detect(url: string): Promise<SourceType> {
    try {
      const platform = matchPlatform(url);
      if (platform) {
        this.logger.info(`Detected ${platform} via URL pattern`, { url });
        return platform;
      }

      if (looksLikeFeedUrl(url)) {
        this.logger.info('Detected feed via URL pattern', { url });
        return 'feed';
      }

      const contentType = await this.probeContentType(url);
      if (contentType && FEED_CONTENT_TYPES.some((marker) => contentType.includes(marker))) {
        this.logger.info('Detected feed via Content-Type', { url, contentType });
        return 'feed';
      }

      const sniffed = await this.sniffBody(url);
      if (sniffed) {
        return sniffed;
      }

      this.logger.info('Defaulting to static-html', { url });
      return 'static-html';
    } catch (error) {
      this.logger.warn('Detection failed, defaulting to static-html', {
        url,
        reason: describeError(error),
      });
      return 'static-html';
    }
  }

  /**
   * True when the URL parses with a scheme and a host
   */
  isSupported(url: string): boolean {
    try {
      const parsed = new URL(url);
      return parsed.protocol.length > 1 && parsed.host.length > 0;
    } catch {
      return false;
    }
  }

  private async probeContentType(url: string): Promise<string | undefined> {
    const started = Date.now();
    try {
      const result = await this.http.head(url, {
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgents.getUserAgent() },
      });
      this.logger.logRequest('HEAD', url, Date.now() - started, result.status);
      return result.contentType;
    } catch (error) {
      this.logger.debug('HEAD probe gave no signal', { url, reason: describeError(error) });
      return undefined;
    }
  }

  private async sniffBody(url: string): Promise<SourceType | undefined> {
    let sample: string;
    try {
      sample = await this.http.getTextPrefix(url, this.sniffBytes, {
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgents.getUserAgent() },
      });
    } catch (error) {
      this.logger.debug('Body sniff gave no signal', { url, reason: describeError(error) });
      return undefined;
    }

    if (FEED_MARKERS.some((marker) => sample.includes(marker)) || hasFeedRoot(sample)) {
      this.logger.info('Detected feed via content', { url });
      return 'feed';
    }

    if (this.dynamicMarkers.some((marker) => sample.includes(marker))) {
      this.logger.info('Detected dynamic content', { url });
      return 'dynamic-html';
    }

    return undefined;
  }
}

export function matchPlatform(url: string): SourceType | undefined {
  return PLATFORM_PATTERNS.find(({ patterns }) => patterns.some((pattern) => pattern.test(url)))
    ?.type;
}

export function looksLikeFeedUrl(url: string): boolean {
  let path = url;
  try {
    path = new URL(url).pathname;
  } catch {
    // not absolute; match against the raw string
  }
  return FEED_PATH_PATTERNS.some((pattern) => pattern.test(path));
}

/**
 * Lenient XML pass over a possibly truncated sample
 */
function hasFeedRoot(sample: string): boolean {
  try {
    const $ = loadXml(sample, { xmlMode: true });
    return $.root()
      .children()
      .toArray()
      .some((element) => FEED_ROOT_ELEMENTS.has(element.tagName.toLowerCase()));
  } catch {
    return false;
  }
}

import { outcome, type ExtractionOutcome, type SourceConfig } from '../types';
import { BrowserUnavailableError, describeError, ExtractionError } from '../utils/errors';
import { parseDate } from '../utils/text';
import { AbstractExtractionStrategy } from './base';
import {
  BrowserMissingError,
  BrowserTimeoutError,
  PlaywrightLauncher,
  type BrowserLauncher,
  type BrowserSession,
} from './browser';
import { ReadabilityContentExtractor, type ContentExtractor } from './content-extractor';
import { DEFAULT_ENTRY_TITLE } from './feed';
import type { ExtractionStrategyInit } from './types';

export const DEFAULT_RENDER_TIMEOUT_MS = 30000;
export const DEFAULT_SETTLE_DELAY_MS = 3000;
export const DEFAULT_POST_SELECTOR = 'shreddit-post';
export const DEFAULT_SELECTOR_TIMEOUT_MS = 5000;
export const DEFAULT_BOT_CHALLENGE_MARKERS: readonly string[] = [
  'Checking if the site connection is secure',
  'Verification',
  'Access Denied',
];
export const DYNAMIC_PLATFORMS: readonly string[] = [
  'reddit.com',
  'stackoverflow.com',
  'instagram.com',
  'twitter.com',
  'x.com',
];

export interface DynamicHtmlStrategyInit extends ExtractionStrategyInit {
  launcher?: BrowserLauncher;
  contentExtractor?: ContentExtractor;
  /** Extra wait after navigation on Reddit pages */
  settleDelayMs?: number;
  postSelector?: string;
  selectorTimeoutMs?: number;
  botChallengeMarkers?: readonly string[];
}

function isRedditUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === 'reddit.com' || host.endsWith('.reddit.com');
  } catch {
    return false;
  }
}

/**
 * Renders JavaScript-driven pages in a headless browser, then strips the boilerplate.
 * Every extraction launches its own browser and closes it on every path.
 */
export class DynamicHtmlStrategy extends AbstractExtractionStrategy {
  readonly kind = 'dynamic' as const;
  private readonly launcher: BrowserLauncher;
  private readonly contentExtractor: ContentExtractor;
  private readonly settleDelayMs: number;
  private readonly postSelector: string;
  private readonly selectorTimeoutMs: number;
  private readonly botChallengeMarkers: readonly string[];

  constructor(init: DynamicHtmlStrategyInit = {}) {
    super(
      { ...init, timeoutMs: init.timeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS },
      'dynamic-html-strategy'
    );
    this.launcher = init.launcher ?? new PlaywrightLauncher();
    this.contentExtractor = init.contentExtractor ?? new ReadabilityContentExtractor(this.logger);
    this.settleDelayMs = init.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.postSelector = init.postSelector ?? DEFAULT_POST_SELECTOR;
    this.selectorTimeoutMs = init.selectorTimeoutMs ?? DEFAULT_SELECTOR_TIMEOUT_MS;
    this.botChallengeMarkers = init.botChallengeMarkers ?? DEFAULT_BOT_CHALLENGE_MARKERS;
  }

  canHandle(url: string): boolean {
    try {
      const host = new URL(url).hostname.toLowerCase();
      return DYNAMIC_PLATFORMS.some(
        (platform) => host === platform || host.endsWith(`.${platform}`)
      );
    } catch {
      return false;
    }
  }

  async extract(config: SourceConfig): Promise<ExtractionOutcome> {
    this.logger.info('Extracting dynamic content', { url: config.url });

    let session: BrowserSession;
    try {
      session = await this.launcher.launch();
    } catch (error) {
      if (error instanceof BrowserMissingError) {
        const unavailable = new BrowserUnavailableError(config.url, error);
        this.logger.error('Headless browser unavailable', unavailable, { url: config.url });
        return outcome.failed(unavailable);
      }
      return this.failure(config, 'browser launch failed', 'RENDER_FAILED', error);
    }

    let html: string;
    try {
      html = await this.render(session, config);
    } catch (error) {
      if (error instanceof BrowserTimeoutError) {
        this.logger.error(
          'Page load timed out; the site may be too slow or blocking headless browsers',
          error,
          { url: config.url }
        );
        return outcome.failed(
          new ExtractionError(
            config.url,
            `page load timed out after ${error.timeoutMs}ms`,
            'RENDER_TIMEOUT',
            error
          )
        );
      }
      return this.failure(config, 'rendering failed', 'RENDER_FAILED', error);
    } finally {
      await this.close(session, config.url);
    }

    if (!html.trim()) {
      this.logger.warn('Browser rendered an empty page', { url: config.url });
      return outcome.empty('empty page');
    }

    const marker = this.botChallengeMarkers.find((candidate) => html.includes(candidate));
    if (marker) {
      this.logger.warn('Bot challenge page served instead of content', { url: config.url, marker });
      return outcome.empty('bot-challenge');
    }

    try {
      const extracted = this.contentExtractor.extract(html, config.url);
      if (!extracted) {
        this.logger.warn('No content found in the rendered page', { url: config.url });
        return outcome.empty('no meaningful content');
      }

      const publishedAt = parseDate(extracted.date);
      if (extracted.date && !publishedAt) {
        this.logger.debug('Unparsable page date', { url: config.url, date: extracted.date });
      }

      return outcome.success([
        this.buildItem(config, 'dynamic-html', {
          sourceUrl: config.url,
          title: extracted.title || DEFAULT_ENTRY_TITLE,
          content: extracted.text,
          publishedAt,
          author: extracted.author,
        }),
      ]);
    } catch (error) {
      return this.failure(config, 'extraction failed', 'INTERNAL', error);
    }
  }

  private async render(session: BrowserSession, config: SourceConfig): Promise<string> {
    const page = await session.newPage(this.userAgents.getUserAgent());
    await page.goto(config.url, { waitUntil: 'networkidle', timeout: this.timeoutMs });

    if (isRedditUrl(config.url)) {
      await page.waitForTimeout(this.settleDelayMs);
      try {
        await page.waitForSelector(this.postSelector, { timeout: this.selectorTimeoutMs });
      } catch (error) {
        this.logger.debug('Post marker did not appear; continuing', {
          url: config.url,
          selector: this.postSelector,
          reason: describeError(error),
        });
      }
    }

    return page.content();
  }

  private async close(session: BrowserSession, url: string): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn('Failed to close browser', { url, reason: describeError(error) });
    }
  }
}

import { type CheerioAPI, load as loadXml } from 'cheerio';
import Parser from 'rss-parser';
import { looksLikeFeedUrl } from '../detection/source-detector';
import { outcome, type ContentItem, type ExtractionOutcome, type SourceConfig } from '../types';
import { describeError } from '../utils/errors';
import { normalizeWhitespace, parseDate } from '../utils/text';
import { AbstractExtractionStrategy } from './base';
import type { ExtractionStrategyInit } from './types';

export const DEFAULT_ENTRY_TITLE = 'No Title';

export interface FeedEntryFields {
  description?: string;
  summary?: string;
  contentEncoded?: string;
  author?: string;
}

type FeedEntry = Parser.Item & FeedEntryFields;

/**
 * Entry fields common to the parsed and the salvaged path
 */
export interface FeedEntryData {
  title?: string;
  link?: string;
  date?: string;
  body?: string;
  author?: string;
}

function text(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export class FeedStrategy extends AbstractExtractionStrategy {
  readonly kind = 'feed' as const;
  private readonly parser: Parser<Record<string, unknown>, FeedEntryFields>;

  constructor(init: ExtractionStrategyInit = {}) {
    super(init, 'feed-strategy');
    this.parser = new Parser<Record<string, unknown>, FeedEntryFields>({
      customFields: {
        item: ['description', 'summary', ['content:encoded', 'contentEncoded']],
      },
    });
  }

  canHandle(url: string): boolean {
    return looksLikeFeedUrl(url);
  }

  async extract(config: SourceConfig): Promise<ExtractionOutcome> {
    this.logger.info('Extracting feed', { url: config.url });

    let payload: string;
    try {
      payload = await this.http.getText(config.url, {
        timeout: this.timeoutMs,
        headers: this.requestHeaders(config),
      });
    } catch (error) {
      return this.failure(config, 'feed download failed', 'DOWNLOAD_FAILED', error);
    }

    try {
      const entries = await this.readEntries(config.url, payload);

      if (entries.length === 0) {
        this.logger.warn('No entries found in feed; check that the URL is an active feed', {
          url: config.url,
        });
        return outcome.empty('feed has no entries');
      }

      const items = entries
        .slice(0, config.maxItems)
        .map((entry) => this.toContentItem(config, entry));
      this.logger.info('Feed extracted', { url: config.url, itemCount: items.length });
      return outcome.success(items);
    } catch (error) {
      return this.failure(config, 'feed extraction failed', 'INTERNAL', error);
    }
  }

  private async readEntries(feedUrl: string, payload: string): Promise<FeedEntryData[]> {
    try {
      const feed = await this.parser.parseString(payload);
      return (feed.items ?? []).map((item) => fromParsedEntry(item));
    } catch (error) {
      this.logger.warn('Malformed feed, salvaging entries', {
        url: feedUrl,
        reason: describeError(error),
      });
      return salvageEntries(payload);
    }
  }

  private toContentItem(config: SourceConfig, entry: FeedEntryData): ContentItem {
    const publishedAt = parseDate(entry.date);
    if (entry.date && !publishedAt) {
      this.logger.debug('Unparsable entry date', { url: config.url, date: entry.date });
    }

    return this.buildItem(config, 'feed', {
      sourceUrl: resolveLink(entry.link, config.url),
      title: entry.title ? normalizeWhitespace(entry.title) : DEFAULT_ENTRY_TITLE,
      content: entry.body ?? '',
      publishedAt,
      author: entry.author,
    });
  }
}

function fromParsedEntry(item: FeedEntry): FeedEntryData {
  return {
    title: text(item.title),
    link: text(item.link),
    date: text(item.isoDate) ?? text(item.pubDate),
    body:
      text(item.summary) ??
      text(item.description) ??
      text(item.content) ??
      text(item.contentEncoded),
    author: text(item.creator) ?? text(item.author),
  };
}

/**
 * Absolute entry link; the feed URL stands in for a missing one
 */
export function resolveLink(link: string | undefined, feedUrl: string): string {
  if (!link) {
    return feedUrl;
  }
  try {
    return new URL(link, feedUrl).toString();
  } catch {
    return link;
  }
}

/**
 * Lenient pass over a feed the parser rejected
 */
export function salvageEntries(payload: string): FeedEntryData[] {
  const $: CheerioAPI = loadXml(payload, { xmlMode: true });
  const entries: FeedEntryData[] = [];

  $('item, entry').each((_, element) => {
    const entry = $(element);
    const child = (selector: string) => text(entry.children(selector).first().text());
    const linkElement = entry.children('link').first();

    entries.push({
      title: child('title'),
      link: text(linkElement.attr('href')) ?? text(linkElement.text()),
      date: child('pubDate') ?? child('published') ?? child('updated') ?? child('dc\\:date'),
      body:
        child('summary') ??
        child('description') ??
        child('content') ??
        child('content\\:encoded'),
      author:
        text(entry.children('author').children('name').first().text()) ??
        child('author') ??
        child('dc\\:creator'),
    });
  });

  return entries;
}

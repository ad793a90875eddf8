import { outcome, type ExtractionOutcome, type SourceConfig } from '../types';
import { describeError } from '../utils/errors';
import { parseDate } from '../utils/text';
import { AbstractExtractionStrategy } from './base';
import { ReadabilityContentExtractor, type ContentExtractor } from './content-extractor';
import { DEFAULT_ENTRY_TITLE } from './feed';
import type { ExtractionStrategyInit } from './types';

export const DEFAULT_AUTHOR = 'Unknown';

export interface StaticHtmlStrategyInit extends ExtractionStrategyInit {
  contentExtractor?: ContentExtractor;
}

/**
 * One page, one item: download and strip the boilerplate
 */
export class StaticHtmlStrategy extends AbstractExtractionStrategy {
  readonly kind = 'static' as const;
  private readonly contentExtractor: ContentExtractor;

  constructor(init: StaticHtmlStrategyInit = {}) {
    super(init, 'static-html-strategy');
    this.contentExtractor = init.contentExtractor ?? new ReadabilityContentExtractor(this.logger);
  }

  canHandle(url: string): boolean {
    return /^https?:\/\//i.test(url);
  }

  async extract(config: SourceConfig): Promise<ExtractionOutcome> {
    this.logger.info('Extracting HTML', { url: config.url });

    let html: string;
    try {
      html = await this.http.getText(config.url, {
        timeout: this.timeoutMs,
        headers: this.requestHeaders(config),
      });
    } catch (error) {
      this.logger.warn('Download failed; the site may block plain requests or be offline', {
        url: config.url,
        reason: describeError(error),
      });
      return outcome.empty('download failed');
    }

    try {
      const extracted = this.contentExtractor.extract(html, config.url);
      if (!extracted) {
        this.logger.warn('No meaningful text content found', { url: config.url });
        return outcome.empty('no meaningful content');
      }

      const publishedAt = parseDate(extracted.date);
      if (extracted.date && !publishedAt) {
        this.logger.debug('Unparsable page date', { url: config.url, date: extracted.date });
      }

      return outcome.success([
        this.buildItem(config, 'static-html', {
          sourceUrl: config.url,
          title: extracted.title || DEFAULT_ENTRY_TITLE,
          content: extracted.text,
          publishedAt,
          author: extracted.author ?? DEFAULT_AUTHOR,
        }),
      ]);
    } catch (error) {
      return this.failure(config, 'HTML extraction failed', 'INTERNAL', error);
    }
  }
}

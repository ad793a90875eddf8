/**
 * ScrapeOrchestrator - routes each URL to an extraction strategy and
 * normalizes whatever comes back
 */

import pLimit from 'p-limit';
import { SourceDetector } from '../detection/source-detector';
import {
  DynamicHtmlStrategy,
  FeedStrategy,
  ReadabilityContentExtractor,
  StaticHtmlStrategy,
  type BrowserLauncher,
  type ContentExtractor,
  type ExtractionStrategy,
} from '../extractors';
import {
  createSourceConfig,
  DEFAULT_MAX_ITEMS,
  type BatchReport,
  type ContentItem,
  type ExtractionOutcome,
  type ExtractionResult,
  type NormalizedRecord,
  type SourceConfig,
  type SourceType,
  type StrategyKind,
} from '../types';
import {
  AggregateError,
  describeError,
  ExtractionError,
  toError,
  ValidationError,
} from '../utils/errors';
import { defaultHttpClient, type HttpClient } from '../utils/http';
import { createLogger, type Logger } from '../utils/logger';
import { DomainRateLimiter } from '../utils/rate-limiter';
import { formatRecordDate, getDomainName } from '../utils/text';
import { UserAgentProvider } from '../utils/user-agent';
import { rewritePlatformUrl } from './url-rewrites';

export const DEFAULT_BATCH_MAX_ITEMS = 8;

/**
 * Closed routing table; anything not listed falls back to static HTML
 */
const STRATEGY_BY_SOURCE_TYPE: Readonly<Record<SourceType, StrategyKind>> = {
  feed: 'feed',
  'static-html': 'static',
  'dynamic-html': 'dynamic',
  reddit: 'dynamic',
  stackoverflow: 'dynamic',
  'generic-forum': 'static',
  unsupported: 'static',
  unknown: 'static',
};

export function routeSourceType(sourceType: SourceType, forceDynamic = false): StrategyKind {
  return forceDynamic ? 'dynamic' : STRATEGY_BY_SOURCE_TYPE[sourceType];
}

export interface ScrapeOrchestratorOptions {
  detector?: Pick<SourceDetector, 'detect'>;
  strategies?: Partial<Record<StrategyKind, ExtractionStrategy>>;
  /** Shared by reference; pass the same instance to every orchestrator that should share pacing */
  rateLimiter?: Pick<DomainRateLimiter, 'wait'>;
  http?: HttpClient;
  userAgents?: UserAgentProvider;
  contentExtractor?: ContentExtractor;
  launcher?: BrowserLauncher;
  /** Default for scrapeBatch/scrapeSources */
  concurrency?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface BatchOptions {
  concurrency?: number;
}

interface AttemptOutcome {
  records: NormalizedRecord[];
  result: ExtractionResult;
}

function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    const isHttp = parsed.protocol === 'http:' || parsed.protocol === 'https:';
    return isHttp && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

function assertMaxItems(maxItems: number): void {
  if (!Number.isInteger(maxItems) || maxItems < 1) {
    throw new ValidationError(
      'maxItems',
      `maxItems must be a positive integer, got ${maxItems}`,
      maxItems
    );
  }
}

export class ScrapeOrchestrator {
  private readonly detector: Pick<SourceDetector, 'detect'>;
  private readonly strategies: Record<StrategyKind, ExtractionStrategy>;
  private readonly rateLimiter: Pick<DomainRateLimiter, 'wait'>;
  private readonly concurrency: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: ScrapeOrchestratorOptions = {}) {
    this.logger = options.logger ?? createLogger('scrape-orchestrator');

    const http = options.http ?? defaultHttpClient;
    const userAgents = options.userAgents ?? new UserAgentProvider();
    const contentExtractor =
      options.contentExtractor ?? new ReadabilityContentExtractor(options.logger);
    const shared = { http, userAgents, logger: options.logger };

    this.detector = options.detector ?? new SourceDetector(shared);
    this.strategies = {
      feed: options.strategies?.feed ?? new FeedStrategy(shared),
      static: options.strategies?.static ?? new StaticHtmlStrategy({ ...shared, contentExtractor }),
      dynamic:
        options.strategies?.dynamic ??
        new DynamicHtmlStrategy({ ...shared, contentExtractor, launcher: options.launcher }),
    };
    this.rateLimiter = options.rateLimiter ?? new DomainRateLimiter({ logger: options.logger });
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scrape one URL. Expected failures resolve to []; only an invalid
   * maxItems throws, synchronously.
   */
  scrape(url: string, maxItems = DEFAULT_MAX_ITEMS, name?: string): Promise<NormalizedRecord[]> {
    assertMaxItems(maxItems);
    return this.attemptUrl(url, maxItems, name).then(({ records }) => records);
  }

  /**
   * Scrape several URLs one after another; records keep the input order
   */
  async scrapeAll(urls: string[], maxItems = DEFAULT_BATCH_MAX_ITEMS): Promise<NormalizedRecord[]> {
    const report = await this.scrapeBatch(urls, maxItems, { concurrency: 1 });
    return report.records;
  }

  /**
   * Like scrapeAll, but reports which URLs failed and why
   */
  scrapeBatch(
    urls: string[],
    maxItems = DEFAULT_BATCH_MAX_ITEMS,
    options: BatchOptions = {}
  ): Promise<BatchReport> {
    assertMaxItems(maxItems);
    const targets = urls.filter((url) => url.trim().length > 0);
    return this.runBatch(
      targets.map((url) => () => this.attemptUrl(url.trim(), maxItems)),
      options.concurrency
    );
  }

  /**
   * Scrape one fully specified source (type override, headers, forced browser)
   */
  async scrapeSource(config: SourceConfig): Promise<NormalizedRecord[]> {
    const { records } = await this.attemptConfig(config, config.url, config.name || undefined);
    return records;
  }

  /**
   * Scrape configured sources; disabled ones are skipped
   */
  scrapeSources(
    configs: readonly SourceConfig[],
    options: BatchOptions = {}
  ): Promise<BatchReport> {
    const enabled = configs.filter((config) => {
      if (!config.enabled) {
        this.logger.debug('Skipping disabled source', { url: config.url, name: config.name });
      }
      return config.enabled;
    });
    return this.runBatch(
      enabled.map(
        (config) => () => this.attemptConfig(config, config.url, config.name || undefined)
      ),
      options.concurrency
    );
  }

  private async runBatch(
    tasks: Array<() => Promise<AttemptOutcome>>,
    concurrency?: number
  ): Promise<BatchReport> {
    const limit = pLimit(Math.max(1, concurrency ?? this.concurrency));
    const done = this.logger.startTimer('scrape batch');

    // Promise.all keeps input order whatever the completion order
    const outcomes = await Promise.all(tasks.map((task) => limit(task)));

    const records = outcomes.flatMap(({ records: attemptRecords }) => attemptRecords);
    const results = outcomes.map(({ result }) => result);
    const failed = results.filter((result) => !result.success);
    const errors = failed.map(
      (result) => result.error ?? new Error(`Scrape failed for ${result.url}`)
    );

    const report: BatchReport = {
      records,
      results,
      failedUrls: failed.map((result) => result.url),
      failure:
        errors.length > 0
          ? new AggregateError(`${errors.length} of ${results.length} sources failed`, errors)
          : undefined,
    };

    this.logger.info('Batch complete', {
      sources: results.length,
      records: records.length,
      failed: report.failedUrls.length,
      duration: done(),
    });
    return report;
  }

  private async attemptUrl(url: string, maxItems: number, name?: string): Promise<AttemptOutcome> {
    const started = Date.now();

    let config: SourceConfig | undefined;
    if (isHttpUrl(url)) {
      try {
        config = createSourceConfig({ url, name: name ?? '', maxItems });
      } catch (error) {
        this.logger.debug('URL rejected by source config validation', {
          url,
          reason: describeError(error),
        });
      }
    }

    if (!config) {
      const error = new ValidationError('url', `Invalid URL provided: ${url}`, url);
      this.logger.error('Invalid URL provided', error, { url });
      return {
        records: [],
        result: {
          url,
          items: [],
          success: false,
          error,
          elapsedMs: Date.now() - started,
          itemCount: 0,
        },
      };
    }

    return this.attemptConfig(config, url, name);
  }

  private async attemptConfig(
    config: SourceConfig,
    requestedUrl: string,
    name?: string
  ): Promise<AttemptOutcome> {
    const started = Date.now();
    const logger = this.logger.forOperation('scrape', { url: requestedUrl });
    let routed: SourceConfig = config;
    let strategyKind: StrategyKind | undefined;

    try {
      routed = await this.resolveRoute(config, logger);
      const sourceType = routed.sourceType ?? 'unknown';
      strategyKind = routeSourceType(sourceType, routed.forceDynamic);
      logger.info(`Routing to ${strategyKind} strategy`, { url: routed.url, sourceType });

      await this.rateLimiter.wait(routed.url);
      const result = await this.strategies[strategyKind].extract(routed);

      return this.settle(result, routed, requestedUrl, name, strategyKind, started, logger);
    } catch (error) {
      const failure = new ExtractionError(routed.url, describeError(error), 'INTERNAL', error);
      logger.error('Error scraping source', toError(error), { url: routed.url });
      return {
        records: [],
        result: {
          url: requestedUrl,
          config: routed,
          items: [],
          success: false,
          error: failure,
          elapsedMs: Date.now() - started,
          itemCount: 0,
          strategy: strategyKind,
          sourceType: routed.sourceType,
        },
      };
    }
  }

  /**
   * Apply platform rewrites, then detection, unless the config already decides
   */
  private async resolveRoute(config: SourceConfig, logger: Logger): Promise<SourceConfig> {
    if (config.sourceType || config.forceDynamic) {
      return config;
    }

    const rewrite = rewritePlatformUrl(config.url);
    if (rewrite.sourceType) {
      if (rewrite.url !== config.url) {
        logger.info('Redirecting to platform feed', {
          from: config.url,
          to: rewrite.url,
          reason: rewrite.reason,
        });
      }
      return createSourceConfig({ ...config, url: rewrite.url, sourceType: rewrite.sourceType });
    }

    const sourceType = await this.detector.detect(config.url);
    return createSourceConfig({ ...config, sourceType });
  }

  private settle(
    result: ExtractionOutcome,
    config: SourceConfig,
    requestedUrl: string,
    name: string | undefined,
    strategy: StrategyKind,
    started: number,
    logger: Logger
  ): AttemptOutcome {
    const base = {
      url: requestedUrl,
      config,
      elapsedMs: Date.now() - started,
      strategy,
      sourceType: config.sourceType,
    };

    switch (result.kind) {
      case 'success': {
        const records = result.items.map((item) =>
          this.normalize(item, requestedUrl, name, config.sourceType)
        );
        logger.info('Scraped source', { url: config.url, itemCount: records.length });
        return {
          records,
          result: { ...base, items: result.items, success: true, itemCount: result.items.length },
        };
      }
      case 'empty':
        logger.warn('Source produced no items', { url: config.url, reason: result.reason });
        return {
          records: [],
          result: { ...base, items: [], success: true, reason: result.reason, itemCount: 0 },
        };
      case 'failed':
        logger.error(`${result.error.name} while scraping source`, result.error, {
          url: config.url,
          code: result.error.code,
        });
        return {
          records: [],
          result: { ...base, items: [], success: false, error: result.error, itemCount: 0 },
        };
    }
  }

  private normalize(
    item: ContentItem,
    requestedUrl: string,
    name: string | undefined,
    sourceType: SourceType | undefined
  ): NormalizedRecord {
    return {
      title: item.title,
      link: item.sourceUrl,
      content: item.content,
      date: formatRecordDate(item.publishedAt ?? this.now()),
      source: resolveSourceName(item, requestedUrl, name, sourceType),
    };
  }
}

/**
 * Caller name, else the strategy's name unless it is just a type tag, else the bare domain
 */
export function resolveSourceName(
  item: ContentItem,
  requestedUrl: string,
  name?: string,
  sourceType?: SourceType
): string {
  if (name) {
    return name;
  }
  const fromItem = item.metadata.sourceName;
  if (fromItem && fromItem !== sourceType && fromItem !== item.sourceType) {
    return fromItem;
  }
  return getDomainName(requestedUrl);
}

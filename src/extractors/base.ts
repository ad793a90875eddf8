import {
  createContentItem,
  createSourceConfig,
  outcome,
  type ContentItem,
  type ExtractionOutcome,
  type SourceConfig,
  type SourceType,
  type StrategyKind,
} from '../types';
import { describeError, ExtractionError, type ExtractionErrorCode } from '../utils/errors';
import { defaultHttpClient, type HttpClient } from '../utils/http';
import { createLogger, type Logger } from '../utils/logger';
import { getDomainName } from '../utils/text';
import { UserAgentProvider } from '../utils/user-agent';
import type { ExtractionStrategy, ExtractionStrategyInit } from './types';

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 15000;

export abstract class AbstractExtractionStrategy implements ExtractionStrategy {
  abstract readonly kind: StrategyKind;
  protected readonly http: HttpClient;
  protected readonly userAgents: UserAgentProvider;
  protected readonly timeoutMs: number;
  protected readonly logger: Logger;

  constructor(init: ExtractionStrategyInit = {}, component = 'extractor') {
    this.http = init.http ?? defaultHttpClient;
    this.userAgents = init.userAgents ?? new UserAgentProvider();
    this.timeoutMs = init.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
    this.logger = init.logger ?? createLogger(component);
  }

  abstract canHandle(url: string): boolean;

  abstract extract(config: SourceConfig): Promise<ExtractionOutcome>;

  async extractSingle(url: string, name?: string): Promise<ContentItem> {
    const config = createSourceConfig({ url, name: name ?? '', maxItems: 1 });
    const result = await this.extract(config);

    switch (result.kind) {
      case 'success': {
        const [first] = result.items;
        if (first) {
          return first;
        }
        throw new ExtractionError(url, 'no content found', 'PARSE_FAILED');
      }
      case 'empty':
        throw new ExtractionError(url, `no content found (${result.reason})`, 'PARSE_FAILED');
      case 'failed':
        throw result.error;
    }
  }

  /**
   * Log an unexpected failure of one extraction step and wrap it as the outcome
   */
  protected failure(
    config: SourceConfig,
    step: string,
    code: ExtractionErrorCode,
    error: unknown
  ): ExtractionOutcome {
    const label = `${step.charAt(0).toUpperCase()}${step.slice(1)}`;
    this.logger.error(label, error instanceof Error ? error : undefined, { url: config.url });
    return outcome.failed(
      new ExtractionError(config.url, `${step}: ${describeError(error)}`, code, error)
    );
  }

  protected requestHeaders(config: SourceConfig): Record<string, string> {
    return this.userAgents.getHeaders(config.headers ? { ...config.headers } : undefined);
  }

  protected displayName(config: SourceConfig): string {
    return config.name || getDomainName(config.url);
  }

  protected buildItem(
    config: SourceConfig,
    sourceType: SourceType,
    fields: Omit<ContentItem, 'sourceType' | 'metadata'>
  ): ContentItem {
    return createContentItem({
      ...fields,
      sourceType,
      metadata: { sourceName: this.displayName(config) },
    });
  }
}

import type { ContentItem, ExtractionOutcome, SourceConfig, StrategyKind } from '../types';
import type { HttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import type { UserAgentProvider } from '../utils/user-agent';

export interface ExtractionStrategy {
  readonly kind: StrategyKind;
  /** Cheap URL-only check; routing does not depend on it */
  canHandle(url: string): boolean;
  /** Resolves to an outcome for every expected failure; never "fails" for nothing found */
  extract(config: SourceConfig): Promise<ExtractionOutcome>;
  /** First item for a single URL; throws ExtractionError when there is none */
  extractSingle(url: string, name?: string): Promise<ContentItem>;
}

export interface ExtractionStrategyInit {
  http?: HttpClient;
  userAgents?: UserAgentProvider;
  /** Download or navigation deadline */
  timeoutMs?: number;
  logger?: Logger;
}

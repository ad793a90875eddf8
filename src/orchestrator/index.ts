/**
 * Central export point for orchestrator modules
 */

export {
  DEFAULT_BATCH_MAX_ITEMS,
  resolveSourceName,
  routeSourceType,
  ScrapeOrchestrator,
  type BatchOptions,
  type ScrapeOrchestratorOptions,
} from './scrape-orchestrator';
export { rewritePlatformUrl, STACKOVERFLOW_FEED_URL, type PlatformRewrite } from './url-rewrites';

export { AbstractExtractionStrategy, DEFAULT_DOWNLOAD_TIMEOUT_MS } from './base';
export {
  BrowserMissingError,
  BrowserTimeoutError,
  PlaywrightLauncher,
  type BrowserLauncher,
  type BrowserPage,
  type BrowserSession,
} from './browser';
export {
  ReadabilityContentExtractor,
  readPageMetadata,
  type ContentExtractor,
  type ExtractedContent,
} from './content-extractor';
export {
  DEFAULT_BOT_CHALLENGE_MARKERS,
  DEFAULT_POST_SELECTOR,
  DEFAULT_RENDER_TIMEOUT_MS,
  DEFAULT_SELECTOR_TIMEOUT_MS,
  DEFAULT_SETTLE_DELAY_MS,
  DynamicHtmlStrategy,
  type DynamicHtmlStrategyInit,
} from './dynamic-html';
export { DEFAULT_ENTRY_TITLE, FeedStrategy, resolveLink, salvageEntries } from './feed';
export { DEFAULT_AUTHOR, StaticHtmlStrategy, type StaticHtmlStrategyInit } from './static-html';
export type { ExtractionStrategy, ExtractionStrategyInit } from './types';

/**
 * Library entry point
 */

export * from './config';
export {
  DEFAULT_DYNAMIC_MARKERS,
  looksLikeFeedUrl,
  matchPlatform,
  SourceDetector,
} from './detection/source-detector';
export type { SourceDetectorOptions } from './detection/source-detector';
export * from './extractors';
export * from './orchestrator';
export * from './types';
export * from './utils';

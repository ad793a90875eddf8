/**
 * Central export point for all type definitions
 */

export {
  // Constants
  DEFAULT_MAX_ITEMS,
  LEGACY_MAX_ITEMS,
  SOURCE_TYPES,
  // Schemas
  SourceConfigSchema,
  // Constructors and helpers
  createContentItem,
  createSourceConfig,
  isSourceType,
  migrateLegacyFeeds,
  outcome,
  outcomeItems,
} from './sources';

export type {
  BatchReport,
  ContentItem,
  ExtractionOutcome,
  ExtractionResult,
  LegacyFeedEntry,
  NormalizedRecord,
  SourceConfig,
  SourceConfigInput,
  SourceType,
  StrategyKind,
} from './sources';

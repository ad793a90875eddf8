/**
 * Source and content type definitions
 * Shared by the detector, the extraction strategies and the orchestrator
 */

import { z } from 'zod';
import { ValidationError, type AggregateError, type ExtractionError } from '../utils/errors';

// ============================================================================
// SOURCE TYPES
// ============================================================================

export const SOURCE_TYPES = [
  'feed',
  'static-html',
  'dynamic-html',
  'reddit',
  'stackoverflow',
  'generic-forum',
  'unsupported',
  'unknown',
] as const;

/**
 * Classification of a source URL; decides which strategy extracts it
 */
export type SourceType = (typeof SOURCE_TYPES)[number];

export function isSourceType(value: unknown): value is SourceType {
  return typeof value === 'string' && SOURCE_TYPES.some((type) => type === value);
}

// ============================================================================
// SOURCE CONFIGURATION
// ============================================================================

export const DEFAULT_MAX_ITEMS = 10;
/** Items per feed in the legacy feed-list format */
export const LEGACY_MAX_ITEMS = 8;

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'URL must use the http or https scheme',
  });

/**
 * Zod schema for SourceConfig validation
 */
export const SourceConfigSchema = z.object({
  url: httpUrl,
  name: z.string().default(''),
  sourceType: z.enum(SOURCE_TYPES).optional(),
  maxItems: z.number().int().min(1).default(DEFAULT_MAX_ITEMS),
  headers: z.record(z.string()).optional(),
  enabled: z.boolean().default(true),
  forceDynamic: z.boolean().default(false),
});

export type SourceConfigInput = z.input<typeof SourceConfigSchema>;

/**
 * Configuration for one source, immutable once created
 */
export interface SourceConfig {
  readonly url: string;
  /** Display name; empty when the caller gave none */
  readonly name: string;
  /** Known type, skips detection when set */
  readonly sourceType?: SourceType;
  readonly maxItems: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly enabled: boolean;
  /** Route to the headless browser regardless of type */
  readonly forceDynamic: boolean;
}

/**
 * Validate and freeze a source configuration.
 * Throws ValidationError naming the first offending field.
 */
export function createSourceConfig(input: SourceConfigInput): SourceConfig {
  const parsed = SourceConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    const value = field === 'url' ? input.url : field === 'maxItems' ? input.maxItems : undefined;
    throw new ValidationError(
      field,
      `Invalid source config: ${field}: ${issue?.message ?? 'invalid'}`,
      value
    );
  }

  const { headers, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    headers: headers ? Object.freeze({ ...headers }) : undefined,
  });
}

/**
 * Legacy configuration format: a plain list of feeds
 */
export interface LegacyFeedEntry {
  name: string;
  url: string;
  maxItems?: number;
}

export function migrateLegacyFeeds(
  feeds: LegacyFeedEntry[],
  defaultMaxItems = LEGACY_MAX_ITEMS
): SourceConfig[] {
  return feeds.map((feed) =>
    createSourceConfig({
      url: feed.url,
      name: feed.name,
      sourceType: 'feed',
      maxItems: feed.maxItems ?? defaultMaxItems,
    })
  );
}

// ============================================================================
// EXTRACTED CONTENT
// ============================================================================

/**
 * One unit of extracted content, before normalization
 */
export interface ContentItem {
  readonly sourceUrl: string;
  readonly sourceType: SourceType;
  readonly title: string;
  readonly content: string;
  readonly publishedAt?: Date;
  readonly author?: string;
  /** `sourceName` carries the display name of the source */
  readonly metadata: Readonly<Record<string, string>>;
}

export function createContentItem(item: ContentItem): ContentItem {
  return Object.freeze({ ...item, metadata: Object.freeze({ ...item.metadata }) });
}

/**
 * What a strategy returns for one source.
 * `empty` is a soft miss (nothing found); `failed` is a technical failure.
 */
export type ExtractionOutcome =
  | { readonly kind: 'success'; readonly items: readonly ContentItem[] }
  | { readonly kind: 'empty'; readonly reason: string }
  | { readonly kind: 'failed'; readonly error: ExtractionError };

export const outcome = {
  success(items: readonly ContentItem[]): ExtractionOutcome {
    return items.length > 0 ? { kind: 'success', items } : { kind: 'empty', reason: 'no items' };
  },
  empty(reason: string): ExtractionOutcome {
    return { kind: 'empty', reason };
  },
  failed(error: ExtractionError): ExtractionOutcome {
    return { kind: 'failed', error };
  },
};

export function outcomeItems(result: ExtractionOutcome): readonly ContentItem[] {
  return result.kind === 'success' ? result.items : [];
}

export type StrategyKind = 'feed' | 'static' | 'dynamic';

/**
 * Record of one extraction attempt, kept for reporting
 */
export interface ExtractionResult {
  /** URL as requested, before any platform rewrite */
  url: string;
  /** Absent when the URL was rejected before a config could be built */
  config?: SourceConfig;
  items: readonly ContentItem[];
  success: boolean;
  error?: Error;
  /** Soft-miss reason when nothing was found */
  reason?: string;
  elapsedMs: number;
  itemCount: number;
  strategy?: StrategyKind;
  sourceType?: SourceType;
}

// ============================================================================
// NORMALIZED OUTPUT
// ============================================================================

/**
 * Output record handed to exporters
 */
export interface NormalizedRecord {
  title: string;
  link: string;
  content: string;
  /** YYYY-MM-DD */
  date: string;
  source: string;
}

export interface BatchReport {
  records: NormalizedRecord[];
  /** One entry per attempted URL, in input order */
  results: ExtractionResult[];
  failedUrls: string[];
  /** Roll-up of the failures, when there are any */
  failure?: AggregateError;
}

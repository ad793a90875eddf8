import { z } from 'zod';
import { SOURCE_TYPES } from '../types';

export const SourceEntrySchema = z.object({
  name: z.string().default(''),
  url: z.string().url({ message: 'Source url must be a valid URL' }),
  type: z.enum(SOURCE_TYPES).optional(),
  max_items: z.number().int().positive().optional(),
  headers: z.record(z.string()).optional(),
  enabled: z.boolean().default(true),
  force_dynamic: z.boolean().default(false),
});

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

/**
 * Feed list from the older configuration format
 */
export const LegacyFeedSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

export const DEFAULT_SOURCE_ENTRIES: SourceEntry[] = [
  {
    name: 'TechCrunch',
    url: 'https://techcrunch.com/tag/artificial-intelligence/feed/',
    type: 'feed',
    max_items: 8,
    enabled: true,
    force_dynamic: false,
  },
  {
    name: 'MIT Technology Review',
    url: 'https://www.technologyreview.com/feed/',
    type: 'feed',
    max_items: 8,
    enabled: true,
    force_dynamic: false,
  },
  {
    name: 'Analytics India Magazine',
    url: 'https://analyticsindiamag.com/feed/',
    type: 'feed',
    max_items: 8,
    enabled: true,
    force_dynamic: false,
  },
];

export const ScraperFileSchema = z.object({
  defaults: z
    .object({
      max_items: z.number().int().positive().default(8),
    })
    .default({ max_items: 8 }),
  detection: z
    .object({
      timeout_ms: z.number().int().positive().optional(),
      sniff_bytes: z.number().int().positive().default(5000),
      dynamic_markers: z.array(z.string().min(1)).optional(),
    })
    .default({ sniff_bytes: 5000 }),
  rendering: z
    .object({
      timeout_ms: z.number().int().positive().optional(),
      settle_delay_ms: z.number().int().min(0).default(3000),
      post_selector: z.string().min(1).default('shreddit-post'),
      selector_timeout_ms: z.number().int().positive().default(5000),
      bot_challenge_markers: z.array(z.string().min(1)).optional(),
    })
    .default({ settle_delay_ms: 3000, post_selector: 'shreddit-post', selector_timeout_ms: 5000 }),
  sources: z.array(SourceEntrySchema).optional(),
  rss_feeds: z.array(LegacyFeedSchema).optional(),
});

export type ScraperFile = z.infer<typeof ScraperFileSchema>;

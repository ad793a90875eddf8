import type { SourceType } from '../types';

export const STACKOVERFLOW_FEED_URL = 'https://stackoverflow.com/feeds';

export interface PlatformRewrite {
  url: string;
  /** Decided type; detection is skipped when present */
  sourceType?: SourceType;
  reason?: string;
}

const REDDIT_LISTING = /reddit\.com\/(r|user)\//i;

function isStackOverflowHost(url: URL): boolean {
  const host = url.hostname.toLowerCase();
  return host === 'stackoverflow.com' || host.endsWith('.stackoverflow.com');
}

/**
 * Swap platform pages for their feed equivalents where one exists.
 * Reddit listings become `.rss` feeds and thread pages go to the browser;
 * StackOverflow question lists become the site-wide feed.
 */
export function rewritePlatformUrl(url: string): PlatformRewrite {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { url };
  }

  if (REDDIT_LISTING.test(url)) {
    if (parsed.pathname.includes('/comments/')) {
      return { url, sourceType: 'reddit', reason: 'reddit thread' };
    }
    if (parsed.pathname.endsWith('.rss')) {
      return { url, sourceType: 'feed', reason: 'reddit feed' };
    }

    parsed.pathname = `${parsed.pathname.replace(/\/+$/, '')}.rss`;
    return { url: parsed.toString(), sourceType: 'feed', reason: 'reddit listing feed' };
  }

  const isQuestionList =
    parsed.pathname.includes('/questions') && !parsed.pathname.endsWith('.rss');
  if (isStackOverflowHost(parsed) && isQuestionList) {
    return {
      url: STACKOVERFLOW_FEED_URL,
      sourceType: 'feed',
      reason: 'stackoverflow questions feed',
    };
  }

  return { url };
}

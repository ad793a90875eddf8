import { load as loadHtml } from 'cheerio';

export interface CleanHtmlOptions {
  /** Drop every character outside 7-bit ASCII (default true) */
  asciiOnly?: boolean;
}

/**
 * Plain text from an HTML fragment: comments, scripts, styles and page chrome
 * are removed and whitespace is collapsed.
 */
export function cleanHtml(html: string, options: CleanHtmlOptions = {}): string {
  if (!html) {
    return '';
  }

  const withoutComments = html.replace(/<!--[\s\S]*?-->/g, '');
  const $ = loadHtml(withoutComments);
  $('script, style, nav, footer, header').remove();

  // Separate block boundaries so adjacent elements do not run together
  $('*').each((_, element) => {
    $(element).append(' ');
  });

  let text = $.root().text();

  if (options.asciiOnly ?? true) {
    text = text.replace(/[^\x00-\x7F]/g, '');
  }

  return normalizeWhitespace(text);
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Bare host of a URL: https://www.reddit.com/r/x -> reddit.com
 */
export function getDomainName(url: string): string {
  try {
    return new URL(url).host.replace(/^www\./, '');
  } catch {
    return url;
  }
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatRecordDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Date from a loosely formatted string; undefined when it does not parse
 */
export function parseDate(value: unknown): Date | undefined {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return undefined;
  }
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

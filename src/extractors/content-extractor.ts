import { Readability } from '@mozilla/readability';
import { type CheerioAPI, load as loadHtml } from 'cheerio';
import { JSDOM, VirtualConsole } from 'jsdom';
import { describeError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { cleanHtml, normalizeWhitespace } from '../utils/text';

/**
 * Main content of a page with the boilerplate stripped
 */
export interface ExtractedContent {
  title: string;
  author?: string;
  /** Raw date string as published by the page */
  date?: string;
  text: string;
}

export interface ContentExtractor {
  /** null when the page carries no meaningful text */
  extract(html: string, url: string): ExtractedContent | null;
}

type JsonLdNode = {
  '@type'?: string | string[];
  headline?: string;
  datePublished?: string;
  author?: JsonLdAuthor | JsonLdAuthor[] | string;
};

type JsonLdAuthor = {
  name?: string;
};

function nonEmpty(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = normalizeWhitespace(value);
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unwrapJsonLdNodes(value: unknown): JsonLdNode[] {
  if (Array.isArray(value)) {
    return value.flatMap((node) => unwrapJsonLdNodes(node));
  }
  if (!isRecord(value)) {
    return [];
  }
  const graph = value['@graph'];
  if (Array.isArray(graph)) {
    return unwrapJsonLdNodes(graph);
  }

  const node: JsonLdNode = {};
  const type = value['@type'];
  const isTypeList = Array.isArray(type) && type.every((entry) => typeof entry === 'string');
  if (typeof type === 'string' || isTypeList) {
    node['@type'] = type;
  }
  if (typeof value.headline === 'string') {
    node.headline = value.headline;
  }
  if (typeof value.datePublished === 'string') {
    node.datePublished = value.datePublished;
  }
  const author = value.author;
  if (typeof author === 'string') {
    node.author = author;
  } else if (Array.isArray(author)) {
    node.author = author
      .filter(isRecord)
      .map((entry) => ({ name: typeof entry.name === 'string' ? entry.name : undefined }));
  } else if (isRecord(author)) {
    node.author = { name: typeof author.name === 'string' ? author.name : undefined };
  }
  return [node];
}

function jsonLdAuthorName(author: JsonLdNode['author']): string | undefined {
  if (typeof author === 'string') {
    return nonEmpty(author);
  }
  const authors = Array.isArray(author) ? author : author ? [author] : [];
  const names = authors
    .map((entry) => nonEmpty(entry.name))
    .filter((name): name is string => Boolean(name));
  return names.length > 0 ? names.join(', ') : undefined;
}

/**
 * Page metadata read straight from the markup
 */
interface PageMetadata {
  title?: string;
  author?: string;
  date?: string;
}

export function readPageMetadata($: CheerioAPI, logger?: Logger): PageMetadata {
  const meta = (selector: string) => nonEmpty($(selector).first().attr('content'));

  const nodes: JsonLdNode[] = [];
  $('script[type="application/ld+json"]').each((_, element) => {
    const raw = $(element).contents().text();
    if (!raw) {
      return;
    }
    try {
      nodes.push(...unwrapJsonLdNodes(JSON.parse(raw)));
    } catch (error) {
      logger?.debug('Skipping unparsable JSON-LD block', { reason: describeError(error) });
    }
  });

  const jsonLdAuthor = nodes.map((node) => jsonLdAuthorName(node.author)).find(Boolean);
  const jsonLdDate = nodes.map((node) => nonEmpty(node.datePublished)).find(Boolean);
  const jsonLdHeadline = nodes.map((node) => nonEmpty(node.headline)).find(Boolean);

  return {
    title: meta('meta[property="og:title"]') ?? jsonLdHeadline,
    author: meta('meta[name="author"]') ?? meta('meta[property="article:author"]') ?? jsonLdAuthor,
    date:
      meta('meta[property="article:published_time"]') ??
      meta('meta[name="date"]') ??
      meta('meta[name="pubdate"]') ??
      jsonLdDate ??
      nonEmpty($('time[datetime]').first().attr('datetime')),
  };
}

/**
 * Mozilla Readability over jsdom, with cheerio reading the page metadata
 * and supplying the body text when Readability finds no article.
 */
export class ReadabilityContentExtractor implements ContentExtractor {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('content-extractor');
  }

  extract(html: string, url: string): ExtractedContent | null {
    if (!html.trim()) {
      return null;
    }

    const $ = loadHtml(html);
    const metadata = readPageMetadata($, this.logger);

    const dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
    try {
      const article = new Readability(dom.window.document).parse();

      const articleText = article?.content ? cleanHtml(article.content, { asciiOnly: false }) : '';
      const text = articleText || cleanHtml($('body').html() ?? '', { asciiOnly: false });
      if (!text) {
        return null;
      }

      return {
        title:
          metadata.title ??
          nonEmpty(article?.title) ??
          nonEmpty($('title').first().text()) ??
          nonEmpty($('h1').first().text()) ??
          '',
        author: metadata.author ?? nonEmpty(article?.byline),
        date: metadata.date ?? nonEmpty(article?.publishedTime),
        text,
      };
    } finally {
      dom.window.close();
    }
  }
}

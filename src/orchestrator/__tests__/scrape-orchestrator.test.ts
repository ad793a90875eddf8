import fs from 'node:fs';
import path from 'node:path';
import nock from 'nock';
import {
  createContentItem,
  createSourceConfig,
  outcome,
  type ContentItem,
  type ExtractionOutcome,
  type SourceConfig,
  type SourceType,
  type StrategyKind,
} from '../../types';
import { BrowserUnavailableError, ExtractionError, ValidationError } from '../../utils/errors';
import { UserAgentProvider } from '../../utils/user-agent';
import { resolveSourceName, routeSourceType, ScrapeOrchestrator } from '../scrape-orchestrator';

const TODAY = new Date(2024, 4, 6, 12);

function readFixture(filename: string): string {
  const fullPath = path.resolve(__dirname, '../../..', 'tests/__fixtures__', filename);
  return fs.readFileSync(fullPath, 'utf-8');
}

function buildItem(overrides: Partial<ContentItem> = {}): ContentItem {
  return createContentItem({
    sourceUrl: 'https://example.com/posts/1',
    sourceType: 'feed',
    title: 'Post',
    content: 'Body',
    publishedAt: new Date(2024, 3, 30, 9),
    metadata: { sourceName: '' },
    ...overrides,
  });
}

function fakeStrategy(
  kind: StrategyKind,
  respond: (config: SourceConfig) => ExtractionOutcome | Promise<ExtractionOutcome>
) {
  return {
    kind,
    canHandle: () => true,
    extract: jest.fn(async (config: SourceConfig) => respond(config)),
    extractSingle: jest.fn(async (url: string): Promise<ContentItem> => {
      throw new ExtractionError(url, 'not used in these tests');
    }),
  };
}

function unexpected(kind: StrategyKind) {
  return fakeStrategy(kind, (config) => {
    throw new Error(`${kind} strategy should not run for ${config.url}`);
  });
}

function buildHarness(detected: SourceType = 'static-html') {
  const detector = { detect: jest.fn(async (_url: string) => detected) };
  const rateLimiter = { wait: jest.fn(async (_url: string) => undefined) };
  const strategies = {
    feed: unexpected('feed'),
    static: unexpected('static'),
    dynamic: unexpected('dynamic'),
  };
  const build = () =>
    new ScrapeOrchestrator({
      detector,
      rateLimiter,
      strategies,
      now: () => TODAY,
    });
  return { detector, rateLimiter, strategies, build };
}

describe('ScrapeOrchestrator', () => {
  describe('scrape', () => {
    it('reads a subreddit through its feed without detection', async () => {
      const harness = buildHarness();
      harness.strategies.feed = fakeStrategy('feed', (config) =>
        outcome.success([
          buildItem({
            sourceUrl: `${config.url}#1`,
            title: 'Weekly thread',
            metadata: { sourceName: 'feed' },
          }),
        ])
      );

      const records = await harness.build().scrape('https://www.reddit.com/r/typescript/', 5);

      expect(harness.detector.detect).not.toHaveBeenCalled();
      expect(harness.strategies.feed.extract).toHaveBeenCalledWith(
        expect.objectContaining({
          url: 'https://www.reddit.com/r/typescript.rss',
          sourceType: 'feed',
          maxItems: 5,
        })
      );
      expect(harness.rateLimiter.wait).toHaveBeenCalledWith('https://www.reddit.com/r/typescript.rss');
      expect(records).toEqual([
        {
          title: 'Weekly thread',
          link: 'https://www.reddit.com/r/typescript.rss#1',
          content: 'Body',
          date: '2024-04-30',
          source: 'reddit.com',
        },
      ]);
    });

    it('sends Reddit threads to the browser', async () => {
      const harness = buildHarness();
      harness.strategies.dynamic = fakeStrategy('dynamic', () => outcome.empty('bot-challenge'));
      const url = 'https://www.reddit.com/r/typescript/comments/abc123/generics_question/';

      await expect(harness.build().scrape(url)).resolves.toEqual([]);
      expect(harness.strategies.dynamic.extract).toHaveBeenCalledWith(
        expect.objectContaining({ url, sourceType: 'reddit' })
      );
    });

    it('routes by the detected type', async () => {
      const harness = buildHarness('dynamic-html');
      harness.strategies.dynamic = fakeStrategy('dynamic', () =>
        outcome.success([buildItem({ sourceType: 'dynamic-html', metadata: { sourceName: 'App' } })])
      );

      const records = await harness.build().scrape('https://app.example.com/');

      expect(harness.detector.detect).toHaveBeenCalledWith('https://app.example.com/');
      expect(records.map((record) => record.source)).toEqual(['App']);
    });

    it('prefers the caller-supplied name', async () => {
      const harness = buildHarness();
      harness.strategies.static = fakeStrategy('static', () =>
        outcome.success([buildItem({ metadata: { sourceName: 'example.com' } })])
      );

      const records = await harness.build().scrape('https://example.com/', 10, 'Example Weekly');

      expect(records[0].source).toBe('Example Weekly');
    });

    it('dates undated items with the current day', async () => {
      const harness = buildHarness();
      harness.strategies.static = fakeStrategy('static', () =>
        outcome.success([buildItem({ publishedAt: undefined })])
      );

      const [record] = await harness.build().scrape('https://example.com/');

      expect(record.date).toBe('2024-05-06');
    });

    it('resolves to no records for an invalid URL', async () => {
      const harness = buildHarness();

      await expect(harness.build().scrape('not a url')).resolves.toEqual([]);
      await expect(harness.build().scrape('ftp://files.example.com/a')).resolves.toEqual([]);
      expect(harness.detector.detect).not.toHaveBeenCalled();
    });

    it('rejects a non-positive maxItems synchronously', () => {
      const orchestrator = buildHarness().build();

      expect(() => orchestrator.scrape('https://example.com/', 0)).toThrow(ValidationError);
      expect(() => orchestrator.scrape('https://example.com/', 2.5)).toThrow(
        'maxItems must be a positive integer, got 2.5'
      );
    });

    it('resolves to no records when a strategy fails', async () => {
      const harness = buildHarness();
      harness.strategies.static = fakeStrategy('static', (config) =>
        outcome.failed(new ExtractionError(config.url, 'HTML extraction failed: boom'))
      );

      await expect(harness.build().scrape('https://example.com/')).resolves.toEqual([]);
    });
  });

  describe('scrapeBatch', () => {
    it('collects records from the sources that worked and reports the rest', async () => {
      const harness = buildHarness();
      harness.strategies.static = fakeStrategy('static', (config) => {
        if (config.url.includes('broken')) {
          return outcome.failed(new ExtractionError(config.url, 'HTML extraction failed: boom'));
        }
        return outcome.success([buildItem({ sourceUrl: config.url, title: config.url })]);
      });

      const report = await harness
        .build()
        .scrapeBatch(['https://a.example/', 'https://broken.example/', 'https://c.example/']);

      expect(report.records.map((record) => record.link)).toEqual(['https://a.example/', 'https://c.example/']);
      expect(report.failedUrls).toEqual(['https://broken.example/']);
      expect(report.results.map((result) => result.success)).toEqual([true, false, true]);
      expect(report.failure?.message).toBe('1 of 3 sources failed');
      expect(report.failure?.errors[0]).toBeInstanceOf(ExtractionError);
    });

    it('keeps input order when running concurrently', async () => {
      const harness = buildHarness();
      const delays: Record<string, number> = { 'https://slow.example/': 30, 'https://fast.example/': 0 };
      harness.strategies.static = fakeStrategy('static', async (config) => {
        await new Promise((resolve) => setTimeout(resolve, delays[config.url] ?? 0));
        return outcome.success([buildItem({ sourceUrl: config.url })]);
      });

      const report = await harness
        .build()
        .scrapeBatch(['https://slow.example/', 'https://fast.example/'], 8, { concurrency: 2 });

      expect(report.records.map((record) => record.link)).toEqual([
        'https://slow.example/',
        'https://fast.example/',
      ]);
    });

    it('counts a soft miss as a success with its reason', async () => {
      const harness = buildHarness();
      harness.strategies.static = fakeStrategy('static', () => outcome.empty('download failed'));

      const report = await harness.build().scrapeBatch(['https://quiet.example/']);

      expect(report.failedUrls).toEqual([]);
      expect(report.failure).toBeUndefined();
      expect(report.results[0]).toMatchObject({
        url: 'https://quiet.example/',
        success: true,
        reason: 'download failed',
        itemCount: 0,
        strategy: 'static',
        sourceType: 'static-html',
      });
    });

    it('reports invalid URLs as validation failures and skips blank ones', async () => {
      const report = await buildHarness().build().scrapeBatch(['not a url', '   ', '']);

      expect(report.results).toHaveLength(1);
      expect(report.failedUrls).toEqual(['not a url']);
      expect(report.results[0].error).toBeInstanceOf(ValidationError);
      expect(report.results[0].error?.message).toBe('Invalid URL provided: not a url');
    });

    it('names a missing headless browser in the report', async () => {
      const harness = buildHarness('dynamic-html');
      harness.strategies.dynamic = fakeStrategy('dynamic', (config) =>
        outcome.failed(new BrowserUnavailableError(config.url))
      );

      const report = await harness.build().scrapeBatch(['https://spa.example/']);

      expect(report.results[0].error).toBeInstanceOf(BrowserUnavailableError);
      expect(report.failure?.getSummary()).toEqual({ total: 1, byType: { BrowserUnavailableError: 1 } });
    });

    it('turns an unexpected strategy error into an extraction failure', async () => {
      const harness = buildHarness();
      harness.strategies.static = fakeStrategy('static', () => {
        throw new TypeError('cannot read properties of undefined');
      });

      const report = await harness.build().scrapeBatch(['https://example.com/']);

      expect(report.records).toEqual([]);
      expect(report.results[0].error).toBeInstanceOf(ExtractionError);
      expect(report.results[0].error?.message).toBe(
        'Extraction failed for https://example.com/: cannot read properties of undefined'
      );
    });

    it('throws for a non-positive maxItems', () => {
      expect(() => buildHarness().build().scrapeBatch(['https://example.com/'], -1)).toThrow(ValidationError);
    });
  });

  describe('scrapeAll', () => {
    it('uses eight items per source by default', async () => {
      const harness = buildHarness('feed');
      harness.strategies.feed = fakeStrategy('feed', () => outcome.success([buildItem()]));

      const records = await harness.build().scrapeAll(['https://example.com/news']);

      expect(records).toHaveLength(1);
      expect(harness.strategies.feed.extract).toHaveBeenCalledWith(expect.objectContaining({ maxItems: 8 }));
    });
  });

  describe('scrapeSource / scrapeSources', () => {
    it('skips detection and rewrites when the type is configured', async () => {
      const harness = buildHarness();
      harness.strategies.dynamic = fakeStrategy('dynamic', () => outcome.success([buildItem()]));
      const config = createSourceConfig({
        url: 'https://www.reddit.com/r/typescript/',
        sourceType: 'dynamic-html',
      });

      await harness.build().scrapeSource(config);

      expect(harness.detector.detect).not.toHaveBeenCalled();
      expect(harness.strategies.dynamic.extract).toHaveBeenCalledWith(config);
    });

    it('forces the browser when asked', async () => {
      const harness = buildHarness();
      harness.strategies.dynamic = fakeStrategy('dynamic', () => outcome.empty('empty page'));
      const config = createSourceConfig({ url: 'https://example.com/feed', forceDynamic: true });

      await harness.build().scrapeSource(config);

      expect(harness.strategies.dynamic.extract).toHaveBeenCalledWith(config);
    });

    it('uses the configured name for records', async () => {
      const harness = buildHarness('feed');
      harness.strategies.feed = fakeStrategy('feed', () => outcome.success([buildItem()]));

      const records = await harness
        .build()
        .scrapeSource(createSourceConfig({ url: 'https://example.com/news', name: 'Example News' }));

      expect(records[0].source).toBe('Example News');
    });

    it('skips disabled sources', async () => {
      const harness = buildHarness('feed');
      harness.strategies.feed = fakeStrategy('feed', () => outcome.success([buildItem()]));

      const report = await harness.build().scrapeSources([
        createSourceConfig({ url: 'https://on.example/feed' }),
        createSourceConfig({ url: 'https://off.example/feed', enabled: false }),
      ]);

      expect(report.results.map((result) => result.url)).toEqual(['https://on.example/feed']);
      expect(harness.strategies.feed.extract).toHaveBeenCalledTimes(1);
    });
  });

  describe('with the real strategies', () => {
    afterEach(() => {
      nock.cleanAll();
    });

    it('scrapes an undated static page into a record dated today', async () => {
      nock('https://status.example.com')
        .head('/status')
        .reply(200, '', { 'Content-Type': 'text/html; charset=utf-8' })
        .get('/status')
        .times(2)
        .reply(200, readFixture('bare-page.html'), { 'Content-Type': 'text/html; charset=utf-8' });

      const orchestrator = new ScrapeOrchestrator({
        userAgents: new UserAgentProvider({ customUserAgent: 'test-agent/1.0' }),
        rateLimiter: { wait: async () => undefined },
        now: () => TODAY,
      });

      const records = await orchestrator.scrape('https://status.example.com/status');

      expect(records).toEqual([
        {
          title: 'Status board',
          link: 'https://status.example.com/status',
          content: 'All systems operational.',
          date: '2024-05-06',
          source: 'status.example.com',
        },
      ]);
    });
  });
});

describe('routeSourceType', () => {
  it.each<[SourceType, StrategyKind]>([
    ['feed', 'feed'],
    ['static-html', 'static'],
    ['dynamic-html', 'dynamic'],
    ['reddit', 'dynamic'],
    ['stackoverflow', 'dynamic'],
    ['generic-forum', 'static'],
    ['unsupported', 'static'],
    ['unknown', 'static'],
  ])('sends %s to the %s strategy', (sourceType, expected) => {
    expect(routeSourceType(sourceType)).toBe(expected);
  });

  it('always picks the browser when forced', () => {
    expect(routeSourceType('feed', true)).toBe('dynamic');
  });
});

describe('resolveSourceName', () => {
  const item = buildItem({ metadata: { sourceName: 'Strategy Name' } });

  it('uses the caller name first', () => {
    expect(resolveSourceName(item, 'https://www.example.com/x', 'Caller')).toBe('Caller');
  });

  it('uses the strategy name next', () => {
    expect(resolveSourceName(item, 'https://www.example.com/x')).toBe('Strategy Name');
  });

  it('ignores names that are only a type tag', () => {
    const tagged = buildItem({ sourceType: 'static-html', metadata: { sourceName: 'static-html' } });

    expect(resolveSourceName(tagged, 'https://www.example.com/x')).toBe('example.com');
  });
});

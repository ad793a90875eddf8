import path from 'node:path';
import { ConfigurationError } from '../../utils/errors';
import {
  clearConfigCache,
  loadScraperConfig,
  parseScraperConfig,
  toSourceConfigs,
} from '../yaml-loader';

const REPO_CONFIG = path.resolve(__dirname, '../../..', 'config/scraper.yaml');

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('parseScraperConfig', () => {
  it('fills every section with defaults', () => {
    expect(parseScraperConfig('')).toEqual({
      defaults: { max_items: 8 },
      detection: { sniff_bytes: 5000 },
      rendering: { settle_delay_ms: 3000, post_selector: 'shreddit-post', selector_timeout_ms: 5000 },
    });
  });

  it('reports YAML syntax errors', () => {
    const error = captureError(() => parseScraperConfig('sources: [', 'sources.yaml'));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: expect.stringMatching(/^Configuration error: Failed to parse configuration file sources\.yaml: /),
    });
  });

  it('reports schema violations by path', () => {
    const error = captureError(() => parseScraperConfig('defaults:\n  max_items: 0\n', 'sources.yaml'));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: 'Configuration error: Invalid configuration in sources.yaml: defaults.max_items: Number must be greater than 0',
    });
  });
});

describe('toSourceConfigs', () => {
  it('falls back to the default feeds', () => {
    const sources = toSourceConfigs(parseScraperConfig(''));

    expect(sources.map((source) => source.name)).toEqual([
      'TechCrunch',
      'MIT Technology Review',
      'Analytics India Magazine',
    ]);
    expect(sources.every((source) => source.sourceType === 'feed' && source.maxItems === 8)).toBe(true);
  });

  it('builds frozen configs with file defaults', () => {
    const sources = toSourceConfigs(
      parseScraperConfig(`
defaults:
  max_items: 5
sources:
  - url: https://example.com/blog
  - name: Docs
    url: https://docs.example.com/
    type: static-html
    max_items: 2
    headers:
      X-Api-Key: test-secret
    enabled: false
    force_dynamic: true
`)
    );

    expect(sources).toEqual([
      { url: 'https://example.com/blog', name: '', maxItems: 5, enabled: true, forceDynamic: false },
      {
        url: 'https://docs.example.com/',
        name: 'Docs',
        sourceType: 'static-html',
        maxItems: 2,
        headers: { 'X-Api-Key': 'test-secret' },
        enabled: false,
        forceDynamic: true,
      },
    ]);
    expect(Object.isFrozen(sources[1])).toBe(true);
    expect(Object.isFrozen(sources[1].headers)).toBe(true);
  });

  it('migrates the legacy feed list', () => {
    const sources = toSourceConfigs(
      parseScraperConfig(`
rss_feeds:
  - name: Old Feed
    url: https://old.example.com/rss
`)
    );

    expect(sources).toEqual([
      {
        url: 'https://old.example.com/rss',
        name: 'Old Feed',
        sourceType: 'feed',
        maxItems: 8,
        enabled: true,
        forceDynamic: false,
      },
    ]);
  });

  it('appends legacy feeds after the sources', () => {
    const sources = toSourceConfigs(
      parseScraperConfig(`
sources:
  - url: https://new.example.com/
rss_feeds:
  - name: Old Feed
    url: https://old.example.com/rss
`)
    );

    expect(sources.map((source) => source.url)).toEqual([
      'https://new.example.com/',
      'https://old.example.com/rss',
    ]);
  });

  it('names the offending source', () => {
    const file = parseScraperConfig(`
sources:
  - url: ftp://files.example.com/feed
`);

    const error = captureError(() => toSourceConfigs(file));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message:
        'Configuration error: Invalid source #1 (ftp://files.example.com/feed): Invalid source config: url: URL must use the http or https scheme',
    });
  });
});

describe('loadScraperConfig', () => {
  afterEach(() => {
    clearConfigCache();
  });

  it('loads the bundled configuration', async () => {
    const file = await loadScraperConfig(REPO_CONFIG);
    const sources = toSourceConfigs(file);

    expect(file.detection.dynamic_markers).toEqual([
      '__NEXT_DATA__',
      'vue-server-renderer',
      'ng-version',
    ]);
    expect(file.detection.timeout_ms).toBeUndefined();
    expect(file.rendering.timeout_ms).toBeUndefined();
    expect(sources).toHaveLength(4);
    expect(sources.filter((source) => source.enabled).map((source) => source.name)).toEqual([
      'TechCrunch',
      'MIT Technology Review',
      'Analytics India Magazine',
    ]);
  });

  it('caches parsed files until cleared', async () => {
    const first = await loadScraperConfig(REPO_CONFIG);

    await expect(loadScraperConfig(REPO_CONFIG)).resolves.toBe(first);

    clearConfigCache();
    const reloaded = await loadScraperConfig(REPO_CONFIG);
    expect(reloaded).not.toBe(first);
    expect(reloaded).toEqual(first);
  });

  it('reports a missing file', async () => {
    const missing = path.resolve(__dirname, 'missing.yaml');

    await expect(loadScraperConfig(missing)).rejects.toThrow(
      `Configuration error: Missing configuration file: ${missing}`
    );
  });
});

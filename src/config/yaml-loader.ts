import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import type { z, ZodTypeAny } from 'zod';
import { createSourceConfig, migrateLegacyFeeds, type SourceConfig } from '../types';
import { ConfigurationError, describeError } from '../utils/errors';
import { DEFAULT_SOURCE_ENTRIES, ScraperFileSchema, type ScraperFile } from './yaml-types';

const CONFIG_ROOT = process.env.CONFIG_ROOT ?? path.resolve(process.cwd(), 'config');
export const SCRAPER_CONFIG_FILE = 'scraper.yaml';

const cache = new Map<string, ScraperFile>();

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readYamlFile(filePath: string): Promise<unknown> {
  let fileContents: string;
  try {
    fileContents = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Missing configuration file: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${describeError(error)}`
    );
  }

  return parseYaml(fileContents, filePath);
}

function parseYaml(contents: string, fileLabel: string): unknown {
  try {
    return YAML.parse(contents, { prettyErrors: true });
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration file ${fileLabel}: ${describeError(error)}`
    );
  }
}

function validate<S extends ZodTypeAny>(schema: S, value: unknown, fileLabel: string): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration in ${fileLabel}: ${issues.join('; ')}`);
  }
  return result.data;
}

export function clearConfigCache(): void {
  cache.clear();
}

/**
 * Parse scraper configuration from YAML text
 */
export function parseScraperConfig(
  contents: string,
  fileLabel = 'inline configuration'
): ScraperFile {
  return validate(ScraperFileSchema, parseYaml(contents, fileLabel), fileLabel);
}

export async function loadScraperConfig(overridePath?: string): Promise<ScraperFile> {
  const resolvedPath = overridePath
    ? path.resolve(overridePath)
    : path.resolve(CONFIG_ROOT, SCRAPER_CONFIG_FILE);

  const cached = cache.get(resolvedPath);
  if (cached) {
    return cached;
  }

  const parsed = validate(ScraperFileSchema, await readYamlFile(resolvedPath), resolvedPath);
  cache.set(resolvedPath, parsed);
  return parsed;
}

/**
 * Source list from a configuration file. Legacy `rss_feeds` entries are
 * migrated to feed sources; a file with neither list gets the default feeds.
 */
export function toSourceConfigs(file: ScraperFile): SourceConfig[] {
  const entries = file.sources ?? (file.rss_feeds ? [] : DEFAULT_SOURCE_ENTRIES);

  const sources = entries.map((entry, index) => {
    try {
      return createSourceConfig({
        url: entry.url,
        name: entry.name,
        sourceType: entry.type,
        maxItems: entry.max_items ?? file.defaults.max_items,
        headers: entry.headers,
        enabled: entry.enabled,
        forceDynamic: entry.force_dynamic,
      });
    } catch (error) {
      throw new ConfigurationError(
        `Invalid source #${index + 1} (${entry.url}): ${describeError(error)}`
      );
    }
  });

  const legacy = file.rss_feeds ? migrateLegacyFeeds(file.rss_feeds, file.defaults.max_items) : [];
  return [...sources, ...legacy];
}

#!/usr/bin/env node

/**
 * Command line entry: scrape the configured sources (or the URLs given)
 * and write the normalized records to scrape-results.json
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as fs from 'node:fs';
import {
  config,
  loadConfig,
  loadScraperConfig,
  toSourceConfigs,
  validateConfig,
  type AppConfig,
  type ScraperFile,
} from './config';
import { SourceDetector } from './detection/source-detector';
import {
  DynamicHtmlStrategy,
  FeedStrategy,
  ReadabilityContentExtractor,
  StaticHtmlStrategy,
  type BrowserLauncher,
} from './extractors';
import { ScrapeOrchestrator } from './orchestrator';
import {
  createSourceConfig,
  type BatchReport,
  type NormalizedRecord,
  type SourceConfig,
} from './types';
import { ConfigurationError, describeError } from './utils/errors';
import { defaultHttpClient, type HttpClient } from './utils/http';
import { getLogger, Logger } from './utils/logger';
import { DomainRateLimiter } from './utils/rate-limiter';
import { cleanHtml } from './utils/text';
import { UserAgentProvider } from './utils/user-agent';

export const DEFAULT_OUTPUT_FILE = 'scrape-results.json';

export interface CliOptions {
  urls: string[];
  maxItems?: number;
  configPath?: string;
  output: string;
}

interface ProgramOptions {
  maxItems?: number;
  config?: string;
  output: string;
}

function parseMaxItems(value: string): number {
  const maxItems = Number(value);
  if (!Number.isInteger(maxItems) || maxItems < 1) {
    throw new InvalidArgumentError(`--max-items must be a positive integer, got ${value}`);
  }
  return maxItems;
}

/**
 * The `universal-scrape` command; `onRun` receives the parsed options.
 * Parse errors throw a CommanderError instead of exiting the process.
 */
export function buildProgram(onRun: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name('universal-scrape')
    .description('Scrape feeds and web pages into uniform content records')
    .version('1.0.0')
    .argument('[urls...]', 'URLs to scrape instead of the configured sources')
    .option('-n, --max-items <count>', 'Maximum items per source', parseMaxItems)
    .option('-c, --config <path>', 'YAML source file')
    .option('-o, --output <file>', 'Results file', DEFAULT_OUTPUT_FILE)
    .exitOverride()
    .action(async (urls: string[], options: ProgramOptions) => {
      await onRun({
        urls: urls.filter((url) => url.trim().length > 0),
        maxItems: options.maxItems,
        configPath: options.config,
        output: options.output,
      });
    });

  return program;
}

/**
 * Records with markup stripped from the content, for spreadsheet-style exports
 */
export function cleanRecords(records: NormalizedRecord[]): NormalizedRecord[] {
  return records.map((record) => ({ ...record, content: cleanHtml(record.content) }));
}

export interface OrchestratorOverrides {
  http?: HttpClient;
  launcher?: BrowserLauncher;
}

/**
 * Wire every collaborator from the environment and the YAML file.
 * A `timeout_ms` in the file wins over the environment timeouts.
 */
export function buildOrchestrator(
  appConfig: AppConfig,
  file: ScraperFile,
  overrides: OrchestratorOverrides = {}
): ScrapeOrchestrator {
  const http = overrides.http ?? defaultHttpClient;
  const userAgents = new UserAgentProvider({ customUserAgent: appConfig.userAgent });
  const contentExtractor = new ReadabilityContentExtractor();

  return new ScrapeOrchestrator({
    http,
    userAgents,
    contentExtractor,
    detector: new SourceDetector({
      http,
      userAgents,
      timeoutMs: file.detection.timeout_ms ?? appConfig.detectionTimeoutMs,
      sniffBytes: file.detection.sniff_bytes,
      dynamicMarkers: file.detection.dynamic_markers,
    }),
    strategies: {
      feed: new FeedStrategy({ http, userAgents }),
      static: new StaticHtmlStrategy({ http, userAgents, contentExtractor }),
      dynamic: new DynamicHtmlStrategy({
        userAgents,
        launcher: overrides.launcher,
        contentExtractor,
        timeoutMs: file.rendering.timeout_ms ?? appConfig.renderTimeoutMs,
        settleDelayMs: file.rendering.settle_delay_ms,
        postSelector: file.rendering.post_selector,
        selectorTimeoutMs: file.rendering.selector_timeout_ms,
        botChallengeMarkers: file.rendering.bot_challenge_markers,
      }),
    },
    rateLimiter: new DomainRateLimiter({
      requestsPerMinute: appConfig.requestsPerMinute,
      defaultDelayMs: appConfig.defaultDelayMs,
    }),
    concurrency: appConfig.batchConcurrency,
  });
}

function writeResults(output: string, report: BatchReport): void {
  const payload = {
    timestamp: new Date().toISOString(),
    recordCount: report.records.length,
    failedUrls: report.failedUrls,
    failures: report.failure?.getSummary(),
    records: report.records,
    cleaned: cleanRecords(report.records),
  };

  fs.writeFileSync(output, JSON.stringify(payload, null, 2));
  console.log(`📝 Results written to ${output}`);
}

function printSummary(report: BatchReport): void {
  console.log(`\n📊 ${report.records.length} records from ${report.results.length} sources`);

  for (const result of report.results) {
    const label = result.config?.name || result.url;
    if (!result.success) {
      const reason = result.error ? `${result.error.name}: ${result.error.message}` : 'failed';
      console.log(`  ❌ ${label}: ${reason}`);
    } else if (result.itemCount === 0) {
      console.log(`  ⚠️ ${label}: no items (${result.reason ?? 'empty'})`);
    } else {
      const strategy = result.strategy ?? 'unknown';
      console.log(`  ✅ ${label}: ${result.itemCount} items via ${strategy} strategy`);
    }
  }
}

function initializeConfiguration(): AppConfig {
  const validation = validateConfig();
  if (!validation.valid) {
    throw new ConfigurationError('Configuration validation failed', validation.errors);
  }

  const appConfig = loadConfig();
  getLogger().setLogLevel(Logger.parseLogLevel(appConfig.logLevel));
  if (appConfig.logLevel === 'debug') {
    config.logConfig();
  }
  return appConfig;
}

function withMaxItems(sources: SourceConfig[], maxItems?: number): SourceConfig[] {
  return maxItems ? sources.map((source) => createSourceConfig({ ...source, maxItems })) : sources;
}

async function run(options: CliOptions): Promise<void> {
  const appConfig = initializeConfiguration();
  const file = await loadScraperConfig(options.configPath ?? appConfig.configPath);
  const orchestrator = buildOrchestrator(appConfig, file);

  const report =
    options.urls.length > 0
      ? await orchestrator.scrapeBatch(options.urls, options.maxItems ?? file.defaults.max_items)
      : await orchestrator.scrapeSources(withMaxItems(toSourceConfigs(file), options.maxItems));

  printSummary(report);
  writeResults(options.output, report);
}

/**
 * Main execution function; resolves to the process exit code
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  console.log('🚀 Universal scrape - starting\n');

  try {
    await buildProgram(run).parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    // Commander has already printed its own usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    console.error(`\n❌ Fatal error: ${describeError(error)}`);
    return 1;
  }
}

// Run if this is the main module
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Unexpected error:', error);
      process.exitCode = 1;
    });
}

export { main };

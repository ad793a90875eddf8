/**
 * Configuration management with environment variable validation
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { getLogger } from '../utils/logger';

// Load .env file if it exists
dotenv.config();

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Environment variable schema
 */
const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),

  // Pacing; 0 falls back to DEFAULT_DELAY_MS between requests to one host
  REQUESTS_PER_MINUTE: z.string().default('20').transform(Number).pipe(z.number().min(0)),
  DEFAULT_DELAY_MS: z.string().default('2000').transform(Number).pipe(z.number().min(0)),

  DETECTION_TIMEOUT_MS: positiveInt('10000'),
  RENDER_TIMEOUT_MS: positiveInt('30000'),
  BATCH_CONCURRENCY: positiveInt('1'),

  // Fixed client identity instead of the rotating pool
  USER_AGENT: z.string().optional(),
  SCRAPER_CONFIG: z.string().optional(),
});

type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Application configuration
 */
export interface AppConfig {
  requestsPerMinute: number;
  defaultDelayMs: number;
  detectionTimeoutMs: number;
  renderTimeoutMs: number;
  batchConcurrency: number;
  userAgent?: string;
  /** Explicit path to the YAML source file */
  configPath?: string;

  logLevel: 'error' | 'warn' | 'info' | 'debug';
  nodeEnv: 'development' | 'test' | 'production';
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

export class Configuration {
  private config?: AppConfig;
  private env?: EnvConfig;

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and validate configuration
   */
  load(): AppConfig {
    if (this.config) {
      return this.config;
    }

    const result = EnvSchema.safeParse(this.source);

    if (!result.success) {
      const invalid = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new ConfigurationError(
        `Invalid configuration:\nInvalid variables: ${invalid.join('; ')}`,
        result.error.errors.map((err) => err.path.join('.'))
      );
    }

    this.env = result.data;
    const userAgent = this.env.USER_AGENT?.trim();

    this.config = {
      requestsPerMinute: this.env.REQUESTS_PER_MINUTE,
      defaultDelayMs: this.env.DEFAULT_DELAY_MS,
      detectionTimeoutMs: this.env.DETECTION_TIMEOUT_MS,
      renderTimeoutMs: this.env.RENDER_TIMEOUT_MS,
      batchConcurrency: this.env.BATCH_CONCURRENCY,
      userAgent: userAgent ? userAgent : undefined,
      configPath: this.env.SCRAPER_CONFIG,
      logLevel: this.env.LOG_LEVEL,
      nodeEnv: this.env.NODE_ENV,
      isDevelopment: this.env.NODE_ENV === 'development',
      isProduction: this.env.NODE_ENV === 'production',
      isTest: this.env.NODE_ENV === 'test',
    };

    return this.config;
  }

  /**
   * Get a specific configuration value
   */
  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.load()[key];
  }

  isLoaded(): boolean {
    return this.config !== undefined;
  }

  /**
   * Reload configuration (useful for testing)
   */
  reload(): AppConfig {
    this.config = undefined;
    this.env = undefined;
    return this.load();
  }

  /**
   * Validate configuration without throwing
   */
  validate(): { valid: boolean; errors?: string[] } {
    try {
      this.load();
      return { valid: true };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return {
          valid: false,
          errors: [error.message, ...(error.missingFields || [])],
        };
      }
      return { valid: false, errors: [String(error)] };
    }
  }

  /**
   * Log configuration; a fixed user agent is shortened
   */
  logConfig(): void {
    const config = this.load();
    getLogger().info('Configuration loaded', {
      ...config,
      userAgent: config.userAgent ? this.abbreviate(config.userAgent) : undefined,
    });
  }

  private abbreviate(value: string): string {
    return value.length <= 24 ? value : `${value.substring(0, 24)}...`;
  }
}

// Export singleton instance
export const config = new Configuration();

export function loadConfig(): AppConfig {
  return config.load();
}

export function validateConfig(): { valid: boolean; errors?: string[] } {
  return config.validate();
}

export * from './yaml-loader';
export * from './yaml-types';

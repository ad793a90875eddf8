import { BaseError, describeError } from '../utils/errors';

/**
 * Narrow view of a rendered page; only what the dynamic strategy drives
 */
export interface BrowserPage {
  goto(url: string, options: { waitUntil: 'networkidle'; timeout: number }): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<void>;
  content(): Promise<string>;
}

export interface BrowserSession {
  newPage(userAgent: string): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<BrowserSession>;
}

/**
 * Thrown by a launcher when no browser can be started at all
 */
export class BrowserMissingError extends BaseError {
  constructor(public readonly reason: string) {
    super(`Headless browser is not available: ${reason}`, { reason });
  }
}

/**
 * Navigation or wait exceeded its deadline
 */
export class BrowserTimeoutError extends BaseError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Page load timed out after ${timeoutMs}ms: ${url}`, { url, timeoutMs });
  }
}

const MISSING_BROWSER_PATTERNS = [
  /executable doesn't exist/i,
  /playwright install/i,
  /cannot find module 'playwright'/i,
];

function isMissingBrowser(error: unknown): boolean {
  if (error instanceof Error && 'code' in error && error.code === 'MODULE_NOT_FOUND') {
    return true;
  }
  const message = describeError(error);
  return MISSING_BROWSER_PATTERNS.some((pattern) => pattern.test(message));
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

export interface PlaywrightLauncherOptions {
  headless?: boolean;
  args?: string[];
}

/**
 * Headless Chromium through Playwright, loaded on first launch so that
 * feed and static sources never need the browser installed
 */
export class PlaywrightLauncher implements BrowserLauncher {
  private readonly headless: boolean;
  private readonly args: string[];

  constructor(options: PlaywrightLauncherOptions = {}) {
    this.headless = options.headless ?? true;
    this.args = options.args ?? ['--disable-blink-features=AutomationControlled', '--no-first-run'];
  }

  async launch(): Promise<BrowserSession> {
    let browser: import('playwright').Browser;
    try {
      const { chromium } = await import('playwright');
      browser = await chromium.launch({ headless: this.headless, args: this.args });
    } catch (error) {
      if (isMissingBrowser(error)) {
        throw new BrowserMissingError(describeError(error));
      }
      throw error;
    }

    return {
      async newPage(userAgent: string): Promise<BrowserPage> {
        const context = await browser.newContext({
          userAgent,
          viewport: { width: 1920, height: 1080 },
        });
        const page = await context.newPage();

        return {
          async goto(url, options) {
            try {
              await page.goto(url, options);
            } catch (error) {
              if (isTimeout(error)) {
                throw new BrowserTimeoutError(url, options.timeout);
              }
              throw error;
            }
          },
          async waitForTimeout(ms) {
            await page.waitForTimeout(ms);
          },
          async waitForSelector(selector, options) {
            try {
              await page.waitForSelector(selector, options);
            } catch (error) {
              if (isTimeout(error)) {
                throw new BrowserTimeoutError(page.url(), options.timeout);
              }
              throw error;
            }
          },
          content: () => page.content(),
        };
      },
      close: () => browser.close(),
    };
  }
}

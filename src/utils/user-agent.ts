/**
 * Rotating browser identities for outbound requests
 */

export const BROWSER_USER_AGENTS: readonly string[] = [
  // Chrome on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  // Chrome on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  // Firefox
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:126.0) Gecko/20100101 Firefox/126.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:126.0) Gecko/20100101 Firefox/126.0',
  // Safari on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  // Edge on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36 Edg/125.0.0.0',
];

const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8';
const DEFAULT_ACCEPT_LANGUAGE = 'en-US,en;q=0.5';

export interface UserAgentProviderOptions {
  /** Fixed identity; disables rotation */
  customUserAgent?: string;
  pool?: readonly string[];
  random?: () => number;
}

export class UserAgentProvider {
  private readonly customUserAgent?: string;
  private readonly pool: readonly string[];
  private readonly random: () => number;

  constructor(options: UserAgentProviderOptions = {}) {
    const custom = options.customUserAgent?.trim();
    this.customUserAgent = custom ? custom : undefined;
    this.pool = options.pool && options.pool.length > 0 ? options.pool : BROWSER_USER_AGENTS;
    this.random = options.random ?? Math.random;
  }

  getUserAgent(): string {
    if (this.customUserAgent) {
      return this.customUserAgent;
    }
    const index = Math.min(Math.floor(this.random() * this.pool.length), this.pool.length - 1);
    return this.pool[index] ?? BROWSER_USER_AGENTS[0];
  }

  /**
   * Browser-like request headers; `additional` wins over the defaults
   */
  getHeaders(additional?: Record<string, string>): Record<string, string> {
    return {
      'User-Agent': this.getUserAgent(),
      Accept: DEFAULT_ACCEPT,
      'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
      DNT: '1',
      'Upgrade-Insecure-Requests': '1',
      ...additional,
    };
  }
}

import { BaseError } from './errors';

export class HttpRequestError extends BaseError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly method: string
  ) {
    super(`HTTP ${method} ${url} failed with ${status} ${statusText}`, {
      url,
      status,
      statusText,
      method,
    });
  }
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

export interface HeadResult {
  status: number;
  url: string;
  contentType: string;
}

/**
 * Outbound HTTP used by the detector and the extraction strategies
 */
export interface HttpClient {
  head(url: string, options?: HttpRequestOptions): Promise<HeadResult>;
  getText(url: string, options?: HttpRequestOptions): Promise<string>;
  /** Reads at most `maxBytes` of the body, whatever the status code */
  getTextPrefix(url: string, maxBytes: number, options?: HttpRequestOptions): Promise<string>;
}

async function executeRequest(
  url: string,
  method: string,
  options: HttpRequestOptions = {}
): Promise<Response> {
  const { timeout, headers } = options;
  const signal = timeout === undefined ? undefined : AbortSignal.timeout(timeout);

  try {
    return await fetch(url, {
      method,
      headers,
      redirect: 'follow',
      signal,
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new BaseError(`HTTP ${method} ${url} timed out after ${timeout}ms`, {
        url,
        method,
        timeout,
        reason: error.message,
      });
    }
    throw error;
  }
}

export async function fetchHead(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HeadResult> {
  const response = await executeRequest(url, 'HEAD', options);
  await response.body?.cancel();

  return {
    status: response.status,
    url: response.url || url,
    contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
  };
}

export async function fetchText(url: string, options: HttpRequestOptions = {}): Promise<string> {
  const response = await executeRequest(url, 'GET', options);

  if (!response.ok) {
    await response.body?.cancel();
    throw new HttpRequestError(url, response.status, response.statusText, 'GET');
  }

  return response.text();
}

export async function fetchTextPrefix(
  url: string,
  maxBytes: number,
  options: HttpRequestOptions = {}
): Promise<string> {
  const response = await executeRequest(url, 'GET', options);

  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  try {
    while (received < maxBytes) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      chunks.push(value);
      received += value.byteLength;
    }
  } finally {
    await reader.cancel();
  }

  const bytes = Buffer.concat(chunks).subarray(0, maxBytes);
  return new TextDecoder('utf-8', { fatal: false }).decode(bytes);
}

export const defaultHttpClient: HttpClient = {
  head: fetchHead,
  getText: fetchText,
  getTextPrefix: fetchTextPrefix,
};

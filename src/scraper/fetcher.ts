/**
 * HTTP Fetcher
 *
 * One GET per call, with a per-attempt timeout, fixed-delay retries on
 * transient failures and a shared rate limiter in front of every attempt.
 */

import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { FetchError, isTransientFetchError } from '../utils/errors.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import type { PageFetcher } from './types.js';

export interface FetcherOptions {
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  userAgent: string;
  rateLimiter?: RateLimiter;
  fetchImpl?: typeof fetch;
}

function toFetchError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new FetchError('Timeout', url, `Timeout fetching ${url}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError('NetworkError', url, `Network error fetching ${url}: ${message}`, { cause: error });
}

export class Fetcher implements PageFetcher {
  private readonly options: FetcherOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetcherOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(url: string): Promise<Buffer> {
    const { maxAttempts, retryDelayMs } = this.options;

    const content = await withRetry(
      () => this.fetchOnce(url),
      {
        maxAttempts,
        initialDelayMs: retryDelayMs,
        maxDelayMs: retryDelayMs,
        factor: 1,
        shouldRetry: isTransientFetchError,
      },
      { url }
    );

    logger.info({ url, bytes: content.length }, 'Fetched URL');
    return content;
  }

  private async fetchOnce(url: string): Promise<Buffer> {
    const { rateLimiter } = this.options;
    if (rateLimiter) {
      await rateLimiter.waitForSlot();
    }

    logger.debug({ url }, 'Fetching URL');

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html, application/xhtml+xml, application/rss+xml, application/xml;q=0.9, */*;q=0.8',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        throw new FetchError('HttpError', url, `HTTP ${response.status} error in ${url}`, {
          status: response.status,
        });
      }

      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw toFetchError(url, error);
    }
  }
}

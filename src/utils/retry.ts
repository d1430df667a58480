/**
 * Retry with backoff. Only the Fetcher retries; everything else fails once
 * and is counted by its loop.
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

/**
 * Delay before attempt `attempt + 1`. A factor of 1 gives a fixed delay.
 */
export function backoffDelay(attempt: number, config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'factor'>): number {
  return Math.min(config.initialDelayMs * config.factor ** (attempt - 1), config.maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  context: Record<string, unknown> = {}
): Promise<T> {
  const settings = { ...DEFAULT_RETRY_CONFIG, ...config };
  const { maxAttempts, shouldRetry } = settings;

  let lastError: Error = new Error(`No attempt made (maxAttempts = ${maxAttempts})`);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (shouldRetry && !shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt === maxAttempts) {
        logger.error({ ...context, error: lastError, attempt, maxAttempts }, 'All retry attempts exhausted');
        throw lastError;
      }

      const delay = backoffDelay(attempt, settings);
      logger.warn(
        { ...context, error: lastError.message, attempt, maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );
      await sleep(delay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

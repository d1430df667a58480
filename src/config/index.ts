/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'galician-news-corpus',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  sources: {
    praza: {
      baseUrl: env.PRAZA_BASE_URL,
      feedUrl: env.PRAZA_FEED_URL,
      sourceDir: env.PRAZA_SOURCE_DIR,
      corpusDir: env.PRAZA_CORPUS_DIR,
      contentType: 'html',
    },
    nosdiario: {
      baseUrl: env.NOSDIARIO_BASE_URL,
      sourceDir: env.NOSDIARIO_SOURCE_DIR,
      corpusDir: env.NOSDIARIO_CORPUS_DIR,
      contentType: 'xml',
    },
  },

  fetch: {
    timeoutMs: env.FETCH_TIMEOUT_MS,
    maxAttempts: env.FETCH_MAX_ATTEMPTS,
    retryDelayMs: env.FETCH_RETRY_DELAY_MS,
    userAgent: env.USER_AGENT,
  },

  crawl: {
    rateLimitMs: env.SCRAPE_RATE_LIMIT_MS,
    maxPages: env.CRAWL_MAX_PAGES,
    feedMaxItems: env.FEED_MAX_ITEMS,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export {
  CATEGORIES,
  CATEGORY_SLUGS,
  NEWSML_SUBJECTS,
  categoryLabel,
  isCategorySlug,
  subjectLabel,
  type CategorySlug,
} from './categories.js';

/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const optionalPositiveInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  // Praza Pública
  PRAZA_BASE_URL: z.string().url().default('https://praza.gal'),
  PRAZA_FEED_URL: z.string().url().default('https://praza.gal/rss'),
  PRAZA_SOURCE_DIR: z.string().default('./data/raw/praza'),
  PRAZA_CORPUS_DIR: z.string().default('./data/corpus/praza'),

  // Nós Diario
  NOSDIARIO_BASE_URL: z.string().url().default('https://www.nosdiario.gal'),
  NOSDIARIO_SOURCE_DIR: z.string().default('./data/raw/nosdiario'),
  NOSDIARIO_CORPUS_DIR: z.string().default('./data/corpus/nosdiario'),

  // Fetching
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  SCRAPE_RATE_LIMIT_MS: z.coerce.number().int().nonnegative().default(1000),
  CRAWL_MAX_PAGES: optionalPositiveInt,
  FEED_MAX_ITEMS: optionalPositiveInt,
  USER_AGENT: z.string().default('GalicianNewsCorpus/1.0'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();

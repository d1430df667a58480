#!/usr/bin/env node
/**
 * Galician News Corpus
 *
 * Two phases per source, run separately:
 * 1. download: crawl Praza Pública listings (or its RSS feed) and store the raw pages
 * 2. parse: extract article records from stored pages / NewsML files into JSON
 *
 * Usage:
 *   node dist/index.js praza --download [category|rss] [--category SLUG...]
 *   node dist/index.js praza --parse [FILE]
 *   node dist/index.js nosdiario --parse [FILE]
 */

import { config } from './config/index.js';
import { logger, setLogLevel } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import {
  CliUsageError,
  USAGE,
  parseCliArgs,
  type CliOptions,
  type DownloadCommand,
  type ParseCommand,
} from './cli/options.js';
import { printParseSummary } from './cli/summary.js';
import { CategoryCrawler, Downloader, FeedCrawler, Fetcher } from './scraper/index.js';
import { DocumentStore } from './store/document-store.js';
import { createExtractor } from './extract/index.js';
import { CorpusWriter } from './corpus/writer.js';
import { runCategoryDownload, runFeedDownload, runParse } from './pipeline.js';

async function executeDownload(options: DownloadCommand): Promise<void> {
  const source = config.sources.praza;

  const fetcher = new Fetcher({
    ...config.fetch,
    rateLimiter: new RateLimiter(config.crawl.rateLimitMs),
  });
  const store = new DocumentStore({ rootDir: source.sourceDir, contentType: source.contentType });
  const downloader = new Downloader({ fetcher, store });

  const result =
    options.from === 'rss'
      ? await runFeedDownload({
          feedCrawler: new FeedCrawler({ fetcher, feedUrl: source.feedUrl, maxItems: config.crawl.feedMaxItems }),
          downloader,
        })
      : await runCategoryDownload({
          crawler: new CategoryCrawler({ fetcher, baseUrl: source.baseUrl, maxPages: config.crawl.maxPages }),
          downloader,
          categories: options.categories,
        });

  logger.info('');
  logger.info('Download Complete:');
  logger.info(`  ✓ Downloaded: ${result.downloaded} articles`);
  logger.info(`  ✓ Skipped:    ${result.skipped} already stored`);
  if (result.errors > 0) {
    logger.info(`  ⚠ Errors:     ${result.errors}`);
  }
  if (result.partialCategories.length > 0) {
    logger.warn(`  ⚠ Partial:    ${result.partialCategories.join(', ')}`);
  }
  logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function executeParse(options: ParseCommand): Promise<void> {
  const source = config.sources[options.source];

  const store = new DocumentStore({ rootDir: source.sourceDir, contentType: source.contentType });
  const writer = new CorpusWriter(source.corpusDir);
  await writer.open();

  const result = await runParse({
    store,
    extractor: createExtractor(options.source, source.baseUrl),
    sink: writer,
    keys: options.file ? [store.keyForPath(options.file)] : undefined,
  });

  printParseSummary(result);
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      process.exit(2);
    }
    throw error;
  }

  if (options.mode === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  logger.info({ env: config.app.env, source: options.source, mode: options.mode }, 'Starting');

  if (options.mode === 'download') {
    await executeDownload(options);
  } else {
    await executeParse(options);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Run failed');
  process.exit(1);
});

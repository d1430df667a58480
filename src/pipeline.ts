/**
 * Pipelines
 *
 * Download: crawl listings (or the feed) and store raw documents.
 * Parse: turn stored documents into corpus records, one at a time, with
 * each document's failure kept to itself.
 */

import { logger } from './utils/logger.js';
import { errorKind, errorMessage } from './utils/errors.js';
import type { CategoryCrawler } from './scraper/category-crawler.js';
import type { FeedCrawler } from './scraper/feed-crawler.js';
import type { Downloader, DownloadStats } from './scraper/downloader.js';
import type { DocumentReader } from './store/document-store.js';
import type { ArticleExtractor } from './extract/types.js';
import type { CorpusSink } from './corpus/writer.js';

export interface DownloadResult extends DownloadStats {
  /** Categories whose crawl stopped before the end of their history */
  partialCategories: string[];
  durationMs: number;
}

export interface ParseFailure {
  key: string;
  kind: string;
  message: string;
}

export interface ParseResult {
  parsed: number;
  failed: number;
  failures: ParseFailure[];
  durationMs: number;
}

function addStats(total: DownloadStats, stats: DownloadStats): void {
  total.downloaded += stats.downloaded;
  total.skipped += stats.skipped;
  total.errors += stats.errors;
}

/**
 * Crawl categories one after another. A category that fails part-way is
 * reported and the next one still runs.
 */
export async function runCategoryDownload(options: {
  crawler: CategoryCrawler;
  downloader: Downloader;
  categories: readonly string[];
}): Promise<DownloadResult> {
  const { crawler, downloader, categories } = options;
  const startTime = Date.now();
  const result: DownloadResult = {
    downloaded: 0,
    skipped: 0,
    errors: 0,
    partialCategories: [],
    durationMs: 0,
  };

  for (const category of categories) {
    logger.info({ category }, 'Fetching category');

    try {
      const { stats, summary } = await downloader.consume(crawler.crawl(category));
      addStats(result, stats);

      if (summary.stopReason === 'fetch-failed') {
        result.partialCategories.push(category);
      }

      logger.info(
        { category, pages: summary.pagesFetched, stopReason: summary.stopReason, ...stats },
        'Category download completed'
      );
    } catch (error) {
      result.partialCategories.push(category);
      logger.error({ category, error }, 'Category download aborted');
    }
  }

  result.durationMs = Date.now() - startTime;
  logger.info({ ...result }, 'Download completed');
  return result;
}

/**
 * Download everything the feed lists. A feed that cannot be read fails the run.
 */
export async function runFeedDownload(options: {
  feedCrawler: FeedCrawler;
  downloader: Downloader;
}): Promise<DownloadResult> {
  const startTime = Date.now();
  const { stats, summary } = await options.downloader.consume(options.feedCrawler.crawl());

  const result: DownloadResult = { ...stats, partialCategories: [], durationMs: Date.now() - startTime };
  logger.info({ feedUrl: summary.feedUrl, items: summary.itemsFound, ...result }, 'Feed download completed');
  return result;
}

/**
 * Extract and write every document (or only `keys`)
 */
export async function runParse(options: {
  store: DocumentReader;
  extractor: ArticleExtractor;
  sink: CorpusSink;
  keys?: Iterable<string>;
}): Promise<ParseResult> {
  const { store, extractor, sink, keys } = options;
  const startTime = Date.now();
  const result: ParseResult = { parsed: 0, failed: 0, failures: [], durationMs: 0 };

  for await (const key of keys ?? store.listKeys()) {
    logger.info({ key }, 'Parsing document');

    try {
      const doc = await store.load(key);
      const record = await extractor.extract(doc);
      await sink.write(key, record);
      result.parsed++;
    } catch (error) {
      const failure: ParseFailure = { key, kind: errorKind(error), message: errorMessage(error) };
      result.failed++;
      result.failures.push(failure);
      logger.error(failure, 'Error parsing document');
    }
  }

  result.durationMs = Date.now() - startTime;
  logger.info(
    { source: extractor.source, parsed: result.parsed, failed: result.failed, durationMs: result.durationMs },
    'Parse completed'
  );
  return result;
}

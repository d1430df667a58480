/**
 * Downloader
 *
 * Drains a crawler's lazy sequence of article links, fetching and storing
 * each one before pulling the next. Failures are counted per article and
 * never stop the sequence.
 */

import { logger } from '../utils/logger.js';
import { documentKey } from '../utils/ids.js';
import { errorKind, errorMessage } from '../utils/errors.js';
import type { DocumentStore } from '../store/document-store.js';
import type { ArticleRef } from '../types/index.js';
import type { PageFetcher } from './types.js';

export interface DownloadStats {
  downloaded: number;
  skipped: number;
  errors: number;
}

export interface DownloaderOptions {
  fetcher: PageFetcher;
  store: DocumentStore;
  /** Re-download and replace documents that are already stored */
  overwrite?: boolean;
}

type ArticleOutcome = 'downloaded' | 'skipped';

export class Downloader {
  private readonly options: DownloaderOptions;

  constructor(options: DownloaderOptions) {
    this.options = options;
  }

  /**
   * Download every ref the generator yields. Resolves with the counts and
   * the generator's own return value (its crawl summary).
   */
  async consume<S>(refs: AsyncGenerator<ArticleRef, S, undefined>): Promise<{ stats: DownloadStats; summary: S }> {
    const stats: DownloadStats = { downloaded: 0, skipped: 0, errors: 0 };

    let step = await refs.next();
    while (!step.done) {
      const ref = step.value;

      try {
        const outcome = await this.downloadArticle(ref);
        if (outcome === 'downloaded') {
          stats.downloaded++;
          logger.info({ url: ref.url }, 'Article downloaded');
        } else {
          stats.skipped++;
          logger.debug({ url: ref.url }, 'Article already stored, skipping');
        }
      } catch (error) {
        stats.errors++;
        logger.error(
          { url: ref.url, sourceId: ref.sourceId, kind: errorKind(error), error: errorMessage(error) },
          'Error downloading article'
        );
      }

      step = await refs.next();
    }

    return { stats, summary: step.value };
  }

  private async downloadArticle(ref: ArticleRef): Promise<ArticleOutcome> {
    const { fetcher, store, overwrite = false } = this.options;
    const key = documentKey(ref.url);

    if (!overwrite && (await store.has(key))) {
      return 'skipped';
    }

    const content = await fetcher.fetch(ref.url);
    if (content.length === 0) {
      throw new Error(`Empty content for ${ref.url}`);
    }

    const outcome = await store.save(
      { key, content, url: ref.url, sourceId: ref.sourceId, fetchedAt: new Date() },
      { overwrite }
    );

    return outcome === 'saved' ? 'downloaded' : 'skipped';
  }
}

/**
 * RSS Feed Crawler
 *
 * Fetches one syndication feed and yields its item links in document order.
 * Unlike listing pages the feed is not paginated, and failing to read it is
 * fatal for the run.
 */

import Parser from 'rss-parser';
import { logger } from '../utils/logger.js';
import type { ArticleRef } from '../types/index.js';
import type { FeedSummary, PageFetcher } from './types.js';

export const FEED_SOURCE_ID = 'rss';

export interface FeedCrawlerOptions {
  fetcher: PageFetcher;
  feedUrl: string;
  maxItems?: number;
}

export class FeedCrawler {
  private readonly options: FeedCrawlerOptions;
  private readonly parser: Parser;

  constructor(options: FeedCrawlerOptions) {
    this.options = options;
    this.parser = new Parser();
  }

  async *crawl(): AsyncGenerator<ArticleRef, FeedSummary, undefined> {
    const { fetcher, feedUrl, maxItems } = this.options;

    let feed: Parser.Output<Record<string, unknown>>;
    try {
      logger.info({ url: feedUrl }, 'Fetching RSS feed');
      const xml = (await fetcher.fetch(feedUrl)).toString('utf-8');
      feed = await this.parser.parseString(xml);
    } catch (error) {
      logger.error({ error, url: feedUrl }, 'Failed to fetch RSS feed');
      throw error;
    }

    const items = feed.items ?? [];
    logger.info({ url: feedUrl, itemCount: items.length }, 'RSS feed parsed');

    const seen = new Set<string>();
    let linksYielded = 0;

    for (const item of items) {
      if (maxItems !== undefined && linksYielded >= maxItems) {
        break;
      }

      const link = item.link?.trim();
      if (!link) {
        logger.debug({ guid: item.guid, title: item.title }, 'Feed item without link, skipping');
        continue;
      }
      if (seen.has(link)) continue;
      seen.add(link);
      linksYielded++;

      const ref: ArticleRef = { sourceId: FEED_SOURCE_ID, url: link, discoveredAt: new Date() };
      const published = item.isoDate ?? item.pubDate;
      if (published) ref.publishedHint = published;
      yield ref;
    }

    return { feedUrl, itemsFound: items.length, linksYielded };
  }
}

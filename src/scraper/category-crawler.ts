/**
 * Category Crawler
 *
 * Walks the paginated "todo" listing of a Praza Pública section, page by
 * page, yielding article links lazily. The consumer downloads each link
 * before the generator asks for the next page, so only one request is ever
 * in flight.
 */

import * as cheerio from 'cheerio';
import { categoryLabel } from '../config/categories.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ArticleRef } from '../types/index.js';
import type { CrawlStopReason, CrawlSummary, ListingLink, PageFetcher } from './types.js';

export interface CategoryCrawlerOptions {
  fetcher: PageFetcher;
  baseUrl: string;
  /** Stop after this many listing pages even if there is more history */
  maxPages?: number;
}

/**
 * Per-category crawl state. Lives only for the duration of one crawl.
 */
interface CrawlCursor {
  category: string;
  pageNumber: number;
  seenUrls: Set<string>;
}

export function listingUrl(baseUrl: string, category: string, page: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/${category}/todo?p=${page}`;
}

/**
 * Extract article links, in page order, from a listing page
 */
export function parseListingPage(html: string, baseUrl: string): ListingLink[] {
  const $ = cheerio.load(html);
  const links: ListingLink[] = [];
  const seen = new Set<string>();

  $('ul.articles-list article').each((_, elem) => {
    const article = $(elem);
    const href = article.find('h2.headline a').first().attr('href')?.trim();
    if (!href) return;

    let url: string;
    try {
      url = new URL(href, baseUrl).toString();
    } catch {
      logger.debug({ href }, 'Skipping unparsable listing link');
      return;
    }

    if (seen.has(url)) return;
    seen.add(url);

    const dateText = article.find('time.date').first().attr('datetime')?.trim();
    links.push(dateText ? { url, dateText } : { url });
  });

  return links;
}

/**
 * A listing page marks the end of the available history when it has no
 * links, or only links already seen in this crawl (the site keeps serving
 * its last page for out-of-range page numbers).
 */
export function isEndOfHistory(links: readonly string[], seenUrls: ReadonlySet<string>): boolean {
  return links.length === 0 || links.every((url) => seenUrls.has(url));
}

export class CategoryCrawler {
  private readonly options: CategoryCrawlerOptions;

  constructor(options: CategoryCrawlerOptions) {
    this.options = options;
  }

  async *crawl(category: string): AsyncGenerator<ArticleRef, CrawlSummary, undefined> {
    const { fetcher, baseUrl, maxPages } = this.options;
    const cursor: CrawlCursor = { category, pageNumber: 1, seenUrls: new Set() };
    let pagesFetched = 0;
    let linksYielded = 0;

    const finish = (stopReason: CrawlStopReason, error?: string): CrawlSummary => {
      const summary: CrawlSummary = { category, pagesFetched, linksYielded, stopReason };
      if (error) summary.error = error;
      logger.info({ ...summary, label: categoryLabel(category) }, 'Category crawl finished');
      return summary;
    };

    while (true) {
      if (maxPages !== undefined && cursor.pageNumber > maxPages) {
        return finish('page-limit');
      }

      const pageUrl = listingUrl(baseUrl, category, cursor.pageNumber);

      let html: string;
      try {
        html = (await fetcher.fetch(pageUrl)).toString('utf-8');
      } catch (error) {
        logger.warn(
          { category, page: cursor.pageNumber, url: pageUrl, error: errorMessage(error) },
          'Listing page failed, crawl of this category is partial'
        );
        return finish('fetch-failed', errorMessage(error));
      }
      pagesFetched++;

      const links = parseListingPage(html, baseUrl);
      if (isEndOfHistory(links.map((l) => l.url), cursor.seenUrls)) {
        logger.debug({ category, page: cursor.pageNumber, links: links.length }, 'No new links, end of history');
        return finish('end-of-history');
      }

      logger.info({ category, page: cursor.pageNumber, links: links.length }, 'Listing page parsed');

      for (const link of links) {
        if (cursor.seenUrls.has(link.url)) continue;
        cursor.seenUrls.add(link.url);
        linksYielded++;

        const ref: ArticleRef = { sourceId: category, url: link.url, discoveredAt: new Date() };
        if (link.dateText) ref.publishedHint = link.dateText;
        yield ref;
      }

      cursor.pageNumber++;
    }
  }
}

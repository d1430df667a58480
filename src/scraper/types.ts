/**
 * Scraper Types
 */

/**
 * Anything that can turn a URL into raw bytes. The Fetcher is the real one;
 * tests use in-memory pages.
 */
export interface PageFetcher {
  fetch(url: string): Promise<Buffer>;
}

/**
 * Article link extracted from a listing page
 */
export interface ListingLink {
  url: string;
  dateText?: string;
}

export type CrawlStopReason = 'end-of-history' | 'page-limit' | 'fetch-failed';

/**
 * How a category crawl ended
 */
export interface CrawlSummary {
  category: string;
  pagesFetched: number;
  linksYielded: number;
  stopReason: CrawlStopReason;
  /** Set when the crawl stopped before reaching the end of the listing */
  error?: string;
}

export interface FeedSummary {
  feedUrl: string;
  itemsFound: number;
  linksYielded: number;
}

/**
 * Scraper Module
 *
 * Listing and feed crawlers, the HTTP fetcher and the downloader that ties
 * them to the document store.
 */

export { Fetcher, type FetcherOptions } from './fetcher.js';
export {
  CategoryCrawler,
  isEndOfHistory,
  listingUrl,
  parseListingPage,
  type CategoryCrawlerOptions,
} from './category-crawler.js';
export { FeedCrawler, FEED_SOURCE_ID, type FeedCrawlerOptions } from './feed-crawler.js';
export { Downloader, type DownloadStats, type DownloaderOptions } from './downloader.js';

export type { CrawlStopReason, CrawlSummary, FeedSummary, ListingLink, PageFetcher } from './types.js';

/**
 * Core types for the Galician news corpus
 */

export type ArticleSource = 'praza' | 'nosdiario';

export type ContentType = 'html' | 'xml';

/**
 * Link to an article found while crawling a listing page or a feed
 */
export interface ArticleRef {
  /** Category slug the link was found under, or "rss" */
  sourceId: string;
  url: string;
  discoveredAt: Date;
  /** Date shown next to the link, if any (not parsed) */
  publishedHint?: string;
}

export interface RawDocument {
  key: string;
  content: Buffer;
  fetchedAt: Date;
  contentType: ContentType;
  url?: string;
  sourceId?: string;
}

export interface ArticleImage {
  url: string;
  caption: string | null;
}

export interface RelatedArticle {
  url: string;
  title: string;
}

export interface ArticleRecord {
  id: string;
  source: ArticleSource;
  url: string | null;
  title: string;
  subtitle: string | null;
  abstract: string | null;
  bodyText: string;
  category: string | null;
  topics: string[];
  keywords: string[];
  localEdition: string | null;
  author: string | null;
  publishedAt: Date | null;
  images: ArticleImage[];
  related: RelatedArticle[];
  /** Key of the raw document the record was extracted from */
  sourceDocument: string;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** Errors rejected by this predicate are rethrown without further attempts */
  shouldRetry?: (error: Error) => boolean;
}

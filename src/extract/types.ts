import type { ArticleRecord, ArticleSource, RawDocument } from '../types/index.js';

/**
 * Turns one stored raw document into one article record, or throws an
 * ExtractionError.
 */
export interface ArticleExtractor {
  readonly source: ArticleSource;
  extract(doc: RawDocument): Promise<ArticleRecord>;
}

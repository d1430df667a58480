/**
 * Extraction Module
 */

import { HtmlArticleExtractor } from './html-article.js';
import { NewsMLExtractor } from './newsml.js';
import type { ArticleSource } from '../types/index.js';
import type { ArticleExtractor } from './types.js';

export { HtmlArticleExtractor, type HtmlArticleExtractorOptions } from './html-article.js';
export { NewsMLExtractor, type NewsMLExtractorOptions } from './newsml.js';
export { extractBlockText, NOISE_SELECTORS } from './html-text.js';
export type { ArticleExtractor } from './types.js';

/**
 * Extractor for a source's stored documents
 */
export function createExtractor(source: ArticleSource, baseUrl: string): ArticleExtractor {
  switch (source) {
    case 'praza':
      return new HtmlArticleExtractor({ baseUrl });
    case 'nosdiario':
      return new NewsMLExtractor({ baseUrl });
  }
}

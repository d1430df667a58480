/**
 * Praza Pública article extractor
 *
 * Reads a stored article page into an ArticleRecord. Title and body are
 * mandatory; everything else degrades to null or an empty list.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { categoryLabel } from '../config/categories.js';
import { parseIsoDate } from '../utils/dates.js';
import { ExtractionError } from '../utils/errors.js';
import { hashId } from '../utils/ids.js';
import { cleanChars, nonEmpty } from '../utils/text.js';
import { logger } from '../utils/logger.js';
import { extractBlockText } from './html-text.js';
import type { ArticleImage, ArticleRecord, RawDocument, RelatedArticle } from '../types/index.js';
import type { ArticleExtractor } from './types.js';

export interface HtmlArticleExtractorOptions {
  baseUrl: string;
  /** Site name appended to page titles */
  titleSuffix?: string;
}

const DEFAULT_TITLE_SUFFIX = ' - Praza Pública';

function metaProperty($: CheerioAPI, property: string): string | null {
  return nonEmpty($(`meta[property="${property}"]`).first().attr('content'));
}

function metaName($: CheerioAPI, name: string): string | null {
  return nonEmpty($(`meta[name="${name}"]`).first().attr('content'));
}

function resolveUrl(href: string | undefined, baseUrl: string): string | null {
  const value = href?.trim();
  if (!value) return null;
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return null;
  }
}

export class HtmlArticleExtractor implements ArticleExtractor {
  readonly source = 'praza' as const;
  private readonly baseUrl: string;
  private readonly titleSuffix: string;

  constructor(options: HtmlArticleExtractorOptions) {
    this.baseUrl = options.baseUrl;
    this.titleSuffix = options.titleSuffix ?? DEFAULT_TITLE_SUFFIX;
  }

  async extract(doc: RawDocument): Promise<ArticleRecord> {
    const $ = cheerio.load(cleanChars(doc.content.toString('utf-8')));

    const url = metaProperty($, 'og:url') ?? doc.url ?? null;

    const title = this.getTitle($);
    if (!title) {
      throw ExtractionError.missingField('title');
    }

    const bodyContainer = $('div.article-body').first();
    if (bodyContainer.length === 0) {
      throw ExtractionError.missingField('body');
    }
    const bodyText = extractBlockText(bodyContainer);
    if (!bodyText) {
      throw ExtractionError.missingField('body');
    }

    const taxonomy = $('article#article ul').first();
    const topics = taxonomy
      .find('a.topic')
      .toArray()
      .map((el) => nonEmpty($(el).text()))
      .filter((topic): topic is string => topic !== null);

    const publishedAt = this.getPublishedAt($, doc.key);

    return {
      id: hashId(url ?? doc.key),
      source: this.source,
      url,
      title,
      subtitle: null,
      abstract: metaProperty($, 'og:description') ?? metaName($, 'description'),
      bodyText,
      category: nonEmpty(taxonomy.find('a.area').first().text()) ?? categoryLabel(doc.sourceId),
      topics,
      keywords: [],
      localEdition: nonEmpty(taxonomy.find('a.local-edition').first().text()),
      author: this.getAuthor($),
      publishedAt,
      images: this.getImages($),
      related: this.getRelated($),
      sourceDocument: doc.key,
    };
  }

  private getTitle($: CheerioAPI): string | null {
    const raw =
      metaProperty($, 'og:title') ??
      metaName($, 'title') ??
      nonEmpty($('title').first().text()) ??
      nonEmpty($('h1.headline').first().text());

    if (!raw) return null;
    return nonEmpty(raw.endsWith(this.titleSuffix) ? raw.slice(0, -this.titleSuffix.length) : raw);
  }

  private getPublishedAt($: CheerioAPI, key: string): Date | null {
    const raw = metaProperty($, 'article:published_time') ?? nonEmpty($('time.date').first().attr('datetime'));
    const date = parseIsoDate(raw);
    if (raw && !date) {
      logger.warn({ key, value: raw }, 'Unparsable publication date');
    }
    return date;
  }

  private getAuthor($: CheerioAPI): string | null {
    return (
      nonEmpty($('[rel="author"]').first().text()) ??
      nonEmpty($('.byline, .author').first().text()) ??
      metaName($, 'author')
    );
  }

  private getImages($: CheerioAPI): ArticleImage[] {
    const images: ArticleImage[] = [];

    $('figure.at-image').each((_, elem) => {
      const figure = $(elem);
      const url = resolveUrl(figure.find('a[href]').first().attr('href'), this.baseUrl);
      if (!url) return;
      images.push({ url, caption: nonEmpty(figure.find('figcaption').first().text()) });
    });

    return images;
  }

  private getRelated($: CheerioAPI): RelatedArticle[] {
    const related: RelatedArticle[] = [];

    $('ul.at-archive-refs-list h1.ref-title a').each((_, elem) => {
      const link = $(elem);
      const url = resolveUrl(link.attr('href'), this.baseUrl);
      const title = nonEmpty(link.text());
      if (url && title) {
        related.push({ url, title });
      }
    });

    return related;
  }
}

/**
 * Nós Diario NewsML extractor
 *
 * Maps a NewsML 1.x item (headline, NITF body, management dates, Tesauro
 * subject codes) to an ArticleRecord. The body is HTML carried as text
 * inside `body.content`.
 */

import * as cheerio from 'cheerio';
import xml2js from 'xml2js';
import { subjectLabel } from '../config/categories.js';
import { parseNewsMLDate } from '../utils/dates.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import { hashId } from '../utils/ids.js';
import { nonEmpty } from '../utils/text.js';
import { logger } from '../utils/logger.js';
import { extractBlockText } from './html-text.js';
import { attr, descendants, isElement, select, selectText } from './xml-tree.js';
import type { ArticleImage, ArticleRecord, RawDocument, RelatedArticle } from '../types/index.js';
import type { ArticleExtractor } from './types.js';

export interface NewsMLExtractorOptions {
  baseUrl: string;
}

const TESAURO = 'Tesauro';

function resolveUrl(href: string | undefined, baseUrl: string): string | null {
  const value = href?.trim();
  if (!value) return null;
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return null;
  }
}

async function parseXml(xml: string): Promise<unknown> {
  if (xml.trim().length === 0) {
    throw ExtractionError.malformedXml('empty document');
  }

  let parsed: unknown;
  try {
    parsed = await new xml2js.Parser({ explicitArray: true }).parseStringPromise(xml);
  } catch (error) {
    throw ExtractionError.malformedXml(errorMessage(error), error);
  }

  if (!isElement(parsed)) {
    throw ExtractionError.malformedXml('no root element');
  }
  return parsed;
}

// Article body first, then any body.content (older exports without a typed ContentItem)
const BODY_SELECTORS = [
  'ContentItem[type="article"] DataContent > nitf > body > body\\.content',
  'body\\.content',
];

/**
 * HTML source of the first non-empty `body.content`: escaped or CDATA text in
 * practice, inline NITF markup taken as written, in document order
 */
function bodyHtml(xml: string): string | null {
  const $ = cheerio.load(xml, { xml: true });

  for (const selector of BODY_SELECTORS) {
    for (const elem of $(selector).toArray()) {
      const content = $(elem);
      const html = content.children().length > 0 ? content.html() : content.text();
      if (html && html.trim().length > 0) return html;
    }
  }
  return null;
}

export class NewsMLExtractor implements ArticleExtractor {
  readonly source = 'nosdiario' as const;
  private readonly baseUrl: string;

  constructor(options: NewsMLExtractorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async extract(doc: RawDocument): Promise<ArticleRecord> {
    const xml = doc.content.toString('utf-8');
    const root = await parseXml(xml);

    const title = nonEmpty(selectText(root, ['NewsLines', 'HeadLine']));
    if (!title) {
      throw ExtractionError.missingField('title');
    }

    const html = bodyHtml(xml);
    if (!html) {
      throw ExtractionError.missingField('body');
    }
    const $ = cheerio.load(html, null, false);
    const related = this.takeRelated($);
    const bodyText = extractBlockText($.root());
    if (!bodyText) {
      throw ExtractionError.missingField('body');
    }

    const newsItemId = nonEmpty(selectText(root, ['NewsIdentifier', 'NewsItemId']));
    const subjectCode = this.getSubjectCodes(root)[0];
    const category = subjectLabel(subjectCode);
    if (subjectCode && !category) {
      logger.debug({ key: doc.key, code: subjectCode }, 'Unknown subject code');
    }

    return {
      id: newsItemId ?? hashId(doc.key),
      source: this.source,
      url: this.buildUrl(root, newsItemId, subjectCode),
      title,
      subtitle: nonEmpty(selectText(root, ['NewsLines', 'SubHeadLine'])),
      abstract: this.getAbstract(root),
      bodyText,
      category,
      topics: [],
      keywords: this.getKeywords(root),
      localEdition: null,
      author: null,
      publishedAt: this.getPublishedAt(root, doc.key),
      images: this.getImages(root),
      related,
      sourceDocument: doc.key,
    };
  }

  private articleItems(root: unknown): unknown[] {
    return descendants(root, 'ContentItem').filter((item) => attr(item, 'type') === 'article');
  }

  private getAbstract(root: unknown): string | null {
    const scopes = [...this.articleItems(root), root];
    for (const scope of scopes) {
      const raw = selectText(scope, ['abstract', 'p']);
      if (raw) {
        return nonEmpty(cheerio.load(raw, null, false).root().text());
      }
    }
    return null;
  }

  /**
   * Collect links from "related content" boxes and drop the boxes from the body
   */
  private takeRelated($: cheerio.CheerioAPI): RelatedArticle[] {
    const related: RelatedArticle[] = [];
    const boxes = $('div[class*="related-content"]');

    boxes.find('ul a').each((_, elem) => {
      const link = $(elem);
      const url = resolveUrl(link.attr('href'), this.baseUrl);
      const title = nonEmpty(link.text());
      if (url && title) {
        related.push({ url, title });
      }
    });

    boxes.remove();
    return related;
  }

  private getSubjectCodes(root: unknown): string[] {
    return descendants(root, 'Property')
      .filter((property) => attr(property, 'FormalName') === TESAURO)
      .map((property) => nonEmpty(attr(property, 'Value')))
      .filter((code): code is string => code !== null);
  }

  private getPublishedAt(root: unknown, key: string): Date | null {
    const raw =
      nonEmpty(selectText(root, ['NewsManagement', 'FirstPublished'])) ??
      nonEmpty(selectText(root, ['NewsManagement', 'FirstCreated']));
    const date = parseNewsMLDate(raw);
    if (raw && !date) {
      logger.warn({ key, value: raw }, 'Unparsable publication date');
    }
    return date;
  }

  /**
   * Public article URL: /articulo/{section}/-/{YYYYMMDDHHMMSS}{NewsItemId}.html
   */
  private buildUrl(root: unknown, newsItemId: string | null, subjectCode: string | undefined): string | null {
    const dateId = selectText(root, ['NewsIdentifier', 'DateId'])?.trim().match(/^(\d{8})T(\d{6})/);
    if (!newsItemId || !subjectCode || !dateId) {
      return null;
    }
    return `${this.baseUrl}/articulo/${subjectCode}/-/${dateId[1]}${dateId[2]}${newsItemId}.html`;
  }

  private getKeywords(root: unknown): string[] {
    const keywords = new Set<string>();
    for (const keyword of descendants(root, 'keyword')) {
      for (const part of (attr(keyword, 'key') ?? '').split(',')) {
        const value = nonEmpty(part);
        if (value) keywords.add(value);
      }
    }
    return [...keywords].sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
  }

  /**
   * Photos live in a `*.photos` component whose sub-components come in
   * pairs sharing a Duid prefix: `*.file` (image) and `*.text` (caption).
   */
  private getImages(root: unknown): ArticleImage[] {
    const images: ArticleImage[] = [];

    for (const component of descendants(root, 'NewsComponent')) {
      if (!attr(component, 'Duid')?.endsWith('.photos')) continue;

      const files = new Map<string, string>();
      const captions = new Map<string, string>();

      for (const part of descendants(component, 'NewsComponent')) {
        const duid = attr(part, 'Duid') ?? '';
        const prefix = duid.replace(/\.(file|text)$/, '');

        if (duid.endsWith('.file')) {
          const href = descendants(part, 'ContentItem')
            .map((item) => attr(item, 'Href'))
            .find((value): value is string => value !== undefined && value.trim().length > 0);
          if (href) files.set(prefix, href.trim());
        } else if (duid.endsWith('.text')) {
          const caption =
            nonEmpty(selectText(part, ['body.content', 'p'])) ?? nonEmpty(selectText(part, ['abstract', 'p']));
          if (caption) captions.set(prefix, caption);
        }
      }

      for (const [prefix, href] of files) {
        const url = resolveUrl(href, this.baseUrl);
        if (url) images.push({ url, caption: captions.get(prefix) ?? null });
      }
    }

    return images;
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runCategoryDownload, runFeedDownload, runParse } from './pipeline.js';
import { DocumentStore } from './store/document-store.js';
import { NewsMLExtractor } from './extract/newsml.js';
import { CategoryCrawler, listingUrl } from './scraper/category-crawler.js';
import { FeedCrawler } from './scraper/feed-crawler.js';
import { Downloader } from './scraper/downloader.js';
import { FakeFetcher, listingPage, makeTempDir } from './test-support/fakes.js';
import type { CorpusSink } from './corpus/writer.js';
import type { ArticleRecord } from './types/index.js';

class MemorySink implements CorpusSink {
  readonly records = new Map<string, ArticleRecord>();

  async write(key: string, record: ArticleRecord): Promise<void> {
    this.records.set(key, record);
  }
}

function newsML(n: number): string {
  return (
    '<NewsML><NewsItem>' +
    `<Identification><NewsIdentifier><NewsItemId>${n}</NewsItemId></NewsIdentifier></Identification>` +
    `<NewsComponent><NewsLines><HeadLine>Nova ${n}</HeadLine></NewsLines>` +
    `<ContentItem type="article"><DataContent><nitf><body><body.content><![CDATA[<p>Texto ${n}.</p>]]></body.content></body></nitf></DataContent></ContentItem>` +
    '</NewsComponent></NewsItem></NewsML>'
  );
}

describe('pipelines', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const tmp = await makeTempDir();
    dir = tmp.dir;
    cleanup = tmp.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('runParse', () => {
    it('keeps going past a malformed document', async () => {
      const store = new DocumentStore({ rootDir: dir, contentType: 'xml' });
      for (const n of [1, 2, 3, 4, 5]) {
        const xml = n === 3 ? '<NewsML><NewsItem></NewsML>' : newsML(n);
        await store.save({ key: `item-${n}`, content: Buffer.from(xml, 'utf-8') });
      }
      const sink = new MemorySink();

      const result = await runParse({ store, extractor: new NewsMLExtractor({ baseUrl: 'https://www.nosdiario.gal' }), sink });

      expect(result.parsed).toBe(4);
      expect(result.failed).toBe(1);
      expect(result.failures).toEqual([
        { key: 'item-3', kind: 'MalformedXml', message: expect.stringMatching(/^Malformed XML: /) },
      ]);
      expect([...sink.records.keys()]).toEqual(['item-1', 'item-2', 'item-4', 'item-5']);
      expect(sink.records.get('item-2')).toMatchObject({ id: '2', title: 'Nova 2', bodyText: 'Texto 2.' });
    });

    it('parses only the given keys and reports missing ones', async () => {
      const store = new DocumentStore({ rootDir: dir, contentType: 'xml' });
      await store.save({ key: 'item-1', content: Buffer.from(newsML(1), 'utf-8') });
      await store.save({ key: 'item-2', content: Buffer.from(newsML(2), 'utf-8') });
      const sink = new MemorySink();

      const result = await runParse({
        store,
        extractor: new NewsMLExtractor({ baseUrl: 'https://www.nosdiario.gal' }),
        sink,
        keys: ['item-2', 'item-9'],
      });

      expect(result.parsed).toBe(1);
      expect(result.failures).toEqual([{ key: 'item-9', kind: 'NotFound', message: 'Document not found: item-9' }]);
      expect([...sink.records.keys()]).toEqual(['item-2']);
    });
  });

  describe('runCategoryDownload', () => {
    it('reports a category cut short and still crawls the next one', async () => {
      const baseUrl = 'https://praza.gal';
      const fetcher = new FakeFetcher({
        [listingUrl(baseUrl, 'cultura', 1)]: new Error('connection reset'),
        [listingUrl(baseUrl, 'mundo', 1)]: listingPage(['/mundo/a']),
        [listingUrl(baseUrl, 'mundo', 2)]: listingPage([]),
        'https://praza.gal/mundo/a': '<html>a</html>',
      });
      const store = new DocumentStore({ rootDir: dir, contentType: 'html' });

      const result = await runCategoryDownload({
        crawler: new CategoryCrawler({ fetcher, baseUrl }),
        downloader: new Downloader({ fetcher, store }),
        categories: ['cultura', 'mundo'],
      });

      expect(result).toMatchObject({ downloaded: 1, skipped: 0, errors: 0, partialCategories: ['cultura'] });
      expect(await store.has('mundo/a')).toBe(true);
    });
  });

  describe('runFeedDownload', () => {
    it('fails the run when the feed is unreachable', async () => {
      const fetcher = new FakeFetcher();
      const store = new DocumentStore({ rootDir: dir, contentType: 'html' });

      await expect(
        runFeedDownload({
          feedCrawler: new FeedCrawler({ fetcher, feedUrl: 'https://praza.gal/rss' }),
          downloader: new Downloader({ fetcher, store }),
        })
      ).rejects.toMatchObject({ kind: 'HttpError' });
    });
  });
});

import { describe, it, expect } from 'vitest';
import { CategoryCrawler, isEndOfHistory, listingUrl, parseListingPage } from './category-crawler.js';
import { FakeFetcher, drain, listingPage } from '../test-support/fakes.js';

const BASE_URL = 'https://praza.gal';

const page = (n: number) => listingUrl(BASE_URL, 'cultura', n);

describe('listingUrl', () => {
  it('builds the paginated "todo" listing URL', () => {
    expect(listingUrl('https://praza.gal/', 'cultura', 3)).toBe('https://praza.gal/cultura/todo?p=3');
  });
});

describe('parseListingPage', () => {
  it('resolves links in page order and keeps the listing date', () => {
    const links = parseListingPage(listingPage(['/cultura/a', 'https://praza.gal/cultura/b']), BASE_URL);

    expect(links).toEqual([
      { url: 'https://praza.gal/cultura/a', dateText: '2024-03-14T09:30:00+01:00' },
      { url: 'https://praza.gal/cultura/b', dateText: '2024-03-14T09:30:00+01:00' },
    ]);
  });

  it('drops repeated links and articles without a headline link', () => {
    const html =
      '<ul class="articles-list">' +
      '<li><article><h2 class="headline"><a href="/cultura/a">A</a></h2></article></li>' +
      '<li><article><h2 class="headline">Sen ligazón</h2></article></li>' +
      '<li><article><h2 class="headline"><a href="/cultura/a">A outra vez</a></h2></article></li>' +
      '</ul>';

    expect(parseListingPage(html, BASE_URL)).toEqual([{ url: 'https://praza.gal/cultura/a' }]);
  });

  it('ignores links outside the article list', () => {
    const html = '<nav><a href="/cultura/menu">Menu</a></nav><ul class="articles-list"></ul>';
    expect(parseListingPage(html, BASE_URL)).toEqual([]);
  });
});

describe('isEndOfHistory', () => {
  it('is true for an empty page or a page of already seen links', () => {
    expect(isEndOfHistory([], new Set())).toBe(true);
    expect(isEndOfHistory(['a', 'b'], new Set(['a', 'b', 'c']))).toBe(true);
  });

  it('is false while at least one link is new', () => {
    expect(isEndOfHistory(['a', 'd'], new Set(['a', 'b']))).toBe(false);
  });
});

describe('CategoryCrawler', () => {
  it('walks pages in order until an empty listing', async () => {
    const fetcher = new FakeFetcher({
      [page(1)]: listingPage(['/cultura/a', '/cultura/b']),
      [page(2)]: listingPage(['/cultura/c']),
      [page(3)]: listingPage([]),
    });
    const crawler = new CategoryCrawler({ fetcher, baseUrl: BASE_URL });

    const { items, result } = await drain(crawler.crawl('cultura'));

    expect(items.map((ref) => ref.url)).toEqual([
      'https://praza.gal/cultura/a',
      'https://praza.gal/cultura/b',
      'https://praza.gal/cultura/c',
    ]);
    expect(fetcher.requests).toEqual([page(1), page(2), page(3)]);
    expect(result).toEqual({ category: 'cultura', pagesFetched: 3, linksYielded: 3, stopReason: 'end-of-history' });
  });

  it('tags refs with the category and the listing date', async () => {
    const fetcher = new FakeFetcher({ [page(1)]: listingPage(['/cultura/a']) });
    const crawler = new CategoryCrawler({ fetcher, baseUrl: BASE_URL });

    const { items } = await drain(crawler.crawl('cultura'));

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      sourceId: 'cultura',
      url: 'https://praza.gal/cultura/a',
      publishedHint: '2024-03-14T09:30:00+01:00',
    });
    expect(items[0]?.discoveredAt).toBeInstanceOf(Date);
  });

  it('stops when the site repeats its last page', async () => {
    const fetcher = new FakeFetcher({
      [page(1)]: listingPage(['/cultura/a', '/cultura/b']),
      [page(2)]: listingPage(['/cultura/a', '/cultura/b']),
    });
    const crawler = new CategoryCrawler({ fetcher, baseUrl: BASE_URL });

    const { items, result } = await drain(crawler.crawl('cultura'));

    expect(items.map((ref) => ref.url)).toEqual(['https://praza.gal/cultura/a', 'https://praza.gal/cultura/b']);
    expect(fetcher.requests).toEqual([page(1), page(2)]);
    expect(result.stopReason).toBe('end-of-history');
  });

  it('yields each URL once across overlapping pages', async () => {
    const fetcher = new FakeFetcher({
      [page(1)]: listingPage(['/cultura/a', '/cultura/b']),
      [page(2)]: listingPage(['/cultura/b', '/cultura/c']),
      [page(3)]: listingPage(['/cultura/c']),
    });
    const crawler = new CategoryCrawler({ fetcher, baseUrl: BASE_URL });

    const { items, result } = await drain(crawler.crawl('cultura'));

    expect(items.map((ref) => ref.url)).toEqual([
      'https://praza.gal/cultura/a',
      'https://praza.gal/cultura/b',
      'https://praza.gal/cultura/c',
    ]);
    expect(result).toMatchObject({ pagesFetched: 3, linksYielded: 3, stopReason: 'end-of-history' });
  });

  it('ends the category as partial when a listing page fails', async () => {
    const fetcher = new FakeFetcher({
      [page(1)]: listingPage(['/cultura/a']),
      [page(2)]: new Error('connection reset'),
    });
    const crawler = new CategoryCrawler({ fetcher, baseUrl: BASE_URL });

    const { items, result } = await drain(crawler.crawl('cultura'));

    expect(items.map((ref) => ref.url)).toEqual(['https://praza.gal/cultura/a']);
    expect(result).toEqual({
      category: 'cultura',
      pagesFetched: 1,
      linksYielded: 1,
      stopReason: 'fetch-failed',
      error: 'connection reset',
    });
  });

  it('respects the page limit', async () => {
    const fetcher = new FakeFetcher({
      [page(1)]: listingPage(['/cultura/a']),
      [page(2)]: listingPage(['/cultura/b']),
      [page(3)]: listingPage(['/cultura/c']),
    });
    const crawler = new CategoryCrawler({ fetcher, baseUrl: BASE_URL, maxPages: 2 });

    const { items, result } = await drain(crawler.crawl('cultura'));

    expect(items).toHaveLength(2);
    expect(fetcher.requests).toEqual([page(1), page(2)]);
    expect(result.stopReason).toBe('page-limit');
  });

  it('does not request the next page until the current links are consumed', async () => {
    const fetcher = new FakeFetcher({
      [page(1)]: listingPage(['/cultura/a', '/cultura/b']),
      [page(2)]: listingPage([]),
    });
    const crawl = new CategoryCrawler({ fetcher, baseUrl: BASE_URL }).crawl('cultura');

    await crawl.next();
    await crawl.next();
    expect(fetcher.requests).toEqual([page(1)]);

    const last = await crawl.next();
    expect(last.done).toBe(true);
    expect(fetcher.requests).toEqual([page(1), page(2)]);
  });
});

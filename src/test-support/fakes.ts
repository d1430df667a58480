/**
 * In-process stand-ins shared by the tests
 */

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FetchError } from '../utils/errors.js';
import type { PageFetcher } from '../scraper/types.js';

/**
 * Serves pages from a map. Unknown URLs answer 404, Error values are thrown.
 * Every requested URL is recorded in order.
 */
export class FakeFetcher implements PageFetcher {
  readonly requests: string[] = [];
  private readonly pages: Map<string, string | Error>;

  constructor(pages: Record<string, string | Error> = {}) {
    this.pages = new Map(Object.entries(pages));
  }

  set(url: string, page: string | Error): void {
    this.pages.set(url, page);
  }

  async fetch(url: string): Promise<Buffer> {
    this.requests.push(url);
    const page = this.pages.get(url);
    if (page === undefined) {
      throw new FetchError('HttpError', url, `HTTP 404 error in ${url}`, { status: 404 });
    }
    if (page instanceof Error) {
      throw page;
    }
    return Buffer.from(page, 'utf-8');
  }
}

export async function drain<T, R>(gen: AsyncGenerator<T, R, undefined>): Promise<{ items: T[]; result: R }> {
  const items: T[] = [];
  let step = await gen.next();
  while (!step.done) {
    items.push(step.value);
    step = await gen.next();
  }
  return { items, result: step.value };
}

export function listingPage(hrefs: readonly string[]): string {
  const items = hrefs
    .map(
      (href) =>
        `<li><article><h2 class="headline"><a href="${href}">Titular</a></h2>` +
        `<time class="date" datetime="2024-03-14T09:30:00+01:00">14/03/2024</time></article></li>`
    )
    .join('\n');
  return `<html><body><ul class="articles-list">\n${items}\n</ul></body></html>`;
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'news-corpus-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/**
 * Raw Document Store
 *
 * Keeps downloaded pages and local NewsML files on disk, one file per
 * document, under a per-source root directory. Downloaded documents get a
 * `.meta.json` sidecar recording where they came from.
 */

import type { Dirent } from 'fs';
import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname, extname, isAbsolute, join, relative, resolve, sep } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { StorageError } from '../utils/errors.js';
import type { ContentType, RawDocument } from '../types/index.js';

export type SaveOutcome = 'saved' | 'exists';

export interface DocumentInput {
  key: string;
  content: Buffer;
  url?: string;
  sourceId?: string;
  fetchedAt?: Date;
}

export interface SaveOptions {
  /** Replace an existing document instead of keeping the first copy */
  overwrite?: boolean;
}

export type KeyFilter = (key: string) => boolean;

/**
 * Read side of the store, all the parse phase needs
 */
export interface DocumentReader {
  load(key: string): Promise<RawDocument>;
  listKeys(filter?: KeyFilter): AsyncGenerator<string, void, undefined>;
}

const documentMetaSchema = z.object({
  url: z.string().optional(),
  sourceId: z.string().optional(),
  fetchedAt: z.coerce.date(),
  contentType: z.enum(['html', 'xml']),
});

type DocumentMeta = z.infer<typeof documentMetaSchema>;

const META_SUFFIX = '.meta.json';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class DocumentStore implements DocumentReader {
  readonly rootDir: string;
  readonly contentType: ContentType;
  private readonly extension: string;

  constructor(options: { rootDir: string; contentType: ContentType }) {
    this.rootDir = resolve(options.rootDir);
    this.contentType = options.contentType;
    this.extension = `.${options.contentType}`;
  }

  /**
   * Write a document. An existing key is left untouched (and reported as
   * 'exists') unless `overwrite` is set.
   */
  async save(doc: DocumentInput, options: SaveOptions = {}): Promise<SaveOutcome> {
    const path = this.pathFor(doc.key);
    const fetchedAt = doc.fetchedAt ?? new Date();

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, doc.content, { flag: options.overwrite ? 'w' : 'wx' });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        logger.debug({ key: doc.key }, 'Document already stored, keeping existing copy');
        return 'exists';
      }
      throw new StorageError('WriteError', doc.key, `Failed to write document ${doc.key}`, error);
    }

    const meta: DocumentMeta = {
      url: doc.url,
      sourceId: doc.sourceId,
      fetchedAt,
      contentType: this.contentType,
    };

    try {
      await writeFile(this.metaPathFor(doc.key), `${JSON.stringify(meta, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError('WriteError', doc.key, `Failed to write metadata for ${doc.key}`, error);
    }

    logger.debug({ key: doc.key, bytes: doc.content.length }, 'Document saved');
    return 'saved';
  }

  async has(key: string): Promise<boolean> {
    try {
      await stat(this.pathFor(key));
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  async load(key: string): Promise<RawDocument> {
    const path = this.pathFor(key);

    let content: Buffer;
    let modifiedAt: Date;
    try {
      content = await readFile(path);
      modifiedAt = (await stat(path)).mtime;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new StorageError('NotFound', key, `Document not found: ${key}`, error);
      }
      throw error;
    }

    const meta = await this.readMeta(key);

    return {
      key,
      content,
      fetchedAt: meta?.fetchedAt ?? modifiedAt,
      contentType: this.contentType,
      url: meta?.url,
      sourceId: meta?.sourceId,
    };
  }

  /**
   * Keys of every stored document, depth-first in name order
   */
  async *listKeys(filter?: KeyFilter): AsyncGenerator<string, void, undefined> {
    for await (const key of this.walk(this.rootDir)) {
      if (!filter || filter(key)) {
        yield key;
      }
    }
  }

  /**
   * Key of a document file given by path (absolute or relative to cwd)
   */
  keyForPath(filePath: string): string {
    const relativePath = relative(this.rootDir, resolve(filePath));

    if (relativePath.startsWith('..') || isAbsolute(relativePath)) {
      throw new StorageError('NotFound', filePath, `${filePath} is outside the source directory ${this.rootDir}`);
    }

    const withoutExtension =
      extname(relativePath) === this.extension ? relativePath.slice(0, -this.extension.length) : relativePath;

    return withoutExtension.split(sep).join('/');
  }

  private async *walk(dir: string): AsyncGenerator<string, void, undefined> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') && dir === this.rootDir) {
        logger.warn({ rootDir: this.rootDir }, 'Source directory does not exist');
        return;
      }
      throw error;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        yield* this.walk(path);
      } else if (entry.isFile() && entry.name.endsWith(this.extension)) {
        yield this.keyForPath(path);
      }
    }
  }

  private async readMeta(key: string): Promise<DocumentMeta | null> {
    let raw: string;
    try {
      raw = await readFile(this.metaPathFor(key), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ key, error }, 'Ignoring unreadable document metadata');
      return null;
    }

    const result = documentMetaSchema.safeParse(json);
    if (!result.success) {
      logger.warn({ key, issues: result.error.issues }, 'Ignoring invalid document metadata');
      return null;
    }

    return result.data;
  }

  private pathFor(key: string): string {
    return join(this.rootDir, `${this.validateKey(key)}${this.extension}`);
  }

  private metaPathFor(key: string): string {
    return join(this.rootDir, `${this.validateKey(key)}${META_SUFFIX}`);
  }

  private validateKey(key: string): string {
    const segments = key.split('/');
    if (key.length === 0 || isAbsolute(key) || segments.some((s) => s === '' || s === '.' || s === '..')) {
      throw new StorageError('WriteError', key, `Invalid document key: "${key}"`);
    }
    return key;
  }
}

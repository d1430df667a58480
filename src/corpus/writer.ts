/**
 * Corpus Writer
 *
 * Writes one pretty-printed JSON file per article record, mirroring the raw
 * document layout: `{outputDir}/{key}.json`.
 */

import { constants } from 'fs';
import { access, mkdir, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { StorageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ArticleRecord } from '../types/index.js';

/**
 * Destination for extracted records
 */
export interface CorpusSink {
  write(key: string, record: ArticleRecord): Promise<void>;
}

export type SerializedRecord = Omit<ArticleRecord, 'publishedAt'> & { publishedAt: string | null };

export function serializeRecord(record: ArticleRecord): SerializedRecord {
  return {
    ...record,
    publishedAt: record.publishedAt ? record.publishedAt.toISOString() : null,
  };
}

export class CorpusWriter implements CorpusSink {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = resolve(outputDir);
  }

  /**
   * Make sure the output directory exists and is writable
   */
  async open(): Promise<void> {
    try {
      await mkdir(this.outputDir, { recursive: true });
      await access(this.outputDir, constants.W_OK);
    } catch (error) {
      throw new StorageError('WriteError', this.outputDir, `Cannot write to output directory ${this.outputDir}`, error);
    }
    logger.debug({ outputDir: this.outputDir }, 'Corpus output ready');
  }

  async write(key: string, record: ArticleRecord): Promise<void> {
    const path = join(this.outputDir, `${key}.json`);

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, `${JSON.stringify(serializeRecord(record), null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError('WriteError', key, `Failed to write record ${path}`, error);
    }

    logger.debug({ key, path }, 'Record written');
  }
}

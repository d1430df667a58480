/**
 * Command-line options
 *
 *   news-corpus [--loglevel LEVEL] praza (--download [category|rss] [--category SLUG...] | --parse [FILE])
 *   news-corpus [--loglevel LEVEL] nosdiario --parse [FILE]
 */

import { z } from 'zod';
import { CATEGORY_SLUGS, isCategorySlug, type CategorySlug } from '../config/categories.js';
import type { ArticleSource } from '../types/index.js';
import type { LogLevel } from '../utils/logger.js';

export const USAGE = `Usage: news-corpus [--loglevel LEVEL] <praza|nosdiario> (--download [category|rss] | --parse [FILE]) [--category SLUG...]

Sources:
  praza                 Praza Pública (HTML pages, crawled by category or from the RSS feed)
  nosdiario             Nós Diario (NewsML files copied into the source directory)

Options:
  -d, --download [FROM] Download raw documents; FROM is "category" (default) or "rss"
  -p, --parse [FILE]    Parse every downloaded document, or only FILE
  -c, --category SLUG   Categories to download with "--download category" (default: all)
                        ${CATEGORY_SLUGS.join(', ')}
  -l, --loglevel LEVEL  trace, debug, info, warn, error, fatal or silent
  -h, --help            Show this help`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

interface BaseOptions {
  source: ArticleSource;
  logLevel?: LogLevel;
}

export interface DownloadCommand extends BaseOptions {
  mode: 'download';
  from: 'category' | 'rss';
  categories: CategorySlug[];
}

export interface ParseCommand extends BaseOptions {
  mode: 'parse';
  /** Single document to parse; null for all */
  file: string | null;
}

export type CliOptions = DownloadCommand | ParseCommand | { mode: 'help' };

const sourceSchema = z.enum(['praza', 'nosdiario']);
const downloadFromSchema = z.enum(['category', 'rss']);

const LOG_LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'fatal',
  critical: 'fatal',
  silent: 'silent',
};

function parseLogLevel(value: string | undefined): LogLevel {
  const name = value?.toLowerCase();
  const level = name !== undefined && Object.hasOwn(LOG_LEVEL_ALIASES, name) ? LOG_LEVEL_ALIASES[name] : undefined;
  if (!level) {
    throw new CliUsageError(`Invalid log level: ${value ?? '(missing)'}`);
  }
  return level;
}

const isFlag = (token: string | undefined): boolean => token !== undefined && token.startsWith('-');

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let source: ArticleSource | undefined;
  let logLevel: LogLevel | undefined;
  let download: string | undefined;
  let parse: string | null | undefined;
  let categories: string[] | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const next = argv[i + 1];

    switch (token) {
      case '-h':
      case '--help':
        return { mode: 'help' };

      case '-l':
      case '--loglevel':
        logLevel = parseLogLevel(next);
        i++;
        break;

      case '-d':
      case '--download':
        if (download !== undefined) throw new CliUsageError('--download given more than once');
        if (next !== undefined && !isFlag(next)) {
          const from = downloadFromSchema.safeParse(next);
          if (!from.success) {
            throw new CliUsageError(`Invalid download source: ${next} (expected "category" or "rss")`);
          }
          download = from.data;
          i++;
        } else {
          download = 'category';
        }
        break;

      case '-p':
      case '--parse':
        if (parse !== undefined) throw new CliUsageError('--parse given more than once');
        if (next !== undefined && !isFlag(next)) {
          parse = next;
          i++;
        } else {
          parse = null;
        }
        break;

      case '-c':
      case '--category': {
        const values: string[] = [];
        while (argv[i + 1] !== undefined && !isFlag(argv[i + 1])) {
          values.push(argv[i + 1] ?? '');
          i++;
        }
        if (values.length === 0) throw new CliUsageError('--category needs at least one value');
        categories = [...(categories ?? []), ...values];
        break;
      }

      default: {
        if (isFlag(token)) {
          throw new CliUsageError(`Unknown option: ${token}`);
        }
        if (source !== undefined) {
          throw new CliUsageError(`Unexpected argument: ${token}`);
        }
        const parsed = sourceSchema.safeParse(token);
        if (!parsed.success) {
          throw new CliUsageError(`Unknown source: ${token} (expected "praza" or "nosdiario")`);
        }
        source = parsed.data;
      }
    }
  }

  if (!source) {
    throw new CliUsageError('Missing source: praza or nosdiario');
  }
  if (download !== undefined && parse !== undefined) {
    throw new CliUsageError('--download and --parse are mutually exclusive');
  }

  const base: BaseOptions = logLevel ? { source, logLevel } : { source };

  if (parse !== undefined) {
    if (categories) {
      throw new CliUsageError('--category only applies to --download category');
    }
    return { ...base, mode: 'parse', file: parse };
  }

  if (download === undefined) {
    throw new CliUsageError('One of --download or --parse is required');
  }
  if (source === 'nosdiario') {
    throw new CliUsageError('nosdiario does not support --download: NewsML files are read from the source directory');
  }

  if (download === 'rss') {
    // The feed covers the whole site, a category filter cannot be honoured
    if (categories) {
      throw new CliUsageError('--category cannot be combined with --download rss');
    }
    return { ...base, mode: 'download', from: 'rss', categories: [] };
  }

  return { ...base, mode: 'download', from: 'category', categories: resolveCategories(categories) };
}

function resolveCategories(values: string[] | undefined): CategorySlug[] {
  if (!values || values.includes('all')) {
    return [...CATEGORY_SLUGS];
  }

  const selected: CategorySlug[] = [];
  for (const value of values) {
    if (!isCategorySlug(value)) {
      throw new CliUsageError(`Unknown category: ${value} (expected one of: all, ${CATEGORY_SLUGS.join(', ')})`);
    }
    if (!selected.includes(value)) selected.push(value);
  }
  return selected;
}

/**
 * Error taxonomy
 *
 * Fetch, extraction and storage failures each carry a `kind` so loops can
 * log and count them per item without string matching.
 */

export type FetchErrorKind = 'Timeout' | 'HttpError' | 'NetworkError';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = options.status;
  }

  /**
   * Timeouts, network errors and 5xx responses may succeed on a later attempt
   */
  get transient(): boolean {
    if (this.kind === 'HttpError') {
      return this.status !== undefined && this.status >= 500;
    }
    return true;
  }
}

export function isTransientFetchError(error: Error): boolean {
  return error instanceof FetchError && error.transient;
}

export type ExtractionErrorKind = 'MissingField' | 'MalformedXml';

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly field?: string;

  private constructor(kind: ExtractionErrorKind, message: string, field?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ExtractionError';
    this.kind = kind;
    this.field = field;
  }

  static missingField(field: string): ExtractionError {
    return new ExtractionError('MissingField', `Missing field: ${field}`, field);
  }

  static malformedXml(reason: string, cause?: unknown): ExtractionError {
    return new ExtractionError('MalformedXml', `Malformed XML: ${reason}`, undefined, cause);
  }
}

export type StorageErrorKind = 'NotFound' | 'WriteError';

export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  readonly key: string;

  constructor(kind: StorageErrorKind, key: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
    this.kind = kind;
    this.key = key;
  }
}

/**
 * Short label for a failure, used in summaries
 */
export function errorKind(error: unknown): string {
  if (error instanceof FetchError || error instanceof ExtractionError || error instanceof StorageError) {
    return error.kind;
  }
  if (error instanceof Error) {
    return error.name;
  }
  return 'UnknownError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

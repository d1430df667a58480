const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

/**
 * Replace control characters (except tab and newlines) with spaces
 */
export const cleanChars = (value: string): string => value.replace(CONTROL_CHARS, ' ').trim();

export const normalizeSingleLine = (value: string): string =>
  value
    .replace(/\u00A0/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

export const normalizeMultiline = (value: string): string =>
  value
    .split('\n')
    .map(normalizeSingleLine)
    .filter((line) => line.length > 0)
    .join('\n');

/**
 * Lowercase, strip accents
 */
export const foldAccents = (value: string): string =>
  value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');

/**
 * Null for empty or whitespace-only values
 */
export const nonEmpty = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) return null;
  const normalized = normalizeSingleLine(value);
  return normalized.length > 0 ? normalized : null;
};

import crypto from 'crypto';
import { foldAccents } from './text.js';

/**
 * Stable short identifier for a URL or any other string
 */
export function hashId(input: string): string {
  return crypto.createHash('sha256').update(input.trim()).digest('hex').slice(0, 16);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Folded, filesystem-safe segment. When folding changed anything, a short
 * hash of the original keeps `Ola` and `ola` apart.
 */
function sanitizeSegment(segment: string): string {
  const decoded = decodeSegment(segment).replace(/\.html?$/i, '');
  const safe = foldAccents(decoded)
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (safe.length === 0 || safe === decoded) {
    return safe;
  }
  return `${safe}-${hashId(decoded).slice(0, 6)}`;
}

/**
 * Storage key for a downloaded article, derived from its URL path:
 * `https://praza.gal/acontece/some-title.html` -> `acontece/some-title`.
 * Falls back to a hash when the path is empty.
 */
export function documentKey(url: string): string {
  const { pathname } = new URL(url);
  const segments = pathname
    .split('/')
    .map(sanitizeSegment)
    .filter((segment) => segment.length > 0);

  if (segments.length === 0) {
    return hashId(url);
  }

  return segments.join('/');
}

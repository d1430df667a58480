/**
 * Plain-text rendering of an HTML subtree: text nodes in reading order,
 * one line per block-level element.
 */

import type { Cheerio } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import { normalizeMultiline } from '../utils/text.js';

const BLOCK_ELEMENTS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'td',
  'th',
  'tr',
  'ul',
]);

/**
 * Markup that never belongs to the article text
 */
export const NOISE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'form',
  'button',
  'figure',
  'aside',
  '[class*="related"]',
  '[class*="advert"]',
  '[class*="publicidade"]',
  '[class^="ad-"]',
  '[class*=" ad-"]',
  '.ad',
  '.ads',
].join(', ');

function collect(node: AnyNode, chunks: string[]): void {
  if (isText(node)) {
    chunks.push(node.data);
    return;
  }

  if (isTag(node)) {
    const name = node.name.toLowerCase();
    if (name === 'br') {
      chunks.push('\n');
      return;
    }

    const block = BLOCK_ELEMENTS.has(name);
    if (block) chunks.push('\n');
    for (const child of node.children) collect(child, chunks);
    if (block) chunks.push('\n');
    return;
  }

  // Document roots and other containers
  if (hasChildren(node)) {
    for (const child of node.children) collect(child, chunks);
  }
}

/**
 * Text of `container` with noise removed. The original tree is not modified.
 */
export function extractBlockText<T extends AnyNode>(container: Cheerio<T>): string {
  const fragment = container.clone();
  fragment.find(NOISE_SELECTORS).remove();

  const chunks: string[] = [];
  for (const node of fragment.toArray()) {
    collect(node, chunks);
  }

  return normalizeMultiline(chunks.join(''));
}

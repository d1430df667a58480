/**
 * Typed navigation over the object tree xml2js produces with
 * `explicitArray: true`: every child name maps to an array whose items are
 * either a string (text-only element) or an object with `$` attributes,
 * `_` text and further children. The document root is the one child that
 * is not wrapped in an array.
 */

export type XmlElement = Record<string, unknown>;

const ATTRIBUTES = '$';
const TEXT = '_';

export function isElement(node: unknown): node is XmlElement {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

function asList(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function children(node: unknown, name: string): unknown[] {
  if (!isElement(node)) return [];
  return asList(node[name]);
}

/**
 * All elements called `name` below `node`, at any depth
 */
export function descendants(node: unknown, name: string): unknown[] {
  const found: unknown[] = [];

  const visit = (current: unknown): void => {
    if (!isElement(current)) return;
    for (const [key, value] of Object.entries(current)) {
      if (key === ATTRIBUTES || key === TEXT) continue;
      for (const item of asList(value)) {
        if (key === name) found.push(item);
        visit(item);
      }
    }
  };

  visit(node);
  return found;
}

/**
 * Elements matching a relative path whose first step may be at any depth,
 * like `.//a/b/c`
 */
export function select(node: unknown, path: readonly string[]): unknown[] {
  const [first, ...rest] = path;
  if (first === undefined) return [];

  let current = descendants(node, first);
  for (const name of rest) {
    current = current.flatMap((item) => children(item, name));
  }
  return current;
}

export function attr(node: unknown, name: string): string | undefined {
  if (!isElement(node)) return undefined;
  const attributes = node[ATTRIBUTES];
  if (!isElement(attributes)) return undefined;
  const value = attributes[name];
  return typeof value === 'string' ? value : undefined;
}

export function textOf(node: unknown): string | null {
  if (typeof node === 'string') return node;
  if (isElement(node) && typeof node[TEXT] === 'string') return node[TEXT];
  return null;
}

export function selectText(node: unknown, path: readonly string[]): string | null {
  for (const match of select(node, path)) {
    const text = textOf(match);
    if (text !== null && text.trim().length > 0) return text;
  }
  return null;
}

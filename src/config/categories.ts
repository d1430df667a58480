/**
 * Static category tables.
 *
 * Praza Pública is crawled per section; Nós Diario tags each NewsML item with
 * "Tesauro" subject codes. Both map to the human-readable labels stored in
 * article records.
 */

import { foldAccents } from '../utils/text.js';

export const CATEGORIES = [
  { slug: 'politica', label: 'Política' },
  { slug: 'deportes', label: 'Deportes' },
  { slug: 'ciencia-e-tecnoloxia', label: 'Ciencia e tecnoloxía' },
  { slug: 'acontece', label: 'Acontece' },
  { slug: 'cultura', label: 'Cultura' },
  { slug: 'lecer', label: 'Lecer' },
  { slug: 'mundo', label: 'Mundo' },
  { slug: 'economia', label: 'Economía' },
  { slug: 'movementos-sociais', label: 'Movementos sociais' },
] as const;

export type CategorySlug = (typeof CATEGORIES)[number]['slug'];

export const CATEGORY_SLUGS: readonly CategorySlug[] = CATEGORIES.map((c) => c.slug);

export function isCategorySlug(value: string): value is CategorySlug {
  return CATEGORIES.some((c) => c.slug === value);
}

/**
 * Label of a Praza Pública section, or null for anything that is not one
 * (e.g. the "rss" discovery source).
 */
export function categoryLabel(slug: string | undefined): string | null {
  if (!slug) return null;
  return CATEGORIES.find((c) => c.slug === slug)?.label ?? null;
}

/**
 * Nós Diario Tesauro codes
 */
export const NEWSML_SUBJECTS: Readonly<Record<string, string>> = {
  galiza: 'Galiza',
  politica: 'Política',
  economia: 'Economía',
  mundo: 'Mundo',
  cultura: 'Cultura',
  deportes: 'Deportes',
  opinion: 'Opinión',
  sociedade: 'Sociedade',
  ciencia: 'Ciencia',
  tecnoloxia: 'Tecnoloxía',
  ecoloxia: 'Ecoloxía',
  lingua: 'Lingua',
  ensino: 'Ensino',
  saude: 'Saúde',
  comunicacion: 'Comunicación',
};

export function subjectLabel(code: string | undefined): string | null {
  if (!code) return null;
  const key = foldAccents(code.trim());
  return Object.hasOwn(NEWSML_SUBJECTS, key) ? NEWSML_SUBJECTS[key] ?? null : null;
}

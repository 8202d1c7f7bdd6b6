import type { MediaKind } from '../types/download.js';

const MEDIA_KINDS: readonly MediaKind[] = ['movie', 'series'];
const CATALOG_ID = /^[\w.-]+$/;

export function isMediaKind(value: string): value is MediaKind {
  return MEDIA_KINDS.some(kind => kind === value);
}

/**
 * Catalog ids end up in file names and URL paths: word characters, dots and dashes, no `..`
 */
export function isCatalogId(value: string): boolean {
  return CATALOG_ID.test(value) && !value.includes('..');
}

/**
 * Stable key of a catalog entry: "<kind>:<catalogId>"
 */
export function toItemId(kind: MediaKind, catalogId: string): string {
  return `${kind}:${catalogId}`;
}

export function parseItemId(itemId: string): { kind: MediaKind; catalogId: string } | null {
  const separator = itemId.indexOf(':');
  if (separator === -1) return null;

  const kind = itemId.slice(0, separator);
  const catalogId = itemId.slice(separator + 1);
  if (!isMediaKind(kind) || !isCatalogId(catalogId)) return null;
  return { kind, catalogId };
}

/**
 * Append-only catalog helpers
 */

import type { CatalogItem, CatalogRecord } from '../core/types.js';

/**
 * Existing rows first, then the additions. Nothing is replaced or reordered.
 */
export function appendItems<T extends CatalogRecord>(
  existing: readonly T[],
  additions: readonly T[]
): T[] {
  return [...existing, ...additions];
}

/**
 * Ids already present in a catalog (the zip catalog's ids are folder names)
 */
export function knownIds(catalog: readonly Pick<CatalogItem, 'id'>[]): Set<string> {
  return new Set(catalog.map(item => item.id));
}

/**
 * Catalog persistence seam
 *
 * The orchestrator reads a whole catalog, rebuilds it in memory and writes
 * it back. There is no locking and no transactional replace: two runs
 * against the same files at once can lose one run's additions.
 */

import type { CatalogRecord } from '../core/types.js';

export interface CatalogStore {
  /**
   * Every row of the catalog at `path`, validated. A missing file is an
   * empty catalog.
   *
   * @throws {SchemaMismatchError} If the stored table lacks a catalog column
   */
  load(path: string): Promise<CatalogRecord[]>;

  /** Replace the catalog at `path` with `items` */
  save(path: string, items: readonly CatalogRecord[]): Promise<void>;
}

/**
 * Store backed by a Map, for tests and dry runs
 */
export class InMemoryCatalogStore implements CatalogStore {
  readonly tables = new Map<string, CatalogRecord[]>();
  readonly saves: string[] = [];

  async load(path: string): Promise<CatalogRecord[]> {
    return [...(this.tables.get(path) ?? [])];
  }

  async save(path: string, items: readonly CatalogRecord[]): Promise<void> {
    this.saves.push(path);
    this.tables.set(path, [...items]);
  }
}

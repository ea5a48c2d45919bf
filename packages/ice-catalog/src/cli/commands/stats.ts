/**
 * Stats Command
 *
 * Item, asset and date-range summary of one catalog.
 *
 * USAGE:
 *   ice-catalog stats [--catalog grouped|zip]
 *
 * @module cli/commands/stats
 */

import type { IceCatalogConfig } from '../../config/config.js';
import type { CatalogRecord } from '../../core/types.js';
import type { CatalogStore } from '../../persistence/catalog-store.js';
import { ParquetCatalogStore } from '../../persistence/parquet-catalog-store.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

export type CatalogName = 'grouped' | 'zip';

export interface CatalogStats {
  readonly items: number;
  readonly assets: number;
  /** Ids that appear on more than one row (grouped catalog awaiting merge) */
  readonly duplicateIds: readonly string[];
  readonly firstDatetime: string | null;
  readonly lastDatetime: string | null;
}

export function summarizeCatalog(records: readonly CatalogRecord[]): CatalogStats {
  const counts = new Map<string, number>();
  let assets = 0;
  let firstDatetime: string | null = null;
  let lastDatetime: string | null = null;

  for (const record of records) {
    counts.set(record.id, (counts.get(record.id) ?? 0) + 1);
    assets += Object.values(record.assets ?? {}).filter(asset => asset !== null).length;

    // ISO-8601 UTC strings order lexicographically
    if (firstDatetime === null || record.datetime < firstDatetime) {
      firstDatetime = record.datetime;
    }
    if (lastDatetime === null || record.datetime > lastDatetime) {
      lastDatetime = record.datetime;
    }
  }

  const duplicateIds = [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([id]) => id)
    .sort();

  return { items: records.length, assets, duplicateIds, firstDatetime, lastDatetime };
}

export async function runStats(
  config: IceCatalogConfig,
  catalog: CatalogName,
  store: CatalogStore = new ParquetCatalogStore()
): Promise<ExitCode> {
  const path = catalog === 'zip' ? config.paths.zipCatalog : config.paths.groupedCatalog;
  const stats = summarizeCatalog(await store.load(path));

  if (config.json) {
    console.log(JSON.stringify({ catalog, path, ...stats }, null, 2));
  } else {
    console.log(`${catalog} catalog (${path})`);
    console.log(`  items:  ${stats.items}`);
    console.log(`  assets: ${stats.assets}`);
    console.log(`  range:  ${stats.firstDatetime ?? '-'} .. ${stats.lastDatetime ?? '-'}`);
    if (stats.duplicateIds.length > 0) {
      console.log(`  ids awaiting merge: ${stats.duplicateIds.join(', ')}`);
    }
  }

  return EXIT_CODES.SUCCESS;
}

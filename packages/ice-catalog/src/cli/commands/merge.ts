/**
 * Merge Command
 *
 * Re-merge the stored grouped catalog (one item per day) in place.
 *
 * USAGE:
 *   ice-catalog merge
 *
 * @module cli/commands/merge
 */

import type { IceCatalogConfig } from '../../config/config.js';
import type { CatalogStore } from '../../persistence/catalog-store.js';
import { createCatalogSync } from '../../sync/factory.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

export async function runMerge(config: IceCatalogConfig, store?: CatalogStore): Promise<ExitCode> {
  const report = await createCatalogSync(config, { store }).mergeOnly();

  if (config.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(
      `Grouped catalog: ${report.itemsBefore} -> ${report.itemsAfter} items` +
        (report.persisted ? ' (written)' : report.changed ? ' (dry run)' : ' (unchanged)')
    );
  }

  return EXIT_CODES.SUCCESS;
}

/**
 * Sync Command
 *
 * Discover new release folders, repackage them and update both catalogs.
 *
 * USAGE:
 *   ice-catalog sync [--list <json>] [--year <yyyy>]
 *
 * @module cli/commands/sync
 */

import type { IceCatalogConfig } from '../../config/config.js';
import type { CatalogStore } from '../../persistence/catalog-store.js';
import type { SyncReport } from '../../sync/catalog-sync.js';
import { createCatalogSync } from '../../sync/factory.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

export interface SyncCommandOptions {
  readonly listPath?: string;
  readonly store?: CatalogStore;
}

export function formatSyncReport(report: SyncReport): string {
  const lines = [
    `Folders discovered: ${report.foldersDiscovered}`,
    `  processed: ${report.processed.length}`,
    `  already cataloged: ${report.skipped.length}`,
    `  ignored: ${report.ignored.length}`,
  ];
  for (const entry of report.ignored) {
    lines.push(`    - ${entry.folder}: ${entry.reason}`);
  }
  lines.push(`  failed: ${report.failed.length}`);
  for (const failure of report.failed) {
    lines.push(`    - ${failure.folder}: ${failure.reason}`);
  }
  lines.push(
    `Zip catalog: +${report.newZipItems} (${report.zipCatalogSize} items)`,
    `Grouped catalog: +${report.newGroupedItems} (${report.groupedCatalogSize} items after merge)`,
    report.persisted ? 'Catalogs written.' : 'No catalog written.'
  );
  return lines.join('\n');
}

export async function runSync(
  config: IceCatalogConfig,
  options: SyncCommandOptions = {}
): Promise<ExitCode> {
  const sync = createCatalogSync(config, options);
  const report = await sync.run();

  if (config.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatSyncReport(report));
  }

  return report.failed.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}

/**
 * Catalog Sync Orchestrator
 *
 * Drives one incremental run:
 *   discovery → per-folder processing → item synthesis → catalog append
 *   → style attachment → per-day merge → persist
 *
 * Folders are processed strictly one at a time. A folder whose name is
 * already a zip-catalog id is skipped, so rerunning over the same listing
 * adds nothing to the zip catalog and leaves the grouped catalog unchanged
 * after merge.
 *
 * Per-folder download/conversion failures are logged and reported; the
 * folder is left out of both catalogs and retried on the next run. Folders
 * without a date prefix are ignored with a warning and do not count as
 * failures. Core
 * errors (schema mismatch, datetime conflict under the 'error' policy)
 * abort the run before anything is written.
 */

import { extractFolderDate, type FolderDiscovery } from '../acquisition/folder-discovery.js';
import { appendItems, knownIds } from '../catalog/catalog.js';
import { synthesizeItem } from '../catalog/item-synthesizer.js';
import { mergeItems, type DatetimeConflictPolicy } from '../catalog/merge.js';
import { withStyleLink } from '../catalog/style-link.js';
import type { IceCatalogConfig } from '../config/config.js';
import { DAILY_ID_PREFIX, MEDIA_TYPES } from '../core/constants.js';
import type {
  AssetSpec,
  CalendarDate,
  CatalogItem,
  CatalogRecord,
} from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import type { CatalogStore } from '../persistence/catalog-store.js';
import type { FolderOutcome, FolderProcessor } from './folder-processor.js';

// ============================================================================
// Types
// ============================================================================

export interface FolderFailure {
  readonly folder: string;
  readonly reason: string;
}

export interface SyncReport {
  readonly foldersDiscovered: number;
  /** Folders turned into catalog items this run */
  readonly processed: readonly string[];
  /** Folders already present in the zip catalog */
  readonly skipped: readonly string[];
  /** Folders whose name carries no date prefix */
  readonly ignored: readonly FolderFailure[];
  readonly failed: readonly FolderFailure[];
  readonly newZipItems: number;
  readonly newGroupedItems: number;
  readonly zipCatalogSize: number;
  readonly groupedCatalogSize: number;
  /** False in dry-run mode, or when neither catalog changed */
  readonly persisted: boolean;
  readonly durationMs: number;
}

export interface MergeReport {
  readonly itemsBefore: number;
  readonly itemsAfter: number;
  readonly changed: boolean;
  readonly persisted: boolean;
}

export interface CatalogSyncOptions {
  readonly config: IceCatalogConfig;
  readonly store: CatalogStore;
  readonly discovery: FolderDiscovery;
  readonly processor: FolderProcessor;
}

/**
 * Settings the grouped-catalog rebuild depends on
 */
export interface RebuildSettings {
  readonly styleUrl: string | null;
  readonly onDatetimeConflict: DatetimeConflictPolicy;
}

// ============================================================================
// Pure helpers
// ============================================================================

export function dailyItemId(date: CalendarDate): string {
  return `${DAILY_ID_PREFIX}${date}`;
}

export function assetUrl(baseUrl: string, fileName: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${fileName}`;
}

/**
 * Append new per-day items to the grouped catalog and merge it
 *
 * The style link is attached to the new items before the merge and again
 * to every merged item afterwards, so its `asset:keys` name the re-keyed
 * assets rather than the pre-merge keys of the first record.
 */
export function rebuildGroupedCatalog(
  existing: readonly CatalogRecord[],
  additions: readonly CatalogItem[],
  settings: RebuildSettings
): CatalogItem[] {
  const styled = additions.map(item => withStyleLink(item, settings.styleUrl));
  const merged = mergeItems(appendItems<CatalogRecord>(existing, styled), {
    onDatetimeConflict: settings.onDatetimeConflict,
  });
  return merged.map(item => withStyleLink(item, settings.styleUrl));
}

function sameCatalog(a: readonly CatalogRecord[], b: readonly CatalogRecord[]): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

// ============================================================================
// Orchestrator
// ============================================================================

export class CatalogSync {
  private readonly config: IceCatalogConfig;
  private readonly store: CatalogStore;
  private readonly discovery: FolderDiscovery;
  private readonly processor: FolderProcessor;

  constructor(options: CatalogSyncOptions) {
    this.config = options.config;
    this.store = options.store;
    this.discovery = options.discovery;
    this.processor = options.processor;
  }

  private get rebuildSettings(): RebuildSettings {
    return {
      styleUrl: this.config.style.url,
      onDatetimeConflict: this.config.merge.onDatetimeConflict,
    };
  }

  /**
   * Run one incremental sync
   */
  async run(): Promise<SyncReport> {
    const startTime = Date.now();
    const { paths, assets, style } = this.config;

    const existingZip = await this.store.load(paths.zipCatalog);
    const existingGrouped = await this.store.load(paths.groupedCatalog);
    const seen = knownIds(existingZip);

    const folders = await this.discovery.discover();
    logger.info('Starting catalog sync', {
      folders: folders.length,
      zipItems: existingZip.length,
      groupedItems: existingGrouped.length,
      dryRun: this.config.dryRun,
    });

    const processed: string[] = [];
    const skipped: string[] = [];
    const ignored: FolderFailure[] = [];
    const failed: FolderFailure[] = [];
    const newZipItems: CatalogItem[] = [];
    const fgbByDate = new Map<CalendarDate, AssetSpec[]>();

    for (const folder of folders) {
      if (seen.has(folder)) {
        skipped.push(folder);
        continue;
      }

      const date = extractFolderDate(folder);
      if (!date) {
        logger.warn('Invalid date format in folder name', { folder });
        ignored.push({ folder, reason: 'invalid date prefix' });
        continue;
      }

      const outcome = await this.processFolder(folder);
      if (outcome.status === 'failed') {
        logger.warn('Skipping folder', { folder, reason: outcome.reason });
        failed.push({ folder, reason: outcome.reason });
        continue;
      }

      const zipItem = synthesizeItem(
        date,
        folder,
        [{ geometry: outcome.envelope, url: assetUrl(assets.zipBaseUrl, `${folder}.zip`) }],
        MEDIA_TYPES.zip
      );
      newZipItems.push(withStyleLink(zipItem, style.url));

      const daySpecs = fgbByDate.get(date) ?? [];
      daySpecs.push({ geometry: outcome.envelope, url: assetUrl(assets.fgbBaseUrl, `${folder}.fgb`) });
      fgbByDate.set(date, daySpecs);

      seen.add(folder);
      processed.push(folder);
    }

    const newGroupedItems = [...fgbByDate.entries()].map(([date, specs]) =>
      synthesizeItem(date, dailyItemId(date), specs, MEDIA_TYPES.flatgeobuf)
    );

    const zipCatalog = appendItems<CatalogRecord>(existingZip, newZipItems);
    const groupedCatalog = rebuildGroupedCatalog(existingGrouped, newGroupedItems, this.rebuildSettings);
    const groupedChanged = !sameCatalog(existingGrouped, groupedCatalog);

    let persisted = false;
    if (this.config.dryRun) {
      logger.info('Dry run, catalogs not written');
    } else {
      if (newZipItems.length > 0) {
        await this.store.save(paths.zipCatalog, zipCatalog);
        persisted = true;
      }
      if (groupedChanged) {
        await this.store.save(paths.groupedCatalog, groupedCatalog);
        persisted = true;
      }
    }

    const report: SyncReport = {
      foldersDiscovered: folders.length,
      processed,
      skipped,
      ignored,
      failed,
      newZipItems: newZipItems.length,
      newGroupedItems: newGroupedItems.length,
      zipCatalogSize: zipCatalog.length,
      groupedCatalogSize: groupedCatalog.length,
      persisted,
      durationMs: Date.now() - startTime,
    };

    logger.info('Catalog sync complete', {
      processed: processed.length,
      skipped: skipped.length,
      ignored: ignored.length,
      failed: failed.length,
      newZipItems: report.newZipItems,
      newGroupedItems: report.newGroupedItems,
      groupedCatalogSize: report.groupedCatalogSize,
    });

    return report;
  }

  /**
   * Re-merge the stored grouped catalog without fetching anything
   */
  async mergeOnly(): Promise<MergeReport> {
    const path = this.config.paths.groupedCatalog;
    const existing = await this.store.load(path);
    const merged = rebuildGroupedCatalog(existing, [], this.rebuildSettings);
    const changed = !sameCatalog(existing, merged);

    let persisted = false;
    if (changed && !this.config.dryRun) {
      await this.store.save(path, merged);
      persisted = true;
    }

    logger.info('Grouped catalog merged', {
      path,
      itemsBefore: existing.length,
      itemsAfter: merged.length,
      changed,
    });

    return { itemsBefore: existing.length, itemsAfter: merged.length, changed, persisted };
  }

  private async processFolder(folder: string): Promise<FolderOutcome> {
    try {
      return await this.processor.process(folder);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected folder processing error', { folder, error: reason });
      return { status: 'failed', reason };
    }
  }
}

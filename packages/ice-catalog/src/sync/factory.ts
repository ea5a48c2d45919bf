/**
 * Wires the production collaborators around CatalogSync
 */

import {
  DirectoryListingDiscovery,
  JsonListDiscovery,
  type FolderDiscovery,
} from '../acquisition/folder-discovery.js';
import { ShapefileFetcher } from '../acquisition/shapefile-fetcher.js';
import type { IceCatalogConfig } from '../config/config.js';
import { HTTPClient } from '../core/http-client.js';
import type { CatalogStore } from '../persistence/catalog-store.js';
import { ParquetCatalogStore } from '../persistence/parquet-catalog-store.js';
import { CatalogSync } from './catalog-sync.js';
import { ShapefileFolderProcessor } from './folder-processor.js';

export interface CreateCatalogSyncOptions {
  /** Read folder names from a `{"list": [...]}` file instead of the archive listing */
  readonly listPath?: string;
  readonly store?: CatalogStore;
}

export function createCatalogSync(
  config: IceCatalogConfig,
  options: CreateCatalogSyncOptions = {}
): CatalogSync {
  const http = new HTTPClient({
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
  });
  const { shapefileBaseUrl, year } = config.sources;

  const discovery: FolderDiscovery = options.listPath
    ? new JsonListDiscovery(options.listPath)
    : new DirectoryListingDiscovery(shapefileBaseUrl, year, http);

  const processor = new ShapefileFolderProcessor({
    fetcher: new ShapefileFetcher(shapefileBaseUrl, year, http),
    zipDir: config.paths.zipDir,
    flatgeobufDir: config.paths.flatgeobufDir,
  });

  return new CatalogSync({
    config,
    store: options.store ?? new ParquetCatalogStore(),
    discovery,
    processor,
  });
}

/**
 * Ice Catalog
 *
 * Catalog synthesis and per-day merge for daily sea-ice chart releases,
 * plus the orchestration that keeps Parquet catalogs in step with the
 * upstream archive.
 *
 * @packageDocumentation
 */

// Core
export * from './core/constants.js';
export type * from './core/types.js';
export {
  CatalogError,
  InvalidInputError,
  SchemaMismatchError,
  DatetimeConflictError,
  ConfigError,
  ConversionError,
  type CatalogErrorKind,
  type SchemaIssue,
} from './core/errors.js';
export {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  type HTTPClientConfig,
} from './core/http-client.js';
export { Logger, logger, type LogLevel, type LoggerConfig } from './core/utils/logger.js';

// Catalog operations
export * from './catalog/index.js';

// Configuration
export { loadConfig, DEFAULT_CONFIG, type IceCatalogConfig, type LoadConfigOptions } from './config/config.js';

// Acquisition
export {
  DirectoryListingDiscovery,
  JsonListDiscovery,
  extractFolderDate,
  parseDirectoryListing,
  yearUrl,
  type FolderDiscovery,
} from './acquisition/folder-discovery.js';
export { ShapefileFetcher, partUrl, type ShapefileFetchResult } from './acquisition/shapefile-fetcher.js';

// Transformation
export { convertShapefileToFlatGeobuf, type ConversionResult } from './transformation/shapefile-to-flatgeobuf.js';
export { zipDirectory } from './transformation/zip-archiver.js';

// Persistence
export { InMemoryCatalogStore, type CatalogStore } from './persistence/catalog-store.js';
export { ParquetCatalogStore } from './persistence/parquet-catalog-store.js';

// Orchestration
export {
  CatalogSync,
  rebuildGroupedCatalog,
  dailyItemId,
  type SyncReport,
  type MergeReport,
  type FolderFailure,
} from './sync/catalog-sync.js';
export { ShapefileFolderProcessor, type FolderOutcome, type FolderProcessor } from './sync/folder-processor.js';
export { createCatalogSync } from './sync/factory.js';

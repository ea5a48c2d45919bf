export { runSync, formatSyncReport, type SyncCommandOptions } from './sync.js';
export { runMerge } from './merge.js';
export { runStats, summarizeCatalog, type CatalogName, type CatalogStats } from './stats.js';

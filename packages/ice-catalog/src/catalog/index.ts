export { envelopeOf, boundsOf } from './envelope.js';
export {
  synthesizeItem,
  dayStart,
  assetKey,
  rekeyAssets,
  buildItem,
} from './item-synthesizer.js';
export { attachStyleLink, withStyleLink } from './style-link.js';
export {
  mergeItems,
  mergeTable,
  partitionBy,
  dedupeLinks,
  type MergeOptions,
  type DatetimeConflictPolicy,
  type Partition,
} from './merge.js';
export { parseCatalogTable, catalogRecordSchema } from './schema.js';
export { appendItems, knownIds } from './catalog.js';

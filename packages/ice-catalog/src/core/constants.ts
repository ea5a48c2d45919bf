/**
 * Catalog-wide constants
 */

export const STAC_VERSION = '1.0.0';

export const ITEM_TYPE = 'Feature';

/** Reference frame of every geometry stored in either catalog */
export const CATALOG_CRS = 'EPSG:4326';

export const MEDIA_TYPES = {
  zip: 'application/zip',
  flatgeobuf: 'application/vnd.flatgeobuf',
  vectorStyles: 'text/vector-styles',
} as const;

export type AssetMediaType = typeof MEDIA_TYPES.zip | typeof MEDIA_TYPES.flatgeobuf;

export const ASSET_KEY_PREFIX = 'asset_';

export const DATA_ROLE = 'data';

export const STYLE_REL = 'style';

/** Grouped catalog ids are `daily_<YYYY-MM-DD>` */
export const DAILY_ID_PREFIX = 'daily_';

/** Parts of a shapefile release folder, in download order */
export const SHAPEFILE_PARTS = ['.shp', '.shx', '.dbf', '.prj', '.cpg'] as const;

/** Columns every catalog table carries */
export const CATALOG_COLUMNS = [
  'id',
  'type',
  'stac_version',
  'datetime',
  'geometry',
  'bbox',
  'assets',
  'links',
] as const;

export type CatalogColumn = (typeof CATALOG_COLUMNS)[number];

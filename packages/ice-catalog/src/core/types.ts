/**
 * Catalog Types
 *
 * Record shapes shared by both catalogs. The zip catalog (one item per
 * source folder) and the grouped catalog (one item per calendar day after
 * merge) use identical rows.
 *
 * TYPE SAFETY: items are readonly end to end. Every operation returns a new
 * item; nothing mutates a row in place.
 */

import type { Geometry, Polygon } from 'geojson';
import type { ITEM_TYPE, STAC_VERSION } from './constants.js';

/**
 * Bounding box `[minX, minY, maxX, maxY]` in WGS84 lon/lat
 */
export type BBox = readonly [number, number, number, number];

/**
 * Calendar day as `YYYY-MM-DD`
 */
export type CalendarDate = string;

/**
 * Downloadable file attached to an item
 */
export interface StacAsset {
  readonly href: string;
  readonly type: string;
  readonly roles: readonly string[];
}

/**
 * Item link. `asset:keys` is set on style links and names the assets the
 * style applies to.
 */
export interface StacLink {
  readonly rel: string;
  readonly href: string;
  readonly type: string;
  readonly 'asset:keys'?: readonly string[];
}

/**
 * One catalog row as the core produces it
 */
export interface CatalogItem {
  readonly id: string;
  readonly type: typeof ITEM_TYPE;
  readonly stac_version: typeof STAC_VERSION;
  /** ISO-8601 timestamp at the start of the UTC day */
  readonly datetime: string;
  /** Axis-aligned rectangle */
  readonly geometry: Polygon;
  readonly bbox: BBox;
  /** Keys are `asset_0 … asset_{n-1}` in insertion order */
  readonly assets: Readonly<Record<string, StacAsset>>;
  readonly links: readonly StacLink[];
}

/**
 * One catalog row as read back from a table.
 *
 * Columnar map and list columns may hold nulls, so assets entries and the
 * nested columns themselves are nullable. Every CatalogItem is a valid
 * CatalogRecord.
 */
export interface CatalogRecord {
  readonly id: string;
  readonly type: typeof ITEM_TYPE;
  readonly stac_version: typeof STAC_VERSION;
  readonly datetime: string;
  readonly geometry: Polygon;
  readonly bbox: BBox;
  readonly assets: Readonly<Record<string, StacAsset | null>> | null;
  readonly links: readonly StacLink[] | null;
}

/**
 * Geometry plus the URL of the file it was computed from
 */
export interface AssetSpec {
  readonly geometry: Geometry;
  readonly url: string;
}

export type Catalog = readonly CatalogItem[];

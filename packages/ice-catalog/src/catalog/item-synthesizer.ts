/**
 * Catalog Item Synthesizer
 *
 * Builds one catalog record from a calendar date, an identifier and an
 * ordered list of (geometry, URL) pairs.
 */

import type { Polygon } from 'geojson';
import {
  ASSET_KEY_PREFIX,
  DATA_ROLE,
  ITEM_TYPE,
  STAC_VERSION,
} from '../core/constants.js';
import { InvalidInputError } from '../core/errors.js';
import type {
  AssetSpec,
  CalendarDate,
  CatalogItem,
  StacAsset,
} from '../core/types.js';
import { boundsOf, envelopeOf } from './envelope.js';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Timestamp at the start of the UTC day, e.g. `2024-01-01T00:00:00.000Z`
 *
 * @throws {InvalidInputError} If `date` is not a real `YYYY-MM-DD` day
 */
export function dayStart(date: CalendarDate): string {
  const match = CALENDAR_DATE.exec(date);
  if (!match) {
    throw new InvalidInputError(`Invalid calendar date "${date}" (expected YYYY-MM-DD)`);
  }

  const [, year, month, day] = match;
  const timestamp = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  // Date.UTC rolls 2024-02-30 over into March
  if (timestamp.toISOString().slice(0, 10) !== date) {
    throw new InvalidInputError(`Invalid calendar date "${date}"`);
  }

  return timestamp.toISOString();
}

/**
 * Key the n-th asset of an item
 */
export function assetKey(index: number): string {
  return `${ASSET_KEY_PREFIX}${index}`;
}

/**
 * Re-key assets in order to `asset_0, asset_1, …`
 */
export function rekeyAssets(assets: readonly StacAsset[]): Record<string, StacAsset> {
  const keyed: Record<string, StacAsset> = {};
  assets.forEach((asset, index) => {
    keyed[assetKey(index)] = asset;
  });
  return keyed;
}

/**
 * Assemble an item around an already-computed envelope
 *
 * Shared by synthesis and merge so both emit rows with the same field order.
 */
export function buildItem(
  id: string,
  datetime: string,
  geometry: Polygon,
  assets: Record<string, StacAsset>,
  links: CatalogItem['links']
): CatalogItem {
  return {
    id,
    type: ITEM_TYPE,
    stac_version: STAC_VERSION,
    datetime,
    geometry,
    bbox: boundsOf(geometry),
    assets,
    links,
  };
}

/**
 * Synthesize a catalog item
 *
 * ALGORITHM:
 * 1. geometry = envelope of every asset spec geometry (union first)
 * 2. bbox = bounds of that envelope
 * 3. assets = specs re-keyed in input order, each `{href, type: mediaType, roles: ['data']}`
 * 4. links = []
 *
 * Deterministic: identical inputs in identical order give identical items.
 *
 * @throws {InvalidInputError} If `assetSpecs` is empty, `id` is blank, or `date` is not a calendar day
 *
 * @example
 * ```typescript
 * const item = synthesizeItem('2024-01-01', 'daily_2024-01-01', [
 *   { geometry: fgbEnvelope, url: 'https://assets.example.com/daily/20240101_A.fgb' },
 * ], MEDIA_TYPES.flatgeobuf);
 * ```
 */
export function synthesizeItem(
  date: CalendarDate,
  id: string,
  assetSpecs: readonly AssetSpec[],
  mediaType: string
): CatalogItem {
  if (!id || id.trim() === '') {
    throw new InvalidInputError('Item id must be set');
  }
  if (!date) {
    throw new InvalidInputError(`Item "${id}" has no date`);
  }
  if (assetSpecs.length === 0) {
    throw new InvalidInputError(`Item "${id}" has no assets`);
  }

  const datetime = dayStart(date);
  const geometry = envelopeOf(assetSpecs.map(spec => spec.geometry));
  const assets = rekeyAssets(
    assetSpecs.map(spec => ({
      href: spec.url,
      type: mediaType,
      roles: [DATA_ROLE],
    }))
  );

  return buildItem(id, datetime, geometry, assets, []);
}

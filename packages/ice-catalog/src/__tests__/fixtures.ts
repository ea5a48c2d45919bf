/**
 * Shared test fixtures
 */

import type { Polygon } from 'geojson';
import type { IceCatalogConfig } from '../config/config.js';
import type { CatalogRecord, StacAsset } from '../core/types.js';

/**
 * Axis-aligned square polygon, counter-clockwise from the lower-left corner
 */
export function square(minX: number, minY: number, size: number): Polygon {
  const maxX = minX + size;
  const maxY = minY + size;
  return {
    type: 'Polygon',
    coordinates: [[[minX, minY], [maxX, minY], [maxX, maxY], [minX, maxY], [minX, minY]]],
  };
}

export function fgbAsset(href: string): StacAsset {
  return { href, type: 'application/vnd.flatgeobuf', roles: ['data'] };
}

/**
 * Catalog row with a square footprint and matching bbox
 */
export function record(
  id: string,
  datetime: string,
  footprint: Polygon,
  assets: CatalogRecord['assets'],
  links: CatalogRecord['links'] = []
): CatalogRecord {
  const ring = footprint.coordinates[0];
  const xs = ring.map(position => position[0]);
  const ys = ring.map(position => position[1]);
  return {
    id,
    type: 'Feature',
    stac_version: '1.0.0',
    datetime,
    geometry: footprint,
    bbox: [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)],
    assets,
    links,
  };
}

export function testConfig(patch: Partial<IceCatalogConfig> = {}): IceCatalogConfig {
  return {
    version: 1,
    paths: {
      groupedCatalog: 'grouped.parquet',
      zipCatalog: 'zip.parquet',
      flatgeobufDir: 'fgb',
      zipDir: 'zips',
    },
    sources: { shapefileBaseUrl: 'https://archive.test/SIGRID3/', year: 2024 },
    assets: {
      fgbBaseUrl: 'https://assets.test/daily',
      zipBaseUrl: 'https://assets.test/zips/',
    },
    style: { url: 'https://styles.test/ice' },
    http: { timeoutMs: 1000, userAgent: 'ice-catalog-test' },
    merge: { onDatetimeConflict: 'warn' },
    verbose: false,
    json: false,
    dryRun: false,
    configPath: null,
    ...patch,
  };
}

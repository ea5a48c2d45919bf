/**
 * Parquet Catalog Store
 *
 * Persists catalogs as Parquet through an in-process DuckDB instance.
 *
 * COLUMN LAYOUT:
 * - id, type, stac_version  VARCHAR
 * - datetime                TIMESTAMP (start of UTC day)
 * - geometry                VARCHAR (GeoJSON text, exact double round-trip)
 * - bbox                    DOUBLE[]
 * - assets                  MAP(VARCHAR, STRUCT(href, type, roles VARCHAR[]))
 * - links                   STRUCT(rel, href, type, "asset:keys" VARCHAR[])[]
 *
 * WRITE: rows are staged as NDJSON in a temp dir and copied with typed
 * columns into the target file, which is overwritten in place.
 *
 * READ: nested columns come back as JSON text and go through
 * parseCatalogTable like any other table.
 */

import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import { parseCatalogTable } from '../catalog/schema.js';
import { CATALOG_COLUMNS } from '../core/constants.js';
import { SchemaMismatchError } from '../core/errors.js';
import type { CatalogRecord } from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import type { CatalogStore } from './catalog-store.js';

const ASSET_TYPE = 'STRUCT(href VARCHAR, type VARCHAR, roles VARCHAR[])';
const LINK_TYPE = 'STRUCT(rel VARCHAR, href VARCHAR, type VARCHAR, "asset:keys" VARCHAR[])';

/**
 * Staged NDJSON column types, in table order
 */
const STAGED_COLUMNS: Record<string, string> = {
  id: 'VARCHAR',
  type: 'VARCHAR',
  stac_version: 'VARCHAR',
  datetime_ms: 'BIGINT',
  geometry: 'VARCHAR',
  bbox: 'DOUBLE[]',
  assets: `MAP(VARCHAR, ${ASSET_TYPE})`,
  links: `${LINK_TYPE}[]`,
};

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function columnsLiteral(): string {
  const entries = Object.entries(STAGED_COLUMNS).map(
    ([name, type]) => `${name}: ${sqlString(type)}`
  );
  return `{${entries.join(', ')}}`;
}

/**
 * One NDJSON line per record
 */
export function toStagedRow(record: CatalogRecord): Record<string, unknown> {
  return {
    id: record.id,
    type: record.type,
    stac_version: record.stac_version,
    datetime_ms: Date.parse(record.datetime),
    geometry: JSON.stringify(record.geometry),
    bbox: [...record.bbox],
    assets: record.assets,
    links: record.links?.map(link => ({
      rel: link.rel,
      href: link.href,
      type: link.type,
      'asset:keys': link['asset:keys'] ?? null,
    })) ?? null,
  };
}

/**
 * COPY statement writing the staged file (or an empty typed table) to `target`
 */
export function buildCopyStatement(stagedPath: string | null, target: string): string {
  const select =
    stagedPath === null
      ? `SELECT ${Object.entries(STAGED_COLUMNS)
          .map(([name, type]) => `NULL::${type} AS ${name}`)
          .join(', ')} LIMIT 0`
      : `SELECT * FROM read_json(${sqlString(stagedPath)}, format = 'newline_delimited', columns = ${columnsLiteral()})`;

  return `COPY (
    SELECT id, type, stac_version, epoch_ms(datetime_ms) AS datetime, geometry, bbox, assets, links
    FROM (${select})
  ) TO ${sqlString(target)} (FORMAT PARQUET)`;
}

export function buildSelectStatement(source: string): string {
  return `SELECT
    id,
    type,
    stac_version,
    CAST(epoch_ms(datetime) AS VARCHAR) AS datetime,
    geometry,
    CAST(to_json(bbox) AS VARCHAR) AS bbox,
    CAST(to_json(assets) AS VARCHAR) AS assets,
    CAST(to_json(links) AS VARCHAR) AS links
  FROM read_parquet(${sqlString(source)})`;
}

function text(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function parseJsonColumn(value: unknown): unknown {
  const raw = text(value);
  return raw === null ? null : JSON.parse(raw);
}

/**
 * Turn a row of JSON text columns back into structured values
 */
export function decodeStoredRow(row: Record<string, unknown>): Record<string, unknown> {
  const epochMs = text(row.datetime);
  return {
    id: row.id,
    type: row.type,
    stac_version: row.stac_version,
    datetime: epochMs === null ? null : new Date(Number(epochMs)).toISOString(),
    geometry: parseJsonColumn(row.geometry),
    bbox: parseJsonColumn(row.bbox),
    assets: parseJsonColumn(row.assets),
    links: parseJsonColumn(row.links),
  };
}

export class ParquetCatalogStore implements CatalogStore {
  private connection: DuckDBConnection | null = null;

  private async connect(): Promise<DuckDBConnection> {
    if (!this.connection) {
      const instance = await DuckDBInstance.create(':memory:');
      this.connection = await instance.connect();
    }
    return this.connection;
  }

  async load(path: string): Promise<CatalogRecord[]> {
    if (!existsSync(path)) {
      logger.info('Catalog file not found, starting empty', { path });
      return [];
    }

    const connection = await this.connect();

    const described = await connection.runAndReadAll(
      `DESCRIBE SELECT * FROM read_parquet(${sqlString(path)})`
    );
    const present = new Set(
      described.getRowObjects().map(row => text(row.column_name) ?? '')
    );
    const missing = CATALOG_COLUMNS.filter(column => !present.has(column));
    if (missing.length > 0) {
      throw new SchemaMismatchError(
        `Catalog ${path} is missing columns: ${missing.join(', ')}`,
        missing,
        missing.map(column => ({ row: -1, path: column, message: `Missing column "${column}"` }))
      );
    }

    const reader = await connection.runAndReadAll(buildSelectStatement(path));
    const rows = reader.getRowObjects().map(row => decodeStoredRow(row));
    const records = parseCatalogTable(rows);

    logger.info('Loaded catalog', { path, items: records.length });
    return records;
  }

  async save(path: string, items: readonly CatalogRecord[]): Promise<void> {
    const connection = await this.connect();
    await mkdir(dirname(path), { recursive: true });

    const stagingDir = await mkdtemp(join(tmpdir(), 'ice-catalog-'));
    try {
      let stagedPath: string | null = null;
      if (items.length > 0) {
        stagedPath = join(stagingDir, 'rows.ndjson');
        const lines = items.map(item => JSON.stringify(toStagedRow(item)));
        await writeFile(stagedPath, `${lines.join('\n')}\n`, 'utf-8');
      }

      await connection.runAndReadAll(buildCopyStatement(stagedPath, path));
      logger.info('Saved catalog', { path, items: items.length });
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }
}

/**
 * Catalog Table Schema
 *
 * Zod schemas for a catalog row and the validation entry point every table
 * read from storage goes through before the core sees it.
 *
 * Columns: id, type, stac_version, datetime, geometry, bbox, assets, links.
 * A missing column or a malformed value raises SchemaMismatchError; nothing
 * is repaired.
 */

import { z } from 'zod';
import {
  CATALOG_COLUMNS,
  ITEM_TYPE,
  STAC_VERSION,
} from '../core/constants.js';
import { SchemaMismatchError, type SchemaIssue } from '../core/errors.js';
import type { CatalogRecord } from '../core/types.js';
import { boundsOf } from './envelope.js';

// ============================================================================
// Schemas
// ============================================================================

const positionSchema = z.array(z.number()).min(2);

export const polygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(positionSchema).min(4)).min(1),
});

export const bboxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const assetSchema = z.object({
  href: z.string().min(1),
  type: z.string(),
  roles: z.array(z.string()),
});

export const linkSchema = z
  .object({
    rel: z.string(),
    href: z.string(),
    type: z.string(),
    'asset:keys': z.array(z.string()).nullish(),
  })
  .transform(({ 'asset:keys': assetKeys, ...link }) =>
    assetKeys ? { ...link, 'asset:keys': assetKeys } : link
  );

/**
 * Timestamps arrive as ISO strings or Date objects depending on the reader
 */
const datetimeSchema = z
  .union([z.string(), z.date()])
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid datetime: ${String(value)}` });
      return z.NEVER;
    }
    return date.toISOString();
  });

export const catalogRecordSchema = z
  .object({
    id: z.string().min(1),
    type: z.literal(ITEM_TYPE),
    stac_version: z.literal(STAC_VERSION),
    datetime: datetimeSchema,
    geometry: polygonSchema,
    bbox: bboxSchema,
    assets: z.record(z.string(), assetSchema.nullable()).nullable(),
    links: z.array(linkSchema).nullable(),
  })
  .superRefine((row, ctx) => {
    const expected = boundsOf(row.geometry);
    if (expected.some((value, i) => value !== row.bbox[i])) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bbox'],
        message: `bbox [${row.bbox.join(', ')}] does not match geometry bounds [${expected.join(', ')}]`,
      });
    }
  });

// ============================================================================
// Validation
// ============================================================================

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw table and return typed records
 *
 * Column presence is checked across the whole table first, so a table
 * missing `links` fails with `missingColumns: ['links']` rather than one
 * issue per row.
 *
 * @throws {SchemaMismatchError}
 */
export function parseCatalogTable(rows: readonly unknown[]): CatalogRecord[] {
  const missing = new Set<string>();
  const issues: SchemaIssue[] = [];

  rows.forEach((row, index) => {
    if (!isRow(row)) {
      issues.push({ row: index, path: '', message: 'Row is not an object' });
      return;
    }
    for (const column of CATALOG_COLUMNS) {
      if (!(column in row)) {
        if (!missing.has(column)) {
          issues.push({ row: index, path: column, message: `Missing column "${column}"` });
        }
        missing.add(column);
      }
    }
  });

  if (missing.size > 0 || issues.length > 0) {
    const missingColumns = CATALOG_COLUMNS.filter(c => missing.has(c));
    throw new SchemaMismatchError(
      missingColumns.length > 0
        ? `Catalog table is missing columns: ${missingColumns.join(', ')}`
        : `Catalog table has ${issues.length} malformed rows`,
      missingColumns,
      issues
    );
  }

  const records: CatalogRecord[] = [];
  rows.forEach((row, index) => {
    const result = catalogRecordSchema.safeParse(row);
    if (result.success) {
      records.push(result.data);
      return;
    }
    for (const issue of result.error.issues) {
      issues.push({ row: index, path: issue.path.join('.'), message: issue.message });
    }
  });

  if (issues.length > 0) {
    const first = issues[0];
    throw new SchemaMismatchError(
      `Catalog table failed validation (${issues.length} issues, first at row ${first.row} "${first.path}": ${first.message})`,
      [],
      issues
    );
  }

  return records;
}

/**
 * Per-Day Merge Engine
 *
 * Collapses a grouped catalog accumulated across repeated runs (several
 * records per day id) into exactly one canonical record per id.
 *
 * ALGORITHM (per id partition):
 * 1. geometry = envelope of every member geometry
 * 2. assets = member assets flattened in member order, nulls dropped,
 *    re-keyed to asset_0..asset_{n-1}
 * 3. links = member links flattened in member order, deduplicated by
 *    (rel, href), first occurrence kept
 * 4. datetime = first member's datetime
 *
 * Assets are NOT deduplicated by href. The same file registered by two
 * runs appears twice after merge. Only links are deduplicated.
 *
 * INVARIANT: mergeItems(mergeItems(X)) deep-equals mergeItems(X).
 */

import { DatetimeConflictError } from '../core/errors.js';
import { logger } from '../core/utils/logger.js';
import type {
  CatalogItem,
  CatalogRecord,
  StacAsset,
  StacLink,
} from '../core/types.js';
import { envelopeOf } from './envelope.js';
import { buildItem, rekeyAssets } from './item-synthesizer.js';
import { parseCatalogTable } from './schema.js';

/**
 * What to do with a partition whose members disagree on datetime
 */
export type DatetimeConflictPolicy = 'warn' | 'error';

export interface MergeOptions {
  /** Default: 'warn' (log and keep the first datetime) */
  readonly onDatetimeConflict?: DatetimeConflictPolicy;
}

/**
 * Records sharing one id, in first-seen order
 */
export interface Partition<T> {
  readonly key: string;
  readonly members: readonly T[];
}

/**
 * Stable partition by key
 *
 * Partitions come out sorted by key (UTF-16 code unit order); members keep
 * their input order. Every input appears in exactly one partition.
 */
export function partitionBy<T>(
  records: readonly T[],
  keyOf: (record: T) => string
): Partition<T>[] {
  const groups = new Map<string, T[]>();

  for (const record of records) {
    const key = keyOf(record);
    const members = groups.get(key);
    if (members) {
      members.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  return [...groups.keys()]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map(key => ({ key, members: groups.get(key) ?? [] }));
}

/**
 * Non-null assets of every member, in member order then map order
 */
function flattenAssets(members: readonly CatalogRecord[]): StacAsset[] {
  const flattened: StacAsset[] = [];
  for (const member of members) {
    if (!member.assets) continue;
    for (const asset of Object.values(member.assets)) {
      if (asset) {
        flattened.push(asset);
      }
    }
  }
  return flattened;
}

/**
 * Member links flattened, first occurrence of each (rel, href) kept
 */
export function dedupeLinks(links: readonly StacLink[]): StacLink[] {
  const seen = new Set<string>();
  const unique: StacLink[] = [];

  for (const link of links) {
    // JSON tuple keeps ("a|b", "c") and ("a", "b|c") apart
    const key = JSON.stringify([link.rel, link.href]);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(link);
  }

  return unique;
}

function resolveDatetime(
  partition: Partition<CatalogRecord>,
  policy: DatetimeConflictPolicy
): string {
  const first = partition.members[0].datetime;
  const distinct = [...new Set(partition.members.map(m => m.datetime))];

  if (distinct.length > 1) {
    if (policy === 'error') {
      throw new DatetimeConflictError(partition.key, distinct);
    }
    logger.warn('Merged records disagree on datetime, keeping the first', {
      id: partition.key,
      kept: first,
      datetimes: distinct,
    });
  }

  return first;
}

function mergePartition(
  partition: Partition<CatalogRecord>,
  policy: DatetimeConflictPolicy
): CatalogItem {
  const { key, members } = partition;

  const datetime = resolveDatetime(partition, policy);
  const geometry = envelopeOf(members.map(m => m.geometry));
  const assets = rekeyAssets(flattenAssets(members));
  const links = dedupeLinks(members.flatMap(m => m.links ?? []));

  return buildItem(key, datetime, geometry, assets, links);
}

/**
 * Merge records sharing an id into one canonical item per id
 *
 * An empty catalog merges to an empty catalog.
 *
 * @throws {DatetimeConflictError} When a partition's datetimes disagree and
 *   `onDatetimeConflict` is 'error'. Nothing is returned in that case.
 */
export function mergeItems(
  records: readonly CatalogRecord[],
  options: MergeOptions = {}
): CatalogItem[] {
  const policy = options.onDatetimeConflict ?? 'warn';
  return partitionBy(records, r => r.id).map(p => mergePartition(p, policy));
}

/**
 * Validate a raw table against the catalog schema, then merge it
 *
 * @throws {SchemaMismatchError} If a column is missing or malformed
 */
export function mergeTable(
  rows: readonly unknown[],
  options: MergeOptions = {}
): CatalogItem[] {
  return mergeItems(parseCatalogTable(rows), options);
}

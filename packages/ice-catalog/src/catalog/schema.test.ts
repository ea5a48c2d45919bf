import { describe, it, expect } from 'vitest';
import { parseCatalogTable } from './schema.js';
import { SchemaMismatchError } from '../core/errors.js';
import { fgbAsset, record, square } from '../__tests__/fixtures.js';

const DAY_1 = '2024-01-01T00:00:00.000Z';

function schemaError(rows: readonly unknown[]): SchemaMismatchError {
  try {
    parseCatalogTable(rows);
  } catch (error) {
    if (error instanceof SchemaMismatchError) {
      return error;
    }
    throw error;
  }
  throw new Error('parseCatalogTable accepted the table');
}

describe('parseCatalogTable', () => {
  it('accepts well-formed rows', () => {
    const row = record('daily_2024-01-01', DAY_1, square(0, 0, 2), { asset_0: fgbAsset('a.fgb') }, [
      { rel: 'style', href: 'https://styles.test/ice', type: 'text/vector-styles', 'asset:keys': ['asset_0'] },
    ]);

    expect(parseCatalogTable([row])).toEqual([row]);
  });

  it('normalizes Date datetimes to ISO strings', () => {
    const row = { ...record('x', DAY_1, square(0, 0, 1), {}), datetime: new Date(Date.UTC(2024, 0, 1)) };

    expect(parseCatalogTable([row])[0].datetime).toBe(DAY_1);
  });

  it('drops null asset:keys from links', () => {
    const row = record('x', DAY_1, square(0, 0, 1), {}, []);
    const stored = {
      ...row,
      links: [{ rel: 'self', href: 'https://catalog.test/x', type: 'application/json', 'asset:keys': null }],
    };

    const [parsed] = parseCatalogTable([stored]);

    expect(parsed.links).toEqual([{ rel: 'self', href: 'https://catalog.test/x', type: 'application/json' }]);
    expect(parsed.links?.[0]).not.toHaveProperty('asset:keys');
  });

  it('keeps null assets entries and null nested columns', () => {
    const row = record('x', DAY_1, square(0, 0, 1), { asset_0: null }, null);

    const [parsed] = parseCatalogTable([row]);

    expect(parsed.assets).toEqual({ asset_0: null });
    expect(parsed.links).toBeNull();
  });

  it('lists every missing column in table order', () => {
    const { links: _links, bbox: _bbox, ...partial } = record('x', DAY_1, square(0, 0, 1), {});

    const error = schemaError([partial]);

    expect(error.missingColumns).toEqual(['bbox', 'links']);
    expect(error.message).toBe('Catalog table is missing columns: bbox, links');
  });

  it('rejects rows that are not objects', () => {
    const error = schemaError([null]);

    expect(error.missingColumns).toEqual([]);
    expect(error.issues).toEqual([{ row: 0, path: '', message: 'Row is not an object' }]);
  });

  it('rejects a bbox that does not match the geometry', () => {
    const row = { ...record('x', DAY_1, square(0, 0, 1), {}), bbox: [0, 0, 2, 2] };

    const error = schemaError([row]);

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].path).toBe('bbox');
    expect(error.issues[0].message).toBe('bbox [0, 0, 2, 2] does not match geometry bounds [0, 0, 1, 1]');
  });

  it('reports the row and path of malformed values', () => {
    const good = record('a', DAY_1, square(0, 0, 1), {});
    const bad = { ...record('b', DAY_1, square(0, 0, 1), {}), stac_version: '0.9.0' };

    const error = schemaError([good, bad]);

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].row).toBe(1);
    expect(error.issues[0].path).toBe('stac_version');
    expect(error.message.startsWith('Catalog table failed validation (1 issues, first at row 1 "stac_version"')).toBe(true);
  });

  it('accepts an empty table', () => {
    expect(parseCatalogTable([])).toEqual([]);
  });
});

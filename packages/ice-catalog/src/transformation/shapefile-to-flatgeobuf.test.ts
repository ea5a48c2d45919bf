import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { deserialize } from 'flatgeobuf/lib/mjs/geojson.js';
import type { Geometry, Position } from 'geojson';
import { convertShapefileToFlatGeobuf, isProjectedWkt } from './shapefile-to-flatgeobuf.js';

const GEOGRAPHIC_PRJ =
    'GEOGCS["GCS_WGS_1984",DATUM["D_WGS_1984",SPHEROID["WGS_1984",6378137.0,298.257223563]],' +
    'PRIMEM["Greenwich",0.0],UNIT["Degree",0.0174532925199433]]';

const UTM_33N_PRJ =
    'PROJCS["WGS_1984_UTM_Zone_33N",' + GEOGRAPHIC_PRJ + ',PROJECTION["Transverse_Mercator"],' +
    'PARAMETER["False_Easting",500000.0],PARAMETER["False_Northing",0.0],' +
    'PARAMETER["Central_Meridian",15.0],PARAMETER["Scale_Factor",0.9996],' +
    'PARAMETER["Latitude_Of_Origin",0.0],UNIT["Meter",1.0]]';

const SHAPE_TYPE_POLYGON = 5;

/**
 * Single-record polygon .shp: 100-byte header, then one record with one part
 */
function polygonShp(ring: Position[]): Buffer {
    const xs = ring.map(p => p[0]);
    const ys = ring.map(p => p[1]);
    const bounds = [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)];

    const contentLength = 4 + 32 + 4 + 4 + 4 + 16 * ring.length;
    const buffer = Buffer.alloc(100 + 8 + contentLength);

    buffer.writeInt32BE(9994, 0);
    buffer.writeInt32BE(buffer.length / 2, 24);
    buffer.writeInt32LE(1000, 28);
    buffer.writeInt32LE(SHAPE_TYPE_POLYGON, 32);
    bounds.forEach((value, i) => buffer.writeDoubleLE(value, 36 + 8 * i));

    buffer.writeInt32BE(1, 100);
    buffer.writeInt32BE(contentLength / 2, 104);

    let offset = 108;
    buffer.writeInt32LE(SHAPE_TYPE_POLYGON, offset);
    bounds.forEach((value, i) => buffer.writeDoubleLE(value, offset + 4 + 8 * i));
    offset += 36;
    buffer.writeInt32LE(1, offset);
    buffer.writeInt32LE(ring.length, offset + 4);
    buffer.writeInt32LE(0, offset + 8);
    offset += 12;
    for (const [x, y] of ring) {
        buffer.writeDoubleLE(x, offset);
        buffer.writeDoubleLE(y, offset + 8);
        offset += 16;
    }
    return buffer;
}

function outerRing(geometry: Geometry | undefined): Position[] {
    if (geometry?.type !== 'Polygon') {
        throw new Error(`Expected a Polygon, got ${geometry?.type}`);
    }
    return geometry.coordinates[0];
}

async function readFlatGeobufGeometries(path: string): Promise<unknown[]> {
    const result = deserialize(new Uint8Array(await readFile(path)));
    if (!('features' in result)) {
        throw new Error('Expected a feature collection');
    }
    return result.features.map(feature => feature.geometry);
}

describe('isProjectedWkt', () => {
    it('recognizes WKT1 and WKT2 projected CRSs', () => {
        expect(isProjectedWkt('PROJCS["WGS_1984_UTM_Zone_24N",GEOGCS["GCS_WGS_1984"]]')).toBe(true);
        expect(isProjectedWkt('  PROJCRS["WGS 84 / UTM zone 24N",BASEGEOGCRS["WGS 84"]]')).toBe(true);
    });

    it('treats geographic CRSs as already lon/lat', () => {
        expect(isProjectedWkt('GEOGCS["GCS_WGS_1984",DATUM["D_WGS_1984"]]')).toBe(false);
    });
});

describe('convertShapefileToFlatGeobuf', () => {
    it('returns null when there is no .shp file', async () => {
        const missing = join(tmpdir(), 'ice-catalog-missing', 'nothing.shp');

        await expect(convertShapefileToFlatGeobuf(missing, join(tmpdir(), 'nothing.fgb'))).resolves.toBeNull();
    });
});

describe('convertShapefileToFlatGeobuf with a polygon shapefile', () => {
    // Clockwise, as shapefile outer rings are stored
    const LON_LAT_RING: Position[] = [[-20.5, 60.25], [-20.5, 61.75], [-18.125, 61.75], [-18.125, 60.25], [-20.5, 60.25]];
    const UTM_RING: Position[] = [[500000, 0], [500000, 100000], [600000, 100000], [600000, 0], [500000, 0]];

    let dir: string | undefined;

    afterEach(async () => {
        vi.restoreAllMocks();
        if (dir) {
            await rm(dir, { recursive: true, force: true });
            dir = undefined;
        }
    });

    async function writeShapefile(ring: Position[], prj: string): Promise<string> {
        dir = await mkdtemp(join(tmpdir(), 'ice-catalog-shp-'));
        const shpPath = join(dir, 'ice.shp');
        await writeFile(shpPath, polygonShp(ring));
        await writeFile(join(dir, 'ice.prj'), prj);
        return shpPath;
    }

    it('keeps geographic coordinates as they are', async () => {
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
        const shpPath = await writeShapefile(LON_LAT_RING, GEOGRAPHIC_PRJ);
        const outPath = join(dirname(shpPath), 'out', 'ice.fgb');

        const result = await convertShapefileToFlatGeobuf(shpPath, outPath);

        expect(result).toEqual({
            featureCount: 1,
            geometries: [{ type: 'Polygon', coordinates: [LON_LAT_RING] }],
            reprojected: false,
        });
        expect(await readFlatGeobufGeometries(outPath)).toEqual([{ type: 'Polygon', coordinates: [LON_LAT_RING] }]);
    });

    it('reprojects a projected CRS to WGS84', async () => {
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
        const shpPath = await writeShapefile(UTM_RING, UTM_33N_PRJ);
        const outPath = join(dirname(shpPath), 'ice.fgb');

        const result = await convertShapefileToFlatGeobuf(shpPath, outPath);

        expect(result?.featureCount).toBe(1);
        expect(result?.reprojected).toBe(true);

        const ring = outerRing(result?.geometries[0]);
        expect(ring).toHaveLength(5);
        // Central meridian and equator map exactly
        expect(ring[0][0]).toBeCloseTo(15, 6);
        expect(ring[0][1]).toBeCloseTo(0, 6);
        expect(ring[1][0]).toBeCloseTo(15, 6);
        expect(ring[1][1]).toBeGreaterThan(0.85);
        expect(ring[1][1]).toBeLessThan(0.95);
        expect(ring[2][0]).toBeGreaterThan(15.85);
        expect(ring[2][0]).toBeLessThan(15.95);
        expect(ring[3][1]).toBeCloseTo(0, 6);
        expect(ring[4]).toEqual(ring[0]);

        expect(await readFlatGeobufGeometries(outPath)).toEqual(result?.geometries);
    });
});

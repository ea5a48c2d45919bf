import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as turf from '@turf/turf';
import { serialize } from 'flatgeobuf/lib/mjs/geojson.js';
import type { Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';
import proj4 from 'proj4';
import * as shapefile from 'shapefile';
import { ConversionError } from '../core/errors.js';
import { logger } from '../core/utils/logger.js';

/** EPSG code written into the FlatGeobuf header */
const WGS84_EPSG = 4326;

export interface ConversionResult {
    readonly featureCount: number;
    /** Non-null feature geometries, WGS84 */
    readonly geometries: readonly Geometry[];
    /** True when the .prj declared a projected CRS and coordinates were transformed */
    readonly reprojected: boolean;
}

function siblingPath(shpPath: string, extension: string): string {
    return shpPath.replace(/\.shp$/i, extension);
}

async function readOptionalText(path: string): Promise<string | null> {
    if (!existsSync(path)) {
        return null;
    }
    return (await readFile(path, 'utf-8')).trim();
}

/**
 * WKT1 `PROJCS[...]` or WKT2 `PROJCRS[...]`; geographic CRSs are taken as lon/lat already
 */
export function isProjectedWkt(wkt: string): boolean {
    return /^\s*PROJ(CS|CRS)\[/i.test(wkt);
}

/**
 * Transform every coordinate of `features` from `sourceWkt` to WGS84 in place
 */
function reprojectToWgs84(features: Feature<Geometry, GeoJsonProperties>[], sourceWkt: string): void {
    const converter = proj4(sourceWkt, 'EPSG:4326');
    for (const feature of features) {
        turf.coordEach(feature, coord => {
            const [x, y] = converter.forward([coord[0], coord[1]]);
            coord[0] = x;
            coord[1] = y;
        });
    }
}

async function readFeatures(
    shpPath: string,
    encoding: string | null
): Promise<Feature<Geometry, GeoJsonProperties>[]> {
    const dbfPath = siblingPath(shpPath, '.dbf');
    const source = await shapefile.open(
        shpPath,
        existsSync(dbfPath) ? dbfPath : undefined,
        encoding ? { encoding } : undefined
    );

    const features: Feature<Geometry, GeoJsonProperties>[] = [];
    let result = await source.read();
    while (!result.done) {
        if (result.value) {
            features.push(result.value);
        }
        result = await source.read();
    }
    return features;
}

/**
 * Convert a shapefile to FlatGeobuf
 *
 * Reads `<name>.shp` with its `.dbf`, honours the `.cpg` attribute encoding,
 * reprojects to WGS84 when the `.prj` declares a projected CRS, and writes
 * the features to `outPath`.
 *
 * @returns null when `shpPath` does not exist
 * @throws {ConversionError} If the shapefile cannot be read or written
 */
export async function convertShapefileToFlatGeobuf(
    shpPath: string,
    outPath: string
): Promise<ConversionResult | null> {
    if (!existsSync(shpPath)) {
        logger.warn('No .shp file found', { shpPath });
        return null;
    }

    try {
        const encoding = await readOptionalText(siblingPath(shpPath, '.cpg'));
        const prj = await readOptionalText(siblingPath(shpPath, '.prj'));
        const features = await readFeatures(shpPath, encoding);

        const reprojected = prj !== null && isProjectedWkt(prj);
        if (reprojected) {
            reprojectToWgs84(features, prj);
        }

        const collection: FeatureCollection<Geometry, GeoJsonProperties> = {
            type: 'FeatureCollection',
            features,
        };

        await mkdir(dirname(outPath), { recursive: true });
        await writeFile(outPath, serialize(collection, WGS84_EPSG));

        const geometries = features
            .map(feature => feature.geometry)
            .filter((geometry): geometry is Geometry => geometry !== null);

        logger.info('Converted shapefile to FlatGeobuf', {
            shpPath,
            outPath,
            featureCount: features.length,
            reprojected,
        });

        return { featureCount: features.length, geometries, reprojected };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConversionError(`Failed to convert ${shpPath}: ${message}`, shpPath);
    }
}

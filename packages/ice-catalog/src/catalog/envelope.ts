/**
 * Geometry Envelope Utility
 *
 * Reduces a collection of geometries to the bounding rectangle of their union.
 *
 * ORDER MATTERS: the geometries are unioned first and the union is then
 * enveloped. Taking the envelope of every input and unioning the envelopes
 * gives the same four numbers but a different geometry, and downstream
 * geometry equality checks compare the union-then-envelope form.
 */

import * as turf from '@turf/turf';
import type {
  Feature,
  Geometry,
  MultiPolygon,
  Polygon,
} from 'geojson';
import { InvalidInputError } from '../core/errors.js';
import type { BBox } from '../core/types.js';

type Polygonal = Polygon | MultiPolygon;

function isPolygonal(geometry: Geometry): geometry is Polygonal {
  return geometry.type === 'Polygon' || geometry.type === 'MultiPolygon';
}

/**
 * Union every polygonal geometry into one feature
 *
 * turf.union needs at least two inputs, so a lone polygon is returned as-is.
 */
function unionPolygons(polygons: readonly Polygonal[]): Feature<Polygonal> | null {
  if (polygons.length === 0) {
    return null;
  }
  if (polygons.length === 1) {
    return turf.feature(polygons[0]);
  }
  return turf.union(turf.featureCollection(polygons.map(p => turf.feature(p))));
}

/**
 * Smallest axis-aligned rectangle containing the union of `geometries`
 *
 * Points and lines cannot take part in a polygon union; they are enveloped
 * together with the union of the polygonal members, which covers the same
 * extent.
 *
 * @throws {InvalidInputError} If `geometries` is empty
 *
 * @example
 * ```typescript
 * const rect = envelopeOf([squareA, squareB]);
 * boundsOf(rect); // [0, 0, 3, 3]
 * ```
 */
export function envelopeOf(geometries: readonly Geometry[]): Polygon {
  if (geometries.length === 0) {
    throw new InvalidInputError('Cannot compute an envelope of zero geometries');
  }

  const polygons = geometries.filter(isPolygonal);
  const others = geometries.filter(g => !isPolygonal(g));

  const members: Feature<Geometry>[] = others.map(g => turf.feature(g));
  const union = unionPolygons(polygons);
  if (union) {
    members.unshift(union);
  }

  if (members.length === 0) {
    // Polygons that union to nothing (every ring empty)
    throw new InvalidInputError('Geometries have no extent to envelope');
  }

  return turf.envelope(turf.featureCollection(members)).geometry;
}

/**
 * `[minX, minY, maxX, maxY]` of a geometry
 */
export function boundsOf(geometry: Geometry): BBox {
  const [minX, minY, maxX, maxY] = turf.bbox(geometry);
  return [minX, minY, maxX, maxY];
}

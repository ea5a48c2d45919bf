import { describe, it, expect } from 'vitest';
import type { LineString, Point } from 'geojson';
import { boundsOf, envelopeOf } from './envelope.js';
import { InvalidInputError } from '../core/errors.js';
import { square } from '../__tests__/fixtures.js';

describe('envelopeOf', () => {
  it('envelopes the union of overlapping polygons', () => {
    const envelope = envelopeOf([square(0, 0, 2), square(1, 1, 2)]);

    expect(envelope).toEqual({
      type: 'Polygon',
      coordinates: [[[0, 0], [3, 0], [3, 3], [0, 3], [0, 0]]],
    });
  });

  it('spans disjoint polygons', () => {
    const envelope = envelopeOf([square(0, 0, 1), square(5, 5, 1)]);

    expect(envelope.coordinates).toEqual([[[0, 0], [6, 0], [6, 6], [0, 6], [0, 0]]]);
  });

  it('turns a single non-rectangular polygon into its bounding rectangle', () => {
    const envelope = envelopeOf([
      { type: 'Polygon', coordinates: [[[0, 0], [4, 0], [0, 2], [0, 0]]] },
    ]);

    expect(envelope.coordinates).toEqual([[[0, 0], [4, 0], [4, 2], [0, 2], [0, 0]]]);
  });

  it('does not depend on input order', () => {
    const a = square(0, 0, 2);
    const b = square(1, 1, 2);

    expect(envelopeOf([b, a])).toEqual(envelopeOf([a, b]));
  });

  it('includes points and lines alongside polygons', () => {
    const point: Point = { type: 'Point', coordinates: [10, -1] };
    const line: LineString = { type: 'LineString', coordinates: [[-2, 1], [-1, 1]] };

    const envelope = envelopeOf([square(0, 0, 2), point, line]);

    expect(envelope.coordinates).toEqual([[[-2, -1], [10, -1], [10, 2], [-2, 2], [-2, -1]]]);
  });

  it('is stable when applied to its own output', () => {
    const once = envelopeOf([square(0, 0, 2), square(1, 1, 2)]);

    expect(envelopeOf([once])).toEqual(once);
  });

  it('rejects an empty collection', () => {
    expect(() => envelopeOf([])).toThrow(InvalidInputError);
    expect(() => envelopeOf([])).toThrow('Cannot compute an envelope of zero geometries');
  });
});

describe('boundsOf', () => {
  it('returns [minX, minY, maxX, maxY]', () => {
    expect(boundsOf(square(-3, 2, 4))).toEqual([-3, 2, 1, 6]);
  });
});

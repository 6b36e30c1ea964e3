import { describe, it, expect, beforeEach } from 'vitest';
import { coordinate, directionVector, relativeOffset } from '../geometry/coordinate';
import {
  coordinatesWithinPolygon,
  distanceBetween,
  lineIntersectsLine,
  lineIntersectsPolygon,
  splitLineWithLine,
} from '../geometry/intersect';
import { SpatialIndex, computeBbox } from '../geometry/SpatialIndex';

const square = [
  coordinate(0, 0),
  coordinate(0, 10),
  coordinate(10, 10),
  coordinate(10, 0),
  coordinate(0, 0),
];

describe('coordinates', () => {
  it('should compute direction vectors from the first to the second point', () => {
    expect(directionVector(coordinate(1, 2), coordinate(4, 0))).toEqual({ x: 3, y: -2 });
  });

  it('should reject relative offsets outside the unit box', () => {
    expect(() => relativeOffset(1.5, 0)).toThrow(RangeError);
    expect(() => relativeOffset(0, -0.1)).toThrow(RangeError);
    expect(relativeOffset(0.5, 1)).toEqual({ x: 0.5, y: 1 });
  });

  it('should compute euclidean distances', () => {
    expect(distanceBetween(coordinate(0, 0), coordinate(3, 4))).toBe(5);
  });
});

describe('lineIntersectsLine', () => {
  it('should detect crossing lines', () => {
    const horizontal = [coordinate(0, 10), coordinate(10, 10)];
    const vertical = [coordinate(5, 0), coordinate(5, 20)];
    expect(lineIntersectsLine(horizontal, vertical)).toBe(true);
  });

  it('should detect a crossing in a later segment of a polyline', () => {
    const polyline = [coordinate(0, 0), coordinate(2, 0), coordinate(2, 8), coordinate(8, 8)];
    const vertical = [coordinate(5, 5), coordinate(5, 10)];
    expect(lineIntersectsLine(polyline, vertical)).toBe(true);
  });

  it('should not report disjoint lines', () => {
    const first = [coordinate(0, 0), coordinate(10, 0)];
    const second = [coordinate(0, 5), coordinate(10, 5)];
    expect(lineIntersectsLine(first, second)).toBe(false);
  });

  it('should not report lines that would only cross when extended', () => {
    const first = [coordinate(0, 5), coordinate(4, 5)];
    const second = [coordinate(5, 0), coordinate(5, 10)];
    expect(lineIntersectsLine(first, second)).toBe(false);
  });
});

describe('lineIntersectsPolygon', () => {
  it('should detect a line crossing the boundary', () => {
    expect(lineIntersectsPolygon([coordinate(-5, 5), coordinate(5, 5)], square)).toBe(true);
  });

  it('should detect a line lying completely inside', () => {
    expect(lineIntersectsPolygon([coordinate(2, 2), coordinate(8, 8)], square)).toBe(true);
  });

  it('should not report a line outside', () => {
    expect(lineIntersectsPolygon([coordinate(20, 0), coordinate(20, 10)], square)).toBe(false);
  });
});

describe('coordinatesWithinPolygon', () => {
  it('should return one flag per point', () => {
    const points = [coordinate(5, 5), coordinate(15, 5), coordinate(1, 9), coordinate(-1, 5)];
    expect(coordinatesWithinPolygon(points, square)).toEqual([true, false, true, false]);
  });

  it('should treat points on the boundary as inside', () => {
    expect(coordinatesWithinPolygon([coordinate(0, 5), coordinate(10, 10)], square)).toEqual([true, true]);
  });
});

describe('splitLineWithLine', () => {
  const vertical = [coordinate(5, 0), coordinate(5, 10)];

  it('should return null when the lines do not meet', () => {
    const subject = [coordinate(0, 20), coordinate(10, 20)];
    expect(splitLineWithLine(subject, vertical)).toBeNull();
  });

  it('should insert the crossing point into both parts', () => {
    const subject = [coordinate(0, 5), coordinate(10, 5)];
    const parts = splitLineWithLine(subject, vertical);
    expect(parts).not.toBeNull();
    expect(parts).toHaveLength(2);
    expect(parts?.[0]).toHaveLength(2);
    expect(parts?.[1]).toHaveLength(2);
    expect(parts?.[0][0]).toEqual({ x: 0, y: 5 });
    expect(parts?.[0][1].x).toBeCloseTo(5, 9);
    expect(parts?.[0][1].y).toBeCloseTo(5, 9);
    expect(parts?.[1][1]).toEqual({ x: 10, y: 5 });
  });

  it('should keep the subject order over several crossings', () => {
    const subject = [coordinate(0, 2), coordinate(10, 2), coordinate(10, 4), coordinate(0, 4)];
    const parts = splitLineWithLine(subject, vertical);
    expect(parts).toHaveLength(3);
    expect(parts?.map(part => part.length)).toEqual([2, 4, 2]);
    expect(parts?.[1][1]).toEqual({ x: 10, y: 2 });
    expect(parts?.[1][2]).toEqual({ x: 10, y: 4 });
    expect(parts?.[2][1]).toEqual({ x: 0, y: 4 });
  });
});

describe('SpatialIndex', () => {
  let spatialIndex: SpatialIndex;

  beforeEach(() => {
    spatialIndex = new SpatialIndex();
  });

  it('should compute bounding box correctly', () => {
    const bbox = computeBbox([coordinate(10, 5), coordinate(0, 0), coordinate(4, 9)]);
    expect(bbox).toEqual({ minX: 0, minY: 0, maxX: 10, maxY: 9 });
  });

  it('should find loaded items touching the search box', () => {
    spatialIndex.load([
      { id: 'N', bbox: { minX: 5, minY: 0, maxX: 5, maxY: 10 } },
      { id: 'far', bbox: { minX: 50, minY: 50, maxX: 60, maxY: 60 } },
    ]);
    expect(spatialIndex.search({ minX: 0, minY: 5, maxX: 10, maxY: 5 })).toEqual(new Set(['N']));
    expect(spatialIndex.search({ minX: 6, minY: 5, maxX: 7, maxY: 6 }).size).toBe(0);
  });

  it('should replace previously loaded items', () => {
    spatialIndex.load([{ id: 'a', bbox: { minX: 0, minY: 0, maxX: 1, maxY: 1 } }]);
    spatialIndex.load([{ id: 'b', bbox: { minX: 2, minY: 2, maxX: 3, maxY: 3 } }]);

    expect(spatialIndex.search({ minX: 0, minY: 0, maxX: 5, maxY: 5 })).toEqual(new Set(['b']));
  });
});

import { lineString, point, polygon } from '@turf/helpers';
import booleanPointInPolygon from '@turf/boolean-point-in-polygon';
import { booleanIntersects } from '@turf/boolean-intersects';
import { lineIntersect } from '@turf/line-intersect';
import type { Coordinate, Line, Polygon } from './types';
import { coordinate, distance } from './coordinate';

// Split parameters closer than this to a segment end are treated as the vertex
const VERTEX_EPSILON = 1e-9;

type Position = [number, number];

function toPositions(coordinates: readonly Coordinate[]): Position[] {
  return coordinates.map(c => [c.x, c.y]);
}

function toLineString(line: Line) {
  return lineString(toPositions(line));
}

function toPolygon(ring: Polygon) {
  return polygon([toPositions(ring)]);
}

/**
 * Whether two polylines share at least one point. Touching endpoints count.
 * Self-intersections of either line are ignored.
 */
export function lineIntersectsLine(a: Line, b: Line): boolean {
  return booleanIntersects(toLineString(a), toLineString(b), { ignoreSelfIntersections: true });
}

export function lineIntersectsPolygon(line: Line, ring: Polygon): boolean {
  return booleanIntersects(toLineString(line), toPolygon(ring), { ignoreSelfIntersections: true });
}

/** Batched point-in-polygon; points on the boundary are inside. */
export function coordinatesWithinPolygon(points: readonly Coordinate[], ring: Polygon): boolean[] {
  const area = toPolygon(ring);
  return points.map(p => booleanPointInPolygon(point([p.x, p.y]), area, { ignoreBoundary: false }));
}

export function distanceBetween(p1: Coordinate, p2: Coordinate): number {
  return distance(p1, p2);
}

function segmentParameter(start: Coordinate, end: Coordinate, p: Coordinate): number {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSq = dx * dx + dy * dy;
  return ((p.x - start.x) * dx + (p.y - start.y) * dy) / lengthSq;
}

function segmentCrossings(start: Coordinate, end: Coordinate, splitter: Line): Array<{ t: number; at: Coordinate }> {
  if (start.x === end.x && start.y === end.y) return [];

  const hits = lineIntersect(lineString([[start.x, start.y], [end.x, end.y]]), toLineString(splitter));
  const crossings: Array<{ t: number; at: Coordinate }> = [];
  for (const hit of hits.features) {
    const [x, y] = hit.geometry.coordinates;
    const at = coordinate(x, y);
    const t = segmentParameter(start, end, at);
    if (!crossings.some(c => Math.abs(c.t - t) < VERTEX_EPSILON)) {
      crossings.push({ t, at });
    }
  }
  return crossings.sort((a, b) => a.t - b.t);
}

/**
 * Partitions `subject` at every point it shares with `splitter`.
 *
 * A crossing inside a segment is inserted into both neighbouring parts. A
 * crossing at an interior vertex splits there without adding a point.
 * Crossings at the first or last coordinate do not split.
 *
 * @returns the parts in the subject's point order, or `null` if nothing was split
 */
export function splitLineWithLine(subject: Line, splitter: Line): Coordinate[][] | null {
  if (subject.length < 2) return null;

  const parts: Coordinate[][] = [];
  let current: Coordinate[] = [subject[0]];

  for (let i = 0; i < subject.length - 1; i++) {
    const start = subject[i];
    const end = subject[i + 1];

    for (const { t, at } of segmentCrossings(start, end, splitter)) {
      if (t >= 1 - VERTEX_EPSILON) {
        // picked up as t = 0 of the next segment
        continue;
      }
      if (t <= VERTEX_EPSILON) {
        if (i === 0 || current.length < 2) continue;
        parts.push(current);
        current = [start];
        continue;
      }
      current.push(at);
      parts.push(current);
      current = [at];
    }

    current.push(end);
  }

  parts.push(current);
  return parts.length > 1 ? parts : null;
}

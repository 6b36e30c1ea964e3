import type { Coordinate, Line, Polygon } from '../geometry/types';
import type { Event, EventBuilder } from '../domain/event';
import type { Track } from '../domain/track';

/** Geometry operations the strategies depend on */
export interface IntersectImplementation {
  lineIntersectsLine(a: Line, b: Line): boolean;
  lineIntersectsPolygon(line: Line, polygon: Polygon): boolean;
  areCoordinatesWithinPolygon(points: readonly Coordinate[], polygon: Polygon): boolean[];
  splitLineWithLine(subject: Line, splitter: Line): Coordinate[][] | null;
  distanceBetween(a: Coordinate, b: Coordinate): number;
}

/**
 * Turns one track into the events of one section. The builder must be seeded
 * with the section id; the road user type is set inside `intersect`.
 */
export interface Intersector {
  intersect(track: Track, eventBuilder: EventBuilder): Event[];
}

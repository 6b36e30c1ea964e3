import type { Coordinate, DirectionVector, RelativeOffsetCoordinate } from './types';

export function coordinate(x: number, y: number): Coordinate {
  return Object.freeze({ x, y });
}

export function relativeOffset(x: number, y: number): RelativeOffsetCoordinate {
  if (x < 0 || x > 1 || y < 0 || y > 1) {
    throw new RangeError(`Relative offset must lie in [0,1], but is (${x}, ${y})`);
  }
  return Object.freeze({ x, y });
}

export function coordinatesEqual(a: Coordinate, b: Coordinate): boolean {
  return a.x === b.x && a.y === b.y;
}

export function directionVector(from: Coordinate, to: Coordinate): DirectionVector {
  return Object.freeze({ x: to.x - from.x, y: to.y - from.y });
}

export function distance(p1: Coordinate, p2: Coordinate): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/** Top left corner of a bounding box */
export const BBOX_ORIGIN: RelativeOffsetCoordinate = relativeOffset(0, 0);

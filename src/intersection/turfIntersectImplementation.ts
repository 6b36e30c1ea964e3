import {
  coordinatesWithinPolygon,
  distanceBetween,
  lineIntersectsLine,
  lineIntersectsPolygon,
  splitLineWithLine,
} from '../geometry/intersect';
import type { IntersectImplementation } from './types';

export const turfIntersectImplementation: IntersectImplementation = {
  lineIntersectsLine,
  lineIntersectsPolygon,
  areCoordinatesWithinPolygon: coordinatesWithinPolygon,
  splitLineWithLine,
  distanceBetween,
};

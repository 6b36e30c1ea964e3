export { BBOX_ORIGIN, coordinate, relativeOffset, coordinatesEqual, directionVector, distance } from './coordinate';
export {
  lineIntersectsLine,
  lineIntersectsPolygon,
  coordinatesWithinPolygon,
  splitLineWithLine,
  distanceBetween,
} from './intersect';
export { SpatialIndex, computeBbox } from './SpatialIndex';
export type { IndexedItem } from './SpatialIndex';
export type { Coordinate, RelativeOffsetCoordinate, DirectionVector, Line, Polygon, BBox } from './types';

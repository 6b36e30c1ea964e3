export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

/** Fraction of a bounding box, both components in [0, 1] */
export interface RelativeOffsetCoordinate {
  readonly x: number;
  readonly y: number;
}

export interface DirectionVector {
  readonly x: number;
  readonly y: number;
}

/** Open polyline, at least two coordinates */
export type Line = readonly Coordinate[];

/** Closed ring, first coordinate equals the last */
export type Polygon = readonly Coordinate[];

export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

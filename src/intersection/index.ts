export { IntersectBySmallestTrackSegments } from './IntersectBySmallestTrackSegments';
export { IntersectAreaByTrackPoints } from './IntersectAreaByTrackPoints';
export { IntersectBySplittingTrackLine } from './IntersectBySplittingTrackLine';
export { createIntersector } from './createIntersector';
export { SectionIndex } from './SectionIndex';
export { turfIntersectImplementation } from './turfIntersectImplementation';
export type { IntersectImplementation, Intersector } from './types';

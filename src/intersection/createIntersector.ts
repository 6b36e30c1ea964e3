import type { LineStrategy } from '../config';
import type { Section } from '../domain/section';
import { IntersectAreaByTrackPoints } from './IntersectAreaByTrackPoints';
import { IntersectBySmallestTrackSegments } from './IntersectBySmallestTrackSegments';
import { IntersectBySplittingTrackLine } from './IntersectBySplittingTrackLine';
import type { IntersectImplementation, Intersector } from './types';

/** Strategy for a section; cutting sections never produce counting events */
export function createIntersector(
  section: Section,
  implementation: IntersectImplementation,
  lineStrategy: LineStrategy = 'smallest-segments'
): Intersector | null {
  switch (section.type) {
    case 'line':
      return lineStrategy === 'splitting-line'
        ? new IntersectBySplittingTrackLine(implementation, section)
        : new IntersectBySmallestTrackSegments(implementation, section);
    case 'area':
      return new IntersectAreaByTrackPoints(implementation, section);
    case 'cutting':
      return null;
  }
}

import type { LineStrategy } from '../config';
import type { Event } from '../domain/event';
import { SectionActionDetector } from '../eventlist/SectionActionDetector';
import { turfIntersectImplementation } from '../intersection/turfIntersectImplementation';
import { intersectWorkItem } from './intersectWorkItem';
import type { WorkItem } from './types';

// One detector per strategy for the lifetime of the thread
const detectors = new Map<LineStrategy, SectionActionDetector>();

function detectorFor(lineStrategy: LineStrategy): SectionActionDetector {
  let detector = detectors.get(lineStrategy);
  if (!detector) {
    detector = new SectionActionDetector(turfIntersectImplementation, lineStrategy);
    detectors.set(lineStrategy, detector);
  }
  return detector;
}

/** Worker thread entry of {@link WorkerPoolIntersect} */
export default function intersect(item: WorkItem): Event[] {
  return intersectWorkItem(item, detectorFor(item.task.lineStrategy));
}

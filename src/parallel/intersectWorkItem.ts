import type { Event } from '../domain/event';
import type { SectionActionDetector } from '../eventlist/SectionActionDetector';
import { SectionIndex } from '../intersection/SectionIndex';
import type { WorkItem } from './types';

/** Events of the item's track at the sections its bounding box can reach */
export function intersectWorkItem(
  item: WorkItem,
  detector: SectionActionDetector,
  index: SectionIndex = new SectionIndex(item.sections, item.task.spatialIndexMaxEntries)
): Event[] {
  return detector.detectForTrack(index.candidatesFor(item.track, item.sections), item.track);
}

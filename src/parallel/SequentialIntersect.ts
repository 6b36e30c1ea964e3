import type { Event } from '../domain/event';
import type { Section } from '../domain/section';
import type { Track } from '../domain/track';
import { SectionActionDetector } from '../eventlist/SectionActionDetector';
import { SectionIndex } from '../intersection/SectionIndex';
import { turfIntersectImplementation } from '../intersection/turfIntersectImplementation';
import type { IntersectImplementation } from '../intersection/types';
import { flattenEvents } from './flattenEvents';
import { intersectWorkItem } from './intersectWorkItem';
import type { IntersectParallelizationStrategy, IntersectTask } from './types';

/** Runs every work item on the calling thread, one after another */
export class SequentialIntersect implements IntersectParallelizationStrategy {
  readonly numWorkers = 1;

  constructor(private readonly implementation: IntersectImplementation = turfIntersectImplementation) {}

  async execute(task: IntersectTask, tracks: Iterable<Track>, sections: Iterable<Section>): Promise<Event[]> {
    const sectionList: readonly Section[] = [...sections];
    const detector = new SectionActionDetector(this.implementation, task.lineStrategy);
    const index = new SectionIndex(sectionList, task.spatialIndexMaxEntries);

    const results: Event[][] = [];
    for (const track of tracks) {
      results.push(intersectWorkItem({ task, track, sections: sectionList }, detector, index));
    }
    return flattenEvents(results);
  }
}

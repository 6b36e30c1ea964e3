import type { Event } from '../domain/event';
import { EventType } from '../domain/eventType';
import { getOffset } from '../domain/section';
import type { Section } from '../domain/section';
import type { IntersectParallelizationStrategy, IntersectTask } from '../parallel/types';
import type { GetTracks } from './types';

/** Intersects all tracks with the given sections on the parallelization strategy */
export class RunIntersect {
  private readonly task: IntersectTask;

  constructor(
    private readonly parallelizer: IntersectParallelizationStrategy,
    private readonly getTracks: GetTracks,
    task?: Partial<IntersectTask>
  ) {
    this.task = { lineStrategy: 'smallest-segments', spatialIndexMaxEntries: 16, ...task };
  }

  /**
   * Every counting section needs a section enter offset, checked before the
   * spatial prefilter can skip a section no track reaches.
   */
  async run(sections: Iterable<Section>): Promise<Event[]> {
    const counting = [...sections].filter(section => section.type !== 'cutting');
    for (const section of counting) {
      getOffset(section, EventType.SECTION_ENTER);
    }
    return this.parallelizer.execute(this.task, this.getTracks(), counting);
  }
}

import type { LineStrategy } from '../config';
import { SectionEventBuilder } from '../domain/event';
import type { Event } from '../domain/event';
import { EventType } from '../domain/eventType';
import type { Section } from '../domain/section';
import type { Track } from '../domain/track';
import { createIntersector } from '../intersection/createIntersector';
import type { IntersectImplementation } from '../intersection/types';

export class SectionActionDetector {
  constructor(
    private readonly implementation: IntersectImplementation,
    private readonly lineStrategy: LineStrategy = 'smallest-segments',
    private readonly eventBuilder: SectionEventBuilder = new SectionEventBuilder()
  ) {}

  /** Events of one track at one section, in occurrence order */
  detect(section: Section, track: Track): Event[] {
    const intersector = createIntersector(section, this.implementation, this.lineStrategy);
    if (!intersector) return [];

    this.eventBuilder.reset();
    this.eventBuilder.addSectionId(section.id);
    this.eventBuilder.addEventType(EventType.SECTION_ENTER);
    return intersector.intersect(track, this.eventBuilder);
  }

  /** Events of one track at every section, grouped by section in the given order */
  detectForTrack(sections: Iterable<Section>, track: Track): Event[] {
    const events: Event[] = [];
    for (const section of sections) {
      events.push(...this.detect(section, track));
    }
    return events;
  }

  detectEnterActions(sections: Iterable<Section>, tracks: Iterable<Track>): Event[] {
    const trackList = [...tracks];
    const events: Event[] = [];
    for (const section of sections) {
      for (const track of trackList) {
        events.push(...this.detect(section, track));
      }
    }
    return events;
  }
}

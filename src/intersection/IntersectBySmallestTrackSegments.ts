import { directionVector } from '../geometry/coordinate';
import type { Line } from '../geometry/types';
import type { Event, EventBuilder } from '../domain/event';
import { EventType } from '../domain/eventType';
import { getOffset, getSectionCoordinates } from '../domain/section';
import type { LineSection } from '../domain/section';
import { trackCoordinates } from '../domain/track';
import type { Track } from '../domain/track';
import type { IntersectImplementation, Intersector } from './types';

/**
 * Intersects every pair of neighbouring detections with the section line.
 * Each crossing segment yields one event at its later detection, so a track
 * crossing the line N times yields N events.
 */
export class IntersectBySmallestTrackSegments implements Intersector {
  private readonly sectionLine: Line;

  constructor(
    private readonly implementation: IntersectImplementation,
    private readonly lineSection: LineSection
  ) {
    this.sectionLine = getSectionCoordinates(lineSection);
  }

  intersect(track: Track, eventBuilder: EventBuilder): Event[] {
    const events: Event[] = [];
    eventBuilder.addRoadUserType(track.classification);

    const offset = getOffset(this.lineSection, EventType.SECTION_ENTER);
    const points = trackCoordinates(track, offset);
    if (points.length < 2) return events;

    // Fast reject: the whole polyline never touches the section
    if (!this.implementation.lineIntersectsLine(this.sectionLine, points)) {
      return events;
    }

    for (let i = 0; i < points.length - 1; i++) {
      const current = points[i];
      const next = points[i + 1];
      if (!this.implementation.lineIntersectsLine(this.sectionLine, [current, next])) continue;

      eventBuilder.addDirectionVector(directionVector(current, next));
      eventBuilder.addEventCoordinate(next.x, next.y);
      events.push(eventBuilder.createEvent(track.detections[i + 1]));
    }

    return events;
  }
}

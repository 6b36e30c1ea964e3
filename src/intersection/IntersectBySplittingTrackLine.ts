import { directionVector } from '../geometry/coordinate';
import type { Line } from '../geometry/types';
import type { Event, EventBuilder } from '../domain/event';
import { getOffset, getSectionCoordinates } from '../domain/section';
import type { LineSection } from '../domain/section';
import { trackCoordinates } from '../domain/track';
import type { Track } from '../domain/track';
import { IncompleteEventBuilderSetup } from '../errors';
import type { IntersectImplementation, Intersector } from './types';

/**
 * Splits the whole track polyline with the section line; every split point
 * yields one event at the detection following it.
 *
 * Each split inserts the crossing point at the end of one part and the start
 * of the next, so the detection after the n-th split sits at
 * `cumulative point count - 2n + 1`. Splits exactly at a detection insert no
 * point and can therefore disagree with {@link IntersectBySmallestTrackSegments}.
 */
export class IntersectBySplittingTrackLine implements Intersector {
  private readonly sectionLine: Line;

  constructor(
    private readonly implementation: IntersectImplementation,
    private readonly lineSection: LineSection
  ) {
    this.sectionLine = getSectionCoordinates(lineSection);
  }

  intersect(track: Track, eventBuilder: EventBuilder): Event[] {
    const eventType = eventBuilder.eventType;
    if (eventType === null) {
      throw new IncompleteEventBuilderSetup('event type not set in section builder');
    }

    const points = trackCoordinates(track, getOffset(this.lineSection, eventType));
    eventBuilder.addRoadUserType(track.classification);
    const events: Event[] = [];
    if (points.length < 2) return events;

    const parts = this.implementation.splitLineWithLine(points, this.sectionLine);
    if (!parts) return events;

    let cumulative = parts[0].length;
    for (let n = 1; n < parts.length; n++) {
      const detectionIndex = cumulative - 2 * n + 1;
      cumulative += parts[n].length;
      if (detectionIndex < 1 || detectionIndex >= points.length) continue;

      const current = points[detectionIndex];
      eventBuilder.addDirectionVector(directionVector(points[detectionIndex - 1], current));
      eventBuilder.addEventCoordinate(current.x, current.y);
      events.push(eventBuilder.createEvent(track.detections[detectionIndex]));
    }

    return events;
  }
}

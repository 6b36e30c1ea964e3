import { directionVector } from '../geometry/coordinate';
import type { Event, EventBuilder } from '../domain/event';
import { EventType } from '../domain/eventType';
import { getOffset } from '../domain/section';
import type { Area } from '../domain/section';
import { trackCoordinates } from '../domain/track';
import type { Track } from '../domain/track';
import type { IntersectImplementation, Intersector } from './types';

/**
 * Classifies every sampled point as inside or outside the area and emits an
 * event for each state change. A track starting inside gets a synthetic
 * enter event at its first detection.
 */
export class IntersectAreaByTrackPoints implements Intersector {
  constructor(
    private readonly implementation: IntersectImplementation,
    private readonly area: Area
  ) {}

  intersect(track: Track, eventBuilder: EventBuilder): Event[] {
    const events: Event[] = [];
    const offset = getOffset(this.area, EventType.SECTION_ENTER);
    const points = trackCoordinates(track, offset);
    if (points.length < 2) return events;

    const inside = this.implementation.areCoordinatesWithinPolygon(points, this.area.coordinates);
    eventBuilder.addRoadUserType(track.classification);

    if (inside[0]) {
      eventBuilder.addEventType(EventType.SECTION_ENTER);
      eventBuilder.addDirectionVector(directionVector(points[0], points[1]));
      eventBuilder.addEventCoordinate(points[0].x, points[0].y);
      events.push(eventBuilder.createEvent(track.detections[0]));
    }

    let currentlyInside = inside[0];
    for (let i = 1; i < points.length; i++) {
      if (inside[i] === currentlyInside) continue;

      eventBuilder.addEventType(inside[i] ? EventType.SECTION_ENTER : EventType.SECTION_LEAVE);
      eventBuilder.addDirectionVector(directionVector(points[i - 1], points[i]));
      eventBuilder.addEventCoordinate(points[i].x, points[i].y);
      events.push(eventBuilder.createEvent(track.detections[i]));
      currentlyInside = inside[i];
    }

    return events;
  }
}

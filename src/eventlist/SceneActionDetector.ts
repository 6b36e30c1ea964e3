import { SceneEventBuilder } from '../domain/event';
import type { Event } from '../domain/event';
import { EventType } from '../domain/eventType';
import type { Track } from '../domain/track';

/** Emits one enter-scene and one leave-scene event per track */
export class SceneActionDetector {
  constructor(private readonly eventBuilder: SceneEventBuilder = new SceneEventBuilder()) {}

  detectEnterScene(track: Track): Event {
    const [first, second] = track.detections;
    this.eventBuilder.addEventType(EventType.ENTER_SCENE);
    this.eventBuilder.addRoadUserType(track.classification);
    this.eventBuilder.addDirectionVectorBetween(first, second);
    this.eventBuilder.addEventCoordinate(first.x, first.y);
    return this.eventBuilder.createEvent(first);
  }

  detectLeaveScene(track: Track): Event {
    const detections = track.detections;
    const last = detections[detections.length - 1];
    const secondLast = detections[detections.length - 2];
    this.eventBuilder.addEventType(EventType.LEAVE_SCENE);
    this.eventBuilder.addRoadUserType(track.classification);
    this.eventBuilder.addDirectionVectorBetween(secondLast, last);
    this.eventBuilder.addEventCoordinate(last.x, last.y);
    return this.eventBuilder.createEvent(last);
  }

  detect(tracks: Iterable<Track>): Event[] {
    const events: Event[] = [];
    for (const track of tracks) {
      events.push(this.detectEnterScene(track), this.detectLeaveScene(track));
    }
    return events;
  }
}

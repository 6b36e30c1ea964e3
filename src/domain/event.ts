import type { Coordinate, DirectionVector } from '../geometry/types';
import { coordinate, directionVector } from '../geometry/coordinate';
import { EventValidationError, ImproperFormattedFilename, IncompleteEventBuilderSetup } from '../errors';
import type { EventType } from './eventType';
import type { SectionId } from './section';
import type { Detection, TrackId } from './track';

export interface Event {
  readonly roadUserId: TrackId;
  readonly roadUserType: string;
  readonly hostname: string;
  readonly occurrence: Date;
  readonly frameNumber: number;
  /** `null` for scene events */
  readonly sectionId: SectionId | null;
  readonly eventCoordinate: Coordinate;
  readonly eventType: EventType;
  readonly directionVector: DirectionVector;
  readonly videoName: string;
}

export interface EventFields {
  roadUserType: string;
  sectionId: SectionId | null;
  eventType: EventType;
  eventCoordinate: Coordinate;
  directionVector: DirectionVector;
}

const HOSTNAME_PATTERN = /^(?<hostname>[^_]+)_.+/;

/** Parses `<hostname>_<rest>` from the file name part of `videoName` */
export function extractHostname(videoName: string): string {
  const fileName = videoName.split(/[\\/]/).pop() ?? '';
  const hostname = HOSTNAME_PATTERN.exec(fileName)?.groups?.hostname;
  if (hostname === undefined) {
    throw new ImproperFormattedFilename(videoName);
  }
  return hostname;
}

/** Stamps an event at `detection` */
export function createEvent(detection: Detection, fields: EventFields): Event {
  if (detection.frame < 1) {
    throw new EventValidationError('frame number must be greater equal 1');
  }
  return Object.freeze({
    roadUserId: detection.trackId,
    roadUserType: fields.roadUserType,
    hostname: extractHostname(detection.videoName),
    occurrence: new Date(detection.occurrence.getTime()),
    frameNumber: detection.frame,
    sectionId: fields.sectionId,
    eventCoordinate: fields.eventCoordinate,
    eventType: fields.eventType,
    directionVector: fields.directionVector,
    videoName: detection.videoName,
  });
}

/**
 * Accumulates the fields of the next event. Direction vector and event
 * coordinate belong to a single detection and are cleared by every
 * successful `createEvent`; section id, event type and road user type stay.
 */
export abstract class EventBuilder {
  protected eventTypeValue: EventType | null = null;
  protected roadUserType: string | null = null;
  protected direction: DirectionVector | null = null;
  protected eventCoordinate: Coordinate | null = null;

  get eventType(): EventType | null {
    return this.eventTypeValue;
  }

  addEventType(eventType: EventType): void {
    this.eventTypeValue = eventType;
  }

  addRoadUserType(roadUserType: string): void {
    this.roadUserType = roadUserType;
  }

  addDirectionVector(vector: DirectionVector): void {
    this.direction = vector;
  }

  addEventCoordinate(x: number, y: number): void {
    this.eventCoordinate = coordinate(x, y);
  }

  reset(): void {
    this.eventTypeValue = null;
    this.roadUserType = null;
    this.direction = null;
    this.eventCoordinate = null;
  }

  createEvent(detection: Detection): Event {
    const event = createEvent(detection, this.collectFields());
    this.direction = null;
    this.eventCoordinate = null;
    return event;
  }

  protected abstract sectionIdForEvent(): SectionId | null;

  private collectFields(): EventFields {
    const sectionId = this.sectionIdForEvent();
    if (this.eventTypeValue === null) {
      throw new IncompleteEventBuilderSetup('event type not set');
    }
    if (this.direction === null) {
      throw new IncompleteEventBuilderSetup('direction vector not set');
    }
    if (this.eventCoordinate === null) {
      throw new IncompleteEventBuilderSetup('event coordinate not set');
    }
    if (this.roadUserType === null) {
      throw new IncompleteEventBuilderSetup('road user type not set');
    }
    return {
      roadUserType: this.roadUserType,
      sectionId,
      eventType: this.eventTypeValue,
      eventCoordinate: this.eventCoordinate,
      directionVector: this.direction,
    };
  }
}

export class SectionEventBuilder extends EventBuilder {
  private sectionId: SectionId | null = null;

  addSectionId(sectionId: SectionId): void {
    this.sectionId = sectionId;
  }

  override reset(): void {
    super.reset();
    this.sectionId = null;
  }

  protected sectionIdForEvent(): SectionId {
    if (this.sectionId === null) {
      throw new IncompleteEventBuilderSetup('section id not set');
    }
    return this.sectionId;
  }
}

export class SceneEventBuilder extends EventBuilder {
  /** Direction between the raw bounding box origins of two detections */
  addDirectionVectorBetween(from: Detection, to: Detection): void {
    this.addDirectionVector(directionVector(coordinate(from.x, from.y), coordinate(to.x, to.y)));
  }

  protected sectionIdForEvent(): null {
    return null;
  }
}

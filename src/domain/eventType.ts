import { EventTypeParseError } from '../errors';

export const EventType = {
  SECTION_ENTER: 'section-enter',
  SECTION_LEAVE: 'section-leave',
  ENTER_SCENE: 'enter-scene',
  LEAVE_SCENE: 'leave-scene',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

const EVENT_TYPES: readonly EventType[] = Object.values(EventType);

function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some(type => type === value);
}

export function parseEventType(value: string): EventType {
  if (!isEventType(value)) {
    throw new EventTypeParseError(value);
  }
  return value;
}

import type { Event } from '../domain/event';
import { InvalidWorkerCountError } from '../errors';

export function flattenEvents(eventsPerTrack: readonly (readonly Event[])[]): Event[] {
  const events: Event[] = [];
  for (const trackEvents of eventsPerTrack) {
    events.push(...trackEvents);
  }
  return events;
}

export function validateNumWorkers(numWorkers: number): number {
  if (!Number.isInteger(numWorkers) || numWorkers < 1) {
    throw new InvalidWorkerCountError(numWorkers);
  }
  return numWorkers;
}

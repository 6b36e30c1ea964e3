import type { Event } from '../domain/event';
import type { SectionId } from '../domain/section';
import type { TrackId } from '../domain/track';

export interface TrackRepositoryEvent {
  added: TrackId[];
  removed: TrackId[];
}

export interface SectionRepositoryEvent {
  added: SectionId[];
  removed: SectionId[];
  changed: SectionId[];
}

export interface EventRepositoryEvent {
  added: Event[];
  removed: Event[];
}

export type RepositoryObserver<T> = (change: T) => void;

/** Stop listening */
export type Unsubscribe = () => void;

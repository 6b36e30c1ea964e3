import { createStore } from 'zustand/vanilla';
import type { Event } from '../domain/event';
import type { EventRepositoryEvent, RepositoryObserver, Unsubscribe } from './types';

interface EventRepositoryState {
  events: readonly Event[];
  lastChange: EventRepositoryEvent | null;
}

/** Single writer: only the event creation run publishes into it */
export class EventRepository {
  private readonly store = createStore<EventRepositoryState>()(() => ({
    events: [],
    lastChange: null,
  }));

  register(observer: RepositoryObserver<EventRepositoryEvent>): Unsubscribe {
    return this.store.subscribe(state => {
      if (state.lastChange) observer(state.lastChange);
    });
  }

  add(event: Event): void {
    this.addAll([event]);
  }

  /** Appends the batch and notifies observers once */
  addAll(events: Iterable<Event>): void {
    const added = [...events];
    this.store.setState(state => ({
      events: [...state.events, ...added],
      lastChange: { added, removed: [] },
    }));
  }

  getAll(): Event[] {
    return [...this.store.getState().events];
  }

  clear(): void {
    this.store.setState(state => ({
      events: [],
      lastChange: { added: [], removed: [...state.events] },
    }));
  }

  isEmpty(): boolean {
    return this.store.getState().events.length === 0;
  }
}

export { TrackRepository } from './TrackRepository';
export { SectionRepository } from './SectionRepository';
export { EventRepository } from './EventRepository';
export type {
  TrackRepositoryEvent,
  SectionRepositoryEvent,
  EventRepositoryEvent,
  RepositoryObserver,
  Unsubscribe,
} from './types';

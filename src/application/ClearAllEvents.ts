import type { EventRepository } from '../repository/EventRepository';
import type { SectionRepository } from '../repository/SectionRepository';
import type { TrackRepository } from '../repository/TrackRepository';
import type { Unsubscribe } from '../repository/types';

/** Events go stale as soon as tracks or sections change */
export class ClearAllEvents {
  constructor(private readonly eventRepository: EventRepository) {}

  clear(): void {
    if (!this.eventRepository.isEmpty()) {
      this.eventRepository.clear();
    }
  }

  observe(trackRepository: TrackRepository, sectionRepository: SectionRepository): Unsubscribe {
    const unsubscribeTracks = trackRepository.register(() => this.clear());
    const unsubscribeSections = sectionRepository.register(() => this.clear());
    return () => {
      unsubscribeTracks();
      unsubscribeSections();
    };
  }
}

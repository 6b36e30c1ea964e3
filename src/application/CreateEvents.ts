import type { Event } from '../domain/event';
import { SceneActionDetector } from '../eventlist/SceneActionDetector';
import { logger } from '../logger';
import type { EventRepository } from '../repository/EventRepository';
import type { SectionRepository } from '../repository/SectionRepository';
import type { RunIntersect } from './RunIntersect';
import type { GetTracks } from './types';

/**
 * Recreates the event list: section events of every track at every section
 * plus the scene events, published as one batch.
 */
export class CreateEvents {
  constructor(
    private readonly sectionRepository: SectionRepository,
    private readonly eventRepository: EventRepository,
    private readonly runIntersect: RunIntersect,
    private readonly getTracks: GetTracks,
    private readonly sceneDetector: SceneActionDetector = new SceneActionDetector()
  ) {}

  async run(): Promise<Event[]> {
    this.eventRepository.clear();

    const sections = this.sectionRepository.getAll();
    logger.info(`Create events for ${sections.length} sections ...`);
    const sectionEvents = await this.runIntersect.run(sections);
    const sceneEvents = this.sceneDetector.detect(this.getTracks());

    const events = [...sectionEvents, ...sceneEvents];
    this.eventRepository.addAll(events);
    logger.info(`Created ${sectionEvents.length} section events and ${sceneEvents.length} scene events.`);
    return events;
  }
}

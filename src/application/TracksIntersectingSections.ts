import { EventType } from '../domain/eventType';
import { getOffset, getSectionCoordinates } from '../domain/section';
import type { Section } from '../domain/section';
import { trackCoordinates } from '../domain/track';
import type { Track, TrackId } from '../domain/track';
import { BBOX_ORIGIN } from '../geometry/coordinate';
import type { IntersectImplementation } from '../intersection/types';
import { logger } from '../logger';
import type { GetTracks } from './types';

/** Ids of the tracks touching at least one of the sections */
export class TracksIntersectingSections {
  constructor(
    private readonly getTracks: GetTracks,
    private readonly implementation: IntersectImplementation
  ) {}

  run(sections: Iterable<Section>): Set<TrackId> {
    const tracks = [...this.getTracks()];
    const all = new Set<TrackId>();

    logger.debug('Number of intersecting tracks per section');
    for (const section of sections) {
      let count = 0;
      for (const track of tracks) {
        if (this.trackIntersectsSection(track, section)) {
          all.add(track.id);
          count++;
        }
      }
      logger.debug(`${section.name}: ${count} tracks`);
    }
    logger.debug(`All sections: ${all.size} tracks`);

    return all;
  }

  private trackIntersectsSection(track: Track, section: Section): boolean {
    switch (section.type) {
      case 'line':
        return this.implementation.lineIntersectsLine(
          trackCoordinates(track, getOffset(section, EventType.SECTION_ENTER)),
          getSectionCoordinates(section)
        );
      case 'cutting':
        return this.implementation.lineIntersectsLine(
          trackCoordinates(track, section.relativeOffsetCoordinates[EventType.SECTION_ENTER] ?? BBOX_ORIGIN),
          getSectionCoordinates(section)
        );
      case 'area':
        return this.implementation.lineIntersectsPolygon(
          trackCoordinates(track, getOffset(section, EventType.SECTION_ENTER)),
          section.coordinates
        );
    }
  }
}

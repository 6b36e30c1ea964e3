import { SpatialIndex } from '../geometry/SpatialIndex';
import { sectionBbox } from '../domain/section';
import type { Section } from '../domain/section';
import { trackBbox } from '../domain/track';
import type { Track } from '../domain/track';

/**
 * Prefilters the sections a track can reach. The track box covers every
 * offset sample, so a section outside it cannot produce events.
 */
export class SectionIndex {
  private readonly index: SpatialIndex;

  constructor(sections: readonly Section[], maxEntries: number = 16) {
    this.index = new SpatialIndex(maxEntries);
    this.index.load(sections.map(section => ({ id: section.id, bbox: sectionBbox(section) })));
  }

  /** Candidates among `sections`, in their given order */
  candidatesFor(track: Track, sections: readonly Section[]): Section[] {
    const ids = this.index.search(trackBbox(track));
    return sections.filter(section => ids.has(section.id));
  }
}

import type { CuttingSection, LineSection } from '../domain/section';
import type { Track, TrackId } from '../domain/track';
import type { CutTracksWithSection } from '../cutting/CutTracksWithSection';
import { logger } from '../logger';
import type { SectionRepository } from '../repository/SectionRepository';
import type { TrackRepository } from '../repository/TrackRepository';
import type { TracksIntersectingSections } from './TracksIntersectingSections';

export interface CutTracksResult {
  cuttingSection: CuttingSection | LineSection;
  originalTrackIds: TrackId[];
  cutTracks: Track[];
}

/**
 * Replaces every track crossing the cutting section by its sub-tracks and
 * retires the cutting section. Repositories stay untouched if cutting fails.
 */
export class CutTracksIntersectingSection {
  constructor(
    private readonly trackRepository: TrackRepository,
    private readonly sectionRepository: SectionRepository,
    private readonly tracksIntersectingSections: TracksIntersectingSections,
    private readonly cutTracksWithSection: CutTracksWithSection
  ) {}

  run(cuttingSection: CuttingSection | LineSection): CutTracksResult {
    const originalTrackIds = [...this.tracksIntersectingSections.run([cuttingSection])];
    const tracks = this.trackRepository.getTracksFromIds(originalTrackIds);
    const cutTracks = this.cutTracksWithSection.cut(tracks, cuttingSection);

    this.trackRepository.removeMultiple(originalTrackIds);
    this.trackRepository.addAll(cutTracks);
    if (this.sectionRepository.get(cuttingSection.id)) {
      this.sectionRepository.remove(cuttingSection.id);
    }

    logger.info(
      `Cut ${originalTrackIds.length} tracks into ${cutTracks.length} tracks with section '${cuttingSection.name}'.`
    );
    return { cuttingSection, originalTrackIds, cutTracks };
  }
}

/** Applies every cutting section of the repository, in insertion order */
export class CutTracksWithCuttingSections {
  constructor(
    private readonly sectionRepository: SectionRepository,
    private readonly cutTracksIntersectingSection: CutTracksIntersectingSection
  ) {}

  run(): CutTracksResult[] {
    const results: CutTracksResult[] = [];
    for (const section of this.sectionRepository.getAll()) {
      if (section.type === 'cutting') {
        results.push(this.cutTracksIntersectingSection.run(section));
      }
    }
    return results;
  }
}

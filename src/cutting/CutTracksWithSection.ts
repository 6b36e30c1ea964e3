import { EventType } from '../domain/eventType';
import { getSectionCoordinates } from '../domain/section';
import type { CuttingSection, LineSection } from '../domain/section';
import { detectionCoordinate } from '../domain/track';
import type { Detection, Track } from '../domain/track';
import { BBOX_ORIGIN } from '../geometry/coordinate';
import type { IntersectImplementation } from '../intersection/types';
import { CutTrackSegmentBuilder } from './CutTrackSegmentBuilder';

/**
 * Splits tracks where a segment between two neighbouring detections crosses
 * the cutting line. Sub-track ids are `<original id>_<n>`, n counting from 1.
 */
export class CutTracksWithSection {
  constructor(
    private readonly implementation: IntersectImplementation,
    private readonly trackBuilder: CutTrackSegmentBuilder = new CutTrackSegmentBuilder()
  ) {}

  cut(tracks: Iterable<Track>, cuttingSection: CuttingSection | LineSection): Track[] {
    const cutTracks: Track[] = [];
    for (const track of tracks) {
      cutTracks.push(...this.cutTrack(track, cuttingSection));
    }
    return cutTracks;
  }

  cutTrack(track: Track, cuttingSection: CuttingSection | LineSection): Track[] {
    const sectionLine = getSectionCoordinates(cuttingSection);
    const offset = cuttingSection.relativeOffsetCoordinates[EventType.SECTION_ENTER] ?? BBOX_ORIGIN;
    const segments: Track[] = [];
    const detections = track.detections;

    this.trackBuilder.reset();
    for (let i = 0; i < detections.length - 1; i++) {
      const current = detections[i];
      const next = detections[i + 1];
      const segment = [detectionCoordinate(current, offset), detectionCoordinate(next, offset)];

      if (this.implementation.lineIntersectsLine(segment, sectionLine)) {
        segments.push(this.buildSegment(`${track.id}_${segments.length + 1}`, current));
      } else {
        this.trackBuilder.addDetection(current);
      }
    }
    segments.push(this.buildSegment(`${track.id}_${segments.length + 1}`, detections[detections.length - 1]));

    return segments;
  }

  private buildSegment(trackId: string, closingDetection: Detection): Track {
    this.trackBuilder.addId(trackId);
    this.trackBuilder.addDetection(closingDetection);
    return this.trackBuilder.build();
  }
}

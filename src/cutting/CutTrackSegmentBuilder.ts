import { calculateTrackClassificationByMaxConfidence, createTrack, reassignDetection } from '../domain/track';
import type { Detection, Track, TrackClassificationCalculator, TrackId } from '../domain/track';
import { TrackBuilderError } from '../errors';

/**
 * Builds the sub-tracks of a cut track. Detections are copied onto the new
 * track id and the classification is recalculated from them alone. The
 * builder is empty again after every `build`.
 */
export class CutTrackSegmentBuilder {
  private trackId: TrackId | null = null;
  private detections: Detection[] = [];

  constructor(
    private readonly classCalculator: TrackClassificationCalculator = calculateTrackClassificationByMaxConfidence
  ) {}

  addId(trackId: TrackId): void {
    this.trackId = trackId;
  }

  addDetection(detection: Detection): void {
    this.detections.push(detection);
  }

  build(): Track {
    const trackId = this.trackId;
    if (trackId === null) {
      throw new TrackBuilderError('Track builder setup error occurred. TrackId not set.');
    }
    try {
      const detections = this.detections.map(detection => reassignDetection(detection, trackId));
      return createTrack(trackId, detections, this.classCalculator);
    } finally {
      this.reset();
    }
  }

  reset(): void {
    this.trackId = null;
    this.detections = [];
  }
}

import type { BBox, Coordinate, RelativeOffsetCoordinate } from '../geometry/types';
import { coordinate } from '../geometry/coordinate';
import {
  BuildTrackWithSingleDetectionError,
  DetectionValidationError,
  TrackError,
  UnsortedDetectionsError,
} from '../errors';

/** Upstream tracks use positive integers, cut tracks `<original>_<n>` */
export type TrackId = string;

export interface Detection {
  readonly classification: string;
  readonly confidence: number;
  /** Bounding box in xywh format, image space */
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
  readonly frame: number;
  readonly occurrence: Date;
  /** File the detection originates from, `<hostname>_<rest>` */
  readonly videoName: string;
  readonly interpolatedDetection: boolean;
  readonly trackId: TrackId;
}

export interface Track {
  readonly id: TrackId;
  readonly classification: string;
  readonly detections: readonly Detection[];
}

export type DetectionInput = Omit<Detection, 'trackId' | 'interpolatedDetection'> & {
  trackId: TrackId | number;
  interpolatedDetection?: boolean;
};

export function createTrackId(value: TrackId | number): TrackId {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 1) {
      throw new TrackError(String(value), 'track id must be an integer greater equal 1');
    }
    return String(value);
  }
  if (value.length === 0) {
    throw new TrackError(value, 'track id must not be empty');
  }
  return value;
}

export function createDetection(input: DetectionInput): Detection {
  if (input.confidence < 0 || input.confidence > 1) {
    throw new DetectionValidationError('confidence must be in range [0,1]');
  }
  for (const key of ['x', 'y', 'w', 'h'] as const) {
    if (input[key] < 0) {
      throw new DetectionValidationError(`${key} must be greater equal 0`);
    }
  }
  if (input.frame < 1) {
    throw new DetectionValidationError('frame number must be greater equal 1');
  }

  return Object.freeze({
    classification: input.classification,
    confidence: input.confidence,
    x: input.x,
    y: input.y,
    w: input.w,
    h: input.h,
    frame: input.frame,
    occurrence: input.occurrence,
    videoName: input.videoName,
    interpolatedDetection: input.interpolatedDetection ?? false,
    trackId: createTrackId(input.trackId),
  });
}

/** Copy of `detection` owned by another track, every other field kept */
export function reassignDetection(detection: Detection, trackId: TrackId): Detection {
  return Object.freeze({ ...detection, trackId });
}

export interface TrackClassificationCalculator {
  calculate(detections: readonly Detection[]): string;
}

/**
 * Sums the confidence per label and picks the largest sum. Equal sums resolve
 * to the lexicographically smallest label.
 */
export const calculateTrackClassificationByMaxConfidence: TrackClassificationCalculator = {
  calculate(detections: readonly Detection[]): string {
    const sums = new Map<string, number>();
    for (const detection of detections) {
      sums.set(detection.classification, (sums.get(detection.classification) ?? 0) + detection.confidence);
    }

    let best: string | null = null;
    let bestSum = -Infinity;
    for (const [label, sum] of sums) {
      if (sum > bestSum || (sum === bestSum && best !== null && label < best)) {
        best = label;
        bestSum = sum;
      }
    }
    if (best === null) {
      throw new DetectionValidationError('cannot classify an empty list of detections');
    }
    return best;
  },
};

export function createTrack(
  id: TrackId | number,
  detections: readonly Detection[],
  calculator: TrackClassificationCalculator = calculateTrackClassificationByMaxConfidence
): Track {
  const trackId = createTrackId(id);
  if (detections.length < 2) {
    throw new BuildTrackWithSingleDetectionError(trackId);
  }
  for (let i = 1; i < detections.length; i++) {
    if (detections[i].occurrence.getTime() <= detections[i - 1].occurrence.getTime()) {
      throw new UnsortedDetectionsError(trackId);
    }
  }

  return Object.freeze({
    id: trackId,
    classification: calculator.calculate(detections),
    detections: Object.freeze([...detections]),
  });
}

export function firstDetection(track: Track): Detection {
  return track.detections[0];
}

export function lastDetection(track: Track): Detection {
  return track.detections[track.detections.length - 1];
}

/** Position inside the detection's bounding box selected by `offset` */
export function detectionCoordinate(detection: Detection, offset: RelativeOffsetCoordinate): Coordinate {
  return coordinate(detection.x + detection.w * offset.x, detection.y + detection.h * offset.y);
}

export function trackCoordinates(track: Track, offset: RelativeOffsetCoordinate): Coordinate[] {
  return track.detections.map(detection => detectionCoordinate(detection, offset));
}

/** Union of all detection boxes; contains every offset sample of the track */
export function trackBbox(track: Track): BBox {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const d of track.detections) {
    minX = Math.min(minX, d.x);
    minY = Math.min(minY, d.y);
    maxX = Math.max(maxX, d.x + d.w);
    maxY = Math.max(maxY, d.y + d.h);
  }
  return { minX, minY, maxX, maxY };
}

import { createDetection, createTrack } from '../domain/track';
import type { Detection, Track } from '../domain/track';

export const VIDEO_NAME = 'myhostname_2022-01-01_00-00-00.mp4';

export interface PointSpec {
  x: number;
  y: number;
  classification?: string;
  confidence?: number;
}

export function at(second: number): Date {
  return new Date(Date.UTC(2022, 0, 1, 0, 0, second));
}

/** Zero sized boxes, so every offset samples the box origin */
export function makeDetections(trackId: number | string, points: PointSpec[]): Detection[] {
  return points.map((p, i) =>
    createDetection({
      classification: p.classification ?? 'car',
      confidence: p.confidence ?? 0.5,
      x: p.x,
      y: p.y,
      w: 0,
      h: 0,
      frame: i + 1,
      occurrence: at(i),
      videoName: VIDEO_NAME,
      trackId,
    })
  );
}

export function makeTrack(id: number | string, points: PointSpec[]): Track {
  return createTrack(id, makeDetections(id, points));
}

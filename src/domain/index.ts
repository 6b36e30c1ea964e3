export { EventType, parseEventType } from './eventType';
export {
  createTrackId,
  createDetection,
  createTrack,
  reassignDetection,
  calculateTrackClassificationByMaxConfidence,
  firstDetection,
  lastDetection,
  detectionCoordinate,
  trackCoordinates,
  trackBbox,
} from './track';
export type { TrackId, Detection, DetectionInput, Track, TrackClassificationCalculator } from './track';
export {
  createLineSection,
  createCuttingSection,
  createArea,
  getOffset,
  getSectionCoordinates,
  sectionBbox,
  withPluginData,
} from './section';
export type {
  SectionId,
  Section,
  LineSection,
  CuttingSection,
  Area,
  SectionInput,
  RelativeOffsets,
  PluginData,
} from './section';
export { extractHostname, createEvent, EventBuilder, SectionEventBuilder, SceneEventBuilder } from './event';
export type { Event, EventFields } from './event';

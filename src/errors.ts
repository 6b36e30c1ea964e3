export class DetectionValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DetectionValidationError';
  }
}

export class TrackError extends Error {
  readonly trackId: string;

  constructor(trackId: string, message: string) {
    super(message);
    this.name = 'TrackError';
    this.trackId = trackId;
  }
}

export class BuildTrackWithSingleDetectionError extends TrackError {
  constructor(trackId: string) {
    super(trackId, `Trying to construct track (track_id=${trackId}) with less than two detections.`);
    this.name = 'BuildTrackWithSingleDetectionError';
  }
}

export class UnsortedDetectionsError extends TrackError {
  constructor(trackId: string) {
    super(trackId, `Detections of track ${trackId} must be sorted by occurrence.`);
    this.name = 'UnsortedDetectionsError';
  }
}

export class TrackBuilderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackBuilderError';
  }
}

export class SectionValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SectionValidationError';
  }
}

export class MissingOffsetError extends Error {
  readonly sectionId: string;

  constructor(sectionId: string, eventType: string) {
    super(`Section ${sectionId} has no relative offset for event type '${eventType}'.`);
    this.name = 'MissingOffsetError';
    this.sectionId = sectionId;
  }
}

export class MissingSection extends Error {
  constructor(sectionId: string) {
    super(`Section for id: ${sectionId} could not be found.`);
    this.name = 'MissingSection';
  }
}

export class SectionIdAlreadyExists extends Error {
  constructor(sectionId: string) {
    super(`Section with id ${sectionId} already exists.`);
    this.name = 'SectionIdAlreadyExists';
  }
}

export class IncompleteEventBuilderSetup extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IncompleteEventBuilderSetup';
  }
}

export class ImproperFormattedFilename extends Error {
  constructor(videoName: string) {
    super(`Could not parse hostname from '${videoName}'. Expected '<hostname>_<rest>'.`);
    this.name = 'ImproperFormattedFilename';
  }
}

export class EventTypeParseError extends Error {
  constructor(value: string) {
    super(`Unknown event type '${value}'.`);
    this.name = 'EventTypeParseError';
  }
}

export class InvalidWorkerCountError extends Error {
  constructor(count: number) {
    super(`Number of workers must be an integer greater equal 1, but is ${count}.`);
    this.name = 'InvalidWorkerCountError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class EventValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventValidationError';
  }
}

import { createAnalysisConfig } from '../config';
import type { AnalysisConfig } from '../config';
import { CutTracksWithSection } from '../cutting/CutTracksWithSection';
import type { Event } from '../domain/event';
import { turfIntersectImplementation } from '../intersection/turfIntersectImplementation';
import type { IntersectImplementation } from '../intersection/types';
import { setLogLevel } from '../logger';
import { SequentialIntersect } from '../parallel/SequentialIntersect';
import { WorkerPoolIntersect } from '../parallel/WorkerPoolIntersect';
import type { IntersectParallelizationStrategy } from '../parallel/types';
import { EventRepository } from '../repository/EventRepository';
import { SectionRepository } from '../repository/SectionRepository';
import { TrackRepository } from '../repository/TrackRepository';
import { ClearAllEvents } from './ClearAllEvents';
import { CreateEvents } from './CreateEvents';
import { CutTracksIntersectingSection, CutTracksWithCuttingSections } from './CutTracksIntersectingSection';
import { RunIntersect } from './RunIntersect';
import { TracksIntersectingSections } from './TracksIntersectingSections';

export interface Analysis {
  readonly config: AnalysisConfig;
  readonly trackRepository: TrackRepository;
  readonly sectionRepository: SectionRepository;
  readonly eventRepository: EventRepository;
  readonly parallelizer: IntersectParallelizationStrategy;
  readonly tracksIntersectingSections: TracksIntersectingSections;
  readonly cutTracksIntersectingSection: CutTracksIntersectingSection;
  readonly cutTracksWithCuttingSections: CutTracksWithCuttingSections;
  readonly createEvents: CreateEvents;
  /** Cuts tracks with all cutting sections, then recreates the event list */
  run(): Promise<Event[]>;
  dispose(): void;
}

export interface AnalysisDependencies {
  implementation: IntersectImplementation;
  parallelizer: IntersectParallelizationStrategy;
}

export function createAnalysis(
  overrides?: Partial<AnalysisConfig>,
  dependencies?: Partial<AnalysisDependencies>
): Analysis {
  const config = createAnalysisConfig(overrides);
  setLogLevel(config.logLevel);

  const implementation = dependencies?.implementation ?? turfIntersectImplementation;
  // worker threads always run the Turf implementation
  const parallelizer =
    dependencies?.parallelizer ??
    (dependencies?.implementation
      ? new SequentialIntersect(dependencies.implementation)
      : new WorkerPoolIntersect(config.numWorkers));

  const trackRepository = new TrackRepository();
  const sectionRepository = new SectionRepository();
  const eventRepository = new EventRepository();
  const getTracks = () => trackRepository.getAllWithoutSingleDetections();

  const tracksIntersectingSections = new TracksIntersectingSections(getTracks, implementation);
  const cutTracksIntersectingSection = new CutTracksIntersectingSection(
    trackRepository,
    sectionRepository,
    tracksIntersectingSections,
    new CutTracksWithSection(implementation)
  );
  const cutTracksWithCuttingSections = new CutTracksWithCuttingSections(sectionRepository, cutTracksIntersectingSection);
  const runIntersect = new RunIntersect(parallelizer, getTracks, {
    lineStrategy: config.lineStrategy,
    spatialIndexMaxEntries: config.spatialIndexMaxEntries,
  });
  const createEvents = new CreateEvents(sectionRepository, eventRepository, runIntersect, getTracks);
  const stopClearing = new ClearAllEvents(eventRepository).observe(trackRepository, sectionRepository);

  return {
    config,
    trackRepository,
    sectionRepository,
    eventRepository,
    parallelizer,
    tracksIntersectingSections,
    cutTracksIntersectingSection,
    cutTracksWithCuttingSections,
    createEvents,
    async run() {
      cutTracksWithCuttingSections.run();
      return createEvents.run();
    },
    dispose() {
      stopClearing();
    },
  };
}

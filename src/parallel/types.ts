import type { LineStrategy } from '../config';
import type { Event } from '../domain/event';
import type { Section } from '../domain/section';
import type { Track } from '../domain/track';

/**
 * The per-track intersect function, described by plain data so that it can
 * be posted to worker threads.
 */
export interface IntersectTask {
  lineStrategy: LineStrategy;
  spatialIndexMaxEntries: number;
}

/** Message handed to a worker: one track and the shared, read only sections */
export interface WorkItem {
  task: IntersectTask;
  track: Track;
  sections: readonly Section[];
}

export interface IntersectParallelizationStrategy {
  readonly numWorkers: number;
  /**
   * Runs the task once per track and returns all events. Events of one
   * track keep their order. Rejects on the first failing track without
   * returning any events.
   */
  execute(task: IntersectTask, tracks: Iterable<Track>, sections: Iterable<Section>): Promise<Event[]>;
}

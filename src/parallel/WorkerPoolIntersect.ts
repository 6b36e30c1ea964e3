import Piscina from 'piscina';
import { DEFAULT_ANALYSIS_CONFIG } from '../config';
import type { Event } from '../domain/event';
import type { Section } from '../domain/section';
import type { Track } from '../domain/track';
import { logger } from '../logger';
import { flattenEvents, validateNumWorkers } from './flattenEvents';
import type { IntersectParallelizationStrategy, IntersectTask, WorkItem } from './types';

export interface WorkerPoolOptions {
  /** Worker entry module; its default export handles one {@link WorkItem} */
  filename: string;
  /** Node options of every worker thread; the loader runs the TypeScript entry */
  execArgv: string[];
}

export const DEFAULT_WORKER_POOL_OPTIONS: WorkerPoolOptions = {
  filename: new URL('./intersectWorker.ts', import.meta.url).href,
  execArgv: ['--import', 'tsx'],
};

/**
 * Fans the tracks out over a pool of worker threads, one work item per
 * track. Every execution starts its own pool sized by the worker count at
 * call time and tears it down once all items are joined.
 */
export class WorkerPoolIntersect implements IntersectParallelizationStrategy {
  private workers: number;
  private readonly options: WorkerPoolOptions;

  constructor(numWorkers: number = DEFAULT_ANALYSIS_CONFIG.numWorkers, options?: Partial<WorkerPoolOptions>) {
    this.workers = validateNumWorkers(numWorkers);
    this.options = { ...DEFAULT_WORKER_POOL_OPTIONS, ...options };
  }

  get numWorkers(): number {
    return this.workers;
  }

  /** Applies to the next `execute`; running executions keep their pool */
  setNumWorkers(numWorkers: number): void {
    this.workers = validateNumWorkers(numWorkers);
  }

  async execute(task: IntersectTask, tracks: Iterable<Track>, sections: Iterable<Section>): Promise<Event[]> {
    const sectionList: readonly Section[] = [...sections];
    const items: WorkItem[] = [...tracks].map(track => ({ task, track, sections: sectionList }));
    if (items.length === 0) return [];

    const poolSize = Math.min(this.workers, items.length);
    const pool = new Piscina({
      filename: this.options.filename,
      execArgv: this.options.execArgv,
      minThreads: poolSize,
      maxThreads: poolSize,
    });

    logger.debug(`Intersecting ${items.length} tracks with ${sectionList.length} sections on ${poolSize} workers`);
    try {
      const results = await Promise.all(items.map(item => this.runItem(pool, item)));
      return flattenEvents(results);
    } finally {
      await pool.destroy();
    }
  }

  private async runItem(pool: Piscina, item: WorkItem): Promise<Event[]> {
    const events: Event[] = await pool.run(item);
    return events;
  }
}

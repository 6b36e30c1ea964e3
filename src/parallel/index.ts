export { SequentialIntersect } from './SequentialIntersect';
export { WorkerPoolIntersect, DEFAULT_WORKER_POOL_OPTIONS } from './WorkerPoolIntersect';
export type { WorkerPoolOptions } from './WorkerPoolIntersect';
export { intersectWorkItem } from './intersectWorkItem';
export { flattenEvents, validateNumWorkers } from './flattenEvents';
export type { IntersectParallelizationStrategy, IntersectTask, WorkItem } from './types';

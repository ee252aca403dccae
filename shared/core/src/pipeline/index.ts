/**
 * Pipeline Module
 *
 * Bounded opportunity queue and the worker pool that drains it.
 *
 * @module pipeline
 */

export { OpportunityQueue, QUEUE_CLOSED, DEFAULT_QUEUE_CAPACITY } from './opportunity-queue';
export type { QueueClosed, QueueStats } from './opportunity-queue';

export { WorkerPool, DEFAULT_WORKER_POOL_SIZE, DEFAULT_OPPORTUNITY_TTL_MS } from './worker-pool';
export type { WorkerPoolOptions, WorkerPoolStats, WorkerPoolStopOptions } from './worker-pool';

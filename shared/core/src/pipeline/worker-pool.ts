/**
 * Worker Pool
 *
 * Fixed set of async consumers draining the OpportunityQueue. Each worker:
 * dequeue -> expiry check -> dispatch to the category handler -> record the
 * outcome and latency in the MetricsAggregator.
 *
 * A failing handler only fails its own item (HandlerError, counted as
 * rejected); the worker moves on to the next one.
 */

import { HandlerError } from '@swarmwatch/types';
import type { HandlerRegistry, Opportunity, OpportunityOutcome } from '@swarmwatch/types';
import type { ILogger } from '../logging/types';
import type { MetricsAggregator } from '../metrics/metrics-aggregator';
import { getErrorMessage } from '../resilience/error-handling';
import { OpportunityQueue, QUEUE_CLOSED } from './opportunity-queue';

export const DEFAULT_WORKER_POOL_SIZE = 20;
export const DEFAULT_OPPORTUNITY_TTL_MS = 30000;

export interface WorkerPoolOptions {
  logger: ILogger;
  /** Number of concurrent workers (default 20) */
  size?: number;
  /** Items older than this when dequeued are expired, not executed (default 30000) */
  opportunityTtlMs?: number;
  now?: () => number;
}

export interface WorkerPoolStopOptions {
  /** Record buffered items as expired instead of executing them */
  discardPending?: boolean;
}

export interface WorkerPoolStats {
  size: number;
  running: boolean;
  inFlight: number;
  executed: number;
  rejected: number;
  expired: number;
  /** Items with no registered handler */
  dropped: number;
}

export class WorkerPool {
  private readonly logger: ILogger;
  private readonly size: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private workers: Promise<void>[] = [];
  private stopping: Promise<void> | null = null;
  private inFlight = 0;
  private readonly outcomes: Record<OpportunityOutcome, number> = { executed: 0, rejected: 0, expired: 0 };
  private dropped = 0;

  constructor(
    private readonly queue: OpportunityQueue<Opportunity>,
    private readonly handlers: HandlerRegistry,
    private readonly metrics: MetricsAggregator,
    options: WorkerPoolOptions
  ) {
    this.logger = options.logger;
    this.size = options.size ?? DEFAULT_WORKER_POOL_SIZE;
    this.ttlMs = options.opportunityTtlMs ?? DEFAULT_OPPORTUNITY_TTL_MS;
    this.now = options.now ?? Date.now;

    if (!Number.isInteger(this.size) || this.size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${this.size}`);
    }
  }

  get isRunning(): boolean {
    return this.workers.length > 0 && this.stopping === null;
  }

  start(): void {
    if (this.workers.length > 0) {
      this.logger.warn('Worker pool already started');
      return;
    }
    for (let i = 0; i < this.size; i++) {
      this.workers.push(this.runWorker(i));
    }
    this.logger.info('Worker pool started', { size: this.size, ttlMs: this.ttlMs });
  }

  /**
   * Close the queue and wait for every worker to exit. In-flight handlers
   * always finish. Buffered items are executed unless discardPending is set,
   * in which case they are recorded as expired. Concurrent calls share one stop.
   */
  stop(options: WorkerPoolStopOptions = {}): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(options.discardPending ?? false);
    }
    return this.stopping;
  }

  getStats(): WorkerPoolStats {
    return {
      size: this.size,
      running: this.isRunning,
      inFlight: this.inFlight,
      executed: this.outcomes.executed,
      rejected: this.outcomes.rejected,
      expired: this.outcomes.expired,
      dropped: this.dropped,
    };
  }

  private async shutdown(discardPending: boolean): Promise<void> {
    this.queue.close();

    if (discardPending) {
      const pending = this.queue.drain();
      for (const opportunity of pending) {
        this.expire(opportunity);
      }
      if (pending.length > 0) {
        this.logger.info('Discarded pending opportunities', { count: pending.length });
      }
    }

    await Promise.all(this.workers);
    this.logger.info('Worker pool stopped', { ...this.getStats() });
  }

  private async runWorker(workerId: number): Promise<void> {
    for (;;) {
      const item = await this.queue.dequeue();
      if (item === QUEUE_CLOSED) {
        return;
      }
      await this.handle(item, workerId);
    }
  }

  /**
   * Never rejects: every failure is accounted to the item.
   */
  private async handle(opportunity: Opportunity, workerId: number): Promise<void> {
    const age = this.now() - opportunity.detectedAt;
    if (age > this.ttlMs) {
      this.expire(opportunity);
      this.logger.debug('Opportunity expired before execution', {
        opportunityId: opportunity.id,
        ageMs: age,
      });
      return;
    }

    const handler = this.handlers[opportunity.category];
    if (!handler) {
      this.dropped++;
      this.logger.warn('No handler registered for category, dropping opportunity', {
        opportunityId: opportunity.id,
        category: opportunity.category,
      });
      return;
    }

    this.inFlight++;
    const startedAt = this.now();
    try {
      const profit = await handler(opportunity);
      if (!Number.isFinite(profit)) {
        throw new Error(`non-finite profit ${profit}`);
      }
      this.metrics.recordExecution(opportunity.category, 'executed', this.now() - startedAt, profit);
      this.outcomes.executed++;
    } catch (error) {
      const failure = new HandlerError(
        `Handler for ${opportunity.category} failed: ${getErrorMessage(error)}`,
        opportunity.id,
        error
      );
      this.metrics.recordExecution(opportunity.category, 'rejected', this.now() - startedAt);
      this.outcomes.rejected++;
      this.logger.warn('Opportunity handler failed', {
        workerId,
        opportunityId: failure.opportunityId,
        category: opportunity.category,
        error: failure.message,
      });
    } finally {
      this.inFlight--;
    }
  }

  private expire(opportunity: Opportunity): void {
    this.metrics.recordExpired(opportunity.category);
    this.outcomes.expired++;
  }
}

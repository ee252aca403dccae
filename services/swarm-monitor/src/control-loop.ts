/**
 * Control Loop
 *
 * Drives the monitor: each tick refreshes endpoint health when due, pulls a
 * pending batch, classifies it with a bounded fan-out, enqueues matches for
 * the worker pool, then flushes metrics and reports progress when due.
 *
 * A failing tick is logged, raised as an alert (subject to cooldown) and
 * followed by a short backoff; the loop itself never exits on an error.
 *
 * Lifecycle: stopped -> starting -> running -> stopping -> stopped.
 */

import { QueueClosedError, QueueFullError, RpcError } from '@swarmwatch/types';
import type {
  Classifier,
  Endpoint,
  MetricsSnapshot,
  Opportunity,
  OpportunityCandidate,
  PendingDataSource,
  PendingRecord,
  SwarmState,
  TelemetrySink,
} from '@swarmwatch/types';
import type { LoopConfig, PipelineConfig } from '@swarmwatch/config';
import {
  ServiceState,
  ServiceStateManager,
  formatErrorForLog,
  getErrorMessage,
  isRetryableError,
  mapConcurrent,
} from '@swarmwatch/core';
import type {
  AlertDispatcher,
  ILogger,
  MetricsAggregator,
  OpportunityQueue,
  ServiceStateSnapshot,
  WorkerPool,
  WorkerPoolStopOptions,
} from '@swarmwatch/core';
import { exceedsMinProfit, toOpportunity } from './classifiers';
import type { ProgressReporter } from './reporter';

/**
 * What the loop needs from the router. SwarmRouter satisfies it.
 */
export interface LoopRouter {
  refreshHealth(): Promise<boolean>;
  getPrimary(): Readonly<Endpoint>;
  getState(): SwarmState;
}

export type ControlLoopOptions = LoopConfig &
  Pick<PipelineConfig, 'batchSize' | 'fanOutConcurrency' | 'enqueueTimeoutMs' | 'minProfit'>;

export interface ControlLoopDeps {
  router: LoopRouter;
  dataSource: PendingDataSource;
  classifier: Classifier;
  queue: OpportunityQueue<Opportunity>;
  workerPool: WorkerPool;
  metrics: MetricsAggregator;
  sink: TelemetrySink;
  alerts: AlertDispatcher;
  reporter: ProgressReporter;
  logger: ILogger;
  now?: () => number;
}

export interface TickResult {
  records: number;
  enqueued: number;
  /** Matches at or below the minimum profit */
  filtered: number;
  /** Matches dropped because the queue stayed full */
  shed: number;
}

export interface ControlLoopStats {
  ticks: number;
  tickErrors: number;
  records: number;
  enqueued: number;
  filtered: number;
  shed: number;
  flushes: number;
}

type EnqueueOutcome = 'none' | 'filtered' | 'enqueued' | 'shed';

export class ControlLoop {
  private readonly router: LoopRouter;
  private readonly dataSource: PendingDataSource;
  private readonly classifier: Classifier;
  private readonly queue: OpportunityQueue<Opportunity>;
  private readonly workerPool: WorkerPool;
  private readonly metrics: MetricsAggregator;
  private readonly sink: TelemetrySink;
  private readonly alerts: AlertDispatcher;
  private readonly reporter: ProgressReporter;
  private readonly logger: ILogger;
  private readonly now: () => number;
  private readonly stateManager: ServiceStateManager;

  private loopPromise: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private stopRequested = false;
  private wake: (() => void) | null = null;
  private lastFlushAt = 0;
  private lastReportAt = 0;

  private readonly stats: ControlLoopStats = {
    ticks: 0,
    tickErrors: 0,
    records: 0,
    enqueued: 0,
    filtered: 0,
    shed: 0,
    flushes: 0,
  };

  constructor(
    deps: ControlLoopDeps,
    private readonly options: ControlLoopOptions
  ) {
    this.router = deps.router;
    this.dataSource = deps.dataSource;
    this.classifier = deps.classifier;
    this.queue = deps.queue;
    this.workerPool = deps.workerPool;
    this.metrics = deps.metrics;
    this.sink = deps.sink;
    this.alerts = deps.alerts;
    this.reporter = deps.reporter;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.stateManager = new ServiceStateManager('control-loop', deps.logger);
  }

  get state(): ServiceState {
    return this.stateManager.getState();
  }

  get isRunning(): boolean {
    return this.stateManager.isRunning();
  }

  getStats(): ControlLoopStats {
    return { ...this.stats };
  }

  /** Lifecycle state, including the reason when the loop crashed */
  getStateSnapshot(): ServiceStateSnapshot {
    return this.stateManager.getSnapshot();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async start(): Promise<void> {
    const result = await this.stateManager.executeStart(async () => {
      this.stopRequested = false;
      const startedAt = this.now();
      this.lastFlushAt = startedAt;
      this.lastReportAt = startedAt;
      this.workerPool.start();
      this.loopPromise = this.runLoop().catch((error: unknown) => {
        this.logger.fatal('Control loop crashed', { error: getErrorMessage(error) });
        this.stateManager.transitionTo(ServiceState.ERROR, getErrorMessage(error));
      });
    });

    if (!result.success) {
      throw result.error ?? new Error(`Control loop failed to start from ${result.previousState}`);
    }
    this.logger.info('Control loop started', {
      tickIntervalMs: this.options.tickIntervalMs,
      fanOutConcurrency: this.options.fanOutConcurrency,
      batchSize: this.options.batchSize,
    });
  }

  /**
   * Stop ticking, let the worker pool finish (draining buffered items unless
   * discardPending is set) and publish a final metrics snapshot. Concurrent
   * calls share one stop; the first caller's options apply.
   */
  stop(options: WorkerPoolStopOptions = {}): Promise<void> {
    if (this.stateManager.isStopped()) {
      return Promise.resolve();
    }
    if (!this.stopping) {
      this.stopping = this.shutdown(options).finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async shutdown(options: WorkerPoolStopOptions): Promise<void> {
    const result = await this.stateManager.executeStop(async () => {
      this.stopRequested = true;
      this.wake?.();
      await this.loopPromise;
      this.loopPromise = null;
      await this.workerPool.stop(options);
      await this.flushMetrics();
    });

    if (!result.success) {
      throw result.error ?? new Error(`Control loop failed to stop from ${result.previousState}`);
    }
    this.logger.info('Control loop stopped', { ...this.stats });
  }

  private async runLoop(): Promise<void> {
    while (!this.stopRequested) {
      let delayMs = this.options.tickIntervalMs;
      try {
        await this.tick();
      } catch (error) {
        await this.handleTickError(error);
        delayMs = this.options.errorBackoffMs;
      }
      if (!this.stopRequested) {
        await this.pause(delayMs);
      }
    }
  }

  /**
   * Sleep that stop() can cut short.
   */
  private pause(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  // ===========================================================================
  // Tick
  // ===========================================================================

  /**
   * One pass of the pipeline. Exposed for tests and manual stepping.
   *
   * @throws RpcError when the pending batch cannot be fetched
   */
  async tick(): Promise<TickResult> {
    this.stats.ticks++;

    if (await this.router.refreshHealth()) {
      await this.checkPrimary();
    }

    const records = await this.dataSource.getPendingBatch(this.options.batchSize);
    const outcomes = await mapConcurrent(
      records,
      record => this.processRecord(record),
      this.options.fanOutConcurrency
    );

    const result: TickResult = { records: records.length, enqueued: 0, filtered: 0, shed: 0 };
    for (const outcome of outcomes) {
      if (outcome !== 'none') result[outcome]++;
    }
    this.stats.records += result.records;
    this.stats.enqueued += result.enqueued;
    this.stats.filtered += result.filtered;
    this.stats.shed += result.shed;

    if (result.shed > 0) {
      this.logger.warn('Queue saturated, shedding opportunities', {
        shed: result.shed,
        capacity: this.queue.capacity,
      });
      await this.alerts.raise({
        type: 'queue_saturated',
        severity: 'warning',
        message: `Opportunity queue saturated: ${result.shed} opportunities shed`,
        details: { shed: result.shed, capacity: this.queue.capacity },
      });
    }

    const now = this.now();
    let flushed: MetricsSnapshot | null = null;
    if (now - this.lastFlushAt >= this.options.metricsFlushIntervalMs) {
      flushed = await this.flushMetrics();
    }
    if (now - this.lastReportAt >= this.options.reportIntervalMs) {
      this.lastReportAt = now;
      this.reporter.report(flushed ?? this.metrics.peek(), this.router.getState(), this.queue.size);
    }

    return result;
  }

  private async processRecord(record: PendingRecord): Promise<EnqueueOutcome> {
    let candidate: OpportunityCandidate | null;
    try {
      candidate = await this.classifier(record);
    } catch (error) {
      this.logger.debug('Classifier failed, treating as no match', {
        recordId: record.id,
        error: getErrorMessage(error),
      });
      return 'none';
    }

    if (!candidate) {
      return 'none';
    }
    if (!exceedsMinProfit(candidate, this.options.minProfit)) {
      return 'filtered';
    }

    const opportunity = toOpportunity(record, candidate, this.now());
    try {
      await this.queue.enqueue(opportunity, this.options.enqueueTimeoutMs);
    } catch (error) {
      if (error instanceof QueueFullError || error instanceof QueueClosedError) {
        return 'shed';
      }
      throw error;
    }
    this.metrics.recordDetection(opportunity);
    return 'enqueued';
  }

  private async checkPrimary(): Promise<void> {
    const primary = this.router.getPrimary();
    if (!primary.stale) {
      return;
    }
    await this.alerts.raise({
      type: 'primary_unhealthy',
      severity: 'critical',
      message: `Primary endpoint ${primary.id} failed its health probe`,
      details: { endpointId: primary.id, consecutiveFailures: primary.consecutiveFailures },
      scope: primary.id,
    });
  }

  private async handleTickError(error: unknown): Promise<void> {
    this.stats.tickErrors++;
    const message = getErrorMessage(error);
    this.logger.error('Control loop tick failed', {
      error: message,
      retryable: isRetryableError(error),
      backoffMs: this.options.errorBackoffMs,
    });

    if (error instanceof RpcError) {
      await this.alerts.raise({
        type: 'rpc_failure',
        severity: 'warning',
        message: `RPC ${error.method} failed: ${message}`,
        details: { method: error.method, attempts: error.attempts },
      });
    } else {
      await this.alerts.raise({
        type: 'tick_error',
        severity: 'critical',
        message: `Control loop tick failed: ${message}`,
        details: formatErrorForLog(error),
      });
    }
  }

  // ===========================================================================
  // Metrics
  // ===========================================================================

  /**
   * Flush the aggregator and publish the snapshot. A publish failure loses
   * that snapshot only; the cumulative totals live on in the aggregator.
   */
  private async flushMetrics(): Promise<MetricsSnapshot> {
    const snapshot = this.metrics.flush();
    this.lastFlushAt = this.now();
    this.stats.flushes++;
    try {
      await this.sink.publish(snapshot);
    } catch (error) {
      this.logger.error('Failed to publish metrics snapshot', { error: getErrorMessage(error) });
    }
    return snapshot;
  }
}

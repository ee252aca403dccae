/**
 * Swarm Monitor assembly
 *
 * Wires config into the router, the pipeline and telemetry. Everything
 * external (fetch, the sink) can be injected, so the whole monitor runs
 * in-process under test.
 */

import type { MonitorConfig } from '@swarmwatch/config';
import type { MetricsSnapshot, Opportunity, SwarmState, TelemetrySink } from '@swarmwatch/types';
import {
  AlertCooldownManager,
  AlertDispatcher,
  HealthProbe,
  JsonRpcClient,
  LoggingTelemetrySink,
  MetricsAggregator,
  OpportunityQueue,
  SwarmRouter,
  WorkerPool,
  createRedisTelemetrySink,
  summarizeSamples,
} from '@swarmwatch/core';
import type {
  FetchFn,
  HealthCheckResult,
  ILogger,
  QueueStats,
  RedisSinkDeps,
  SampleSummary,
  ServiceStateSnapshot,
  WorkerPoolStats,
  WorkerPoolStopOptions,
} from '@swarmwatch/core';
import { composeClassifiers, createOutputValueClassifier } from './classifiers';
import type { NamedClassifier } from './classifiers';
import { ControlLoop } from './control-loop';
import type { ControlLoopStats } from './control-loop';
import { JsonRpcDataSource } from './data-source';
import { createPaperHandlers } from './handlers';
import { ProgressReporter } from './reporter';

export interface SwarmMonitorDeps {
  logger: ILogger;
  fetchFn?: FetchFn;
  /** Overrides the sink chosen from REDIS_URL */
  sink?: TelemetrySink;
  redis?: RedisSinkDeps;
  classifiers?: NamedClassifier[];
}

export interface MonitorStatus {
  loopState: string;
  lifecycle: ServiceStateSnapshot;
  swarm: SwarmState;
  queue: QueueStats;
  workers: WorkerPoolStats;
  loop: ControlLoopStats;
}

export const DEFAULT_CLASSIFIERS: readonly NamedClassifier[] = [
  createOutputValueClassifier({ category: 'backrun', minOutputValue: 10 }),
];

export function createTelemetrySink(config: MonitorConfig, logger: ILogger, redis?: RedisSinkDeps): TelemetrySink {
  if (config.redisUrl) {
    return createRedisTelemetrySink(config.redisUrl, logger.child({ component: 'telemetry' }), {}, redis);
  }
  return new LoggingTelemetrySink(logger.child({ component: 'telemetry' }));
}

export class SwarmMonitor {
  readonly router: SwarmRouter;
  readonly queue: OpportunityQueue<Opportunity>;
  readonly metrics: MetricsAggregator;
  readonly workerPool: WorkerPool;
  readonly sink: TelemetrySink;
  readonly loop: ControlLoop;

  constructor(config: MonitorConfig, deps: SwarmMonitorDeps) {
    const { logger } = deps;

    const transport = new JsonRpcClient({
      timeoutMs: config.rpc.timeoutMs,
      user: config.rpc.user,
      password: config.rpc.password,
      fetchFn: deps.fetchFn,
    });

    this.router = new SwarmRouter(config.endpoints, new HealthProbe(transport), transport, {
      logger: logger.child({ component: 'swarm-router' }),
      healthRefreshIntervalMs: config.router.healthRefreshIntervalMs,
      admissionLatencyMs: config.router.admissionLatencyMs,
      weights: config.router.weights,
    });

    this.queue = new OpportunityQueue<Opportunity>(config.pipeline.queueCapacity);
    this.metrics = new MetricsAggregator();
    this.workerPool = new WorkerPool(
      this.queue,
      createPaperHandlers({ logger: logger.child({ component: 'handlers' }) }),
      this.metrics,
      {
        logger: logger.child({ component: 'worker-pool' }),
        size: config.pipeline.workerPoolSize,
        opportunityTtlMs: config.pipeline.opportunityTtlMs,
      }
    );

    this.sink = deps.sink ?? createTelemetrySink(config, logger, deps.redis);
    const alerts = new AlertDispatcher(
      this.sink,
      new AlertCooldownManager(logger, { cooldownMs: config.alertCooldownMs }),
      logger.child({ component: 'alerts' })
    );

    const loopLogger = logger.child({ component: 'control-loop' });
    this.loop = new ControlLoop(
      {
        router: this.router,
        dataSource: new JsonRpcDataSource(this.router, { logger: loopLogger }),
        classifier: composeClassifiers(deps.classifiers ?? DEFAULT_CLASSIFIERS, loopLogger),
        queue: this.queue,
        workerPool: this.workerPool,
        metrics: this.metrics,
        sink: this.sink,
        alerts,
        reporter: new ProgressReporter(logger.child({ component: 'reporter' }), config.targetProfit),
        logger: loopLogger,
      },
      {
        ...config.loop,
        batchSize: config.pipeline.batchSize,
        fanOutConcurrency: config.pipeline.fanOutConcurrency,
        enqueueTimeoutMs: config.pipeline.enqueueTimeoutMs,
        minProfit: config.pipeline.minProfit,
      }
    );
  }

  /**
   * Probe every endpoint once, then start the loop and the workers.
   */
  async start(): Promise<void> {
    await this.router.refreshHealth({ force: true });
    await this.loop.start();
  }

  async stop(options: WorkerPoolStopOptions = {}): Promise<void> {
    await this.loop.stop(options);
    await this.sink.close?.();
  }

  getStatus(): MonitorStatus {
    return {
      loopState: this.loop.state,
      lifecycle: this.loop.getStateSnapshot(),
      swarm: this.router.getState(),
      queue: this.queue.getStats(),
      workers: this.workerPool.getStats(),
      loop: this.loop.getStats(),
    };
  }

  /**
   * healthy: running on a healthy primary; degraded: running with a stale
   * primary; unhealthy: not running.
   */
  healthCheck(): HealthCheckResult {
    const status = this.getStatus();
    const primary = this.router.getPrimary();
    const state = !this.loop.isRunning ? 'unhealthy' : primary.stale ? 'degraded' : 'healthy';
    return { status: state, ...status };
  }

  metricsView(): { snapshot: MetricsSnapshot; summary: SampleSummary } {
    const snapshot = this.metrics.peek();
    return { snapshot, summary: summarizeSamples(snapshot) };
  }
}

/**
 * Swarm Monitor Service Entry Point
 *
 * Loads configuration from the environment, starts the monitor and the
 * health server, and wires graceful shutdown.
 *
 * Endpoints (HEALTH_PORT, 0 disables):
 * - GET /health  - loop state, router state, queue and worker stats
 * - GET /ready   - 200 once the control loop is running
 * - GET /metrics - current metrics snapshot without flushing
 */

import type { Server } from 'http';
import { loadMonitorConfig } from '@swarmwatch/config';
import {
  closeHealthServer,
  createPinoLogger,
  createSimpleHealthServer,
  runServiceMain,
  setupServiceShutdown,
} from '@swarmwatch/core';
import type { ILogger } from '@swarmwatch/core';
import { SwarmMonitor } from './monitor';

export { SwarmMonitor, createTelemetrySink, DEFAULT_CLASSIFIERS } from './monitor';
export type { MonitorStatus, SwarmMonitorDeps } from './monitor';
export { ControlLoop } from './control-loop';
export type { ControlLoopDeps, ControlLoopOptions, ControlLoopStats, LoopRouter, TickResult } from './control-loop';
export { JsonRpcDataSource } from './data-source';
export type { JsonRpcDataSourceOptions, RpcRouter } from './data-source';
export {
  composeClassifiers,
  createOutputValueClassifier,
  exceedsMinProfit,
  toOpportunity,
} from './classifiers';
export type { NamedClassifier, OutputValueClassifierOptions } from './classifiers';
export { createPaperHandlers, paperHandler } from './handlers';
export { ProgressReporter, buildProgressReport } from './reporter';
export type { EndpointReport, ProgressReport } from './reporter';

const SERVICE_NAME = 'swarm-monitor';

export function startHealthServer(monitor: SwarmMonitor, port: number, logger: ILogger): Server {
  return createSimpleHealthServer({
    port,
    serviceName: SERVICE_NAME,
    logger,
    description: 'Node-health-aware routing and opportunity pipeline',
    healthCheck: () => monitor.healthCheck(),
    readyCheck: () => monitor.loop.isRunning,
    additionalRoutes: {
      '/metrics': (_req, res) => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(monitor.metricsView()));
      },
    },
  });
}

async function main(): Promise<void> {
  const config = loadMonitorConfig();
  const logger = createPinoLogger({ name: SERVICE_NAME, level: config.logLevel });

  logger.info('Starting swarm monitor', {
    endpoints: config.endpoints.length,
    workerPoolSize: config.pipeline.workerPoolSize,
    fanOutConcurrency: config.pipeline.fanOutConcurrency,
    deepAnalysis: config.pipeline.deepAnalysis,
    sink: config.redisUrl ? 'redis' : 'log',
  });

  const monitor = new SwarmMonitor(config, { logger });
  await monitor.start();

  const healthServer = config.healthPort > 0
    ? startHealthServer(monitor, config.healthPort, logger)
    : null;

  setupServiceShutdown({
    logger,
    serviceName: SERVICE_NAME,
    onShutdown: async () => {
      await closeHealthServer(healthServer);
      await monitor.stop();
    },
  });
}

runServiceMain({ main, serviceName: SERVICE_NAME });

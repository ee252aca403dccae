/**
 * SwarmMonitor Tests
 *
 * The whole monitor runs in-process: fetch is replaced by a small node
 * simulator keyed by host name, and telemetry goes to an in-memory sink.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import http from 'http';
import type { RedisOptions } from 'ioredis';
import { loadMonitorConfig } from '@swarmwatch/config';
import type { MonitorConfig } from '@swarmwatch/config';
import type { AlertEvent, MetricsSnapshot, TelemetrySink } from '@swarmwatch/types';
import { LoggingTelemetrySink, RecordingLogger, RedisTelemetrySink, closeHealthServer } from '@swarmwatch/core';
import type { FetchFn, TelemetryRedisClient } from '@swarmwatch/core';
import { SwarmMonitor, createTelemetrySink } from '../../src/monitor';
import { startHealthServer } from '../../src/index';

interface SimulatedNode {
  down: boolean;
  connections: number;
  backlogSize: number;
  mempool: Map<string, Record<string, unknown>>;
}

function simulatedNode(connections: number, backlogSize: number): SimulatedNode {
  return { down: false, connections, backlogSize, mempool: new Map() };
}

function simulatedFetch(nodes: Record<string, SimulatedNode>): FetchFn {
  return async (input, init) => {
    const node = nodes[new URL(String(input)).hostname];
    if (!node || node.down) {
      throw new Error('connect ECONNREFUSED');
    }

    const request = JSON.parse(String(init?.body));
    const reply = (result: unknown): Response => new Response(JSON.stringify({ result, error: null, id: request.id }));

    switch (request.method) {
      case 'getblockchaininfo':
        return reply({ blocks: 850000 });
      case 'getnetworkinfo':
        return reply({ connections: node.connections });
      case 'getmempoolinfo':
        return reply({ size: node.backlogSize });
      case 'getblockcount':
        return reply(850000);
      case 'getrawmempool':
        return reply([...node.mempool.keys()]);
      case 'getrawtransaction': {
        const tx = node.mempool.get(String(request.params[0]));
        if (tx) return reply(tx);
        return new Response(
          JSON.stringify({ result: null, error: { code: -5, message: 'No such mempool transaction' }, id: request.id }),
          { status: 500 }
        );
      }
      default:
        return new Response(
          JSON.stringify({ result: null, error: { code: -32601, message: 'Method not found' }, id: request.id }),
          { status: 404 }
        );
    }
  };
}

class MemorySink implements TelemetrySink {
  readonly snapshots: MetricsSnapshot[] = [];
  readonly alerts: AlertEvent[] = [];
  closed = false;

  async publish(snapshot: MetricsSnapshot): Promise<void> {
    this.snapshots.push(snapshot);
  }

  async publishAlert(event: AlertEvent): Promise<void> {
    this.alerts.push(event);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}

function testConfig(overrides: Record<string, string> = {}): MonitorConfig {
  return loadMonitorConfig({
    RPC_URLS: 'http://primary.test:8332,http://b.test:8332',
    TICK_INTERVAL_MS: '5',
    ERROR_BACKOFF_MS: '5',
    MIN_PROFIT: '0',
    HEALTH_PORT: '0',
    ...overrides,
  });
}

describe('SwarmMonitor', () => {
  let nodes: Record<string, SimulatedNode>;
  let sink: MemorySink;
  let logger: RecordingLogger;
  let monitor: SwarmMonitor;

  beforeEach(() => {
    nodes = {
      'primary.test': simulatedNode(5, 100),
      'b.test': simulatedNode(12, 80),
    };
    sink = new MemorySink();
    logger = new RecordingLogger();
    monitor = new SwarmMonitor(testConfig(), { logger, sink, fetchFn: simulatedFetch(nodes) });
  });

  afterEach(async () => {
    await monitor.stop();
  });

  it('probes every endpoint on start and routes to the best one', async () => {
    await monitor.start();

    const status = monitor.getStatus();
    expect(status.loopState).toBe('running');
    expect(status.lifecycle).toMatchObject({ state: 'running', serviceName: 'control-loop', transitionCount: 2 });
    expect(status.swarm.currentBest?.id).toBe('secondary-1');
    expect(status.swarm.endpoints.map(e => [e.id, e.connections])).toEqual([
      ['primary', 5],
      ['secondary-1', 12],
    ]);
    expect(monitor.healthCheck().status).toBe('healthy');
  });

  it('classifies pending records from the selected node and executes them on paper', async () => {
    nodes['b.test'].mempool.set('tx1', { txid: 'tx1', vout: [{ value: 30 }, { value: 20 }], fee: 0.001 });
    nodes['b.test'].mempool.set('tx2', { txid: 'tx2', vout: [{ value: 1 }] });

    await monitor.start();
    await waitFor(() => monitor.metrics.peek().categories.backrun.successes === 1);
    await monitor.stop();

    const last = sink.snapshots[sink.snapshots.length - 1];
    expect(last.opportunitiesFound).toBe(1);
    expect(last.totalProfit).toBeCloseTo(0.049, 10);
    expect(monitor.metrics.getRecentOpportunities('backrun').map(o => o.id)).toEqual(['backrun:tx1']);
    const paperLine = logger.getLogs('debug').find(entry => entry.msg === 'Paper execution');
    expect(paperLine?.bindings).toEqual({ component: 'handlers' });
    expect(paperLine?.meta).toMatchObject({ opportunityId: 'backrun:tx1', category: 'backrun' });
    expect(sink.closed).toBe(true);
  });

  it('reports degraded while the primary is unreachable', async () => {
    nodes['primary.test'].down = true;

    await monitor.start();

    expect(monitor.healthCheck()).toMatchObject({ status: 'degraded' });
    expect(logger.hasLogWithMeta('warn', { endpointId: 'primary', consecutiveFailures: 1 })).toBe(true);
  });

  it('reports unhealthy once stopped', async () => {
    await monitor.start();
    await monitor.stop();

    expect(monitor.healthCheck().status).toBe('unhealthy');
  });

  it('exposes a non-flushing metrics view', async () => {
    monitor.metrics.recordExecution('arbitrage', 'executed', 12, 1);

    const view = monitor.metricsView();

    expect(view.summary).toEqual({ avgLatencyMs: 12, successRate: 1, sampleCount: 1 });
    expect(monitor.metrics.peek().latencySamples).toEqual([12]);
  });
});

describe('createTelemetrySink', () => {
  class FakeRedis implements TelemetryRedisClient {
    constructor(readonly url: string, readonly options: RedisOptions) {}
    async hset(): Promise<number> {
      return 0;
    }
    async lpush(): Promise<number> {
      return 1;
    }
    async ltrim(): Promise<'OK'> {
      return 'OK';
    }
    async quit(): Promise<'OK'> {
      return 'OK';
    }
    on(): this {
      return this;
    }
  }

  it('logs telemetry without a Redis URL', () => {
    expect(createTelemetrySink(testConfig(), new RecordingLogger())).toBeInstanceOf(LoggingTelemetrySink);
  });

  it('writes to Redis when a URL is configured', () => {
    const config = testConfig({ REDIS_URL: 'redis://localhost:6379' });

    const created = createTelemetrySink(config, new RecordingLogger(), { RedisImpl: FakeRedis });
    expect(created).toBeInstanceOf(RedisTelemetrySink);
  });
});

describe('startHealthServer', () => {
  it('serves the metrics view on /metrics', async () => {
    const logger = new RecordingLogger();
    const monitor = new SwarmMonitor(testConfig(), { logger, sink: new MemorySink(), fetchFn: simulatedFetch({}) });
    monitor.metrics.recordExecution('backrun', 'executed', 8, 2);

    const server = startHealthServer(monitor, 0, logger);
    try {
      if (!server.listening) {
        await new Promise<void>(resolve => server.once('listening', () => resolve()));
      }
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;

      const body = await new Promise<string>((resolve, reject) => {
        http.get(`http://127.0.0.1:${port}/metrics`, res => {
          let data = '';
          res.on('data', chunk => (data += chunk));
          res.on('end', () => resolve(data));
        }).on('error', reject);
      });

      expect(JSON.parse(body)).toMatchObject({
        snapshot: { totalProfit: 2, latencySamples: [8] },
        summary: { avgLatencyMs: 8, successRate: 1, sampleCount: 1 },
      });
    } finally {
      await closeHealthServer(server);
    }
  });
});

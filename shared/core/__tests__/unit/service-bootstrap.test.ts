/**
 * Tests for Service Bootstrap Utilities
 *
 * Shutdown registration, the health server, the service runner and server close.
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import http from 'http';
import {
  setupServiceShutdown,
  runServiceMain,
  closeHealthServer,
  createSimpleHealthServer,
} from '../../src/service-lifecycle/service-bootstrap';
import type { SimpleHealthServerConfig } from '../../src/service-lifecycle/service-bootstrap';
import { RecordingLogger } from '../../src/logging/testing-logger';

const PROCESS_EVENTS = ['SIGTERM', 'SIGINT', 'uncaughtException', 'unhandledRejection'] as const;

function listenerCounts(): number[] {
  return PROCESS_EVENTS.map(event => process.listenerCount(event));
}

describe('service-bootstrap', () => {
  // ===========================================================================
  // setupServiceShutdown
  // ===========================================================================

  describe('setupServiceShutdown', () => {
    it('registers one handler per process event and removes them on cleanup', () => {
      const before = listenerCounts();

      const cleanup = setupServiceShutdown({
        logger: new RecordingLogger(),
        onShutdown: async () => undefined,
        serviceName: 'test-service',
      });
      expect(listenerCounts()).toEqual(before.map(count => count + 1));

      cleanup();
      expect(listenerCounts()).toEqual(before);
    });
  });

  // ===========================================================================
  // runServiceMain
  // ===========================================================================

  describe('runServiceMain', () => {
    const originalWorkerId = process.env.JEST_WORKER_ID;

    afterEach(() => {
      process.env.JEST_WORKER_ID = originalWorkerId;
      jest.restoreAllMocks();
    });

    it('skips execution under Jest', () => {
      const mainFn = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
      runServiceMain({ main: mainFn, serviceName: 'test-service', logger: new RecordingLogger() });
      expect(mainFn).not.toHaveBeenCalled();
    });

    it('logs a failing main and exits with 1', async () => {
      delete process.env.JEST_WORKER_ID;
      const exitSpy = jest.spyOn(process, 'exit').mockImplementation(() => undefined as never);
      const logger = new RecordingLogger();
      const failure = new Error('startup failed');

      runServiceMain({
        main: jest.fn<() => Promise<void>>().mockRejectedValue(failure),
        serviceName: 'test-service',
        logger,
      });
      await new Promise(resolve => setTimeout(resolve, 10));

      expect(logger.getLastLogAt('error')).toMatchObject({
        msg: 'Unhandled error in test-service',
        meta: { error: failure },
      });
      expect(exitSpy).toHaveBeenCalledWith(1);
    });

    it('falls back to console.error without a logger', async () => {
      delete process.env.JEST_WORKER_ID;
      jest.spyOn(process, 'exit').mockImplementation(() => undefined as never);
      const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const failure = new Error('no logger');

      runServiceMain({
        main: jest.fn<() => Promise<void>>().mockRejectedValue(failure),
        serviceName: 'test-service',
      });
      await new Promise(resolve => setTimeout(resolve, 10));

      expect(consoleSpy).toHaveBeenCalledWith('Unhandled error in test-service:', failure);
    });
  });

  // ===========================================================================
  // closeHealthServer
  // ===========================================================================

  describe('closeHealthServer', () => {
    it('resolves immediately with null server', async () => {
      await expect(closeHealthServer(null)).resolves.toBeUndefined();
    });

    it('closes a listening server', async () => {
      const server = http.createServer();
      await new Promise<void>(resolve => server.listen(0, resolve));

      await closeHealthServer(server);
      expect(server.listening).toBe(false);
    });
  });

  // ===========================================================================
  // createSimpleHealthServer
  // ===========================================================================

  describe('createSimpleHealthServer', () => {
    let server: http.Server | null = null;

    afterEach(async () => {
      await closeHealthServer(server);
      server = null;
    });

    function get(port: number, path: string): Promise<{ statusCode: number; body: unknown }> {
      return new Promise((resolve, reject) => {
        const req = http.get(`http://127.0.0.1:${port}${path}`, res => {
          let data = '';
          res.on('data', chunk => (data += chunk));
          res.on('end', () => {
            resolve({ statusCode: res.statusCode ?? 0, body: JSON.parse(data) });
          });
        });
        req.on('error', reject);
      });
    }

    async function start(overrides: Partial<SimpleHealthServerConfig> = {}): Promise<{ port: number; logger: RecordingLogger }> {
      const logger = new RecordingLogger();
      const created = createSimpleHealthServer({
        port: 0,
        serviceName: 'test-service',
        logger,
        healthCheck: () => ({ status: 'healthy' }),
        ...overrides,
      });
      server = created;

      if (!created.listening) {
        await new Promise<void>(resolve => created.once('listening', () => resolve()));
      }
      const address = created.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      return { port, logger };
    }

    it.each([
      ['healthy', 200],
      ['degraded', 200],
      ['unhealthy', 503],
    ])('/health maps %s to %d', async (status, expected) => {
      const { port } = await start({ healthCheck: () => ({ status, primary: 'B' }) });
      const { statusCode, body } = await get(port, '/health');

      expect(statusCode).toBe(expected);
      expect(body).toMatchObject({ service: 'test-service', status, primary: 'B' });
    });

    it('/health honours an explicit statusCode and leaves it out of the body', async () => {
      const { port } = await start({ healthCheck: () => ({ status: 'custom', statusCode: 418 }) });
      const { statusCode, body } = await get(port, '/health');

      expect(statusCode).toBe(418);
      expect(body).not.toHaveProperty('statusCode');
    });

    it('/health returns 500 when the check throws', async () => {
      const { port, logger } = await start({
        healthCheck: () => {
          throw new Error('probe table corrupt');
        },
      });
      const { statusCode, body } = await get(port, '/health');

      expect(statusCode).toBe(500);
      expect(body).toMatchObject({ status: 'error', error: 'Internal health check failed' });
      expect(logger.hasLogWithMeta('error', { error: 'probe table corrupt' })).toBe(true);
    });

    it('/ready reflects readyCheck', async () => {
      const { port } = await start({ readyCheck: () => false });
      const { statusCode, body } = await get(port, '/ready');

      expect(statusCode).toBe(503);
      expect(body).toEqual({ service: 'test-service', ready: false });
    });

    it('/ lists the endpoints including additional routes', async () => {
      const { port } = await start({
        description: 'Swarm monitor',
        additionalRoutes: {
          '/metrics': (_req, res) => {
            res.end('{}');
          },
        },
      });
      const { body } = await get(port, '/');

      expect(body).toEqual({
        service: 'test-service',
        description: 'Swarm monitor',
        endpoints: ['/health', '/ready', '/metrics'],
      });
    });

    it('serves additional routes and returns 404 for unknown paths', async () => {
      const { port } = await start({
        additionalRoutes: {
          '/metrics': (_req, res) => {
            res.writeHead(200, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify({ opportunitiesFound: 42 }));
          },
        },
      });

      expect(await get(port, '/metrics')).toEqual({ statusCode: 200, body: { opportunitiesFound: 42 } });
      expect(await get(port, '/nope')).toEqual({ statusCode: 404, body: { error: 'Not found' } });
    });

    it('returns 500 when an additional route throws', async () => {
      const { port } = await start({
        additionalRoutes: {
          '/metrics': () => {
            throw new Error('snapshot failed');
          },
        },
      });

      expect(await get(port, '/metrics')).toEqual({ statusCode: 500, body: { error: 'Internal server error' } });
    });
  });
});

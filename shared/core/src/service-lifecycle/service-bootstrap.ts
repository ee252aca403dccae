/**
 * Service Bootstrap Utilities
 *
 * Shutdown handling, signal registration, the health server and the
 * process entry-point wrapper shared by services.
 */

import { createServer, IncomingMessage, ServerResponse, Server } from 'http';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../resilience/error-handling';

// =============================================================================
// Types
// =============================================================================

export interface ServiceShutdownConfig {
  logger: ILogger;

  /** Async callback to run during shutdown (stop loops, close connections) */
  onShutdown: () => Promise<void>;

  serviceName: string;

  /** Max time (ms) to wait for graceful shutdown before force-exiting (default: 10000) */
  shutdownTimeoutMs?: number;
}

/**
 * Removes every handler registered by setupServiceShutdown.
 */
export type ServiceShutdownCleanup = () => void;

export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void | Promise<void>;

export interface SimpleHealthServerConfig {
  /** Port to listen on; 0 picks a free one */
  port: number;

  serviceName: string;

  logger: ILogger;

  /** Optional description for the root endpoint */
  description?: string;

  /**
   * Health check handler returning { status, statusCode?, ...data }.
   * Without statusCode, 'healthy' and 'degraded' map to 200, anything else to 503.
   */
  healthCheck: () => HealthCheckResult | Promise<HealthCheckResult>;

  /** Readiness check; ready when omitted */
  readyCheck?: () => boolean;

  /** Extra routes keyed by exact URL path, e.g. '/metrics' */
  additionalRoutes?: Record<string, RouteHandler>;
}

export interface HealthCheckResult {
  /** 'healthy', 'degraded', 'unhealthy', ... */
  status: string;

  /** Explicit HTTP status code; derived from status when omitted */
  statusCode?: number;

  [key: string]: unknown;
}

export interface RunServiceMainConfig {
  main: () => Promise<void>;

  serviceName: string;

  /** Falls back to console.error when omitted */
  logger?: ILogger;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Register SIGTERM/SIGINT/uncaughtException/unhandledRejection handlers.
 * The first signal runs onShutdown once and exits; later signals are ignored.
 * A force-exit timer bounds a hanging shutdown.
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    const forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${shutdownTimeoutMs}ms, forcing exit`);
      process.exit(1);
    }, shutdownTimeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      clearTimeout(forceExitTimer);
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      process.exit(1);
    }
  };

  const exitOnFailure = (error: unknown): void => {
    logger.fatal(`Shutdown handler failed in ${serviceName}`, { error: getErrorMessage(error) });
    process.exit(1);
  };

  const sigtermHandler = (): void => {
    shutdown('SIGTERM').catch(exitOnFailure);
  };
  const sigintHandler = (): void => {
    shutdown('SIGINT').catch(exitOnFailure);
  };
  const uncaughtHandler = (error: Error): void => {
    logger.error(`Uncaught exception in ${serviceName}`, {
      error: error.message,
      stack: error.stack,
    });
    shutdown('uncaughtException').catch(exitOnFailure);
  };
  const rejectionHandler = (reason: unknown): void => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  // 4 process handlers plus pino transport exit handlers
  process.setMaxListeners(Math.max(process.getMaxListeners(), 15));

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

// =============================================================================
// Simple Health Server
// =============================================================================

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * HTTP health server with:
 * - GET /health - liveness plus service data
 * - GET /ready - readiness
 * - GET / - service info with endpoint list
 * - additionalRoutes, matched by exact path
 */
export function createSimpleHealthServer(config: SimpleHealthServerConfig): Server {
  const { port, serviceName, logger, description, healthCheck, readyCheck, additionalRoutes } = config;

  const handleRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = req.url ?? '';

    const route = additionalRoutes?.[url];
    if (route) {
      try {
        await route(req, res);
      } catch (error) {
        logger.error('Route handler error', { url, error: getErrorMessage(error) });
        sendJson(res, 500, { error: 'Internal server error' });
      }
      return;
    }

    if (url === '/health') {
      try {
        const result = await healthCheck();
        const { statusCode: explicitStatus, ...responseData } = result;
        const statusCode = explicitStatus ??
          (result.status === 'healthy' || result.status === 'degraded' ? 200 : 503);

        sendJson(res, statusCode, {
          service: serviceName,
          ...responseData,
          timestamp: Date.now(),
        });
      } catch (error) {
        logger.error('Health check failed', { error: getErrorMessage(error) });
        sendJson(res, 500, {
          service: serviceName,
          status: 'error',
          error: 'Internal health check failed',
        });
      }
    } else if (url === '/ready') {
      const ready = readyCheck ? readyCheck() : true;
      sendJson(res, ready ? 200 : 503, { service: serviceName, ready });
    } else if (url === '/') {
      const endpoints = ['/health', '/ready'];
      if (additionalRoutes) {
        endpoints.push(...Object.keys(additionalRoutes));
      }
      sendJson(res, 200, {
        service: serviceName,
        description: description ?? `${serviceName} Service`,
        endpoints,
      });
    } else {
      sendJson(res, 404, { error: 'Not found' });
    }
  };

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error('Unhandled health server error', { error: getErrorMessage(error) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      }
    });
  });

  server.listen(port, () => {
    logger.debug(`${serviceName} health server listening on port ${port}`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    const errorCode = error.code;

    if (errorCode === 'EADDRINUSE') {
      logger.error('Health server port already in use', {
        port,
        service: serviceName,
        error: error.message,
        hint: `Another process is using port ${port}. Set HEALTH_PORT to a free port or 0 to disable.`,
      });
      process.exit(1);
    } else if (errorCode === 'EACCES') {
      logger.error('Health server port requires elevated privileges', {
        port,
        service: serviceName,
        error: error.message,
        hint: `Port ${port} requires root/admin privileges. Use a port > 1024.`,
      });
      process.exit(1);
    } else {
      logger.error('Health server error', {
        service: serviceName,
        code: errorCode,
        error: error.message,
      });
    }
  });

  return server;
}

// =============================================================================
// Service Runner
// =============================================================================

/**
 * Run a service's main() with a top-level catch that logs and exits 1.
 * Skipped when JEST_WORKER_ID is set so importing the entry point in tests
 * does not start the service.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    const message = `Unhandled error in ${serviceName}`;
    if (logger) {
      logger.error(message, { error });
    } else {
      console.error(`${message}:`, error);
    }
    process.exit(1);
  });
}

/**
 * Close an HTTP server, giving up after timeoutMs.
 */
export async function closeHealthServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server) {
    return;
  }

  await new Promise<void>((resolve) => {
    let resolved = false;
    const safeResolve = (): void => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    const timer = setTimeout(safeResolve, timeoutMs);

    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
  });
}

/**
 * Telemetry Sinks
 *
 * Destinations for metrics snapshots and alert events.
 *
 * RedisTelemetrySink layout (prefix defaults to "swarmwatch:"):
 * - `<prefix>metrics:latest`    hash, overwritten on every flush
 * - `<prefix>metrics:snapshots` list of JSON summaries, newest first, capped
 * - `<prefix>alerts`            list of JSON alert events, newest first, capped at 1000
 *
 * Write failures throw RedisOperationError; the caller decides whether a
 * lost snapshot matters.
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { OPPORTUNITY_CATEGORIES, SwarmWatchError } from '@swarmwatch/types';
import type { AlertEvent, MetricsSnapshot, TelemetrySink } from '@swarmwatch/types';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../resilience/error-handling';
import { opportunitiesPerHour, summarizeSamples } from '../metrics/metrics-aggregator';

export class RedisOperationError extends SwarmWatchError {
  constructor(
    public readonly operation: string,
    public readonly key: string,
    public readonly cause: unknown
  ) {
    super(
      `Redis ${operation} failed for key '${key}': ${getErrorMessage(cause)}`,
      'REDIS_OPERATION_ERROR',
      'telemetry-sink',
      true
    );
    this.name = 'RedisOperationError';
  }
}

/**
 * The slice of the ioredis client the sink uses.
 */
export interface TelemetryRedisClient {
  hset(key: string, values: Record<string, string>): Promise<number>;
  lpush(key: string, value: string): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<'OK'>;
  quit(): Promise<'OK'>;
}

export interface RedisTelemetrySinkOptions {
  keyPrefix?: string;
  /** Snapshot summaries kept in the history list (default 100) */
  snapshotHistory?: number;
  /** Alerts kept in the alert list (default 1000) */
  alertHistory?: number;
}

/**
 * Compact, JSON-friendly view of a snapshot. Raw sample arrays are reduced
 * to their summary.
 */
export function toSnapshotRecord(snapshot: MetricsSnapshot): Record<string, unknown> {
  return {
    flushedAt: snapshot.flushedAt,
    startedAt: snapshot.startedAt,
    windowStartedAt: snapshot.windowStartedAt,
    opportunitiesFound: snapshot.opportunitiesFound,
    opportunitiesPerHour: opportunitiesPerHour(snapshot),
    totalProfit: snapshot.totalProfit,
    ...summarizeSamples(snapshot),
    categories: snapshot.categories,
  };
}

export class RedisTelemetrySink implements TelemetrySink {
  private readonly keyPrefix: string;
  private readonly snapshotHistory: number;
  private readonly alertHistory: number;

  constructor(
    private readonly client: TelemetryRedisClient,
    private readonly logger: ILogger,
    options: RedisTelemetrySinkOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? 'swarmwatch:';
    this.snapshotHistory = options.snapshotHistory ?? 100;
    this.alertHistory = options.alertHistory ?? 1000;
  }

  get latestKey(): string {
    return `${this.keyPrefix}metrics:latest`;
  }

  get snapshotsKey(): string {
    return `${this.keyPrefix}metrics:snapshots`;
  }

  get alertsKey(): string {
    return `${this.keyPrefix}alerts`;
  }

  async publish(snapshot: MetricsSnapshot): Promise<void> {
    const summary = summarizeSamples(snapshot);
    const fields: Record<string, string> = {
      flushedAt: String(snapshot.flushedAt),
      startedAt: String(snapshot.startedAt),
      windowStartedAt: String(snapshot.windowStartedAt),
      opportunitiesFound: String(snapshot.opportunitiesFound),
      opportunitiesPerHour: String(opportunitiesPerHour(snapshot)),
      totalProfit: String(snapshot.totalProfit),
      avgLatencyMs: String(summary.avgLatencyMs),
      successRate: String(summary.successRate),
      sampleCount: String(summary.sampleCount),
    };
    for (const category of OPPORTUNITY_CATEGORIES) {
      fields[`category:${category}`] = JSON.stringify(snapshot.categories[category]);
    }

    await this.run('hset', this.latestKey, () => this.client.hset(this.latestKey, fields));
    await this.pushCapped(this.snapshotsKey, JSON.stringify(toSnapshotRecord(snapshot)), this.snapshotHistory);
    this.logger.debug('Published metrics snapshot', { flushedAt: snapshot.flushedAt });
  }

  async publishAlert(event: AlertEvent): Promise<void> {
    await this.pushCapped(this.alertsKey, JSON.stringify(event), this.alertHistory);
  }

  async close(): Promise<void> {
    await this.run('quit', '*', () => this.client.quit());
  }

  private async pushCapped(key: string, value: string, cap: number): Promise<void> {
    await this.run('lpush', key, () => this.client.lpush(key, value));
    await this.run('ltrim', key, () => this.client.ltrim(key, 0, cap - 1));
  }

  private async run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error('Redis telemetry write failed', { operation, key, error: getErrorMessage(error) });
      throw new RedisOperationError(operation, key, error);
    }
  }
}

// =============================================================================
// Construction from a URL
// =============================================================================

export type RedisConstructor = new (url: string, options: RedisOptions) => TelemetryRedisClient & {
  on(event: 'error', listener: (error: Error) => void): unknown;
};

export interface RedisSinkDeps {
  /** Redis constructor - defaults to ioredis Redis */
  RedisImpl?: RedisConstructor;
}

/**
 * Connect to Redis and wrap the client in a sink.
 */
export function createRedisTelemetrySink(
  url: string,
  logger: ILogger,
  options: RedisTelemetrySinkOptions = {},
  deps: RedisSinkDeps = {}
): RedisTelemetrySink {
  const RedisImpl = deps.RedisImpl ?? Redis;
  const client = new RedisImpl(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: false,
  });
  client.on('error', (error: Error) => {
    logger.warn('Redis connection error', { error: error.message });
  });
  return new RedisTelemetrySink(client, logger, options);
}

// =============================================================================
// Logging sink
// =============================================================================

/**
 * Sink used when no Redis URL is configured: snapshots and alerts become log lines.
 */
export class LoggingTelemetrySink implements TelemetrySink {
  constructor(private readonly logger: ILogger) {}

  async publish(snapshot: MetricsSnapshot): Promise<void> {
    const summary = summarizeSamples(snapshot);
    this.logger.info('Metrics snapshot', {
      opportunitiesFound: snapshot.opportunitiesFound,
      opportunitiesPerHour: Number(opportunitiesPerHour(snapshot).toFixed(2)),
      totalProfit: snapshot.totalProfit,
      avgLatencyMs: Number(summary.avgLatencyMs.toFixed(2)),
      successRate: Number(summary.successRate.toFixed(4)),
      sampleCount: summary.sampleCount,
    });
  }

  async publishAlert(event: AlertEvent): Promise<void> {
    const meta = { alertType: event.type, ...event.details };
    switch (event.severity) {
      case 'critical':
        this.logger.error(event.message, meta);
        break;
      case 'warning':
        this.logger.warn(event.message, meta);
        break;
      default:
        this.logger.info(event.message, meta);
    }
  }
}

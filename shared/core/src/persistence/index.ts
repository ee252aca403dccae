/**
 * Persistence Module
 *
 * Telemetry sinks for metrics snapshots and alerts.
 *
 * @module persistence
 */

export {
  RedisTelemetrySink,
  LoggingTelemetrySink,
  RedisOperationError,
  createRedisTelemetrySink,
  toSnapshotRecord
} from './telemetry-sinks';
export type {
  RedisConstructor,
  RedisSinkDeps,
  RedisTelemetrySinkOptions,
  TelemetryRedisClient
} from './telemetry-sinks';

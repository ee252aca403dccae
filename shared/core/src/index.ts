/**
 * @swarmwatch/core - Core Library
 *
 * Public API for the swarm monitor. Exports are grouped by concern:
 * infrastructure (logging, async, resilience), the request router, the
 * analysis pipeline, telemetry and the service lifecycle.
 *
 * RecordingLogger is exported alongside the production logger so service
 * tests can inject it; NullLogger backs optional loggers.
 *
 * @module @swarmwatch/core
 */

// #############################################################################
// #                                                                           #
// #                    SECTION 1: CORE INFRASTRUCTURE                         #
// #                                                                           #
// #############################################################################

// =============================================================================
// 1.1 Logging
// =============================================================================

export {
  createPinoLogger,
  resetLoggerCache,
  isLogLevel,
  LOG_LEVELS,
  REDACT_PATHS,
  RecordingLogger,
  NullLogger
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// 1.2 Async Primitives
// =============================================================================

export { mapConcurrent } from './async';

// =============================================================================
// 1.3 Resilience
// =============================================================================

export { getErrorMessage, isRetryableError, formatErrorForLog } from './resilience';

// =============================================================================
// 1.4 Data Structures
// =============================================================================

export { CircularBuffer } from './data-structures';

// #############################################################################
// #                                                                           #
// #                    SECTION 2: ROUTING                                     #
// #                                                                           #
// #############################################################################

export { JsonRpcClient, JsonRpcResponseSchema } from './rpc';
export type {
  FetchFn,
  JsonRpcClientOptions,
  JsonRpcRequest,
  JsonRpcResponse,
  RpcTarget,
  RpcTransport
} from './rpc';

export { HealthProbe, DEFAULT_PROBE_QUERIES, SwarmRouter, DEFAULT_SCORE_WEIGHTS } from './monitoring';
export type {
  ProbeQueries,
  ProbeQuery,
  EndpointProber,
  RefreshOptions,
  SwarmRouterOptions
} from './monitoring';

// #############################################################################
// #                                                                           #
// #                    SECTION 3: ANALYSIS PIPELINE                           #
// #                                                                           #
// #############################################################################

export {
  OpportunityQueue,
  QUEUE_CLOSED,
  DEFAULT_QUEUE_CAPACITY,
  WorkerPool,
  DEFAULT_WORKER_POOL_SIZE,
  DEFAULT_OPPORTUNITY_TTL_MS
} from './pipeline';
export type {
  QueueClosed,
  QueueStats,
  WorkerPoolOptions,
  WorkerPoolStats,
  WorkerPoolStopOptions
} from './pipeline';

export { MetricsAggregator, opportunitiesPerHour, summarizeSamples } from './metrics';
export type { ExecutionOutcome, MetricsAggregatorOptions, SampleSummary } from './metrics';

// #############################################################################
// #                                                                           #
// #                    SECTION 4: TELEMETRY & ALERTS                          #
// #                                                                           #
// #############################################################################

export {
  RedisTelemetrySink,
  LoggingTelemetrySink,
  RedisOperationError,
  createRedisTelemetrySink,
  toSnapshotRecord
} from './persistence';
export type {
  RedisConstructor,
  RedisSinkDeps,
  RedisTelemetrySinkOptions,
  TelemetryRedisClient
} from './persistence';

export { AlertCooldownManager, AlertDispatcher } from './alerts';
export type { AlertCooldownManagerConfig, RaiseAlertInput } from './alerts';

// #############################################################################
// #                                                                           #
// #                    SECTION 5: SERVICE LIFECYCLE                           #
// #                                                                           #
// #############################################################################

export {
  ServiceState,
  ServiceStateManager,
  setupServiceShutdown,
  createSimpleHealthServer,
  runServiceMain,
  closeHealthServer
} from './service-lifecycle';
export type {
  StateChangeEvent,
  StateTransitionResult,
  ServiceStateSnapshot,
  ServiceShutdownConfig,
  ServiceShutdownCleanup,
  SimpleHealthServerConfig,
  HealthCheckResult,
  RouteHandler,
  RunServiceMainConfig
} from './service-lifecycle';

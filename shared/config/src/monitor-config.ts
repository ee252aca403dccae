/**
 * Monitor Configuration
 *
 * Builds the structured MonitorConfig from environment variables.
 * Validation happens once, at startup; every failing variable is reported
 * together in a single ConfigValidationError.
 */

import { ConfigValidationError } from '@swarmwatch/types';
import type { EndpointDescriptor } from '@swarmwatch/types';
import { MonitorEnvSchema, validateWithDetails } from './schemas';
import type { MonitorEnv } from './schemas';

export type LogLevel = MonitorEnv['LOG_LEVEL'];

export interface ScoreWeights {
  connections: number;
  backlog: number;
  latency: number;
}

export interface RpcConfig {
  user?: string;
  password?: string;
  /** Per-call timeout, also used by health probes */
  timeoutMs: number;
}

export interface RouterConfig {
  healthRefreshIntervalMs: number;
  admissionLatencyMs: number;
  weights: ScoreWeights;
}

export interface PipelineConfig {
  queueCapacity: number;
  enqueueTimeoutMs: number;
  workerPoolSize: number;
  /** Effective classification width (already doubled when deepAnalysis is set) */
  fanOutConcurrency: number;
  deepAnalysis: boolean;
  batchSize: number;
  opportunityTtlMs: number;
  minProfit: number;
}

export interface LoopConfig {
  tickIntervalMs: number;
  errorBackoffMs: number;
  metricsFlushIntervalMs: number;
  reportIntervalMs: number;
}

export interface MonitorConfig {
  endpoints: EndpointDescriptor[];
  rpc: RpcConfig;
  router: RouterConfig;
  pipeline: PipelineConfig;
  loop: LoopConfig;
  /** 0 disables the progress percentage */
  targetProfit: number;
  alertCooldownMs: number;
  redisUrl?: string;
  /** 0 disables the health server */
  healthPort: number;
  logLevel: LogLevel;
}

/**
 * Turn the RPC URL list into endpoint descriptors, primary first.
 */
export function buildEndpointDescriptors(urls: readonly string[]): EndpointDescriptor[] {
  return urls.map((address, index) => ({
    id: index === 0 ? 'primary' : `secondary-${index}`,
    address,
    role: index === 0 ? 'primary' : 'secondary',
  }));
}

/**
 * Load and validate the monitor configuration.
 *
 * @throws ConfigValidationError listing every invalid variable
 */
export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const result = validateWithDetails(MonitorEnvSchema, env);
  if (!result.success || !result.data) {
    const issues = (result.errors ?? []).map((e) => `${e.path}: ${e.message}`);
    throw new ConfigValidationError(issues);
  }
  const e = result.data;

  return {
    endpoints: buildEndpointDescriptors(e.RPC_URLS),
    rpc: {
      user: e.RPC_USER,
      password: e.RPC_PASSWORD,
      timeoutMs: e.RPC_TIMEOUT_MS,
    },
    router: {
      healthRefreshIntervalMs: e.HEALTH_REFRESH_INTERVAL_MS,
      admissionLatencyMs: e.ADMISSION_LATENCY_MS,
      weights: {
        connections: e.SCORE_WEIGHT_CONNECTIONS,
        backlog: e.SCORE_WEIGHT_BACKLOG,
        latency: e.SCORE_WEIGHT_LATENCY,
      },
    },
    pipeline: {
      queueCapacity: e.QUEUE_CAPACITY,
      enqueueTimeoutMs: e.ENQUEUE_TIMEOUT_MS,
      workerPoolSize: e.WORKER_POOL_SIZE,
      fanOutConcurrency: e.DEEP_ANALYSIS ? e.FAN_OUT_CONCURRENCY * 2 : e.FAN_OUT_CONCURRENCY,
      deepAnalysis: e.DEEP_ANALYSIS,
      batchSize: e.BATCH_SIZE,
      opportunityTtlMs: e.OPPORTUNITY_TTL_MS,
      minProfit: e.MIN_PROFIT,
    },
    loop: {
      tickIntervalMs: e.TICK_INTERVAL_MS,
      errorBackoffMs: e.ERROR_BACKOFF_MS,
      metricsFlushIntervalMs: e.METRICS_FLUSH_INTERVAL_MS,
      reportIntervalMs: e.REPORT_INTERVAL_MS,
    },
    targetProfit: e.TARGET_PROFIT,
    alertCooldownMs: e.ALERT_COOLDOWN_MS,
    redisUrl: e.REDIS_URL,
    healthPort: e.HEALTH_PORT,
    logLevel: e.LOG_LEVEL,
  };
}

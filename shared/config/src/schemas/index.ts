/**
 * Zod Schemas for Monitor Configuration
 *
 * Every environment variable the monitor reads is declared here with its
 * default. Raw process.env values are strings, so numeric and boolean
 * entries coerce; blank strings count as unset.
 *
 * @see ../monitor-config.ts - builds the structured MonitorConfig from the parsed env
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * RPC URL schema (HTTP or HTTPS).
 */
export const RpcUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'RPC URL must start with http:// or https://');

/**
 * Redis URL schema.
 */
export const RedisUrlSchema = z
  .string()
  .regex(/^rediss?:\/\//, 'Redis URL must start with redis:// or rediss://');

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

/**
 * Integer env var with a default and an inclusive lower bound.
 */
export function envInt(defaultValue: number, min = 0) {
  return z.preprocess(
    blankToUndefined,
    z.coerce.number().int('Value must be an integer').min(min, `Value must be >= ${min}`).default(defaultValue)
  );
}

/**
 * Finite float env var with a default.
 */
export function envFloat(defaultValue: number, min = Number.NEGATIVE_INFINITY) {
  return z.preprocess(
    blankToUndefined,
    z.coerce.number().finite('Value must be a finite number').min(min, `Value must be >= ${min}`).default(defaultValue)
  );
}

/**
 * Boolean env var: true/false/1/0, case-insensitive.
 */
export function envBool(defaultValue: boolean) {
  return z.preprocess(
    (value) => {
      const v = blankToUndefined(value);
      return typeof v === 'string' ? v.trim().toLowerCase() : v;
    },
    z
      .enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'Expected true, false, 1 or 0' }) })
      .default(defaultValue ? 'true' : 'false')
      .transform((v) => v === 'true' || v === '1')
  );
}

function envOptionalString() {
  return z.preprocess(blankToUndefined, z.string().optional());
}

// =============================================================================
// Environment Schema
// =============================================================================

/**
 * Comma separated RPC URL list; the first entry is the primary.
 */
export const RpcUrlListSchema = z
  .string({ required_error: 'RPC_URLS is required' })
  .transform((raw) => raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0))
  .pipe(z.array(RpcUrlSchema).min(1, 'At least one RPC URL is required'));

export const MonitorEnvSchema = z.object({
  RPC_URLS: RpcUrlListSchema,
  RPC_USER: envOptionalString(),
  RPC_PASSWORD: envOptionalString(),
  RPC_TIMEOUT_MS: envInt(5000, 1),

  HEALTH_REFRESH_INTERVAL_MS: envInt(15000, 1),
  ADMISSION_LATENCY_MS: envInt(1000, 0),
  SCORE_WEIGHT_CONNECTIONS: envFloat(1),
  SCORE_WEIGHT_BACKLOG: envFloat(0.01),
  SCORE_WEIGHT_LATENCY: envFloat(1),

  METRICS_FLUSH_INTERVAL_MS: envInt(30000, 1),
  REPORT_INTERVAL_MS: envInt(120000, 1),
  TICK_INTERVAL_MS: envInt(50, 0),
  ERROR_BACKOFF_MS: envInt(100, 0),

  QUEUE_CAPACITY: envInt(1000, 1),
  ENQUEUE_TIMEOUT_MS: envInt(1000, 0),
  WORKER_POOL_SIZE: envInt(20, 1),
  FAN_OUT_CONCURRENCY: envInt(20, 1),
  DEEP_ANALYSIS: envBool(false),
  BATCH_SIZE: envInt(500, 1),
  OPPORTUNITY_TTL_MS: envInt(30000, 1),
  MIN_PROFIT: envFloat(0.001),
  TARGET_PROFIT: envFloat(0, 0),

  ALERT_COOLDOWN_MS: envInt(300000, 0),
  REDIS_URL: z.preprocess(blankToUndefined, RedisUrlSchema.optional()),
  HEALTH_PORT: envInt(3010, 0).pipe(z.number().max(65535, 'Port must be <= 65535')),
  LOG_LEVEL: z.preprocess(blankToUndefined, LogLevelSchema.default('info')),
});

export type MonitorEnv = z.infer<typeof MonitorEnvSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Validate data against a schema and return detailed result.
 * Does NOT throw - returns result object for handling.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Pino Logger Implementation
 *
 * - One cached pino instance per service name
 * - JSON output in production, pino-pretty when NODE_ENV=development
 * - RPC URLs and credentials are redacted
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import { isLogLevel } from './types';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

// =============================================================================
// Options
// =============================================================================

const serializers: LoggerOptions['serializers'] = {
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
};

/**
 * Paths censored in every entry. Endpoint addresses may embed basic-auth
 * credentials, so they are redacted along with explicit secrets.
 */
export const REDACT_PATHS: readonly string[] = [
  'address', '*.address',
  'url', '*.url',
  'rpcUrl', '*.rpcUrl',
  'redisUrl', '*.redisUrl',
  'password', '*.password',
  'authorization', '*.authorization',
  'headers.authorization',
];

function resolveLevel(level: LoggerConfig['level']): LogLevel | 'silent' {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv === 'silent') return 'silent';
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts pino to the ILogger interface.
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.fatal(meta, msg);
    } else {
      this.pino.fatal(msg);
    }
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.error(meta, msg);
    } else {
      this.pino.error(msg);
    }
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.warn(meta, msg);
    } else {
      this.pino.warn(msg);
    }
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.info(meta, msg);
    } else {
      this.pino.info(msg);
    }
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.debug(meta, msg);
    } else {
      this.pino.debug(msg);
    }
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.trace(meta, msg);
    } else {
      this.pino.trace(msg);
    }
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a pino-backed logger.
 *
 * Calling with the same name returns the cached instance (or a child of it
 * when bindings are given).
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('swarm-monitor');
 * const routerLogger = createPinoLogger({ name: 'swarm-monitor', bindings: { component: 'router' } });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const normalizedConfig: LoggerConfig = typeof config === 'string'
    ? { name: config }
    : config;

  const { name, level, pretty, bindings } = normalizedConfig;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  // LOG_FORMAT=json forces JSON output even in development
  const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: resolveLevel(level),
    serializers,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: name,
      pid: process.pid,
    },
    redact: {
      paths: [...REDACT_PATHS],
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  const logger = new PinoLoggerWrapper(pino(options));
  loggerCache.set(name, logger);

  // The child is not cached
  return bindings ? logger.child(bindings) : logger;
}

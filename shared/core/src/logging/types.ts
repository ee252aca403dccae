/**
 * Logger Type Definitions
 *
 * ILogger decouples components from the logging library. Components take a
 * logger in their constructor; production passes a pino-backed logger, tests
 * pass a RecordingLogger.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class SwarmRouter {
 *   constructor(private logger: ILogger) {}
 * }
 *
 * // Production
 * new SwarmRouter(createPinoLogger('swarm-router'));
 *
 * // Test
 * const logger = new RecordingLogger();
 * new SwarmRouter(logger);
 * expect(logger.hasLogMatching('warn', /probe failed/)).toBe(true);
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context.
   * The context is merged into every log entry from the child.
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   * Useful for avoiding expensive computations for disabled levels.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Service/module name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output. 'silent' disables output.
   * @default process.env.LOG_LEVEL, then 'info'
   */
  level?: LogLevel | 'silent';

  /**
   * Enable pretty printing (development mode).
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}

/**
 * Logging Module
 *
 * Production code uses createPinoLogger() (cached pino instances). Tests
 * inject RecordingLogger; NullLogger is the default where a logger is optional.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';
export { isLogLevel, LOG_LEVELS } from './types';

export {
  createPinoLogger,
  resetLoggerCache,
  REDACT_PATHS,
} from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';

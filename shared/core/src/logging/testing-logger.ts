/**
 * Testing Logger Implementations
 *
 * RecordingLogger captures entries in memory for assertions; NullLogger
 * discards everything. Both are injected through constructors, so tests
 * never need jest.mock() on the logging module.
 */

import type { ILogger, LogLevel, LogMeta } from './types';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta?: LogMeta;
  timestamp: number;
  /** Child logger bindings (if from a child logger) */
  bindings?: LogMeta;
}

// =============================================================================
// RecordingLogger
// =============================================================================

/**
 * Captures every entry in memory. Children share the parent's entry list.
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const pool = new WorkerPool(queue, handlers, metrics, { logger });
 * // ...
 * expect(logger.getLogs('error')).toHaveLength(0);
 * expect(logger.hasLogMatching('warn', /unknown category/)).toBe(true);
 * ```
 */
export class RecordingLogger implements ILogger {
  private logs: LogEntry[] = [];
  private readonly bindings: LogMeta;

  constructor(bindings?: LogMeta) {
    this.bindings = bindings ?? {};
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.record('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.record('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.record('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.record('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.record('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.record('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    const child = new RecordingLogger({ ...this.bindings, ...bindings });
    child.logs = this.logs;
    return child;
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return true;
  }

  private record(level: LogLevel, msg: string, meta?: LogMeta): void {
    this.logs.push({
      level,
      msg,
      meta: meta ? { ...meta } : undefined,
      timestamp: Date.now(),
      bindings: Object.keys(this.bindings).length > 0 ? { ...this.bindings } : undefined,
    });
  }

  getAllLogs(): ReadonlyArray<LogEntry> {
    return [...this.logs];
  }

  getLogs(level: LogLevel): ReadonlyArray<LogEntry> {
    return this.logs.filter(log => log.level === level);
  }

  getWarnings(): ReadonlyArray<LogEntry> {
    return this.getLogs('warn');
  }

  /**
   * Check if any entry at `level` has a message matching the pattern.
   */
  hasLogMatching(level: LogLevel, pattern: string | RegExp): boolean {
    return this.getLogs(level).some(log => {
      if (typeof pattern === 'string') {
        return log.msg.includes(pattern);
      }
      return pattern.test(log.msg);
    });
  }

  /**
   * Check if any entry at `level` carries all the given metadata values.
   */
  hasLogWithMeta(level: LogLevel, meta: LogMeta): boolean {
    return this.getLogs(level).some(log => {
      const logMeta = log.meta;
      if (!logMeta) return false;
      return Object.entries(meta).every(([key, value]) => logMeta[key] === value);
    });
  }

  getLastLogAt(level: LogLevel): LogEntry | undefined {
    const logsAtLevel = this.getLogs(level);
    return logsAtLevel[logsAtLevel.length - 1];
  }

  clear(): void {
    this.logs.length = 0;
  }

  get count(): number {
    return this.logs.length;
  }

  countAt(level: LogLevel): number {
    return this.getLogs(level).length;
  }
}

// =============================================================================
// NullLogger
// =============================================================================

export class NullLogger implements ILogger {
  fatal(_msg: string, _meta?: LogMeta): void { /* noop */ }
  error(_msg: string, _meta?: LogMeta): void { /* noop */ }
  warn(_msg: string, _meta?: LogMeta): void { /* noop */ }
  info(_msg: string, _meta?: LogMeta): void { /* noop */ }
  debug(_msg: string, _meta?: LogMeta): void { /* noop */ }
  trace(_msg: string, _meta?: LogMeta): void { /* noop */ }

  child(_bindings: LogMeta): ILogger {
    return this;
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}

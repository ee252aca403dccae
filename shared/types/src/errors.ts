// Error taxonomy for the router and the analysis pipeline

/**
 * Base error class for all SwarmWatch errors.
 *
 * @example
 * ```typescript
 * throw new SwarmWatchError(
 *   'Endpoint returned malformed payload',
 *   'PROBE_ERROR',
 *   'health-probe',
 *   true // retryable
 * );
 * ```
 */
export class SwarmWatchError extends Error {
  constructor(
    message: string,
    public code: string,
    public component: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'SwarmWatchError';
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Endpoint unreachable, timed out or returned an unusable health payload.
 * Contained by the router: logged and reflected in the endpoint's stale flag.
 */
export class ProbeError extends SwarmWatchError {
  constructor(
    message: string,
    public readonly endpointId: string,
    public readonly cause?: unknown
  ) {
    super(message, 'PROBE_ERROR', 'health-probe', true);
    this.name = 'ProbeError';
  }
}

/**
 * JSON-RPC call failed, after the single fallback to the primary where one applied.
 * Surfaced to the immediate caller, which decides whether to retry or skip.
 */
export class RpcError extends SwarmWatchError {
  constructor(
    message: string,
    public readonly method: string,
    /** Endpoint ids tried, in order */
    public readonly attempts: string[],
    public readonly causes: unknown[] = [],
    /** JSON-RPC error code when the node answered with an error object */
    public readonly rpcCode?: number
  ) {
    super(message, 'RPC_ERROR', 'swarm-router', true);
    this.name = 'RpcError';
  }
}

/**
 * Backpressure signal: the bounded queue stayed full for the whole enqueue timeout.
 */
export class QueueFullError extends SwarmWatchError {
  constructor(
    public readonly capacity: number,
    public readonly timeoutMs: number
  ) {
    super(
      `Queue full: capacity ${capacity} still saturated after ${timeoutMs}ms`,
      'QUEUE_FULL',
      'opportunity-queue',
      true
    );
    this.name = 'QueueFullError';
  }
}

/**
 * The queue was closed for shutdown; no further items are accepted.
 */
export class QueueClosedError extends SwarmWatchError {
  constructor() {
    super('Queue is closed', 'QUEUE_CLOSED', 'opportunity-queue', false);
    this.name = 'QueueClosedError';
  }
}

/**
 * One opportunity's handler failed. Never propagates beyond the worker.
 */
export class HandlerError extends SwarmWatchError {
  constructor(
    message: string,
    public readonly opportunityId: string,
    public readonly cause?: unknown
  ) {
    super(message, 'HANDLER_ERROR', 'worker-pool', false);
    this.name = 'HandlerError';
  }
}

/**
 * Classifier threw for one record. Treated as "no opportunity found".
 */
export class ClassifierError extends SwarmWatchError {
  constructor(
    message: string,
    public readonly recordId: string,
    public readonly cause?: unknown
  ) {
    super(message, 'CLASSIFIER_ERROR', 'classifier', false);
    this.name = 'ClassifierError';
  }
}

/**
 * Configuration failed validation at startup.
 */
export class ConfigValidationError extends SwarmWatchError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID', 'config', false);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Timeout error for async operations that exceed their time limit.
 *
 * @example
 * ```typescript
 * throw new TimeoutError('getmempoolinfo', 5000, 'json-rpc');
 * ```
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional component name for context */
    public readonly component?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${component ? ` in ${component}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Swarm Router
 *
 * Holds the endpoint set, refreshes health samples on an interval, scores
 * admissible endpoints and routes JSON-RPC calls to the current best one
 * with a single fallback to the primary.
 *
 * Score: connections * wC + backlogSize * wB - latencySeconds * wL.
 * A secondary is admissible only once probed, while not stale, with at
 * least one connection and latency within the admission bound. The primary
 * is always admissible, so selection never yields null.
 *
 * Endpoint samples are written only inside refreshHealth(), and at most one
 * refresh is in flight at a time; readers get frozen copies.
 */

import { RpcError, SwarmWatchError } from '@swarmwatch/types';
import type { Endpoint, EndpointDescriptor, HealthSample, SwarmState } from '@swarmwatch/types';
import type { ScoreWeights } from '@swarmwatch/config';
import type { ILogger } from '../logging/types';
import type { RpcTransport } from '../rpc/json-rpc-client';
import { getErrorMessage } from '../resilience/error-handling';

export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  connections: 1,
  backlog: 0.01,
  latency: 1,
};

export interface SwarmRouterOptions {
  logger: ILogger;
  /** @default 15000 */
  healthRefreshIntervalMs?: number;
  /** @default 1000 */
  admissionLatencyMs?: number;
  weights?: ScoreWeights;
}

/**
 * Anything that can produce a health sample for an endpoint.
 */
export interface EndpointProber {
  probe(endpoint: Pick<Endpoint, 'id' | 'address'>): Promise<HealthSample>;
}

export interface RefreshOptions {
  /** Ignore the refresh interval */
  force?: boolean;
}

export class SwarmRouter {
  private readonly logger: ILogger;
  private readonly refreshIntervalMs: number;
  private readonly admissionLatencyMs: number;
  private readonly weights: ScoreWeights;

  private readonly endpoints: Endpoint[];
  private readonly primary: Endpoint;
  private currentBest: Endpoint | null = null;
  private lastRefreshAt = 0;

  private inFlightRefresh: Promise<boolean> | null = null;

  constructor(
    descriptors: readonly EndpointDescriptor[],
    private readonly prober: EndpointProber,
    private readonly transport: RpcTransport,
    options: SwarmRouterOptions
  ) {
    const primaries = descriptors.filter(d => d.role === 'primary');
    if (primaries.length !== 1) {
      throw new SwarmWatchError(
        `Swarm needs exactly one primary endpoint, got ${primaries.length}`,
        'INVALID_SWARM',
        'swarm-router'
      );
    }

    // Primary first, then secondaries in configured order
    this.endpoints = [...primaries, ...descriptors.filter(d => d.role !== 'primary')].map(d => ({
      id: d.id,
      address: d.address,
      role: d.role,
      connections: 0,
      chainHeight: 0,
      backlogSize: 0,
      latencyMs: 0,
      lastProbeTime: 0,
      stale: false,
      consecutiveFailures: 0,
    }));
    this.primary = this.endpoints[0];

    this.logger = options.logger;
    this.refreshIntervalMs = options.healthRefreshIntervalMs ?? 15000;
    this.admissionLatencyMs = options.admissionLatencyMs ?? 1000;
    this.weights = options.weights ?? DEFAULT_SCORE_WEIGHTS;
  }

  // ===========================================================================
  // Health refresh
  // ===========================================================================

  isRefreshDue(now: number = Date.now()): boolean {
    return this.lastRefreshAt === 0 || now - this.lastRefreshAt >= this.refreshIntervalMs;
  }

  /**
   * Probe every endpoint concurrently, then reselect the best one.
   * A no-op unless the interval has elapsed (or force is set). Callers that
   * overlap an in-flight refresh share its result.
   *
   * @returns true when a refresh ran (or was joined), false when skipped
   */
  refreshHealth(options: RefreshOptions = {}): Promise<boolean> {
    if (this.inFlightRefresh) {
      return this.inFlightRefresh;
    }
    if (!options.force && !this.isRefreshDue()) {
      return Promise.resolve(false);
    }

    const refresh = this.probeAll().finally(() => {
      this.inFlightRefresh = null;
    });
    this.inFlightRefresh = refresh;
    return refresh;
  }

  private async probeAll(): Promise<boolean> {
    this.lastRefreshAt = Date.now();
    await Promise.all(this.endpoints.map(endpoint => this.probeOne(endpoint)));
    this.selectBest();
    return true;
  }

  /**
   * Never rejects: a failed probe keeps the previous sample and marks it stale.
   */
  private async probeOne(endpoint: Endpoint): Promise<void> {
    const startedAt = Date.now();
    try {
      const sample = await this.prober.probe(endpoint);
      const finishedAt = Date.now();
      endpoint.connections = sample.connections;
      endpoint.chainHeight = sample.chainHeight;
      endpoint.backlogSize = sample.backlogSize;
      endpoint.latencyMs = finishedAt - startedAt;
      endpoint.lastProbeTime = finishedAt;
      endpoint.stale = false;
      endpoint.consecutiveFailures = 0;
    } catch (error) {
      endpoint.stale = true;
      endpoint.consecutiveFailures++;
      this.logger.warn('Endpoint probe failed', {
        endpointId: endpoint.id,
        role: endpoint.role,
        consecutiveFailures: endpoint.consecutiveFailures,
        error: getErrorMessage(error),
      });
    }
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  score(endpoint: Readonly<Endpoint>): number {
    return (
      this.weights.connections * endpoint.connections +
      this.weights.backlog * endpoint.backlogSize -
      this.weights.latency * (endpoint.latencyMs / 1000)
    );
  }

  isAdmissible(endpoint: Readonly<Endpoint>): boolean {
    if (endpoint.role === 'primary') return true;
    return (
      endpoint.lastProbeTime > 0 &&
      !endpoint.stale &&
      endpoint.connections > 0 &&
      endpoint.latencyMs <= this.admissionLatencyMs
    );
  }

  /**
   * Recompute currentBest. Equal scores keep the current best.
   */
  selectBest(): Readonly<Endpoint> {
    const previous = this.currentBest;
    let best: Endpoint | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;

    if (previous && this.isAdmissible(previous)) {
      best = previous;
      bestScore = this.score(previous);
    }

    for (const endpoint of this.endpoints) {
      if (endpoint === best || !this.isAdmissible(endpoint)) continue;
      const score = this.score(endpoint);
      if (score > bestScore) {
        best = endpoint;
        bestScore = score;
      }
    }

    const selected = best ?? this.primary;
    this.currentBest = selected;

    if (selected !== previous) {
      this.logger.info('Selected best endpoint', {
        endpointId: selected.id,
        previousId: previous?.id ?? null,
        score: Number(bestScore.toFixed(4)),
      });
    }
    return { ...selected };
  }

  // ===========================================================================
  // Routing
  // ===========================================================================

  /**
   * Send a JSON-RPC call to explicitTarget, else currentBest, else primary.
   * A failure on a non-primary target is retried exactly once on the primary.
   *
   * @param explicitTarget - Endpoint id to pin the call to
   * @throws RpcError carrying every attempt's cause
   */
  async call(method: string, params: unknown[] = [], explicitTarget?: string): Promise<unknown> {
    const target = this.resolveTarget(explicitTarget);
    const attempts: string[] = [target.id];
    const causes: unknown[] = [];

    try {
      return await this.transport.call(target, method, params);
    } catch (error) {
      causes.push(error);
      if (target === this.primary) {
        throw this.toRpcError(method, attempts, causes);
      }
      this.logger.warn('RPC call failed, falling back to primary', {
        method,
        endpointId: target.id,
        error: getErrorMessage(error),
      });
    }

    attempts.push(this.primary.id);
    try {
      return await this.transport.call(this.primary, method, params);
    } catch (error) {
      causes.push(error);
      throw this.toRpcError(method, attempts, causes);
    }
  }

  private resolveTarget(explicitTarget?: string): Endpoint {
    if (explicitTarget !== undefined) {
      const pinned = this.endpoints.find(e => e.id === explicitTarget);
      if (!pinned) {
        throw new RpcError(`Unknown endpoint '${explicitTarget}'`, 'resolve', []);
      }
      return pinned;
    }
    return this.currentBest ?? this.primary;
  }

  private toRpcError(method: string, attempts: string[], causes: unknown[]): RpcError {
    const last = causes[causes.length - 1];
    const rpcCode = last instanceof RpcError ? last.rpcCode : undefined;
    return new RpcError(
      `${method} failed on ${attempts.join(' -> ')}: ${getErrorMessage(last)}`,
      method,
      attempts,
      causes,
      rpcCode
    );
  }

  // ===========================================================================
  // Read-only views
  // ===========================================================================

  getPrimary(): Readonly<Endpoint> {
    return { ...this.primary };
  }

  getCurrentBest(): Readonly<Endpoint> | null {
    return this.currentBest ? { ...this.currentBest } : null;
  }

  getState(): SwarmState {
    return {
      endpoints: this.endpoints.map(e => Object.freeze({ ...e })),
      currentBest: this.currentBest ? Object.freeze({ ...this.currentBest }) : null,
      lastRefreshAt: this.lastRefreshAt,
    };
  }
}

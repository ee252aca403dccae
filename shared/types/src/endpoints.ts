// Upstream endpoint types shared by the router, the probe and reporting

/**
 * Role of an upstream endpoint within the swarm.
 * The primary is always admissible and is the fallback target for failed calls.
 */
export type EndpointRole = 'primary' | 'secondary';

/**
 * Liveness/load sample returned by a single health probe.
 */
export interface HealthSample {
  /** Peer connections reported by the node */
  connections: number;
  /** Best known chain height */
  chainHeight: number;
  /** Number of pending transactions in the node's backlog */
  backlogSize: number;
}

/**
 * One upstream JSON-RPC data source together with its latest health sample.
 */
export interface Endpoint extends HealthSample {
  id: string;
  /** HTTP(S) JSON-RPC URL */
  address: string;
  role: EndpointRole;
  /** Wall-clock round trip of the last successful probe */
  latencyMs: number;
  /** Epoch ms of the last successful probe, 0 when never probed */
  lastProbeTime: number;
  /** Set when the most recent probe failed; the previous sample is kept */
  stale: boolean;
  consecutiveFailures: number;
}

/**
 * Static endpoint description as read from configuration.
 */
export interface EndpointDescriptor {
  id: string;
  address: string;
  role: EndpointRole;
}

/**
 * Read-only view of the router state for reporting.
 */
export interface SwarmState {
  endpoints: ReadonlyArray<Readonly<Endpoint>>;
  currentBest: Readonly<Endpoint> | null;
  lastRefreshAt: number;
}

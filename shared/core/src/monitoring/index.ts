/**
 * Monitoring Module
 *
 * Endpoint health probing and health-aware request routing.
 *
 * @module monitoring
 */

export { HealthProbe, DEFAULT_PROBE_QUERIES } from './health-probe';
export type { ProbeQueries, ProbeQuery } from './health-probe';

export { SwarmRouter, DEFAULT_SCORE_WEIGHTS } from './swarm-router';
export type { EndpointProber, RefreshOptions, SwarmRouterOptions } from './swarm-router';

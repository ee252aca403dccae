/**
 * Configuration for the swarm monitor.
 *
 * Environment variables are validated with zod and mapped onto MonitorConfig.
 */

export * from './schemas';
export * from './monitor-config';

// Shared types for the swarm router and opportunity pipeline

export * from './endpoints';
export * from './opportunities';
export * from './metrics';
export * from './errors';

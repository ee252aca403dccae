/**
 * Service Lifecycle Module
 *
 * Service bootstrap and state management utilities:
 * - ServiceStateManager: State machine for service lifecycle
 * - Service bootstrap: Shutdown handling, health servers, entry points
 *
 * @module service-lifecycle
 */

export * from './service-bootstrap';
export * from './service-state';

/**
 * Service State Machine
 *
 * Lifecycle guard for long-running components (the control loop, the
 * health server). Transitions are validated against a fixed table and
 * announced through a 'stateChange' event.
 *
 * States:
 * - STOPPED: not running (initial)
 * - STARTING: initializing
 * - RUNNING: operational
 * - STOPPING: draining and shutting down
 * - ERROR: start or stop failed
 */

import { EventEmitter } from 'events';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../resilience/error-handling';

export enum ServiceState {
  STOPPED = 'stopped',
  STARTING = 'starting',
  RUNNING = 'running',
  STOPPING = 'stopping',
  ERROR = 'error'
}

export interface StateTransitionResult {
  success: boolean;
  previousState: ServiceState;
  currentState: ServiceState;
  error?: Error;
}

export interface StateChangeEvent {
  previousState: ServiceState;
  newState: ServiceState;
  timestamp: number;
  serviceName: string;
}

export interface ServiceStateSnapshot {
  state: ServiceState;
  serviceName: string;
  lastTransition: number;
  transitionCount: number;
  errorMessage?: string;
}

const VALID_TRANSITIONS: Record<ServiceState, ServiceState[]> = {
  [ServiceState.STOPPED]: [ServiceState.STARTING],
  [ServiceState.STARTING]: [ServiceState.RUNNING, ServiceState.ERROR, ServiceState.STOPPED],
  [ServiceState.RUNNING]: [ServiceState.STOPPING, ServiceState.ERROR],
  [ServiceState.STOPPING]: [ServiceState.STOPPED, ServiceState.ERROR],
  [ServiceState.ERROR]: [ServiceState.STOPPED, ServiceState.STARTING]
};

export class ServiceStateManager extends EventEmitter {
  private state: ServiceState = ServiceState.STOPPED;
  private lastTransition: number = Date.now();
  private transitionCount = 0;
  private errorMessage?: string;

  constructor(
    private readonly serviceName: string,
    private readonly logger: ILogger
  ) {
    super();
  }

  getState(): ServiceState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === ServiceState.RUNNING;
  }

  isStopped(): boolean {
    return this.state === ServiceState.STOPPED;
  }

  getSnapshot(): ServiceStateSnapshot {
    return {
      state: this.state,
      serviceName: this.serviceName,
      lastTransition: this.lastTransition,
      transitionCount: this.transitionCount,
      errorMessage: this.errorMessage
    };
  }

  canTransitionTo(newState: ServiceState): boolean {
    return VALID_TRANSITIONS[this.state].includes(newState);
  }

  /**
   * Attempt a transition. Returns failure instead of throwing.
   */
  transitionTo(newState: ServiceState, errorMessage?: string): StateTransitionResult {
    const previousState = this.state;

    if (!this.canTransitionTo(newState)) {
      this.logger.warn('Invalid state transition attempted', { from: previousState, to: newState });
      return {
        success: false,
        previousState,
        currentState: this.state,
        error: new Error(`Invalid state transition: ${previousState} -> ${newState} for service ${this.serviceName}`)
      };
    }

    this.state = newState;
    this.lastTransition = Date.now();
    this.transitionCount++;
    this.errorMessage = newState === ServiceState.ERROR ? errorMessage : undefined;

    this.logger.info('State transition', {
      from: previousState,
      to: newState,
      transitionCount: this.transitionCount
    });

    const event: StateChangeEvent = {
      previousState,
      newState,
      timestamp: this.lastTransition,
      serviceName: this.serviceName
    };
    try {
      this.emit('stateChange', event);
    } catch (emitError) {
      // Listener errors must not undo a completed transition
      this.logger.error('Error in state change event listener', {
        error: getErrorMessage(emitError),
        previousState,
        newState
      });
    }

    return { success: true, previousState, currentState: newState };
  }

  /**
   * STOPPED|ERROR -> STARTING -> (RUNNING | ERROR)
   */
  async executeStart(startFn: () => Promise<void>): Promise<StateTransitionResult> {
    const starting = this.transitionTo(ServiceState.STARTING);
    if (!starting.success) {
      return starting;
    }

    try {
      await startFn();
      return this.transitionTo(ServiceState.RUNNING);
    } catch (error) {
      const failed = this.transitionTo(ServiceState.ERROR, getErrorMessage(error));
      return {
        ...failed,
        success: false,
        error: error instanceof Error ? error : new Error(getErrorMessage(error))
      };
    }
  }

  /**
   * RUNNING -> STOPPING -> (STOPPED | ERROR); ERROR -> STOPPED after cleanup.
   */
  async executeStop(stopFn: () => Promise<void>): Promise<StateTransitionResult> {
    if (this.state === ServiceState.ERROR) {
      try {
        await stopFn();
      } catch (error) {
        this.logger.warn('Cleanup after error state failed', { error: getErrorMessage(error) });
      }
      return this.transitionTo(ServiceState.STOPPED);
    }

    const stopping = this.transitionTo(ServiceState.STOPPING);
    if (!stopping.success) {
      return stopping;
    }

    try {
      await stopFn();
      return this.transitionTo(ServiceState.STOPPED);
    } catch (error) {
      const failed = this.transitionTo(ServiceState.ERROR, getErrorMessage(error));
      return {
        ...failed,
        success: false,
        error: error instanceof Error ? error : new Error(getErrorMessage(error))
      };
    }
  }
}

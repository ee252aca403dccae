/**
 * Alert Dispatcher
 *
 * Publishes alert events to the telemetry sink, throttled per type (and
 * optional scope) by the cooldown manager. A sink failure is logged and
 * reported as "not sent"; it never reaches the caller.
 */

import type { AlertEvent, AlertSeverity, AlertType, TelemetrySink } from '@swarmwatch/types';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../resilience/error-handling';
import { AlertCooldownManager } from './cooldown-manager';

export interface RaiseAlertInput {
  type: AlertType;
  severity: AlertSeverity;
  message: string;
  details?: Record<string, unknown>;
  /** Narrows the cooldown key, e.g. to one endpoint */
  scope?: string;
}

export class AlertDispatcher {
  constructor(
    private readonly sink: TelemetrySink,
    private readonly cooldowns: AlertCooldownManager,
    private readonly logger: ILogger
  ) {}

  /**
   * @returns true when the alert was published
   */
  async raise(input: RaiseAlertInput, now: number = Date.now()): Promise<boolean> {
    const key = AlertCooldownManager.createKey(input.type, input.scope);
    if (!this.cooldowns.shouldSendAndRecord(key, now)) {
      this.logger.debug('Alert suppressed by cooldown', { type: input.type, key });
      return false;
    }

    const event: AlertEvent = {
      type: input.type,
      severity: input.severity,
      message: input.message,
      timestamp: now,
      details: input.details,
    };

    try {
      await this.sink.publishAlert(event);
      return true;
    } catch (error) {
      this.logger.error('Failed to publish alert', {
        type: input.type,
        error: getErrorMessage(error),
      });
      return false;
    }
  }
}

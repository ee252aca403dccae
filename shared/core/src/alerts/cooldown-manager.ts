/**
 * Alert Cooldown Manager
 *
 * Suppresses repeats of the same alert key within a cooldown window.
 * Entries older than maxAgeMs are swept once the map passes a size threshold.
 */

import type { ILogger } from '../logging/types';

export interface AlertCooldownManagerConfig {
  /** Cooldown duration in milliseconds (default: 300000 = 5 minutes) */
  cooldownMs?: number;
  /** Max age before cleanup in milliseconds (default: 3600000 = 1 hour) */
  maxAgeMs?: number;
  /** Size threshold to trigger automatic cleanup (default: 1000) */
  cleanupThreshold?: number;
}

const DEFAULT_CONFIG: Required<AlertCooldownManagerConfig> = {
  cooldownMs: 300000,
  maxAgeMs: 3600000,
  cleanupThreshold: 1000,
};

export class AlertCooldownManager {
  private readonly cooldowns = new Map<string, number>();
  private readonly config: Required<AlertCooldownManagerConfig>;

  constructor(
    private readonly logger?: ILogger,
    config?: AlertCooldownManagerConfig
  ) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };
  }

  /**
   * Cooldown key from alert type and an optional scope (e.g. an endpoint id).
   */
  static createKey(alertType: string, scope?: string): string {
    return `${alertType}_${scope || 'system'}`;
  }

  /**
   * @returns true if the alert is still cooling down and should be suppressed
   */
  isOnCooldown(key: string, now: number = Date.now()): boolean {
    const lastAlert = this.cooldowns.get(key);
    if (lastAlert === undefined) {
      return false;
    }
    return (now - lastAlert) < this.config.cooldownMs;
  }

  recordAlert(key: string, now: number = Date.now()): void {
    this.cooldowns.set(key, now);

    if (this.cooldowns.size > this.config.cleanupThreshold) {
      this.cleanup(now);
    }
  }

  /**
   * Check-and-record in one step.
   *
   * @returns true if the alert should be sent
   */
  shouldSendAndRecord(key: string, now: number = Date.now()): boolean {
    if (this.isOnCooldown(key, now)) {
      return false;
    }
    this.recordAlert(key, now);
    return true;
  }

  cleanup(now: number = Date.now()): void {
    let removed = 0;
    for (const [key, timestamp] of this.cooldowns) {
      if (now - timestamp > this.config.maxAgeMs) {
        this.cooldowns.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger?.debug('Cleaned up stale alert cooldowns', {
        removed,
        remaining: this.cooldowns.size,
      });
    }
  }

  get size(): number {
    return this.cooldowns.size;
  }

  get cooldownMs(): number {
    return this.config.cooldownMs;
  }
}

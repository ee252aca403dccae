// Metrics snapshot and telemetry sink contracts

import type { OpportunityCategory } from './opportunities';

export interface CategoryMetrics {
  /** Opportunities detected in this category */
  count: number;
  cumulativeProfit: number;
  successes: number;
  failures: number;
  expired: number;
}

/**
 * Point-in-time capture produced by a metrics flush.
 * Global totals always equal the sum of the category buckets.
 */
export interface MetricsSnapshot {
  categories: Record<OpportunityCategory, CategoryMetrics>;
  /** Handler latencies in ms recorded since the previous flush */
  latencySamples: number[];
  /** 1 for executed, 0 for rejected, since the previous flush */
  successSamples: Array<0 | 1>;
  opportunitiesFound: number;
  totalProfit: number;
  /** When the aggregator began counting; the base of cumulative rates */
  startedAt: number;
  windowStartedAt: number;
  flushedAt: number;
}

export type AlertSeverity = 'info' | 'warning' | 'critical';

export type AlertType = 'queue_saturated' | 'rpc_failure' | 'tick_error' | 'primary_unhealthy';

export interface AlertEvent {
  type: AlertType;
  severity: AlertSeverity;
  message: string;
  timestamp: number;
  details?: Record<string, unknown>;
}

/**
 * Persistence/telemetry sink. The wire format is the sink's concern.
 */
export interface TelemetrySink {
  publish(snapshot: MetricsSnapshot): Promise<void>;
  publishAlert(event: AlertEvent): Promise<void>;
  close?(): Promise<void>;
}

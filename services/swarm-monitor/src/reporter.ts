/**
 * Progress Reporter
 *
 * Periodic human-oriented summary: totals, window rates, queue depth and
 * one line per endpoint.
 */

import type { MetricsSnapshot, SwarmState } from '@swarmwatch/types';
import { opportunitiesPerHour, summarizeSamples } from '@swarmwatch/core';
import type { ILogger } from '@swarmwatch/core';

export interface EndpointReport {
  id: string;
  role: string;
  connections: number;
  backlogSize: number;
  latencyMs: number;
  stale: boolean;
  selected: boolean;
}

export interface ProgressReport {
  opportunitiesFound: number;
  /** Detections per hour since metrics started */
  opportunitiesPerHour: number;
  totalProfit: number;
  /** Null when no target profit is configured */
  progressPercent: number | null;
  /** Percentage of executed outcomes in the current sample window */
  successRatePercent: number;
  avgLatencyMs: number;
  queueDepth: number;
  endpoints: EndpointReport[];
}

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

export function buildProgressReport(
  snapshot: MetricsSnapshot,
  swarm: SwarmState,
  queueDepth: number,
  targetProfit: number
): ProgressReport {
  const samples = summarizeSamples(snapshot);
  const selectedId = swarm.currentBest?.id;

  return {
    opportunitiesFound: snapshot.opportunitiesFound,
    opportunitiesPerHour: round(opportunitiesPerHour(snapshot), 2),
    totalProfit: snapshot.totalProfit,
    progressPercent: targetProfit > 0 ? round((snapshot.totalProfit / targetProfit) * 100, 2) : null,
    successRatePercent: round(samples.successRate * 100, 2),
    avgLatencyMs: round(samples.avgLatencyMs, 1),
    queueDepth,
    endpoints: swarm.endpoints.map(endpoint => ({
      id: endpoint.id,
      role: endpoint.role,
      connections: endpoint.connections,
      backlogSize: endpoint.backlogSize,
      latencyMs: endpoint.latencyMs,
      stale: endpoint.stale,
      selected: endpoint.id === selectedId,
    })),
  };
}

export class ProgressReporter {
  constructor(
    private readonly logger: ILogger,
    private readonly targetProfit: number
  ) {}

  report(snapshot: MetricsSnapshot, swarm: SwarmState, queueDepth: number): ProgressReport {
    const report = buildProgressReport(snapshot, swarm, queueDepth, this.targetProfit);

    this.logger.info('Progress report', {
      opportunitiesFound: report.opportunitiesFound,
      opportunitiesPerHour: report.opportunitiesPerHour,
      totalProfit: report.totalProfit,
      ...(report.progressPercent !== null
        ? { targetProfit: this.targetProfit, progressPercent: report.progressPercent }
        : {}),
      successRatePercent: report.successRatePercent,
      avgLatencyMs: report.avgLatencyMs,
      queueDepth: report.queueDepth,
    });

    for (const endpoint of report.endpoints) {
      this.logger.info('Endpoint status', { ...endpoint });
    }
    return report;
  }
}

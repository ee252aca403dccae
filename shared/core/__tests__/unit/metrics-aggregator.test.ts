/**
 * MetricsAggregator Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { OPPORTUNITY_CATEGORIES } from '@swarmwatch/types';
import type { Opportunity, OpportunityCategory } from '@swarmwatch/types';
import { MetricsAggregator, opportunitiesPerHour, summarizeSamples } from '../../src/metrics/metrics-aggregator';

function opportunity(id: string, category: OpportunityCategory, detectedAt = 0): Opportunity {
  return Object.freeze({
    id,
    category,
    sourceRecordId: id,
    estimatedValue: 2,
    cost: 1,
    detectedAt,
    details: {},
  });
}

describe('MetricsAggregator', () => {
  let clock: number;
  let metrics: MetricsAggregator;

  beforeEach(() => {
    clock = 1000;
    metrics = new MetricsAggregator({ now: () => clock, sampleWindow: 5, recentPerCategory: 2 });
  });

  it('derives global totals from the category buckets', () => {
    metrics.recordDetection(opportunity('a', 'arbitrage'));
    metrics.recordDetection(opportunity('b', 'backrun'));
    metrics.recordDetection(opportunity('c', 'backrun'));
    metrics.recordExecution('arbitrage', 'executed', 10, 1.5);
    metrics.recordExecution('backrun', 'executed', 20, 0.5);
    metrics.recordExecution('backrun', 'rejected', 30);

    const snapshot = metrics.flush();
    const counts = OPPORTUNITY_CATEGORIES.reduce((sum, c) => sum + snapshot.categories[c].count, 0);
    const profit = OPPORTUNITY_CATEGORIES.reduce((sum, c) => sum + snapshot.categories[c].cumulativeProfit, 0);

    expect(snapshot.opportunitiesFound).toBe(3);
    expect(counts).toBe(3);
    expect(snapshot.totalProfit).toBe(2);
    expect(profit).toBe(2);
    expect(snapshot.categories.backrun).toEqual({
      count: 2,
      cumulativeProfit: 0.5,
      successes: 1,
      failures: 1,
      expired: 0,
    });
  });

  it('ignores profit on rejected outcomes', () => {
    metrics.recordExecution('sandwich', 'rejected', 5, 99);
    expect(metrics.peek().categories.sandwich.cumulativeProfit).toBe(0);
  });

  it('resets samples on flush but keeps cumulative totals', () => {
    metrics.recordDetection(opportunity('a', 'liquidation'));
    metrics.recordExecution('liquidation', 'executed', 12, 3);

    const first = metrics.flush();
    expect(first.latencySamples).toEqual([12]);
    expect(first.successSamples).toEqual([1]);

    const second = metrics.flush();
    expect(second.latencySamples).toEqual([]);
    expect(second.successSamples).toEqual([]);
    expect(second.opportunitiesFound).toBe(1);
    expect(second.totalProfit).toBe(3);
  });

  it('returns identical totals for two idle flushes', () => {
    metrics.recordDetection(opportunity('a', 'frontrun'));
    metrics.recordExecution('frontrun', 'executed', 1, 0.25);
    metrics.flush();

    clock = 2000;
    const first = metrics.flush();
    clock = 3000;
    const second = metrics.flush();

    expect(second.categories).toEqual(first.categories);
    expect(second.totalProfit).toBe(first.totalProfit);
    expect(second.latencySamples).toEqual([]);
    expect(second.windowStartedAt).toBe(2000);
    expect(second.flushedAt).toBe(3000);
  });

  it('peek does not reset samples', () => {
    metrics.recordExecution('backrun', 'executed', 7, 1);
    metrics.peek();
    expect(metrics.peek().latencySamples).toEqual([7]);
  });

  it('bounds the sample window, dropping the oldest', () => {
    for (let i = 1; i <= 7; i++) {
      metrics.recordExecution('arbitrage', i % 2 === 0 ? 'rejected' : 'executed', i);
    }
    const snapshot = metrics.peek();
    expect(snapshot.latencySamples).toEqual([3, 4, 5, 6, 7]);
    expect(snapshot.successSamples).toEqual([1, 0, 1, 0, 1]);
  });

  it('records expiries per category', () => {
    metrics.recordExpired('time_bandit');
    metrics.recordExpired('time_bandit');
    expect(metrics.peek().categories.time_bandit.expired).toBe(2);
  });

  it('snapshots are independent of later updates', () => {
    metrics.recordDetection(opportunity('a', 'arbitrage'));
    const snapshot = metrics.peek();
    metrics.recordDetection(opportunity('b', 'arbitrage'));

    expect(snapshot.categories.arbitrage.count).toBe(1);
  });

  describe('getRecentOpportunities', () => {
    it('keeps a bounded ring per category', () => {
      metrics.recordDetection(opportunity('a1', 'arbitrage', 1));
      metrics.recordDetection(opportunity('a2', 'arbitrage', 2));
      metrics.recordDetection(opportunity('a3', 'arbitrage', 3));

      expect(metrics.getRecentOpportunities('arbitrage').map(o => o.id)).toEqual(['a2', 'a3']);
    });

    it('merges categories ordered by detection time', () => {
      metrics.recordDetection(opportunity('b1', 'backrun', 5));
      metrics.recordDetection(opportunity('a1', 'arbitrage', 3));
      metrics.recordDetection(opportunity('s1', 'sandwich', 4));

      expect(metrics.getRecentOpportunities().map(o => o.id)).toEqual(['a1', 's1', 'b1']);
    });
  });

  describe('opportunitiesPerHour', () => {
    it('rates cumulative detections over time since the aggregator started', () => {
      for (const id of ['a', 'b', 'c']) {
        metrics.recordDetection(opportunity(id, 'backrun'));
      }

      clock = 1000 + 1_800_000;
      const first = metrics.flush();
      expect(first.startedAt).toBe(1000);
      expect(opportunitiesPerHour(first)).toBe(6);

      clock = 1000 + 3_600_000;
      const second = metrics.flush();
      expect(second.windowStartedAt).toBe(1000 + 1_800_000);
      expect(second.startedAt).toBe(1000);
      expect(opportunitiesPerHour(second)).toBe(3);
    });

    it('is zero before any time has elapsed', () => {
      expect(opportunitiesPerHour({ opportunitiesFound: 5, startedAt: 1000, flushedAt: 1000 })).toBe(0);
    });
  });

  describe('summarizeSamples', () => {
    it('averages latency and success', () => {
      expect(summarizeSamples({ latencySamples: [10, 20, 30], successSamples: [1, 0, 1, 1] })).toEqual({
        avgLatencyMs: 20,
        successRate: 0.75,
        sampleCount: 3,
      });
    });

    it('returns zeros without samples', () => {
      expect(summarizeSamples({ latencySamples: [], successSamples: [] })).toEqual({
        avgLatencyMs: 0,
        successRate: 0,
        sampleCount: 0,
      });
    });
  });
});

/**
 * Metrics Aggregator
 *
 * Per-category counters plus rolling latency/success sample windows, shared
 * by every worker and the control loop.
 *
 * Each public method runs to completion without awaiting, so on the single
 * event loop no update is lost and a snapshot is never torn. Global totals
 * are derived from the category buckets when a snapshot is built, which
 * keeps them equal to the category sums by construction.
 */

import { OPPORTUNITY_CATEGORIES } from '@swarmwatch/types';
import type {
  CategoryMetrics,
  MetricsSnapshot,
  Opportunity,
  OpportunityCategory,
} from '@swarmwatch/types';
import { CircularBuffer } from '../data-structures/circular-buffer';

export interface MetricsAggregatorOptions {
  /** Max samples kept between flushes; the oldest are dropped (default 10000) */
  sampleWindow?: number;
  /** Recent opportunities kept per category (default 100) */
  recentPerCategory?: number;
  now?: () => number;
}

export interface SampleSummary {
  /** Mean handler latency in ms, 0 with no samples */
  avgLatencyMs: number;
  /** Fraction of executed outcomes, 0 with no samples */
  successRate: number;
  sampleCount: number;
}

export type ExecutionOutcome = 'executed' | 'rejected';

function emptyCategoryMetrics(): CategoryMetrics {
  return { count: 0, cumulativeProfit: 0, successes: 0, failures: 0, expired: 0 };
}

function createCategoryRecord<T>(factory: () => T): Record<OpportunityCategory, T> {
  return {
    arbitrage: factory(),
    liquidation: factory(),
    sandwich: factory(),
    frontrun: factory(),
    backrun: factory(),
    just_in_time: factory(),
    time_bandit: factory(),
  };
}

const MS_PER_HOUR = 3_600_000;

/**
 * Cumulative detections per hour since the aggregator started; 0 before any
 * time has elapsed.
 */
export function opportunitiesPerHour(
  snapshot: Pick<MetricsSnapshot, 'opportunitiesFound' | 'startedAt' | 'flushedAt'>
): number {
  const elapsedMs = snapshot.flushedAt - snapshot.startedAt;
  if (elapsedMs <= 0) {
    return 0;
  }
  return snapshot.opportunitiesFound / (elapsedMs / MS_PER_HOUR);
}

/**
 * Mean latency and success rate of a snapshot's sample windows.
 */
export function summarizeSamples(snapshot: Pick<MetricsSnapshot, 'latencySamples' | 'successSamples'>): SampleSummary {
  const { latencySamples, successSamples } = snapshot;
  const latencyTotal = latencySamples.reduce((sum, v) => sum + v, 0);
  const successes = successSamples.reduce<number>((sum, v) => sum + v, 0);
  return {
    avgLatencyMs: latencySamples.length > 0 ? latencyTotal / latencySamples.length : 0,
    successRate: successSamples.length > 0 ? successes / successSamples.length : 0,
    sampleCount: latencySamples.length,
  };
}

export class MetricsAggregator {
  private readonly now: () => number;
  private readonly categories: Record<OpportunityCategory, CategoryMetrics>;
  private readonly latencySamples: CircularBuffer<number>;
  private readonly successSamples: CircularBuffer<0 | 1>;
  private readonly recent: Record<OpportunityCategory, CircularBuffer<Opportunity>>;
  private readonly startedAt: number;
  private windowStartedAt: number;

  constructor(options: MetricsAggregatorOptions = {}) {
    const sampleWindow = options.sampleWindow ?? 10000;
    const recentPerCategory = options.recentPerCategory ?? 100;

    this.now = options.now ?? Date.now;
    this.categories = createCategoryRecord(emptyCategoryMetrics);
    this.latencySamples = new CircularBuffer<number>(sampleWindow);
    this.successSamples = new CircularBuffer<0 | 1>(sampleWindow);
    this.recent = createCategoryRecord(() => new CircularBuffer<Opportunity>(recentPerCategory));
    this.startedAt = this.now();
    this.windowStartedAt = this.startedAt;
  }

  recordDetection(opportunity: Opportunity): void {
    this.categories[opportunity.category].count++;
    this.recent[opportunity.category].pushOverwrite(opportunity);
  }

  /**
   * Record a handler outcome. Profit only counts for executed items.
   */
  recordExecution(
    category: OpportunityCategory,
    outcome: ExecutionOutcome,
    latencyMs: number,
    profit = 0
  ): void {
    const bucket = this.categories[category];
    if (outcome === 'executed') {
      bucket.successes++;
      bucket.cumulativeProfit += profit;
      this.successSamples.pushOverwrite(1);
    } else {
      bucket.failures++;
      this.successSamples.pushOverwrite(0);
    }
    this.latencySamples.pushOverwrite(latencyMs);
  }

  recordExpired(category: OpportunityCategory): void {
    this.categories[category].expired++;
  }

  /**
   * Capture a snapshot and reset the sample windows.
   * Cumulative counts and profit persist.
   */
  flush(): MetricsSnapshot {
    const snapshot = this.buildSnapshot();
    this.latencySamples.clear();
    this.successSamples.clear();
    this.windowStartedAt = snapshot.flushedAt;
    return snapshot;
  }

  /**
   * Snapshot without resetting anything.
   */
  peek(): MetricsSnapshot {
    return this.buildSnapshot();
  }

  /**
   * Most recent opportunities, oldest first: one category, or all of them.
   */
  getRecentOpportunities(category?: OpportunityCategory): Opportunity[] {
    if (category) {
      return this.recent[category].toArray();
    }
    return OPPORTUNITY_CATEGORIES.flatMap(c => this.recent[c].toArray())
      .sort((a, b) => a.detectedAt - b.detectedAt);
  }

  private buildSnapshot(): MetricsSnapshot {
    const categories = createCategoryRecord(emptyCategoryMetrics);
    let opportunitiesFound = 0;
    let totalProfit = 0;

    for (const category of OPPORTUNITY_CATEGORIES) {
      const bucket = { ...this.categories[category] };
      categories[category] = bucket;
      opportunitiesFound += bucket.count;
      totalProfit += bucket.cumulativeProfit;
    }

    return {
      categories,
      latencySamples: this.latencySamples.toArray(),
      successSamples: this.successSamples.toArray(),
      opportunitiesFound,
      totalProfit,
      startedAt: this.startedAt,
      windowStartedAt: this.windowStartedAt,
      flushedAt: this.now(),
    };
  }
}

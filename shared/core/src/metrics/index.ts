export { MetricsAggregator, opportunitiesPerHour, summarizeSamples } from './metrics-aggregator';
export type { ExecutionOutcome, MetricsAggregatorOptions, SampleSummary } from './metrics-aggregator';

// Opportunity, classifier and handler contracts

/**
 * Fixed set of opportunity categories a classifier may emit.
 */
export const OPPORTUNITY_CATEGORIES = [
  'arbitrage',
  'liquidation',
  'sandwich',
  'frontrun',
  'backrun',
  'just_in_time',
  'time_bandit',
] as const;

export type OpportunityCategory = typeof OPPORTUNITY_CATEGORIES[number];

/**
 * A pending record as returned by the data source.
 * Only the identifier is interpreted by the pipeline; the raw fields are the classifier's concern.
 */
export interface PendingRecord {
  id: string;
  fields: Record<string, unknown>;
}

/**
 * Classifier output before the pipeline stamps identity and detection time on it.
 */
export interface OpportunityCandidate {
  category: OpportunityCategory;
  estimatedValue: number;
  cost: number;
  details?: Record<string, unknown>;
}

/**
 * A classified opportunity. Frozen on creation and handed from stage to stage.
 */
export interface Opportunity {
  readonly id: string;
  readonly category: OpportunityCategory;
  readonly sourceRecordId: string;
  readonly estimatedValue: number;
  readonly cost: number;
  readonly detectedAt: number;
  readonly details: Readonly<Record<string, unknown>>;
}

export type OpportunityOutcome = 'executed' | 'rejected' | 'expired';

/**
 * Pluggable classification function. May be slow; always run inside the bounded fan-out.
 */
export type Classifier = (record: PendingRecord) => Promise<OpportunityCandidate | null>;

/**
 * Executes one opportunity and resolves to the realised profit. Throws on failure.
 */
export type OpportunityHandler = (opportunity: Opportunity) => Promise<number>;

export type HandlerRegistry = Partial<Record<OpportunityCategory, OpportunityHandler>>;

/**
 * Query surface of the upstream data source.
 */
export interface PendingDataSource {
  getBestHeight(): Promise<number>;
  getPendingBatch(limit: number): Promise<PendingRecord[]>;
  getRecordDetail(id: string): Promise<PendingRecord>;
}

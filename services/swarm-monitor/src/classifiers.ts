/**
 * Classifiers
 *
 * Classifiers are pluggable: any `(record) => Promise<candidate | null>`.
 * This module composes them and turns a match into an Opportunity.
 */

import { z } from 'zod';
import { ClassifierError } from '@swarmwatch/types';
import type {
  Classifier,
  Opportunity,
  OpportunityCandidate,
  OpportunityCategory,
  PendingRecord,
} from '@swarmwatch/types';
import { getErrorMessage } from '@swarmwatch/core';
import type { ILogger } from '@swarmwatch/core';

export interface NamedClassifier {
  name: string;
  classify: Classifier;
}

/**
 * Run classifiers in order and keep the first match. A classifier that
 * throws counts as "no match": the error is wrapped in ClassifierError and
 * logged at debug, and the next classifier runs.
 */
export function composeClassifiers(classifiers: readonly NamedClassifier[], logger: ILogger): Classifier {
  return async (record: PendingRecord): Promise<OpportunityCandidate | null> => {
    for (const { name, classify } of classifiers) {
      try {
        const candidate = await classify(record);
        if (candidate) {
          return candidate;
        }
      } catch (error) {
        const failure = new ClassifierError(
          `Classifier ${name} failed: ${getErrorMessage(error)}`,
          record.id,
          error
        );
        logger.debug('Classifier error treated as no match', {
          classifier: name,
          recordId: failure.recordId,
          error: failure.message,
        });
      }
    }
    return null;
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(frozenCopy));
  }
  return isPlainObject(value) ? freezeDetails(value) : value;
}

/**
 * Copy details, freezing nested plain objects and arrays. Class instances
 * (Date, Map, ...) are kept by reference.
 */
function freezeDetails(details: Record<string, unknown>): Readonly<Record<string, unknown>> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    copy[key] = frozenCopy(value);
  }
  return Object.freeze(copy);
}

/**
 * Stamp identity and detection time on a candidate. The result is frozen.
 */
export function toOpportunity(record: PendingRecord, candidate: OpportunityCandidate, detectedAt: number): Opportunity {
  return Object.freeze({
    id: `${candidate.category}:${record.id}`,
    category: candidate.category,
    sourceRecordId: record.id,
    estimatedValue: candidate.estimatedValue,
    cost: candidate.cost,
    detectedAt,
    details: freezeDetails(candidate.details ?? {}),
  });
}

/**
 * Net value a candidate must exceed to be enqueued.
 */
export function exceedsMinProfit(candidate: OpportunityCandidate, minProfit: number): boolean {
  return candidate.estimatedValue - candidate.cost > minProfit;
}

// =============================================================================
// Output value classifier
// =============================================================================

const OutputSchema = z.object({ value: z.number().nonnegative() }).passthrough();
const TransactionFieldsSchema = z
  .object({
    vout: z.array(OutputSchema),
    fee: z.number().nonnegative().optional(),
  })
  .passthrough();

export interface OutputValueClassifierOptions {
  category: OpportunityCategory;
  /** Minimum summed output value for a match */
  minOutputValue: number;
  /** Share of the output value booked as estimated value (default 0.001) */
  valueShare?: number;
}

/**
 * Flags records whose summed outputs reach minOutputValue. Records without
 * a readable output list never match.
 */
export function createOutputValueClassifier(options: OutputValueClassifierOptions): NamedClassifier {
  const valueShare = options.valueShare ?? 0.001;

  return {
    name: `output-value:${options.category}`,
    classify: async (record) => {
      const parsed = TransactionFieldsSchema.safeParse(record.fields);
      if (!parsed.success) {
        return null;
      }

      const totalOutput = parsed.data.vout.reduce((sum, output) => sum + output.value, 0);
      if (totalOutput < options.minOutputValue) {
        return null;
      }

      return {
        category: options.category,
        estimatedValue: totalOutput * valueShare,
        cost: parsed.data.fee ?? 0,
        details: { totalOutput, outputs: parsed.data.vout.length },
      };
    },
  };
}

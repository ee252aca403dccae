/**
 * Classifier Composition and Output Value Classifier Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { OpportunityCandidate, PendingRecord } from '@swarmwatch/types';
import { RecordingLogger } from '@swarmwatch/core';
import {
  composeClassifiers,
  createOutputValueClassifier,
  exceedsMinProfit,
  toOpportunity,
} from '../../src/classifiers';
import type { NamedClassifier } from '../../src/classifiers';

const record: PendingRecord = { id: 'tx1', fields: { vout: [{ value: 30 }, { value: 20 }], fee: 0.01 } };

function fixed(name: string, candidate: OpportunityCandidate | null): NamedClassifier {
  return { name, classify: async () => candidate };
}

describe('composeClassifiers', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('returns the first match in order', async () => {
    const classify = composeClassifiers(
      [
        fixed('none', null),
        fixed('arb', { category: 'arbitrage', estimatedValue: 5, cost: 1 }),
        fixed('sandwich', { category: 'sandwich', estimatedValue: 9, cost: 1 }),
      ],
      logger
    );

    await expect(classify(record)).resolves.toMatchObject({ category: 'arbitrage' });
  });

  it('treats a throwing classifier as no match and continues', async () => {
    const broken: NamedClassifier = {
      name: 'broken',
      classify: async () => {
        throw new Error('unexpected script');
      },
    };
    const classify = composeClassifiers([broken, fixed('backrun', { category: 'backrun', estimatedValue: 2, cost: 0 })], logger);

    await expect(classify(record)).resolves.toMatchObject({ category: 'backrun' });
    expect(logger.getLastLogAt('debug')?.meta).toEqual({
      classifier: 'broken',
      recordId: 'tx1',
      error: 'Classifier broken failed: unexpected script',
    });
  });

  it('returns null when nothing matches', async () => {
    await expect(composeClassifiers([fixed('none', null)], logger)(record)).resolves.toBeNull();
  });
});

describe('toOpportunity', () => {
  it('derives the id from category and record and freezes the result', () => {
    const opportunity = toOpportunity(
      record,
      { category: 'liquidation', estimatedValue: 3, cost: 1, details: { pool: 'p1' } },
      1700
    );

    expect(opportunity).toEqual({
      id: 'liquidation:tx1',
      category: 'liquidation',
      sourceRecordId: 'tx1',
      estimatedValue: 3,
      cost: 1,
      detectedAt: 1700,
      details: { pool: 'p1' },
    });
    expect(Object.isFrozen(opportunity)).toBe(true);
    expect(Object.isFrozen(opportunity.details)).toBe(true);
  });

  it('freezes nested details without touching the candidate', () => {
    const pools = [{ id: 'p1' }];
    const route = { hops: 2, legs: ['a', 'b'] };

    const opportunity = toOpportunity(
      record,
      { category: 'arbitrage', estimatedValue: 3, cost: 1, details: { pools, route } },
      0
    );

    expect(opportunity.details).toEqual({ pools: [{ id: 'p1' }], route: { hops: 2, legs: ['a', 'b'] } });
    expect(Object.isFrozen(opportunity.details.pools)).toBe(true);
    expect(Object.isFrozen(opportunity.details.route)).toBe(true);
    const frozenRoute = opportunity.details.route;
    expect(typeof frozenRoute === 'object' && frozenRoute !== null && Object.isFrozen(Reflect.get(frozenRoute, 'legs')))
      .toBe(true);
    expect(Object.isFrozen(pools)).toBe(false);
    expect(opportunity.details.pools).not.toBe(pools);
  });
});

describe('exceedsMinProfit', () => {
  it('requires net value strictly above the minimum', () => {
    const candidate: OpportunityCandidate = { category: 'backrun', estimatedValue: 1.5, cost: 0.5 };

    expect(exceedsMinProfit(candidate, 0.5)).toBe(true);
    expect(exceedsMinProfit(candidate, 1)).toBe(false);
  });
});

describe('createOutputValueClassifier', () => {
  const classifier = createOutputValueClassifier({ category: 'backrun', minOutputValue: 10, valueShare: 0.01 });

  it('is named after its category', () => {
    expect(classifier.name).toBe('output-value:backrun');
  });

  it('books a share of the summed outputs with the fee as cost', async () => {
    await expect(classifier.classify(record)).resolves.toEqual({
      category: 'backrun',
      estimatedValue: 0.5,
      cost: 0.01,
      details: { totalOutput: 50, outputs: 2 },
    });
  });

  it('ignores records below the output threshold', async () => {
    await expect(classifier.classify({ id: 'small', fields: { vout: [{ value: 9.5 }] } })).resolves.toBeNull();
  });

  it('ignores records without a readable output list', async () => {
    await expect(classifier.classify({ id: 'odd', fields: { vout: 'n/a' } })).resolves.toBeNull();
    await expect(classifier.classify({ id: 'none', fields: {} })).resolves.toBeNull();
  });

  it('treats a missing fee as zero cost', async () => {
    await expect(classifier.classify({ id: 'nofee', fields: { vout: [{ value: 10 }] } }))
      .resolves.toMatchObject({ cost: 0, estimatedValue: 0.1 });
  });
});

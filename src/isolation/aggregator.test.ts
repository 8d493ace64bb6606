import { describe, it, expect } from 'vitest';
import type { IsolationPolicy } from '../policy/types.js';
import { T0 } from '../test/fixtures.js';
import { AggregateQuerySchema, computeAggregate, disparityOf } from './aggregator.js';
import type { IsolatedRecord } from './types.js';

const POLICY: IsolationPolicy = { minimumSampleSize: 30, disparityRatioFloor: 0.8, collectionOperations: [], aggregateOperations: [] };

function makeRecord(index: number, overrides: Partial<IsolatedRecord> = {}): IsolatedRecord {
  return {
    id: `rec-${index}`,
    subjectId: `subj-${index}`,
    race: null,
    ethnicity: null,
    sex: null,
    ageBand: null,
    collectionMethod: 'self_reported',
    collectedAt: new Date(T0 + index),
    ...overrides,
  };
}

function makeRecords(count: number, overrides: Partial<IsolatedRecord> = {}, start = 0): IsolatedRecord[] {
  return Array.from({ length: count }, (_, i) => makeRecord(start + i, overrides));
}

function outcomesFor(records: IsolatedRecord[], approved: number, denied: number, into = new Map<string, string | null>()) {
  records.slice(0, approved).forEach((r) => into.set(r.subjectId, 'approved'));
  records.slice(approved, approved + denied).forEach((r) => into.set(r.subjectId, 'denied'));
  return into;
}

describe('computeAggregate', () => {
  it('refuses a subgroup of 12 records with the default threshold of 30', () => {
    const result = computeAggregate(makeRecords(12, { race: 'Asian' }), { groupBy: ['race'] }, POLICY);
    expect(result).toEqual({ kind: 'insufficient_sample', minimumSampleSize: 30 });
  });

  it('refuses when one cell is small even though the total is large', () => {
    const records = [...makeRecords(60, { race: 'White' }), ...makeRecords(12, { race: 'Asian' }, 60)];
    expect(computeAggregate(records, { groupBy: ['race'] }, POLICY).kind).toBe('insufficient_sample');
  });

  it('counts each subject once, by its latest record', () => {
    const records = [
      ...makeRecords(30, { race: 'White' }),
      makeRecord(0, { id: 'rec-late', race: 'Asian', collectedAt: new Date(T0 + 1000) }),
    ];
    // subj-0 moves to a cell of one
    expect(computeAggregate(records, { groupBy: ['race'] }, POLICY).kind).toBe('insufficient_sample');
  });

  it('reports counts, outcome ratios and a concerning disparity', () => {
    const white = makeRecords(40, { race: 'White' });
    const asian = makeRecords(30, { race: 'Asian' }, 40);
    const outcomes = outcomesFor(asian, 15, 15, outcomesFor(white, 30, 10));

    const result = computeAggregate([...white, ...asian], { groupBy: ['race'], joinOutcomes: true }, POLICY, outcomes);

    expect(result).toEqual({
      kind: 'statistic',
      groupLabels: ['race'],
      values: [
        { labels: { race: 'Asian' }, count: 30, outcomeRatio: 0.5 },
        { labels: { race: 'White' }, count: 40, outcomeRatio: 0.75 },
      ],
      sampleSize: 70,
      disparity: { ratio: 0.6667, floor: 0.8, concerning: true },
    });
  });

  it('withholds a ratio when too few outcomes are known', () => {
    const white = makeRecords(40, { race: 'White' });
    const asian = makeRecords(30, { race: 'Asian' }, 40);
    const outcomes = outcomesFor(asian, 20, 10, outcomesFor(white, 15, 5));

    const result = computeAggregate([...white, ...asian], { groupBy: ['race'] }, POLICY, outcomes);

    if (result.kind !== 'statistic') throw new Error('expected a statistic');
    expect(result.values.map((v) => v.outcomeRatio)).toEqual([0.6667, null]);
    expect(result.disparity).toBeNull();
  });

  it('labels missing attributes as not_provided', () => {
    const result = computeAggregate(makeRecords(30), { groupBy: ['race'] }, POLICY);
    expect(result).toEqual({
      kind: 'statistic',
      groupLabels: ['race'],
      values: [{ labels: { race: 'not_provided' }, count: 30, outcomeRatio: null }],
      sampleSize: 30,
      disparity: null,
    });
  });

  it('groups by two attributes', () => {
    const records = [
      ...makeRecords(30, { race: 'White', sex: 'Male' }),
      ...makeRecords(30, { race: 'White', sex: 'Female' }, 30),
    ];
    const result = computeAggregate(records, { groupBy: ['race', 'sex'] }, POLICY);
    if (result.kind !== 'statistic') throw new Error('expected a statistic');
    expect(result.values.map((v) => v.labels)).toEqual([
      { race: 'White', sex: 'Female' },
      { race: 'White', sex: 'Male' },
    ]);
  });
});

describe('disparityOf', () => {
  it('is null when every ratio is zero', () => {
    const cells = [
      { labels: {}, count: 30, outcomeRatio: 0 },
      { labels: {}, count: 30, outcomeRatio: 0 },
    ];
    expect(disparityOf(cells, 0.8)).toBeNull();
  });
});

describe('AggregateQuerySchema', () => {
  it.each([[[]], [['race', 'race']], [['race', 'sex', 'ethnicity']], [['income']]])('rejects groupBy %j', (groupBy) => {
    expect(AggregateQuerySchema.safeParse({ groupBy }).success).toBe(false);
  });
});

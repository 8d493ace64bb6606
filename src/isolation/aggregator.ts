/**
 * The designated aggregator: the only computation whose result may leave
 * the isolated path.
 *
 * Each subject counts once, by its latest record. If the whole sample or
 * any cell is smaller than the minimum sample size the result carries no
 * numbers at all.
 *
 * @module isolation/aggregator
 */

import { z } from 'zod';
import type { IsolationPolicy } from '../policy/types.js';
import {
  DEMOGRAPHIC_ATTRIBUTES,
  NOT_PROVIDED,
  type AggregateCell,
  type AggregateOutcome,
  type AggregateQuery,
  type DemographicAttribute,
  type Disparity,
  type IsolatedRecord,
} from './types.js';

export const DEFAULT_FAVOURABLE_OUTCOME = 'approved';

export const AggregateQuerySchema = z.object({
  groupBy: z
    .array(z.enum(DEMOGRAPHIC_ATTRIBUTES))
    .min(1)
    .max(2)
    .refine((attrs) => new Set(attrs).size === attrs.length, 'groupBy attributes must be distinct'),
  joinOutcomes: z.boolean().optional(),
  favourableOutcome: z.string().min(1).optional(),
});

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function latestPerSubject(records: readonly IsolatedRecord[]): IsolatedRecord[] {
  const latest = new Map<string, IsolatedRecord>();
  for (const record of records) {
    const seen = latest.get(record.subjectId);
    if (!seen || seen.collectedAt.getTime() <= record.collectedAt.getTime()) {
      latest.set(record.subjectId, record);
    }
  }
  return [...latest.values()];
}

function labelOf(record: IsolatedRecord, attribute: DemographicAttribute): string {
  return record[attribute] ?? NOT_PROVIDED;
}

/** Subject ids behind the records, for the outcome join. */
export function subjectsOf(records: readonly IsolatedRecord[]): string[] {
  return [...new Set(records.map((r) => r.subjectId))];
}

export function computeAggregate(
  records: readonly IsolatedRecord[],
  query: AggregateQuery,
  policy: IsolationPolicy,
  outcomes?: ReadonlyMap<string, string | null>,
): AggregateOutcome {
  const n = policy.minimumSampleSize;
  const insufficient: AggregateOutcome = { kind: 'insufficient_sample', minimumSampleSize: n };

  const sample = latestPerSubject(records);
  if (sample.length < n) return insufficient;

  const cells = new Map<string, { labels: Partial<Record<DemographicAttribute, string>>; members: IsolatedRecord[] }>();
  for (const record of sample) {
    const labels: Partial<Record<DemographicAttribute, string>> = {};
    for (const attribute of query.groupBy) labels[attribute] = labelOf(record, attribute);
    const key = query.groupBy.map((a) => labels[a]).join('\u0000');
    const cell = cells.get(key);
    if (cell) cell.members.push(record);
    else cells.set(key, { labels, members: [record] });
  }

  for (const cell of cells.values()) {
    if (cell.members.length < n) return insufficient;
  }

  const favourable = query.favourableOutcome ?? DEFAULT_FAVOURABLE_OUTCOME;
  const values: AggregateCell[] = [...cells.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, cell]) => {
      let outcomeRatio: number | null = null;
      if (outcomes) {
        const known = cell.members
          .map((m) => outcomes.get(m.subjectId))
          .filter((o): o is string => typeof o === 'string');
        if (known.length >= n) {
          outcomeRatio = round4(known.filter((o) => o === favourable).length / known.length);
        }
      }
      return { labels: cell.labels, count: cell.members.length, outcomeRatio };
    });

  return {
    kind: 'statistic',
    groupLabels: [...query.groupBy],
    values,
    sampleSize: sample.length,
    disparity: disparityOf(values, policy.disparityRatioFloor),
  };
}

/** Lowest over highest outcome ratio; null with fewer than two ratios. */
export function disparityOf(cells: readonly AggregateCell[], floor: number): Disparity | null {
  const ratios = cells.map((c) => c.outcomeRatio).filter((r): r is number => r !== null);
  if (ratios.length < 2) return null;
  const max = Math.max(...ratios);
  if (max === 0) return null;
  const ratio = round4(Math.min(...ratios) / max);
  return { ratio, floor, concerning: ratio < floor };
}

/**
 * Property-based tests for the isolated partition
 *
 * Whatever the partition holds and whoever holds the general credential,
 * reads with that credential are refused rather than answered.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { IsolationViolation } from '../utils/errors.js';
import { InMemoryIsolatedPartition } from './isolatedPartition.js';
import { PartitionCredential, mintIsolatedCredential } from './partitionCredential.js';
import type { IsolatedRecordInput } from './types.js';

const INPUT: IsolatedRecordInput = {
  subjectId: 'app-1',
  race: 'Asian',
  ethnicity: 'Not Hispanic or Latino',
  sex: 'Female',
  ageBand: '35-44',
  collectionMethod: 'self_reported',
};

describe('InMemoryIsolatedPartition', () => {
  it('never returns isolated fields to a general credential', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.constantFrom('Asian', 'White', 'Black or African American', null), { minLength: 1, maxLength: 20 }),
        fc.string({ minLength: 1, maxLength: 12 }),
        async (races, holder) => {
          const partition = new InMemoryIsolatedPartition();
          const isolated = mintIsolatedCredential();
          for (const [i, race] of races.entries()) {
            await partition.insert(isolated, { ...INPUT, subjectId: `app-${i}`, race });
          }
          const general = PartitionCredential.general(holder);

          await expect(partition.readAll(general)).rejects.toBeInstanceOf(IsolationViolation);
          await expect(partition.readBySubject(general, 'app-0')).rejects.toBeInstanceOf(IsolationViolation);
          expect(await partition.readAll(isolated)).toHaveLength(races.length);
        },
      ),
      { numRuns: 50 },
    );
  });
});

import { describe, it, expect, vi } from 'vitest';
import { T0 } from '../test/fixtures.js';
import { createTestPlatform } from '../test/harness.js';
import { IsolationViolation } from '../utils/errors.js';
import { DualPathRouter } from './dualPathRouter.js';
import { InMemoryIsolatedPartition, type ViolationHandler } from './isolatedPartition.js';
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
  it('stores and reads records under the isolated credential', async () => {
    const partition = new InMemoryIsolatedPartition(() => T0);
    const credential = mintIsolatedCredential();

    const record = await partition.insert(credential, INPUT);

    expect(record).toMatchObject({ ...INPUT, collectedAt: new Date(T0) });
    expect(await partition.readBySubject(credential, 'app-1')).toEqual([record]);
    expect(await partition.readBySubject(credential, 'app-2')).toEqual([]);
  });

  it('refuses the general credential with a permission error, not data', async () => {
    const partition = new InMemoryIsolatedPartition();
    await partition.insert(mintIsolatedCredential(), INPUT);
    const handler = vi.fn<Parameters<ViolationHandler>, ReturnType<ViolationHandler>>(async () => undefined);
    partition.onViolation(handler);

    const general = PartitionCredential.general('reporting_service');

    await expect(partition.readAll(general)).rejects.toThrow('permission denied for schema hmda (read)');
    await expect(partition.insert(general, INPUT)).rejects.toBeInstanceOf(IsolationViolation);
    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map((call) => call[1])).toEqual(['read', 'insert']);
  });

  it('escalates refusals through the router as a critical security_event and alert', async () => {
    const { ledger, ledgerStore, alerts } = await createTestPlatform();
    const partition = new InMemoryIsolatedPartition();
    DualPathRouter.over(partition, { ledger, alerts });

    await expect(partition.readBySubject(PartitionCredential.general('reporting_service'), 'app-1')).rejects.toThrow(
      IsolationViolation,
    );

    expect(ledgerStore.rows).toHaveLength(1);
    expect(ledgerStore.rows[0]?.eventType).toBe('security_event');
    expect(ledgerStore.rows[0]?.payload).toEqual({
      kind: 'isolation_violation',
      severity: 'critical',
      attemptedBy: 'reporting_service',
      attemptedOperation: 'read',
    });
    expect(alerts.recent().map((a) => [a.kind, a.severity])).toEqual([['isolation_violation', 'critical']]);
  });

  it('cannot be given an isolated credential minted outside the module', () => {
    expect(() => PartitionCredential.isolated(Symbol('isolated-credential'), null)).toThrow(
      'Isolated credentials cannot be minted here',
    );
  });
});

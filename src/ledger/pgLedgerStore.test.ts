import { describe, it, expect, vi } from 'vitest';
import type pg from 'pg';
import { OperationTimeout } from '../utils/errors.js';
import { AuditLedger } from './auditLedger.js';
import { computeEventHash, eventBody } from './hashChain.js';
import { LedgerPermissionError } from './ledgerStore.js';
import { LEDGER_LOCK_NAMESPACE, PgLedgerStore, mapRowToEvent } from './pgLedgerStore.js';
import type { ChainTail, LedgerEvent } from './types.js';

const CREATED_AT = new Date('2026-01-15T12:00:00.000Z');

type LedgerRow = Parameters<typeof mapRowToEvent>[0];

function fakeRow(overrides: Partial<LedgerRow> = {}): LedgerRow {
  return {
    partition: 'main',
    sequence_no: '42',
    prev_hash: 'a'.repeat(64),
    this_hash: 'b'.repeat(64),
    event_type: 'query',
    principal_id: 'officer_7',
    role_at_time: 'loan_officer',
    subject_id: 'app-1',
    payload: { outcome: 'ALLOW' },
    created_at: CREATED_AT,
    ...overrides,
  };
}

function buildFrom(tail: ChainTail): LedgerEvent {
  return {
    partition: 'main',
    sequenceNo: tail.sequenceNo + 1,
    prevHash: tail.thisHash,
    thisHash: 'c'.repeat(64),
    eventType: 'tool_call',
    principalId: 'agent-1',
    roleAtTime: 'underwriter',
    subjectId: 'app-9',
    payload: { tool: 'record_decision' },
    createdAt: CREATED_AT,
  };
}

function mockPool(handler: (text: string, params?: unknown[]) => unknown) {
  const client = {
    query: vi.fn(async (text: string, params?: unknown[]) => handler(text, params)),
    release: vi.fn(),
  };
  const pool = {
    connect: vi.fn().mockResolvedValue(client),
    query: vi.fn(async (text: string, params?: unknown[]) => handler(text, params)),
  };
  return { client, pool, store: new PgLedgerStore(pool as unknown as pg.Pool) };
}

function statements(mock: { mock: { calls: unknown[][] } }): string[] {
  return mock.mock.calls.map((call) => String(call[0]).split(/\s+/).slice(0, 2).join(' '));
}

describe('mapRowToEvent', () => {
  it('maps snake_case columns and converts the bigint sequence', () => {
    expect(mapRowToEvent(fakeRow())).toEqual({
      partition: 'main',
      sequenceNo: 42,
      prevHash: 'a'.repeat(64),
      thisHash: 'b'.repeat(64),
      eventType: 'query',
      principalId: 'officer_7',
      roleAtTime: 'loan_officer',
      subjectId: 'app-1',
      payload: { outcome: 'ALLOW' },
      createdAt: CREATED_AT,
    });
  });

  it('nulls an unrecognised role', () => {
    expect(mapRowToEvent(fakeRow({ role_at_time: 'root' })).roleAtTime).toBeNull();
  });
});

describe('PgLedgerStore.append', () => {
  it('locks the partition, extends the stored tail and commits', async () => {
    const { client, store } = mockPool((text) =>
      text.startsWith('SELECT sequence_no') ? { rows: [{ sequence_no: '41', this_hash: 'd'.repeat(64) }] } : { rows: [] },
    );

    const event = await store.append('main', buildFrom);

    expect(event.sequenceNo).toBe(42);
    expect(event.prevHash).toBe('d'.repeat(64));
    expect(statements(client.query)).toEqual([
      'BEGIN',
      'SELECT pg_advisory_xact_lock($1,',
      'SELECT sequence_no,',
      'INSERT INTO',
      'COMMIT',
    ]);
    expect(client.query.mock.calls[1]?.[1]).toEqual([LEDGER_LOCK_NAMESPACE, 'main']);
    expect(client.query.mock.calls[3]?.[1]).toEqual([
      'main',
      42,
      'd'.repeat(64),
      'c'.repeat(64),
      'tool_call',
      'agent-1',
      'underwriter',
      'app-9',
      '{"tool":"record_decision"}',
      CREATED_AT,
    ]);
    expect(client.release).toHaveBeenCalledOnce();
  });

  it('starts from genesis on an empty partition', async () => {
    const { store } = mockPool(() => ({ rows: [] }));
    const event = await store.append('main', buildFrom);
    expect(event.sequenceNo).toBe(1);
    expect(event.prevHash).toBe('genesis');
  });

  it('bounds the transaction by the deadline', async () => {
    const { client, store } = mockPool(() => ({ rows: [] }));
    await store.append('main', buildFrom, { deadline: Date.now() + 60_000 });
    expect(String(client.query.mock.calls[1]?.[0])).toMatch(/^SET LOCAL statement_timeout = \d+$/);
  });

  it('rolls back and releases on failure', async () => {
    const { client, store } = mockPool((text) => {
      if (text.startsWith('INSERT')) throw Object.assign(new Error('duplicate key'), { code: '23505' });
      return { rows: [] };
    });

    await expect(store.append('main', buildFrom)).rejects.toThrow('duplicate key');
    expect(statements(client.query).at(-1)).toBe('ROLLBACK');
    expect(client.release).toHaveBeenCalledOnce();
  });

  it('maps a cancelled statement to OperationTimeout', async () => {
    const { store } = mockPool((text) => {
      if (text.startsWith('SELECT pg_advisory')) throw Object.assign(new Error('canceling statement'), { code: '57014' });
      return { rows: [] };
    });
    await expect(store.append('main', buildFrom, { deadline: Date.now() + 60_000 })).rejects.toBeInstanceOf(
      OperationTimeout,
    );
  });

  it('does not connect once the deadline has passed', async () => {
    const { pool, store } = mockPool(() => ({ rows: [] }));
    await expect(store.append('main', buildFrom, { deadline: Date.now() - 1 })).rejects.toBeInstanceOf(
      OperationTimeout,
    );
    expect(pool.connect).not.toHaveBeenCalled();
  });
});

describe('AuditLedger over PgLedgerStore', () => {
  it('stores NUL characters as U+FFFD and hashes what is stored', async () => {
    const { client, store } = mockPool((text, params) => {
      const hasNul = (params ?? []).some(
        (param) => typeof param === 'string' && (param.includes('\u0000') || param.includes('\\u0000')),
      );
      if (text.startsWith('INSERT') && hasNul) {
        throw Object.assign(new Error('unsupported Unicode escape sequence'), { code: '22P05' });
      }
      return { rows: [] };
    });
    const ledger = new AuditLedger({ store, clock: () => CREATED_AT.getTime(), sleep: async () => undefined });

    const event = await ledger.append({
      eventType: 'decision',
      principalId: 'underwriter_1',
      roleAtTime: 'underwriter',
      subjectId: 'app-\u00001',
      payload: { rationale: 'income\u0000verified' },
    });

    expect(event.subjectId).toBe('app-\uFFFD1');
    expect(event.payload).toEqual({ rationale: 'income\uFFFDverified' });
    expect(event.thisHash).toBe(computeEventHash('genesis', eventBody(event)));
    const insert = client.query.mock.calls.find((call) => String(call[0]).startsWith('INSERT'));
    expect(insert?.[1]?.[7]).toBe('app-\uFFFD1');
    expect(insert?.[1]?.[8]).toBe('{"rationale":"income\uFFFDverified"}');
  });
});

describe('PgLedgerStore reads', () => {
  it('builds time criteria into the WHERE clause', async () => {
    const { pool, store } = mockPool(() => ({ rows: [fakeRow()] }));
    const from = new Date('2026-01-01T00:00:00.000Z');

    const events = await store.readByTime('main', { from, eventTypes: ['query', 'tool_call'] }, 10, 100);

    expect(events).toHaveLength(1);
    const [text, params] = pool.query.mock.calls[0] ?? [];
    expect(String(text)).toContain('partition = $1 AND sequence_no > $2 AND created_at >= $3 AND event_type = ANY($4)');
    expect(String(text)).toContain('LIMIT $5');
    expect(params).toEqual(['main', 10, from, ['query', 'tool_call'], 100]);
  });

  it('finds a decision by its payload id', async () => {
    const { pool, store } = mockPool(() => ({ rows: [] }));
    expect(await store.findDecision('main', 'dec-1')).toBeNull();
    expect(pool.query.mock.calls[0]?.[1]).toEqual(['main', 'dec-1']);
  });
});

describe('PgLedgerStore mutations', () => {
  it('converts insufficient_privilege into LedgerPermissionError', async () => {
    const { store } = mockPool(() => {
      throw Object.assign(new Error('permission denied for table ledger_events'), { code: '42501' });
    });

    await expect(store.delete('main', 42)).rejects.toBeInstanceOf(LedgerPermissionError);
    await expect(store.update('main', 42, { outcome: 'DENY' })).rejects.toMatchObject({
      operation: 'UPDATE',
      sequenceNo: 42,
    });
  });

  it('passes other storage errors through', async () => {
    const { store } = mockPool(() => {
      throw new Error('connection terminated');
    });
    await expect(store.delete('main', 42)).rejects.toThrow('connection terminated');
  });
});

import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  GENESIS_HASH,
  canonicalize,
  computeEventHash,
  eventBody,
  toJsonRecord,
  verifyEvents,
} from './hashChain.js';
import type { LedgerEvent } from './types.js';

const CREATED_AT = new Date('2026-01-15T12:00:00.000Z');

function chain(count: number): LedgerEvent[] {
  const events: LedgerEvent[] = [];
  let prevHash = GENESIS_HASH;
  for (let sequenceNo = 1; sequenceNo <= count; sequenceNo++) {
    const body = {
      partition: 'main',
      sequenceNo,
      eventType: 'query' as const,
      principalId: 'officer_7',
      roleAtTime: 'loan_officer' as const,
      subjectId: `app-${sequenceNo}`,
      payload: { outcome: 'ALLOW', n: sequenceNo },
      createdAt: CREATED_AT,
    };
    const thisHash = computeEventHash(prevHash, body);
    events.push({ ...body, prevHash, thisHash });
    prevHash = thisHash;
  }
  return events;
}

describe('canonicalize', () => {
  it('sorts keys and drops undefined properties', () => {
    expect(canonicalize({ b: 1, a: [1, 'x', null], c: undefined })).toBe('{"a":[1,"x",null],"b":1}');
  });

  it('sorts nested keys', () => {
    expect(canonicalize({ z: { y: 2, x: 1 } })).toBe('{"z":{"x":1,"y":2}}');
  });

  it('renders a date as its ISO string', () => {
    expect(canonicalize(CREATED_AT)).toBe(canonicalize('2026-01-15T12:00:00.000Z'));
  });

  it('renders non-finite numbers as null', () => {
    expect(canonicalize({ a: Number.NaN, b: Infinity })).toBe('{"a":null,"b":null}');
  });
});

describe('toJsonRecord', () => {
  it('reduces a payload to plain JSON', () => {
    expect(toJsonRecord({ at: CREATED_AT, skip: undefined, n: 1 })).toEqual({
      at: '2026-01-15T12:00:00.000Z',
      n: 1,
    });
  });

  it('replaces NUL in keys and nested strings', () => {
    expect(toJsonRecord({ 'a\u0000': ['x\u0000y', { z: '\u0000' }] })).toEqual({
      'a\uFFFD': ['x\uFFFDy', { z: '\uFFFD' }],
    });
  });
});

describe('computeEventHash', () => {
  it('hashes prevHash followed by the canonical body', () => {
    const [event] = chain(1);
    if (!event) throw new Error('chain is empty');
    const expected = createHash('sha256')
      .update(GENESIS_HASH + canonicalize(eventBody(event)))
      .digest('hex');
    expect(event.thisHash).toBe(expected);
    expect(event.thisHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('gives the same hash for a date and its ISO string', () => {
    const [event] = chain(1);
    if (!event) throw new Error('chain is empty');
    const fromJson = { ...eventBody(event), createdAt: CREATED_AT.toISOString() };
    expect(computeEventHash(GENESIS_HASH, fromJson)).toBe(event.thisHash);
  });
});

describe('verifyEvents', () => {
  it('accepts an intact chain', () => {
    expect(verifyEvents(chain(5))).toEqual({
      valid: true,
      firstBrokenAt: null,
      eventsChecked: 5,
      details: 'All events verified',
    });
  });

  it('accepts an empty chain', () => {
    expect(verifyEvents([]).valid).toBe(true);
  });

  it('reports a payload edit at the edited event', () => {
    const events = chain(5);
    const third = events[2];
    if (!third) throw new Error('missing event');
    third.payload = { ...third.payload, outcome: 'DENY' };

    const result = verifyEvents(events);
    expect(result.valid).toBe(false);
    expect(result.firstBrokenAt).toBe(3);
    expect(result.eventsChecked).toBe(2);
  });

  it('reports a removed event at the missing sequence number', () => {
    const events = chain(5).filter((e) => e.sequenceNo !== 4);
    const result = verifyEvents(events);
    expect(result.firstBrokenAt).toBe(4);
    expect(result.details).toBe('Sequence gap: expected #4, found #5');
  });

  it('reports a relinked event at that event', () => {
    const events = chain(4);
    const second = events[1];
    if (!second) throw new Error('missing event');
    second.prevHash = GENESIS_HASH;
    expect(verifyEvents(events).firstBrokenAt).toBe(2);
  });
});

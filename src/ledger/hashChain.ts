/**
 * Canonical serialization and SHA-256 chaining for ledger events.
 *
 * `thisHash = SHA-256(prevHash ‖ canonical(body))`. The canonical form sorts
 * object keys, drops undefined properties and renders dates as ISO strings,
 * so an event read back from JSONB hashes the same as the one written.
 *
 * @module ledger/hashChain
 */

import { createHash } from 'node:crypto';
import { isPlainRecord } from '../logging/piiScrubber.js';
import type { ChainTail, ChainVerification, LedgerEvent, LedgerEventBody } from './types.js';

export const GENESIS_HASH = 'genesis';

export const GENESIS_TAIL: Readonly<ChainTail> = Object.freeze({ sequenceNo: 0, thisHash: GENESIS_HASH });

export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : 'null';
    case 'bigint':
      return JSON.stringify(value.toString());
    case 'object': {
      const keys = Object.keys(value).sort();
      const parts: string[] = [];
      for (const key of keys) {
        const child: unknown = Reflect.get(value, key);
        if (child === undefined || typeof child === 'function' || typeof child === 'symbol') continue;
        parts.push(`${JSON.stringify(key)}:${canonicalize(child)}`);
      }
      return `{${parts.join(',')}}`;
    }
    default:
      return 'null';
  }
}

/** PostgreSQL text and JSONB cannot hold U+0000; it is stored as U+FFFD. */
export function storableText(value: string): string {
  return value.replaceAll('\u0000', '\uFFFD');
}

function storable(value: unknown): unknown {
  if (typeof value === 'string') return storableText(value);
  if (Array.isArray(value)) return value.map(storable);
  if (isPlainRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, child]) => [storableText(key), storable(child)]));
  }
  return value;
}

/**
 * Round-trip through the canonical form: plain JSON data only, with every
 * string storable. The hash is computed over this form, so it matches the row.
 */
export function toJsonRecord(value: Record<string, unknown>): Record<string, unknown> {
  const parsed = storable(JSON.parse(canonicalize(value)));
  return isPlainRecord(parsed) ? parsed : {};
}

export function eventBody(event: LedgerEvent): LedgerEventBody {
  return {
    partition: event.partition,
    sequenceNo: event.sequenceNo,
    eventType: event.eventType,
    principalId: event.principalId,
    roleAtTime: event.roleAtTime,
    subjectId: event.subjectId,
    payload: event.payload,
    createdAt: event.createdAt,
  };
}

export function computeEventHash(prevHash: string, body: LedgerEventBody): string {
  return createHash('sha256').update(prevHash).update(canonicalize(body)).digest('hex');
}

/**
 * Incremental verifier. Feed events in ascending order; the first failure is
 * latched and later events are ignored.
 */
export class ChainVerifier {
  private expectedSequenceNo: number;
  private expectedPrevHash: string;
  private checked = 0;
  private failure: { at: number; details: string } | null = null;

  constructor(start: ChainTail = GENESIS_TAIL) {
    this.expectedSequenceNo = start.sequenceNo + 1;
    this.expectedPrevHash = start.thisHash;
  }

  /** Returns false once the chain is known to be broken. */
  push(event: LedgerEvent): boolean {
    if (this.failure) return false;

    if (event.sequenceNo !== this.expectedSequenceNo) {
      this.failure = {
        at: Math.min(event.sequenceNo, this.expectedSequenceNo),
        details: `Sequence gap: expected #${this.expectedSequenceNo}, found #${event.sequenceNo}`,
      };
      return false;
    }
    if (event.prevHash !== this.expectedPrevHash) {
      this.failure = { at: event.sequenceNo, details: `prevHash mismatch at #${event.sequenceNo}` };
      return false;
    }
    if (computeEventHash(event.prevHash, eventBody(event)) !== event.thisHash) {
      this.failure = { at: event.sequenceNo, details: `Content hash mismatch at #${event.sequenceNo}` };
      return false;
    }

    this.checked += 1;
    this.expectedSequenceNo = event.sequenceNo + 1;
    this.expectedPrevHash = event.thisHash;
    return true;
  }

  result(): ChainVerification {
    if (this.failure) {
      return {
        valid: false,
        firstBrokenAt: this.failure.at,
        eventsChecked: this.checked,
        details: this.failure.details,
      };
    }
    return {
      valid: true,
      firstBrokenAt: null,
      eventsChecked: this.checked,
      details: this.checked === 0 ? 'No events to verify' : 'All events verified',
    };
  }
}

export function verifyEvents(events: Iterable<LedgerEvent>, start: ChainTail = GENESIS_TAIL): ChainVerification {
  const verifier = new ChainVerifier(start);
  for (const event of events) {
    if (!verifier.push(event)) break;
  }
  return verifier.result();
}

/**
 * Credentials for the isolated partition.
 *
 * Anyone may hold a general-path credential. An isolated credential can only
 * be minted in this directory, and only the dual-path router keeps one.
 *
 * @module isolation/partitionCredential
 */

import type pg from 'pg';
import { IsolationViolation } from '../utils/errors.js';

export type CredentialPath = 'general' | 'isolated';

const MINT_KEY = Symbol('isolated-credential');
const minted = new WeakSet<PartitionCredential>();

export class PartitionCredential {
  private constructor(
    public readonly path: CredentialPath,
    /** Who holds it, for violation reports. */
    public readonly holder: string,
    /** Pool logged in as this credential's database role. */
    public readonly connection: pg.Pool | null,
  ) {}

  static general(holder: string, connection: pg.Pool | null = null): PartitionCredential {
    return new PartitionCredential('general', holder, connection);
  }

  static isolated(key: symbol, connection: pg.Pool | null): PartitionCredential {
    if (key !== MINT_KEY) {
      throw new IsolationViolation('Isolated credentials cannot be minted here', 'unknown');
    }
    const credential = new PartitionCredential('isolated', 'dual_path_router', connection);
    minted.add(credential);
    return credential;
  }
}

/** True only for credentials minted by {@link mintIsolatedCredential}. */
export function isIsolatedCredential(credential: PartitionCredential): boolean {
  return credential.path === 'isolated' && minted.has(credential);
}

export function mintIsolatedCredential(connection: pg.Pool | null = null): PartitionCredential {
  return PartitionCredential.isolated(MINT_KEY, connection);
}

/**
 * Policy Store
 *
 * Holds the current policy snapshot behind a single reference. Readers get
 * the whole snapshot or nothing; a reload builds a new frozen snapshot and
 * swaps the reference, so requests already holding the old one are not
 * affected.
 *
 * Reloads happen only at request boundaries ({@link PolicyStore.acquire}) or
 * when {@link PolicyStore.load} is called explicitly. A failed reload keeps the
 * previous snapshot. Until the first successful load, `acquire()` resolves to
 * `undefined` and the gateway fails closed.
 *
 * @module policy/policyStore
 */

import { silentLogger, type Logger } from '../logging/index.js';
import { withDeadline } from '../utils/deadline.js';
import { OperationTimeout, PolicyLoadError, toError } from '../utils/errors.js';
import { sleep as defaultSleep, withRetry } from '../utils/retry.js';
import { parsePolicyDocument, type PolicySource } from './policyLoader.js';
import { compilePolicy } from './policySnapshot.js';
import type { PolicySnapshot } from './types.js';

export type PolicySwapListener = (
  next: PolicySnapshot,
  previous: PolicySnapshot | undefined,
) => void | Promise<void>;

export interface PolicyStoreOptions {
  source: PolicySource;
  logger?: Logger;
  /** Per-attempt read timeout. Defaults to 2000 ms. */
  fetchTimeoutMs?: number;
  /** Retries after a timed-out or failed read. Defaults to 3. */
  fetchRetries?: number;
  retryBaseDelayMs?: number;
  /** Reload at the next boundary once this much time has passed. 0 disables. */
  reloadIntervalMs?: number;
  /** After a failed boundary reload, wait this long before trying again. Defaults to 1000 ms. */
  retryCooldownMs?: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class PolicyStore {
  readonly #source: PolicySource;
  readonly #logger: Logger;
  readonly #fetchTimeoutMs: number;
  readonly #fetchRetries: number;
  readonly #retryBaseDelayMs: number;
  readonly #reloadIntervalMs: number;
  readonly #retryCooldownMs: number;
  readonly #clock: () => number;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #listeners: PolicySwapListener[] = [];

  #snapshot: PolicySnapshot | undefined;
  #revision = 0;
  #stale = false;
  #lastLoadedAt = 0;
  #lastFailureAt: number | null = null;
  #inflight: Promise<PolicySnapshot> | null = null;

  constructor(options: PolicyStoreOptions) {
    this.#source = options.source;
    this.#logger = options.logger ?? silentLogger;
    this.#fetchTimeoutMs = options.fetchTimeoutMs ?? 2_000;
    this.#fetchRetries = options.fetchRetries ?? 3;
    this.#retryBaseDelayMs = options.retryBaseDelayMs ?? 100;
    this.#reloadIntervalMs = options.reloadIntervalMs ?? 0;
    this.#retryCooldownMs = options.retryCooldownMs ?? 1_000;
    this.#clock = options.clock ?? Date.now;
    this.#sleep = options.sleep ?? defaultSleep;
  }

  /** Last valid snapshot. No I/O. */
  current(): PolicySnapshot | undefined {
    return this.#snapshot;
  }

  /** Request a reload at the next boundary. */
  markStale(): void {
    this.#stale = true;
  }

  onSwap(listener: PolicySwapListener): () => void {
    this.#listeners.push(listener);
    return () => {
      const index = this.#listeners.indexOf(listener);
      if (index >= 0) this.#listeners.splice(index, 1);
    };
  }

  /**
   * Fetch, validate and swap in a new snapshot. Concurrent callers share one
   * in-flight load.
   *
   * @throws {PolicyLoadError} when the document cannot be read or is invalid;
   *   the previous snapshot stays current.
   */
  load(): Promise<PolicySnapshot> {
    if (!this.#inflight) {
      this.#inflight = this.#loadOnce().finally(() => {
        this.#inflight = null;
      });
    }
    return this.#inflight;
  }

  /**
   * Snapshot for a new request or session. Performs a pending reload first;
   * if that fails the previous snapshot is returned.
   */
  async acquire(): Promise<PolicySnapshot | undefined> {
    if (this.#reloadDue()) {
      await this.load().catch((error: unknown) => {
        // Already logged by #loadOnce; the boundary keeps serving the old snapshot.
        this.#logger.debug('Boundary reload skipped', { reason: toError(error).message });
      });
    }
    return this.#snapshot;
  }

  #reloadDue(): boolean {
    const now = this.#clock();
    if (this.#lastFailureAt !== null && now - this.#lastFailureAt < this.#retryCooldownMs) {
      return false;
    }
    if (this.#snapshot === undefined || this.#stale) return true;
    return this.#reloadIntervalMs > 0 && now - this.#lastLoadedAt >= this.#reloadIntervalMs;
  }

  async #loadOnce(): Promise<PolicySnapshot> {
    const previous = this.#snapshot;
    let next: PolicySnapshot;
    try {
      const content = await withRetry(() => this.#fetch(), {
        maxRetries: this.#fetchRetries,
        baseDelayMs: this.#retryBaseDelayMs,
        isRetryable: (error) =>
          error instanceof PolicyLoadError && (error.kind === 'timeout' || error.kind === 'unreadable'),
        onRetry: (error, attempt, delayMs) =>
          this.#logger.warn('Policy fetch failed, retrying', {
            source: this.#source.name,
            attempt,
            delayMs,
            reason: toError(error).message,
          }),
        sleep: this.#sleep,
      });
      const document = parsePolicyDocument(content, this.#source.format, this.#source.name);
      next = compilePolicy(document, {
        revision: this.#revision + 1,
        loadedAt: new Date(this.#clock()),
        source: this.#source.name,
      });
    } catch (error) {
      this.#lastFailureAt = this.#clock();
      this.#logger.error('Policy load failed; keeping previous snapshot', toError(error), {
        source: this.#source.name,
        previousVersion: previous?.version ?? null,
      });
      throw error;
    }

    this.#revision = next.revision;
    this.#snapshot = next;
    this.#stale = false;
    this.#lastLoadedAt = this.#clock();
    this.#lastFailureAt = null;
    this.#logger.info('Policy snapshot loaded', {
      version: next.version,
      revision: next.revision,
      source: next.source,
    });

    for (const listener of this.#listeners) {
      try {
        await listener(next, previous);
      } catch (error) {
        this.#logger.error('Policy swap listener failed', toError(error), { revision: next.revision });
      }
    }
    return next;
  }

  async #fetch(): Promise<string> {
    const controller = new AbortController();
    try {
      return await withDeadline(
        this.#source.read(controller.signal),
        Date.now() + this.#fetchTimeoutMs,
        'policy fetch',
        () => controller.abort(),
      );
    } catch (error) {
      if (error instanceof OperationTimeout || controller.signal.aborted) {
        throw new PolicyLoadError(
          `Policy source "${this.#source.name}" timed out after ${this.#fetchTimeoutMs}ms`,
          'timeout',
          [],
          error,
        );
      }
      throw new PolicyLoadError(
        `Policy source "${this.#source.name}" could not be read: ${toError(error).message}`,
        'unreadable',
        [],
        error,
      );
    }
  }
}

/**
 * Marks the policy store stale when the policy file changes on disk. The
 * actual reload happens at the next request boundary.
 *
 * @module policy/policyWatcher
 */

import { watch, type FSWatcher } from 'node:fs';
import { silentLogger, type Logger } from '../logging/index.js';
import type { PolicyStore } from './policyStore.js';

export interface PolicyFileWatcher {
  close(): void;
}

export interface WatchPolicyFileOptions {
  /** Coalesce bursts of change events. Defaults to 200 ms. */
  debounceMs?: number;
  logger?: Logger;
  watchFn?: (path: string, listener: () => void) => FSWatcher;
}

const defaultWatch = (path: string, listener: () => void): FSWatcher =>
  watch(path, { persistent: false }, listener);

export function watchPolicyFile(
  store: PolicyStore,
  filePath: string,
  options: WatchPolicyFileOptions = {},
): PolicyFileWatcher {
  const debounceMs = options.debounceMs ?? 200;
  const logger = options.logger ?? silentLogger;
  let timer: ReturnType<typeof setTimeout> | null = null;

  const watcher = (options.watchFn ?? defaultWatch)(filePath, () => {
    if (timer !== null) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      logger.info('Policy file changed; reload scheduled', { path: filePath });
      store.markStale();
    }, debounceMs);
  });

  watcher.on('error', (error: Error) => {
    logger.error('Policy file watcher failed', error, { path: filePath });
  });

  return {
    close() {
      if (timer !== null) clearTimeout(timer);
      watcher.close();
    },
  };
}

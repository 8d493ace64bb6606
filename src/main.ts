/**
 * Process entry point: load configuration, build the platform, serve HTTP
 * and shut down cleanly on SIGTERM/SIGINT.
 *
 * @module main
 */

import type { Server } from 'node:http';

import { createApp } from './app.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { createPlatform } from './platform.js';
import { toError } from './utils/errors.js';

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ service: config.serviceName, level: config.logLevel });
  const platform = await createPlatform(config, logger);

  const app = createApp({
    gateway: platform.gateway,
    router: platform.router,
    ledger: platform.ledger,
    applications: platform.applications,
    logger,
    requestTimeoutMs: config.requestTimeoutMs,
    aggregateTimeoutMs: config.aggregateTimeoutMs,
  });

  const server: Server = app.listen(config.port, () => {
    logger.info('Listening', { port: config.port, policyVersion: platform.policy.current()?.version ?? null });
  });

  // ── Graceful shutdown ───────────────────────────────────────────────────

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutdown requested', { signal });
    setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS).unref();
    server.close((closeError) => {
      if (closeError) logger.error('HTTP server close failed', closeError);
      platform
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.fatal('Shutdown failed', toError(error));
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  createLogger().fatal('Startup failed', toError(error));
  process.exit(1);
});

import { fileURLToPath } from 'node:url';
import { closePool } from '../utils/db.js';
import { runMigrations } from '../utils/migrationRunner.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ context: { operation: 'migrate' } });

// Run directly if executed as a script
const entry = process.argv[1];
const isMain = entry !== undefined && fileURLToPath(import.meta.url).includes(entry);
if (isMain) {
  runMigrations({ logger })
    .then((applied) => {
      logger.info('All migrations applied', { count: applied.length });
      return closePool();
    })
    .catch((err: unknown) => {
      logger.fatal('Migration failed', err instanceof Error ? err : new Error(String(err)));
      process.exit(1);
    });
}

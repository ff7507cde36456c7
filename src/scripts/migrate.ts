import pino from 'pino';
import { env } from '../config/env.js';
import { closePool } from '../db/pool.js';
import { runMigrations } from '../db/migrator.js';

const logger = pino({ name: 'migrate', level: env.LOG_LEVEL });

async function main() {
  const result = await runMigrations();
  if (!result.ran) {
    logger.warn('DATABASE_URL is not configured; skipping migrations');
    return;
  }

  if (result.applied.length === 0) {
    logger.info('no new migrations');
    return;
  }

  logger.info({ applied: result.applied }, 'migrations applied');
}

main()
  .catch((error: unknown) => {
    logger.error({ err: error }, 'migrations failed');
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });

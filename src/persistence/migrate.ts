import { loadConfig } from '../config/env';
import { logger } from '../utils/logger';
import { closePool, getPool } from './database';
import { runMigrations } from './migrations';
import { SecretBox } from './SecretBox';

/**
 * Applies the ledger schema to the configured PostgreSQL database
 */
async function migrate(): Promise<void> {
  const config = loadConfig();
  if (!config.WALLET_ENCRYPTION_KEY) {
    throw new Error('WALLET_ENCRYPTION_KEY is required to migrate the ledger');
  }

  try {
    const result = await runMigrations(getPool(), new SecretBox(config.WALLET_ENCRYPTION_KEY));
    logger.info(result, 'Migrations complete');
  } finally {
    await closePool();
  }
}

migrate().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Migration failed');
  process.exit(1);
});

import type { Pool, PoolClient } from 'pg';
import { logger } from '../utils/logger';
import { withTransaction } from './database';
import {
  LEDGER_INDEXES,
  LEGACY_USER_COLUMNS,
  TRANSACTIONS_TABLE_SCHEMA,
  USERS_TABLE_SCHEMA,
  WALLETS_TABLE_SCHEMA
} from './schema';
import { SecretBox } from './SecretBox';

export const LEGACY_WALLET_NAME = 'Main Wallet';

export interface MigrationResult {
  migratedWallets: number;
  droppedLegacyColumns: boolean;
}

type ColumnRow = { column_name: string };

type LegacyUserRow = {
  user_id: string;
  wallet_address: string;
  private_key: string;
};

type InsertedWalletRow = { id: number; is_active: boolean };

/**
 * Creates the ledger schema and moves single-wallet users onto the
 * multi-wallet layout. Runs in one transaction; safe to run repeatedly.
 */
export async function runMigrations(pool: Pool, secretBox: SecretBox): Promise<MigrationResult> {
  return withTransaction(pool, async (client) => {
    await client.query(USERS_TABLE_SCHEMA);
    await client.query('ALTER TABLE users ADD COLUMN IF NOT EXISTS active_wallet_id INTEGER');
    await client.query(WALLETS_TABLE_SCHEMA);
    await client.query(TRANSACTIONS_TABLE_SCHEMA);

    for (const statement of LEDGER_INDEXES) {
      await client.query(statement);
    }

    const columns = await client.query<ColumnRow>(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = 'users' AND column_name = ANY($1)`,
      [[...LEGACY_USER_COLUMNS]]
    );

    if (columns.rows.length < LEGACY_USER_COLUMNS.length) {
      logger.info('Ledger schema up to date');
      return { migratedWallets: 0, droppedLegacyColumns: false };
    }

    const migratedWallets = await migrateLegacyWallets(client, secretBox);

    await client.query('ALTER TABLE users DROP COLUMN wallet_address, DROP COLUMN private_key');

    logger.info({ migratedWallets }, 'Legacy single-wallet users migrated');
    return { migratedWallets, droppedLegacyColumns: true };
  });
}

async function migrateLegacyWallets(client: PoolClient, secretBox: SecretBox): Promise<number> {
  const legacy = await client.query<LegacyUserRow>(
    `SELECT user_id, wallet_address, private_key FROM users
     WHERE wallet_address IS NOT NULL AND private_key IS NOT NULL`
  );

  let migrated = 0;

  for (const row of legacy.rows) {
    const sealed = SecretBox.isSealed(row.private_key)
      ? row.private_key
      : secretBox.seal(withHexPrefix(row.private_key));

    const inserted = await client.query<InsertedWalletRow>(
      `INSERT INTO wallets (user_id, wallet_name, wallet_address, private_key, is_active)
       VALUES ($1, $2, $3, $4,
         NOT EXISTS (SELECT 1 FROM wallets WHERE user_id = $1 AND is_active))
       ON CONFLICT (user_id, wallet_address) DO NOTHING
       RETURNING id, is_active`,
      [row.user_id, LEGACY_WALLET_NAME, row.wallet_address, sealed]
    );

    const wallet = inserted.rows[0];
    if (!wallet) {
      continue;
    }

    migrated++;
    if (wallet.is_active) {
      await client.query(
        'UPDATE users SET active_wallet_id = $2 WHERE user_id = $1',
        [row.user_id, wallet.id]
      );
    }
  }

  return migrated;
}

function withHexPrefix(key: string): string {
  return /^[0-9a-fA-F]{64}$/.test(key) ? `0x${key}` : key;
}

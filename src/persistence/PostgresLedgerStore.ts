import type { Pool, PoolClient } from 'pg';
import { getAddress, isHex, type Address, type Hash, type Hex } from 'viem';
import {
  CategorizedError,
  ForbiddenError,
  NotFoundError,
  StorageError,
  ValidationError,
  errorMessage
} from '../errors';
import { logger } from '../utils/logger';
import { isPrivateKeyHex } from '../utils/validation';
import type {
  CustodyWallet,
  NewTransaction,
  TransactionRecord,
  UserRecord,
  WalletSummary
} from '../types';
import { withTransaction } from './database';
import { DEFAULT_HISTORY_LIMIT, type LedgerStore } from './LedgerStore';
import { SecretBox } from './SecretBox';

const UNIQUE_VIOLATION = '23505';

const WALLET_COLUMNS = 'id, user_id, wallet_name, wallet_address, is_active, created_at';

type UserRow = {
  user_id: string;
  username: string;
  active_wallet_id: number | null;
  created_at: Date;
};

type WalletRow = {
  id: number;
  user_id: string;
  wallet_name: string;
  wallet_address: string;
  is_active: boolean;
  created_at: Date;
};

type SecretWalletRow = WalletRow & { private_key: string };

type TransactionRow = {
  id: number;
  user_id: string;
  wallet_id: number;
  tx_hash: string;
  tx_type: string;
  amount: string;
  token_address: string;
  status: string;
  created_at: Date;
};

/**
 * Ledger backed by PostgreSQL.
 *
 * Multi-row updates run in a transaction that first locks the user's row,
 * so concurrent wallet creation and switching for one user are serialized.
 */
export class PostgresLedgerStore implements LedgerStore {
  constructor(
    private readonly pool: Pool,
    private readonly secretBox: SecretBox
  ) {}

  async createUser(id: number, displayName: string): Promise<void> {
    await this.run('createUser', () =>
      this.pool.query(
        'INSERT INTO users (user_id, username) VALUES ($1, $2) ON CONFLICT (user_id) DO NOTHING',
        [id, displayName]
      )
    );
  }

  async getUser(id: number): Promise<UserRecord | null> {
    const result = await this.run('getUser', () =>
      this.pool.query<UserRow>(
        'SELECT user_id, username, active_wallet_id, created_at FROM users WHERE user_id = $1',
        [id]
      )
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async createWallet(userId: number, name: string, address: Address, secret: Hex): Promise<WalletSummary> {
    const normalized = getAddress(address);
    const sealed = this.secretBox.seal(secret);

    const wallet = await this.run('createWallet', () =>
      withTransaction(this.pool, async (client) => {
        await this.lockUser(client, userId);

        const existing = await client.query<{ count: number }>(
          'SELECT COUNT(*)::int AS count FROM wallets WHERE user_id = $1',
          [userId]
        );
        const isFirst = (existing.rows[0]?.count ?? 0) === 0;

        const inserted = await client.query<WalletRow>(
          `INSERT INTO wallets (user_id, wallet_name, wallet_address, private_key, is_active)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${WALLET_COLUMNS}`,
          [userId, name, normalized, sealed, isFirst]
        );
        const row = inserted.rows[0];
        if (!row) {
          throw new StorageError('Wallet insert returned no row', { userId });
        }

        if (isFirst) {
          await client.query('UPDATE users SET active_wallet_id = $2 WHERE user_id = $1', [userId, row.id]);
        }

        return toWallet(row);
      })
    );

    logger.info({ userId, walletId: wallet.id, address: normalized, isActive: wallet.isActive }, 'Wallet stored');
    return wallet;
  }

  async listWallets(userId: number): Promise<WalletSummary[]> {
    const result = await this.run('listWallets', () =>
      this.pool.query<WalletRow>(
        `SELECT ${WALLET_COLUMNS} FROM wallets WHERE user_id = $1 ORDER BY created_at, id`,
        [userId]
      )
    );
    return result.rows.map(toWallet);
  }

  async getWallet(userId: number, walletId: number): Promise<WalletSummary> {
    const result = await this.run('getWallet', () =>
      this.pool.query<WalletRow>(`SELECT ${WALLET_COLUMNS} FROM wallets WHERE id = $1`, [walletId])
    );
    return toWallet(requireOwned(result.rows[0], userId, walletId));
  }

  async getActiveWallet(userId: number): Promise<CustodyWallet> {
    const result = await this.run('getActiveWallet', () =>
      this.pool.query<SecretWalletRow>(
        `SELECT w.id, w.user_id, w.wallet_name, w.wallet_address, w.is_active, w.created_at, w.private_key
         FROM users u
         JOIN wallets w ON w.id = u.active_wallet_id
         WHERE u.user_id = $1`,
        [userId]
      )
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('No active wallet for user', { userId });
    }

    const secret = this.secretBox.open(row.private_key);
    if (!isPrivateKeyHex(secret)) {
      throw new StorageError('Stored secret is not a valid private key', { walletId: row.id });
    }

    return { ...toWallet(row), secret };
  }

  async setActiveWallet(userId: number, walletId: number): Promise<WalletSummary> {
    const wallet = await this.run('setActiveWallet', () =>
      withTransaction(this.pool, async (client) => {
        await this.lockUser(client, userId);

        const target = await client.query<WalletRow>(
          `SELECT ${WALLET_COLUMNS} FROM wallets WHERE id = $1`,
          [walletId]
        );
        const row = requireOwned(target.rows[0], userId, walletId);

        // Deactivate first: the partial unique index rejects two active rows
        await client.query(
          'UPDATE wallets SET is_active = FALSE WHERE user_id = $1 AND is_active AND id <> $2',
          [userId, walletId]
        );
        await client.query('UPDATE wallets SET is_active = TRUE WHERE id = $1', [walletId]);
        await client.query('UPDATE users SET active_wallet_id = $2 WHERE user_id = $1', [userId, walletId]);

        return { ...toWallet(row), isActive: true };
      })
    );

    logger.info({ userId, walletId }, 'Active wallet switched');
    return wallet;
  }

  async appendTransaction(tx: NewTransaction): Promise<TransactionRecord> {
    const result = await this.run('appendTransaction', () =>
      this.pool.query<TransactionRow>(
        `INSERT INTO transactions (user_id, wallet_id, tx_hash, tx_type, amount, token_address, status)
         SELECT w.user_id, w.id, $2, $3, $4, $5, $6 FROM wallets w WHERE w.id = $1
         RETURNING id, user_id, wallet_id, tx_hash, tx_type, amount, token_address, status, created_at`,
        [tx.walletId, tx.txHash, tx.type, tx.amount, tx.tokenAddress, tx.status]
      )
    );

    const row = result.rows[0];
    if (!row) {
      throw new StorageError('Cannot record transaction for unknown wallet', { walletId: tx.walletId });
    }
    return toTransaction(row);
  }

  async listTransactions(userId: number, limit: number = DEFAULT_HISTORY_LIMIT): Promise<TransactionRecord[]> {
    const result = await this.run('listTransactions', () =>
      this.pool.query<TransactionRow>(
        `SELECT id, user_id, wallet_id, tx_hash, tx_type, amount, token_address, status, created_at
         FROM transactions
         WHERE user_id = $1
         ORDER BY created_at DESC, id DESC
         LIMIT $2`,
        [userId, limit]
      )
    );
    return result.rows.map(toTransaction);
  }

  private async lockUser(client: PoolClient, userId: number): Promise<void> {
    const locked = await client.query('SELECT user_id FROM users WHERE user_id = $1 FOR UPDATE', [userId]);
    if (locked.rows.length === 0) {
      throw new NotFoundError('User not found', { userId });
    }
  }

  /**
   * Passes categorized errors through and wraps driver errors
   */
  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof CategorizedError) {
        throw error;
      }
      if (isUniqueViolation(error)) {
        throw new ValidationError('Wallet address is already registered for this user', { operation });
      }

      logger.error({ operation, error: errorMessage(error) }, 'Ledger query failed');
      throw new StorageError(`Ledger ${operation} failed`, { operation, cause: errorMessage(error) });
    }
  }
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

function requireOwned(row: WalletRow | undefined, userId: number, walletId: number): WalletRow {
  if (!row) {
    throw new NotFoundError('Wallet not found', { userId, walletId });
  }
  if (Number(row.user_id) !== userId) {
    throw new ForbiddenError('Wallet does not belong to user', { userId, walletId });
  }
  return row;
}

function toUser(row: UserRow): UserRecord {
  return {
    id: Number(row.user_id),
    displayName: row.username,
    activeWalletId: row.active_wallet_id,
    createdAt: row.created_at
  };
}

function toWallet(row: WalletRow): WalletSummary {
  return {
    id: row.id,
    userId: Number(row.user_id),
    name: row.wallet_name,
    address: getAddress(row.wallet_address),
    isActive: row.is_active,
    createdAt: row.created_at
  };
}

function toTransaction(row: TransactionRow): TransactionRecord {
  if (row.tx_type !== 'swap' || row.status !== 'pending') {
    throw new StorageError('Unrecognized transaction record', { id: row.id });
  }

  return {
    id: row.id,
    walletId: row.wallet_id,
    userId: Number(row.user_id),
    txHash: toHash(row.tx_hash, row.id),
    type: row.tx_type,
    amount: row.amount,
    tokenAddress: getAddress(row.token_address),
    status: row.status,
    createdAt: row.created_at
  };
}

function toHash(value: string, id: number): Hash {
  if (!isHex(value, { strict: true }) || value.length !== 66) {
    throw new StorageError('Stored transaction hash is malformed', { id });
  }
  return value;
}

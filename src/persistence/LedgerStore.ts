import type { Address, Hex } from 'viem';
import type {
  CustodyWallet,
  NewTransaction,
  TransactionRecord,
  UserRecord,
  WalletSummary
} from '../types';

/**
 * Persistent store for users, custody wallets and transaction history.
 *
 * Implementations guarantee that a user has at most one active wallet at any
 * observation point, and that multi-step updates (first-wallet activation,
 * active wallet switch) are applied atomically per user.
 */
export interface LedgerStore {
  /**
   * Idempotent upsert. An existing user keeps its display name.
   */
  createUser(id: number, displayName: string): Promise<void>;

  getUser(id: number): Promise<UserRecord | null>;

  /**
   * Stores a wallet for an existing user. The user's first wallet becomes
   * active; later wallets leave the active wallet unchanged.
   * @throws NotFoundError if the user does not exist
   * @throws ValidationError if the user already holds this address
   */
  createWallet(userId: number, name: string, address: Address, secret: Hex): Promise<WalletSummary>;

  /**
   * Wallets of a user ordered by creation time
   */
  listWallets(userId: number): Promise<WalletSummary[]>;

  /**
   * @throws NotFoundError if the wallet does not exist
   * @throws ForbiddenError if the wallet belongs to another user
   */
  getWallet(userId: number, walletId: number): Promise<WalletSummary>;

  /**
   * Resolves the user's active-wallet pointer, decrypting the custody secret.
   * @throws NotFoundError if the user has no active wallet
   */
  getActiveWallet(userId: number): Promise<CustodyWallet>;

  /**
   * @throws NotFoundError if the wallet does not exist
   * @throws ForbiddenError if the wallet belongs to another user
   */
  setActiveWallet(userId: number, walletId: number): Promise<WalletSummary>;

  /**
   * @throws StorageError if the record cannot be written
   */
  appendTransaction(tx: NewTransaction): Promise<TransactionRecord>;

  /**
   * Most recent transactions across all of a user's wallets
   */
  listTransactions(userId: number, limit?: number): Promise<TransactionRecord[]>;
}

export const DEFAULT_HISTORY_LIMIT = 20;

export const MAX_WALLET_NAME_LENGTH = 50;

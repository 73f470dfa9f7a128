import { getAddress, type Address, type Hex } from 'viem';
import {
  ForbiddenError,
  NotFoundError,
  StorageError,
  ValidationError
} from '../errors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { logger } from '../utils/logger';
import { isPrivateKeyHex } from '../utils/validation';
import type {
  CustodyWallet,
  NewTransaction,
  TransactionRecord,
  UserRecord,
  WalletSummary
} from '../types';
import { DEFAULT_HISTORY_LIMIT, type LedgerStore } from './LedgerStore';
import { SecretBox } from './SecretBox';

interface StoredWallet extends WalletSummary {
  sealedSecret: string;
}

/**
 * Process-local ledger used for LEDGER_BACKEND=memory and in tests.
 * Writes touching a user's wallets are serialized per user.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly users = new Map<number, UserRecord>();
  private readonly wallets = new Map<number, StoredWallet>();
  private readonly transactions: TransactionRecord[] = [];
  private readonly userLocks = new KeyedMutex<number>();
  private readonly secretBox: SecretBox;
  private nextWalletId = 1;
  private nextTransactionId = 1;

  constructor(secretBox: SecretBox = SecretBox.ephemeral()) {
    this.secretBox = secretBox;
  }

  async createUser(id: number, displayName: string): Promise<void> {
    if (this.users.has(id)) {
      return;
    }

    this.users.set(id, {
      id,
      displayName,
      activeWalletId: null,
      createdAt: new Date()
    });
    logger.info({ userId: id }, 'User created');
  }

  async getUser(id: number): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async createWallet(userId: number, name: string, address: Address, secret: Hex): Promise<WalletSummary> {
    return this.userLocks.runExclusive(userId, async () => {
      const user = this.requireUser(userId);
      const normalized = getAddress(address);
      const owned = this.walletsOf(userId);

      if (owned.some(wallet => wallet.address === normalized)) {
        throw new ValidationError('Wallet address is already registered for this user', {
          userId,
          address: normalized
        });
      }

      const isFirst = owned.length === 0;
      const wallet: StoredWallet = {
        id: this.nextWalletId++,
        userId,
        name,
        address: normalized,
        isActive: isFirst,
        createdAt: new Date(),
        sealedSecret: this.secretBox.seal(secret)
      };

      this.wallets.set(wallet.id, wallet);
      if (isFirst) {
        user.activeWalletId = wallet.id;
      }

      logger.info({ userId, walletId: wallet.id, address: normalized, isActive: isFirst }, 'Wallet stored');
      return toSummary(wallet);
    });
  }

  async listWallets(userId: number): Promise<WalletSummary[]> {
    return this.walletsOf(userId).map(toSummary);
  }

  async getWallet(userId: number, walletId: number): Promise<WalletSummary> {
    return toSummary(this.requireOwnedWallet(userId, walletId));
  }

  async getActiveWallet(userId: number): Promise<CustodyWallet> {
    const user = this.users.get(userId);
    const wallet = user?.activeWalletId != null ? this.wallets.get(user.activeWalletId) : undefined;

    if (!wallet) {
      throw new NotFoundError('No active wallet for user', { userId });
    }

    return { ...toSummary(wallet), secret: this.openSecret(wallet) };
  }

  async setActiveWallet(userId: number, walletId: number): Promise<WalletSummary> {
    return this.userLocks.runExclusive(userId, async () => {
      const user = this.requireUser(userId);
      const target = this.requireOwnedWallet(userId, walletId);

      // No await between here and return: readers never see a half switch
      for (const wallet of this.walletsOf(userId)) {
        wallet.isActive = wallet.id === target.id;
      }
      user.activeWalletId = target.id;

      logger.info({ userId, walletId }, 'Active wallet switched');
      return toSummary(target);
    });
  }

  async appendTransaction(tx: NewTransaction): Promise<TransactionRecord> {
    const wallet = this.wallets.get(tx.walletId);
    if (!wallet) {
      throw new StorageError('Cannot record transaction for unknown wallet', { walletId: tx.walletId });
    }

    const record: TransactionRecord = {
      ...tx,
      id: this.nextTransactionId++,
      userId: wallet.userId,
      createdAt: new Date()
    };
    this.transactions.push(record);

    return { ...record };
  }

  async listTransactions(userId: number, limit: number = DEFAULT_HISTORY_LIMIT): Promise<TransactionRecord[]> {
    return this.transactions
      .filter(tx => tx.userId === userId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map(tx => ({ ...tx }));
  }

  private requireUser(userId: number): UserRecord {
    const user = this.users.get(userId);
    if (!user) {
      throw new NotFoundError('User not found', { userId });
    }
    return user;
  }

  private requireOwnedWallet(userId: number, walletId: number): StoredWallet {
    const wallet = this.wallets.get(walletId);
    if (!wallet) {
      throw new NotFoundError('Wallet not found', { userId, walletId });
    }
    if (wallet.userId !== userId) {
      throw new ForbiddenError('Wallet does not belong to user', { userId, walletId });
    }
    return wallet;
  }

  private walletsOf(userId: number): StoredWallet[] {
    return [...this.wallets.values()]
      .filter(wallet => wallet.userId === userId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id);
  }

  private openSecret(wallet: StoredWallet): Hex {
    const secret = this.secretBox.open(wallet.sealedSecret);
    if (!isPrivateKeyHex(secret)) {
      throw new StorageError('Stored secret is not a valid private key', { walletId: wallet.id });
    }
    return secret;
  }
}

function toSummary(wallet: StoredWallet): WalletSummary {
  return {
    id: wallet.id,
    userId: wallet.userId,
    name: wallet.name,
    address: wallet.address,
    isActive: wallet.isActive,
    createdAt: wallet.createdAt
  };
}

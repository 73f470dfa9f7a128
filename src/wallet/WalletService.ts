import type { Address, Hex } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import type { ChainClient } from '../chain/ChainClient';
import type { LedgerStore } from '../persistence/LedgerStore';
import type { TokenMetadata, WalletSummary } from '../types';
import { ValidationError } from '../errors';
import { logger } from '../utils/logger';
import { parsePrivateKey, parseTokenAddress, parseWalletName } from '../utils/validation';

export interface CreatedWallet {
  wallet: WalletSummary;
  /**
   * Returned once so the user can back it up; never stored in plaintext
   */
  privateKey: Hex;
}

export interface WalletBalance {
  wallet: WalletSummary;
  balance: string;
  symbol: string;
}

/**
 * Wallet lifecycle on top of the ledger and the chain
 */
export class WalletService {
  constructor(
    private readonly ledger: LedgerStore,
    private readonly chain: ChainClient,
    private readonly nativeSymbol: string
  ) {}

  async createWallet(userId: number, nameInput: unknown): Promise<CreatedWallet> {
    const name = parseWalletName(nameInput);
    const privateKey = generatePrivateKey();
    const { address } = privateKeyToAccount(privateKey);

    const wallet = await this.ledger.createWallet(userId, name, address, privateKey);
    logger.info({ userId, walletId: wallet.id, address }, 'Wallet generated');

    return { wallet, privateKey };
  }

  /**
   * @throws ValidationError on a malformed key, before the ledger is touched
   */
  async importWallet(userId: number, nameInput: unknown, privateKeyInput: unknown): Promise<WalletSummary> {
    const name = parseWalletName(nameInput);
    const privateKey = parsePrivateKey(privateKeyInput);
    const address = deriveAddress(privateKey);

    const wallet = await this.ledger.createWallet(userId, name, address, privateKey);
    logger.info({ userId, walletId: wallet.id, address }, 'Wallet imported');

    return wallet;
  }

  async getActiveBalance(userId: number): Promise<WalletBalance> {
    const active = await this.ledger.getActiveWallet(userId);
    const balance = await this.chain.getNativeBalance(active.address);

    return {
      wallet: {
        id: active.id,
        userId: active.userId,
        name: active.name,
        address: active.address,
        isActive: active.isActive,
        createdAt: active.createdAt
      },
      balance,
      symbol: this.nativeSymbol
    };
  }

  async getWalletDetails(userId: number, walletId: number): Promise<WalletBalance> {
    const wallet = await this.ledger.getWallet(userId, walletId);
    const balance = await this.chain.getNativeBalance(wallet.address);

    return { wallet, balance, symbol: this.nativeSymbol };
  }

  async lookupToken(addressInput: unknown): Promise<TokenMetadata> {
    const token = parseTokenAddress(addressInput, 'tokenAddress');
    return this.chain.getTokenMetadata(token);
  }
}

function deriveAddress(privateKey: Hex): Address {
  try {
    return privateKeyToAccount(privateKey).address;
  } catch {
    // Format is valid but the scalar is outside the curve order
    throw new ValidationError('Private key is not a valid secp256k1 key');
  }
}

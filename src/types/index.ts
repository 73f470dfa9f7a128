import type { Address, Hash, Hex } from 'viem';

export type SwapStage = 'resolving' | 'quoting' | 'building' | 'submitted' | 'failed';

export type SwapDirection = 'buy' | 'sell';

export type TransactionType = 'swap';

export type TransactionStatus = 'pending';

export interface UserRecord {
  id: number;
  displayName: string;
  activeWalletId: number | null;
  createdAt: Date;
}

/**
 * Wallet as exposed to callers. Never carries the custody secret.
 */
export interface WalletSummary {
  id: number;
  userId: number;
  name: string;
  address: Address;
  isActive: boolean;
  createdAt: Date;
}

/**
 * Wallet together with its decrypted signing key. Only produced by
 * LedgerStore.getActiveWallet and only held for the duration of one swap.
 */
export interface CustodyWallet extends WalletSummary {
  secret: Hex;
}

export interface TransactionRecord {
  id: number;
  walletId: number;
  userId: number;
  txHash: Hash;
  type: TransactionType;
  amount: string;
  tokenAddress: Address;
  status: TransactionStatus;
  createdAt: Date;
}

export interface NewTransaction {
  walletId: number;
  txHash: Hash;
  type: TransactionType;
  amount: string;
  tokenAddress: Address;
  status: TransactionStatus;
}

export interface TokenMetadata {
  address: Address;
  name: string;
  symbol: string;
  decimals: number;
}

export interface Quote {
  pool: Address;
  rate: bigint;
  inputAmount: bigint;
  expectedOutput: bigint;
  minOutput: bigint;
  toleranceBps: number;
}

export interface SwapRequest {
  wallet: Pick<CustodyWallet, 'id' | 'address' | 'secret'>;
  toToken: Address;
  amount: bigint;
  onProgress?: SwapProgressCallback;
}

export interface SwapReceipt {
  txHash: Hash;
  walletId: number;
  pool: Address;
  toToken: Address;
  amount: bigint;
  minOutput: bigint;
  expectedOutput: bigint;
  nonce: number;
  gasPrice: bigint;
  recorded: boolean;
}

export interface SwapProgressData {
  pool?: Address;
  expectedOutput?: string;
  minOutput?: string;
  txHash?: Hash;
  error?: string;
}

export type SwapProgressCallback = (stage: SwapStage, data?: SwapProgressData) => void;

export interface SwapProgressMessage {
  requestId: string;
  stage: SwapStage;
  timestamp: number;
  data?: SwapProgressData;
}

export type WalletNameMode = 'create' | 'import';

/**
 * Where a user is in a multi-step chat exchange. Persisted per user in the
 * session store; `idle` is never stored.
 */
export type ConversationState =
  | { step: 'idle' }
  | { step: 'awaiting-wallet-name'; mode: WalletNameMode }
  | { step: 'awaiting-private-key'; walletName: string }
  | { step: 'awaiting-token-address' }
  | { step: 'awaiting-swap-amount'; token: Address; pool: Address; symbol: string }
  | { step: 'awaiting-confirmation'; token: Address; pool: Address; symbol: string; amount: string };

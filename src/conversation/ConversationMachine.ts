import { formatEther, type Address, type Hex } from 'viem';
import { NATIVE_ASSET } from '../chain/abis';
import type { ChainClient } from '../chain/ChainClient';
import { CategorizedError, ErrorCategory, NoPoolError } from '../errors';
import type { SwapOrchestrator } from '../execution/SwapOrchestrator';
import type { LedgerStore } from '../persistence/LedgerStore';
import type { SessionStore } from '../persistence/SessionStore';
import type { PoolResolver } from '../routing/PoolResolver';
import type { ConversationState, SwapReceipt, WalletSummary } from '../types';
import { KeyedMutex } from '../utils/KeyedMutex';
import { logger } from '../utils/logger';
import { parseNativeAmount, parseTokenAddress, parseWalletName } from '../utils/validation';
import type { WalletService } from '../wallet/WalletService';

export type ConversationInput =
  | { type: 'create-wallet' }
  | { type: 'import-wallet' }
  | { type: 'start-swap' }
  | { type: 'text'; text: string }
  | { type: 'confirm' }
  | { type: 'cancel' };

export type ConversationOutcome =
  | { kind: 'prompt'; message: string }
  | { kind: 'invalid-input'; message: string }
  | { kind: 'wallet-created'; wallet: WalletSummary; privateKey: Hex }
  | { kind: 'wallet-imported'; wallet: WalletSummary }
  | { kind: 'swap-submitted'; receipt: SwapReceipt; explorerUrl: string }
  | { kind: 'swap-failed'; code: string; message: string }
  | { kind: 'cancelled' };

export interface StepResult {
  outcome: ConversationOutcome;
  state: ConversationState;
}

export interface ConversationMachineDeps {
  sessions: SessionStore;
  ledger: LedgerStore;
  wallets: Pick<WalletService, 'createWallet' | 'importWallet' | 'lookupToken'>;
  resolver: Pick<PoolResolver, 'resolve'>;
  orchestrator: Pick<SwapOrchestrator, 'swapFromActiveWallet'>;
  chain: Pick<ChainClient, 'getNativeBalanceWei'>;
  explorerUrl: string;
  nativeSymbol: string;
}

const IDLE: ConversationState = { step: 'idle' };

/**
 * Multi-step chat flows (create wallet, import wallet, swap) as an explicit
 * state machine. Invalid input keeps the current state; cancel always
 * returns to idle. Steps for one user run one at a time.
 */
export class ConversationMachine {
  private readonly userLocks = new KeyedMutex<number>();

  constructor(private readonly deps: ConversationMachineDeps) {}

  async step(userId: number, input: ConversationInput): Promise<StepResult> {
    return this.userLocks.runExclusive(userId, async () => {
      const current = await this.deps.sessions.load(userId);
      const result = await this.transition(userId, current, input);
      await this.deps.sessions.save(userId, result.state);

      logger.debug({ userId, from: current.step, to: result.state.step, outcome: result.outcome.kind }, 'Conversation step');
      return result;
    });
  }

  private async transition(userId: number, state: ConversationState, input: ConversationInput): Promise<StepResult> {
    switch (input.type) {
      case 'cancel':
        return { outcome: { kind: 'cancelled' }, state: IDLE };
      case 'create-wallet':
        return prompt({ step: 'awaiting-wallet-name', mode: 'create' }, 'Send a name for the new wallet (1-50 characters).');
      case 'import-wallet':
        return prompt({ step: 'awaiting-wallet-name', mode: 'import' }, 'Send a name for the imported wallet (1-50 characters).');
      case 'start-swap':
        return this.startSwap(userId, state);
      case 'confirm':
        return state.step === 'awaiting-confirmation'
          ? this.confirmSwap(userId, state)
          : invalid(state, 'There is nothing to confirm.');
      case 'text':
        return this.handleText(userId, state, input.text);
    }
  }

  private async handleText(userId: number, state: ConversationState, text: string): Promise<StepResult> {
    switch (state.step) {
      case 'idle':
        return prompt(IDLE, 'Choose an action: create wallet, import wallet or swap.');
      case 'awaiting-wallet-name':
        return this.receiveWalletName(userId, state, text);
      case 'awaiting-private-key':
        return this.receivePrivateKey(userId, state, text);
      case 'awaiting-token-address':
        return this.receiveTokenAddress(state, text);
      case 'awaiting-swap-amount':
        return this.receiveAmount(userId, state, text);
      case 'awaiting-confirmation':
        return invalid(state, 'Reply confirm to submit the swap or cancel to stop.');
    }
  }

  private async startSwap(userId: number, state: ConversationState): Promise<StepResult> {
    const user = await this.deps.ledger.getUser(userId);
    if (!user || user.activeWalletId === null) {
      return invalid(state, 'Create or import a wallet before swapping.');
    }
    return prompt({ step: 'awaiting-token-address' }, 'Send the address of the token to buy.');
  }

  private async receiveWalletName(
    userId: number,
    state: Extract<ConversationState, { step: 'awaiting-wallet-name' }>,
    text: string
  ): Promise<StepResult> {
    return withValidation(state, async () => {
      const walletName = parseWalletName(text);

      if (state.mode === 'import') {
        return prompt(
          { step: 'awaiting-private-key', walletName },
          'Send the private key (0x followed by 64 hexadecimal characters).'
        );
      }

      const { wallet, privateKey } = await this.deps.wallets.createWallet(userId, walletName);
      return { outcome: { kind: 'wallet-created', wallet, privateKey }, state: IDLE };
    });
  }

  private async receivePrivateKey(
    userId: number,
    state: Extract<ConversationState, { step: 'awaiting-private-key' }>,
    text: string
  ): Promise<StepResult> {
    return withValidation(state, async () => {
      const wallet = await this.deps.wallets.importWallet(userId, state.walletName, text);
      return { outcome: { kind: 'wallet-imported', wallet }, state: IDLE };
    });
  }

  private async receiveTokenAddress(state: ConversationState, text: string): Promise<StepResult> {
    return withValidation(state, async () => {
      const token: Address = parseTokenAddress(text);
      const metadata = await this.deps.wallets.lookupToken(token);

      const pool = await this.findPool(token);
      if (!pool) {
        return invalid(state, `No pool trades ${this.deps.nativeSymbol} for ${metadata.symbol}.`);
      }

      return prompt(
        { step: 'awaiting-swap-amount', token, pool, symbol: metadata.symbol },
        `${metadata.name} (${metadata.symbol}). How much ${this.deps.nativeSymbol} do you want to swap?`
      );
    });
  }

  private async findPool(token: Address): Promise<Address | null> {
    try {
      return await this.deps.resolver.resolve(NATIVE_ASSET, token);
    } catch (error) {
      if (error instanceof NoPoolError) {
        return null;
      }
      throw error;
    }
  }

  private async receiveAmount(
    userId: number,
    state: Extract<ConversationState, { step: 'awaiting-swap-amount' }>,
    text: string
  ): Promise<StepResult> {
    return withValidation(state, async () => {
      const { wei, display } = parseNativeAmount(text);

      const user = await this.deps.ledger.getUser(userId);
      if (!user || user.activeWalletId === null) {
        return invalid(IDLE, 'Create or import a wallet before swapping.');
      }
      const wallet = await this.deps.ledger.getWallet(userId, user.activeWalletId);
      const balance = await this.deps.chain.getNativeBalanceWei(wallet.address);
      if (wei > balance) {
        return invalid(
          state,
          `Insufficient balance: ${formatEther(balance)} ${this.deps.nativeSymbol} available. Send a smaller amount.`
        );
      }

      return prompt(
        { step: 'awaiting-confirmation', token: state.token, pool: state.pool, symbol: state.symbol, amount: display },
        `Swap ${display} ${this.deps.nativeSymbol} for ${state.symbol}? Reply confirm or cancel.`
      );
    });
  }

  private async confirmSwap(
    userId: number,
    state: Extract<ConversationState, { step: 'awaiting-confirmation' }>
  ): Promise<StepResult> {
    try {
      const receipt = await this.deps.orchestrator.swapFromActiveWallet(userId, state.token, state.amount);
      return {
        outcome: { kind: 'swap-submitted', receipt, explorerUrl: `${this.deps.explorerUrl}${receipt.txHash}` },
        state: IDLE
      };
    } catch (error) {
      if (error instanceof CategorizedError) {
        return { outcome: { kind: 'swap-failed', code: error.code, message: error.message }, state: IDLE };
      }
      throw error;
    }
  }
}

function prompt(state: ConversationState, message: string): StepResult {
  return { outcome: { kind: 'prompt', message }, state };
}

function invalid(state: ConversationState, message: string): StepResult {
  return { outcome: { kind: 'invalid-input', message }, state };
}

/**
 * Turns validation failures into invalid-input, keeping the current state
 */
async function withValidation(state: ConversationState, work: () => Promise<StepResult>): Promise<StepResult> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof CategorizedError && error.category === ErrorCategory.VALIDATION) {
      return invalid(state, error.message);
    }
    throw error;
  }
}

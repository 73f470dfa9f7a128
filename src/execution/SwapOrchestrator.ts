import {
  encodeFunctionData,
  formatEther,
  isAddressEqual,
  type Address,
  type Hash,
  type PrivateKeyAccount
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import type { ChainClient } from '../chain/ChainClient';
import { NATIVE_ASSET, routerAbi } from '../chain/abis';
import {
  InsufficientBalanceError,
  ValidationError,
  classifyError,
  errorMessage
} from '../errors';
import type { LedgerStore } from '../persistence/LedgerStore';
import type { PoolResolver } from '../routing/PoolResolver';
import type { QuoteEngine } from '../quoting/QuoteEngine';
import type {
  SwapProgressCallback,
  SwapProgressData,
  SwapReceipt,
  SwapRequest,
  SwapStage
} from '../types';
import { KeyedMutex } from '../utils/KeyedMutex';
import { logger } from '../utils/logger';
import { parseNativeAmount, parseTokenAddress } from '../utils/validation';

/**
 * Configuration for SwapOrchestrator
 */
export interface SwapOrchestratorConfig {
  routerAddress: Address;
  chainId: number;
  gasLimit: number;
}

type SwapOutcome = Pick<SwapReceipt, 'txHash' | 'nonce' | 'gasPrice' | 'pool' | 'expectedOutput' | 'minOutput'>;

type ProgressReporter = (stage: SwapStage, data?: SwapProgressData) => void;

/**
 * Runs a native-to-token swap end to end: balance check, pool lookup,
 * quote, build, sign, submit, record.
 *
 * Nonce fetch, signing and submission for one wallet address happen under a
 * per-address lock, so concurrent swaps from the same wallet never reuse a
 * nonce. Any failure before submission aborts with a single categorized
 * error and leaves the ledger untouched.
 */
export class SwapOrchestrator {
  private readonly submissionLocks = new KeyedMutex<Address>();

  constructor(
    private readonly chain: ChainClient,
    private readonly resolver: Pick<PoolResolver, 'resolve'>,
    private readonly quotes: Pick<QuoteEngine, 'quote'>,
    private readonly ledger: LedgerStore,
    private readonly config: SwapOrchestratorConfig
  ) {}

  async executeSwap(request: SwapRequest): Promise<SwapReceipt> {
    const { wallet, toToken, amount } = request;
    const report = progressReporter(wallet.id, request.onProgress);

    const outcome = await this.submit(request, report).catch((error: unknown) => {
      const failure = classifyError(error);
      logger.warn({ walletId: wallet.id, toToken, code: failure.code, error: failure.message }, 'Swap failed');
      report('failed', { error: failure.message });
      throw failure;
    });

    report('submitted', { pool: outcome.pool, txHash: outcome.txHash });
    logger.info({
      walletId: wallet.id,
      toToken,
      pool: outcome.pool,
      amount: formatEther(amount),
      minOutput: outcome.minOutput.toString(),
      txHash: outcome.txHash,
      nonce: outcome.nonce
    }, 'Swap submitted');

    const recorded = await this.record(wallet.id, outcome.txHash, amount, toToken);

    return {
      ...outcome,
      walletId: wallet.id,
      toToken,
      amount,
      recorded
    };
  }

  /**
   * Validates untrusted input from a front end, then swaps from the user's
   * active wallet
   */
  async swapFromActiveWallet(
    userId: number,
    toTokenInput: unknown,
    amountInput: unknown,
    onProgress?: SwapProgressCallback
  ): Promise<SwapReceipt> {
    const toToken = parseTokenAddress(toTokenInput, 'toToken');
    if (isAddressEqual(toToken, NATIVE_ASSET)) {
      throw new ValidationError('toToken must differ from the native asset', { field: 'toToken' });
    }
    const { wei } = parseNativeAmount(amountInput);

    const wallet = await this.ledger.getActiveWallet(userId);
    return this.executeSwap({ wallet, toToken, amount: wei, onProgress });
  }

  private async submit(request: SwapRequest, report: ProgressReporter): Promise<SwapOutcome> {
    const { wallet, toToken, amount } = request;

    const account = deriveAccount(wallet);
    await this.ensureBalance(account.address, amount);

    report('resolving');
    const pool = await this.resolver.resolve(NATIVE_ASSET, toToken);

    report('quoting', { pool });
    const { expectedOutput, minOutput } = await this.quotes.quote(pool, amount, 'sell');

    report('building', {
      pool,
      expectedOutput: expectedOutput.toString(),
      minOutput: minOutput.toString()
    });
    const data = encodeFunctionData({
      abi: routerAbi,
      functionName: 'anyToAnySwap',
      args: [[pool], [true], [true], NATIVE_ASSET, toToken, amount, minOutput]
    });

    return this.submissionLocks.runExclusive(account.address, async () => {
      const [gasPrice, nonce] = await Promise.all([
        this.chain.getGasPrice(),
        this.chain.getNonce(account.address)
      ]);

      const raw = await account.signTransaction({
        type: 'legacy',
        chainId: this.config.chainId,
        to: this.config.routerAddress,
        data,
        value: amount,
        gas: BigInt(this.config.gasLimit),
        gasPrice,
        nonce
      });

      const txHash = await this.chain.sendSignedTransaction(raw);
      return { txHash, nonce, gasPrice, pool, expectedOutput, minOutput };
    });
  }

  private async ensureBalance(address: Address, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new ValidationError('amount must be greater than 0', { field: 'amount' });
    }

    const balance = await this.chain.getNativeBalanceWei(address);
    if (amount > balance) {
      throw new InsufficientBalanceError('Insufficient balance for swap', {
        required: formatEther(amount),
        available: formatEther(balance)
      });
    }
  }

  /**
   * The transaction is already on the network at this point, so a failed
   * write is reported through the receipt instead of thrown.
   */
  private async record(walletId: number, txHash: Hash, amount: bigint, toToken: Address): Promise<boolean> {
    try {
      await this.ledger.appendTransaction({
        walletId,
        txHash,
        type: 'swap',
        amount: formatEther(amount),
        tokenAddress: toToken,
        status: 'pending'
      });
      return true;
    } catch (error) {
      logger.error({ walletId, txHash, error: errorMessage(error) }, 'Submitted swap could not be recorded');
      return false;
    }
  }
}

/**
 * Signing account for a custody wallet. The secret never reaches an error.
 */
function deriveAccount(wallet: SwapRequest['wallet']): PrivateKeyAccount {
  let account: PrivateKeyAccount;
  try {
    account = privateKeyToAccount(wallet.secret);
  } catch {
    throw new ValidationError('Wallet secret is not a valid private key', { walletId: wallet.id });
  }

  if (!isAddressEqual(account.address, wallet.address)) {
    throw new ValidationError('Wallet secret does not match the stored address', { walletId: wallet.id });
  }
  return account;
}

function progressReporter(walletId: number, onProgress?: SwapProgressCallback): ProgressReporter {
  return (stage, data) => {
    if (!onProgress) {
      return;
    }
    try {
      onProgress(stage, data);
    } catch (error) {
      logger.warn({ walletId, stage, error: errorMessage(error) }, 'Progress callback threw');
    }
  };
}

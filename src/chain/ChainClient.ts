import {
  BaseError,
  HttpRequestError,
  TimeoutError,
  createPublicClient,
  createWalletClient,
  defineChain,
  erc20Abi,
  formatEther,
  http,
  type Abi,
  type Address,
  type Chain,
  type Hash,
  type Hex,
  type Transport
} from 'viem';
import { InvalidTokenError, NetworkError, SubmissionError, errorMessage } from '../errors';
import type { TokenMetadata } from '../types';
import { logger } from '../utils/logger';

/**
 * Read and submit access to one EVM chain
 */
export interface ChainClient {
  /**
   * Health probe. Never throws.
   */
  isReachable(): Promise<boolean>;
  getChainId(): Promise<number>;
  /**
   * Balance in whole native units as a decimal string
   */
  getNativeBalance(address: Address): Promise<string>;
  getNativeBalanceWei(address: Address): Promise<bigint>;
  /**
   * @throws InvalidTokenError if the address does not answer the ERC-20 read interface
   */
  getTokenMetadata(token: Address): Promise<TokenMetadata>;
  getTokenBalance(token: Address, owner: Address): Promise<bigint>;
  getGasPrice(): Promise<bigint>;
  /**
   * Next nonce, counting transactions still in the mempool
   */
  getNonce(address: Address): Promise<number>;
  callView(contract: Address, abi: Abi, functionName: string, args?: readonly unknown[]): Promise<unknown>;
  /**
   * @throws SubmissionError when the network rejects the transaction
   */
  sendSignedTransaction(raw: Hex): Promise<Hash>;
}

export interface ChainClientConfig {
  rpcUrl: string;
  chainId: number;
  chainName: string;
  nativeSymbol: string;
  timeoutMs: number;
  /**
   * Overrides the HTTP transport, e.g. with an in-process provider
   */
  transportFactory?: () => Transport;
}

function buildClients(chain: Chain, transport: Transport) {
  return {
    publicClient: createPublicClient({ chain, transport }),
    walletClient: createWalletClient({ chain, transport })
  };
}

type Clients = ReturnType<typeof buildClients>;

/**
 * True when the failure happened below the JSON-RPC layer
 */
export function isTransportFailure(error: unknown): boolean {
  if (!(error instanceof BaseError)) {
    return false;
  }
  const cause = error.walk(err => err instanceof HttpRequestError || err instanceof TimeoutError);
  return cause !== null && cause !== undefined;
}

function shortMessage(error: unknown): string {
  return error instanceof BaseError ? error.shortMessage : errorMessage(error);
}

/**
 * ChainClient over viem. Clients are created lazily and rebuilt after a
 * transport failure; every request is bounded by the configured timeout and
 * never retried.
 */
export class ViemChainClient implements ChainClient {
  private readonly chain: Chain;
  private readonly transportFactory: () => Transport;
  private clients: Clients | null = null;

  constructor(private readonly config: ChainClientConfig) {
    this.chain = defineChain({
      id: config.chainId,
      name: config.chainName,
      nativeCurrency: { name: config.nativeSymbol, symbol: config.nativeSymbol, decimals: 18 },
      rpcUrls: { default: { http: [config.rpcUrl] } }
    });
    this.transportFactory =
      config.transportFactory ?? (() => http(config.rpcUrl, { timeout: config.timeoutMs, retryCount: 0 }));
  }

  async isReachable(): Promise<boolean> {
    try {
      await this.getChainId();
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Chain endpoint unreachable');
      return false;
    }
  }

  async getChainId(): Promise<number> {
    return this.request('getChainId', ({ publicClient }) => publicClient.getChainId());
  }

  async getNativeBalance(address: Address): Promise<string> {
    return formatEther(await this.getNativeBalanceWei(address));
  }

  async getNativeBalanceWei(address: Address): Promise<bigint> {
    return this.request('getBalance', ({ publicClient }) => publicClient.getBalance({ address }));
  }

  async getTokenMetadata(token: Address): Promise<TokenMetadata> {
    const { publicClient } = this.getClients();

    try {
      const [name, symbol, decimals] = await Promise.all([
        publicClient.readContract({ address: token, abi: erc20Abi, functionName: 'name' }),
        publicClient.readContract({ address: token, abi: erc20Abi, functionName: 'symbol' }),
        publicClient.readContract({ address: token, abi: erc20Abi, functionName: 'decimals' })
      ]);
      return { address: token, name, symbol, decimals };
    } catch (error) {
      if (isTransportFailure(error)) {
        throw this.networkFailure('getTokenMetadata', error);
      }
      throw new InvalidTokenError('Address is not an ERC-20 token', { token, reason: shortMessage(error) });
    }
  }

  async getTokenBalance(token: Address, owner: Address): Promise<bigint> {
    return this.request('getTokenBalance', ({ publicClient }) =>
      publicClient.readContract({ address: token, abi: erc20Abi, functionName: 'balanceOf', args: [owner] })
    );
  }

  async getGasPrice(): Promise<bigint> {
    return this.request('getGasPrice', ({ publicClient }) => publicClient.getGasPrice());
  }

  async getNonce(address: Address): Promise<number> {
    return this.request('getNonce', ({ publicClient }) =>
      publicClient.getTransactionCount({ address, blockTag: 'pending' })
    );
  }

  /**
   * Reverts and decoding failures propagate unchanged so the caller can
   * classify them; transport failures become NetworkError.
   */
  async callView(contract: Address, abi: Abi, functionName: string, args: readonly unknown[] = []): Promise<unknown> {
    const { publicClient } = this.getClients();

    try {
      return await publicClient.readContract({ address: contract, abi, functionName, args });
    } catch (error) {
      if (isTransportFailure(error)) {
        throw this.networkFailure('callView', error);
      }
      throw error;
    }
  }

  async sendSignedTransaction(raw: Hex): Promise<Hash> {
    const { walletClient } = this.getClients();

    try {
      return await walletClient.sendRawTransaction({ serializedTransaction: raw });
    } catch (error) {
      if (isTransportFailure(error)) {
        throw this.networkFailure('sendRawTransaction', error);
      }
      throw new SubmissionError('Transaction rejected by the network', { reason: shortMessage(error) });
    }
  }

  /**
   * Runs a read. Any failure becomes NetworkError; only transport failures
   * discard the clients.
   */
  private async request<T>(operation: string, call: (clients: Clients) => Promise<T>): Promise<T> {
    try {
      return await call(this.getClients());
    } catch (error) {
      if (isTransportFailure(error)) {
        throw this.networkFailure(operation, error);
      }
      logger.warn({ operation, error: shortMessage(error) }, 'RPC request failed');
      throw new NetworkError(`RPC ${operation} failed`, { operation, reason: shortMessage(error) });
    }
  }

  private getClients(): Clients {
    if (!this.clients) {
      this.clients = buildClients(this.chain, this.transportFactory());
    }
    return this.clients;
  }

  private networkFailure(operation: string, error: unknown): NetworkError {
    this.clients = null;
    logger.warn({ operation, error: shortMessage(error) }, 'RPC transport failure, clients will be rebuilt');
    return new NetworkError(`RPC ${operation} failed`, { operation, reason: shortMessage(error) });
  }
}

import { describe, it, expect, vi } from 'vitest';
import {
  TimeoutError,
  custom,
  decodeFunctionData,
  encodeFunctionResult,
  erc20Abi,
  type Hex
} from 'viem';
import { ViemChainClient } from './ChainClient';
import { priceRouterAbi } from './abis';
import { InvalidTokenError, NetworkError, SubmissionError } from '../errors';

const WALLET = '0x1111111111111111111111111111111111111111';
const TOKEN = '0x3333333333333333333333333333333333333333';
const PRICE_ROUTER = '0x9E50D9202bEc0D046a75048Be8d51bBa93386Ade';
const POOL = '0x4444444444444444444444444444444444444444';
const TX_HASH: Hex = `0x${'ee'.repeat(32)}`;

type Handler = (method: string, params: unknown) => unknown;

/**
 * Builds a client over an in-process EIP-1193 provider
 */
function createClient(handler: Handler) {
  const request = vi.fn(async ({ method, params }: { method: string; params?: unknown }) => handler(method, params));
  const transportFactory = vi.fn(() => custom({ request }, { retryCount: 0 }));
  const client = new ViemChainClient({
    rpcUrl: 'http://localhost:8545',
    chainId: 10143,
    chainName: 'Test Chain',
    nativeSymbol: 'MON',
    timeoutMs: 1000,
    transportFactory
  });
  return { client, request, transportFactory };
}

function callData(params: unknown): Hex {
  const [call] = params as [{ data: Hex }];
  return call.data;
}

function erc20Responder(method: string, params: unknown): unknown {
  if (method !== 'eth_call') {
    throw new Error(`unexpected ${method}`);
  }
  const { functionName } = decodeFunctionData({ abi: erc20Abi, data: callData(params) });
  switch (functionName) {
    case 'name':
      return encodeFunctionResult({ abi: erc20Abi, functionName: 'name', result: 'Test Token' });
    case 'symbol':
      return encodeFunctionResult({ abi: erc20Abi, functionName: 'symbol', result: 'TST' });
    case 'decimals':
      return encodeFunctionResult({ abi: erc20Abi, functionName: 'decimals', result: 6 });
    case 'balanceOf':
      return encodeFunctionResult({ abi: erc20Abi, functionName: 'balanceOf', result: 2500000n });
    default:
      throw new Error(`unexpected ${functionName}`);
  }
}

describe('ViemChainClient', () => {
  describe('balances', () => {
    it('should format the native balance from wei', async () => {
      const { client } = createClient(() => '0xde0b6b3a7640000');

      expect(await client.getNativeBalanceWei(WALLET)).toBe(10n ** 18n);
      expect(await client.getNativeBalance(WALLET)).toBe('1');
    });

    it('should read token balances through balanceOf', async () => {
      const { client } = createClient(erc20Responder);

      expect(await client.getTokenBalance(TOKEN, WALLET)).toBe(2500000n);
    });
  });

  describe('getNonce', () => {
    it('should count pending transactions', async () => {
      const { client, request } = createClient(() => '0x7');

      expect(await client.getNonce(WALLET)).toBe(7);
      expect(request.mock.calls[0][0]).toMatchObject({
        method: 'eth_getTransactionCount',
        params: [WALLET, 'pending']
      });
    });
  });

  describe('getTokenMetadata', () => {
    it('should read name, symbol and decimals', async () => {
      const { client } = createClient(erc20Responder);

      expect(await client.getTokenMetadata(TOKEN)).toEqual({
        address: TOKEN,
        name: 'Test Token',
        symbol: 'TST',
        decimals: 6
      });
    });

    it('should reject addresses without ERC-20 code', async () => {
      const { client } = createClient(() => '0x');

      await expect(client.getTokenMetadata(TOKEN)).rejects.toThrow(InvalidTokenError);
    });

    it('should report transport failures as network errors', async () => {
      const { client } = createClient(() => {
        throw new TimeoutError({ body: {}, url: 'http://localhost:8545' });
      });

      await expect(client.getTokenMetadata(TOKEN)).rejects.toThrow(NetworkError);
    });
  });

  describe('callView', () => {
    it('should decode the view result', async () => {
      const { client } = createClient(() =>
        encodeFunctionResult({ abi: priceRouterAbi, functionName: 'calculatePriceOverRoute', result: 2n * 10n ** 18n })
      );

      const result = await client.callView(PRICE_ROUTER, priceRouterAbi, 'calculatePriceOverRoute', [[POOL], [false]]);

      expect(result).toBe(2n * 10n ** 18n);
    });
  });

  describe('transport failures', () => {
    it('should raise NetworkError and rebuild the clients on the next call', async () => {
      let failing = true;
      const { client, transportFactory } = createClient(() => {
        if (failing) {
          throw new TimeoutError({ body: {}, url: 'http://localhost:8545' });
        }
        return '0x1';
      });

      await expect(client.getGasPrice()).rejects.toThrow(NetworkError);
      failing = false;

      expect(await client.getGasPrice()).toBe(1n);
      expect(transportFactory).toHaveBeenCalledTimes(2);
    });
  });

  describe('isReachable', () => {
    it('should be true when the chain id answers', async () => {
      const { client } = createClient(() => '0x279f');

      expect(await client.isReachable()).toBe(true);
      expect(await client.getChainId()).toBe(10143);
    });

    it('should be false instead of throwing', async () => {
      const { client } = createClient(() => {
        throw new TimeoutError({ body: {}, url: 'http://localhost:8545' });
      });

      expect(await client.isReachable()).toBe(false);
    });
  });

  describe('sendSignedTransaction', () => {
    it('should return the transaction hash', async () => {
      const { client, request } = createClient(() => TX_HASH);

      expect(await client.sendSignedTransaction('0x02abcd')).toBe(TX_HASH);
      expect(request.mock.calls[0][0]).toMatchObject({
        method: 'eth_sendRawTransaction',
        params: ['0x02abcd']
      });
    });

    it('should raise SubmissionError when the node rejects it', async () => {
      const { client } = createClient(() => {
        throw { code: -32000, message: 'nonce too low' };
      });

      await expect(client.sendSignedTransaction('0x02abcd')).rejects.toThrow(SubmissionError);
    });
  });
});

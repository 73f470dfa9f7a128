import { describe, it, expect, vi, beforeEach } from 'vitest';
import { QuoteEngine, computeMinOutput } from './QuoteEngine';
import type { ChainClient } from '../chain/ChainClient';
import { priceRouterAbi } from '../chain/abis';
import { NetworkError, QuoteUnavailableError, ValidationError } from '../errors';

const PRICE_ROUTER = '0x9E50D9202bEc0D046a75048Be8d51bBa93386Ade';
const POOL = '0x4444444444444444444444444444444444444444';

function createMockChain(): ChainClient {
  return {
    isReachable: vi.fn(),
    getChainId: vi.fn(),
    getNativeBalance: vi.fn(),
    getNativeBalanceWei: vi.fn(),
    getTokenMetadata: vi.fn(),
    getTokenBalance: vi.fn(),
    getGasPrice: vi.fn(),
    getNonce: vi.fn(),
    callView: vi.fn(),
    sendSignedTransaction: vi.fn()
  };
}

describe('computeMinOutput', () => {
  it('should apply the rate and tolerance with truncating division', () => {
    expect(computeMinOutput(1000n, 2n * 10n ** 18n, 1500)).toEqual({
      expectedOutput: 2000n,
      minOutput: 1700n
    });
  });

  it('should floor both steps', () => {
    // 999 * 1.5 = 1498.5 -> 1498; 1498 * 0.85 = 1273.3 -> 1273
    expect(computeMinOutput(999n, 15n * 10n ** 17n, 1500)).toEqual({
      expectedOutput: 1498n,
      minOutput: 1273n
    });
  });

  it('should default to 1500 basis points', () => {
    expect(computeMinOutput(10n ** 18n, 10n ** 18n).minOutput).toBe(85n * 10n ** 16n);
  });

  it('should accept the tolerance bounds', () => {
    expect(computeMinOutput(100n, 10n ** 18n, 0).minOutput).toBe(100n);
    expect(computeMinOutput(100n, 10n ** 18n, 10000).minOutput).toBe(0n);
  });

  it('should reject tolerance outside 0..10000', () => {
    expect(() => computeMinOutput(100n, 10n ** 18n, 10001)).toThrow(ValidationError);
    expect(() => computeMinOutput(100n, 10n ** 18n, -1)).toThrow(ValidationError);
  });
});

describe('QuoteEngine', () => {
  let chain: ChainClient;
  let engine: QuoteEngine;

  beforeEach(() => {
    chain = createMockChain();
    engine = new QuoteEngine(chain, { priceRouterAddress: PRICE_ROUTER });
  });

  describe('getExpectedRate', () => {
    it('should call the price router with the pool and direction flag', async () => {
      vi.mocked(chain.callView).mockResolvedValue(2n * 10n ** 18n);

      const rate = await engine.getExpectedRate(POOL, 'sell');

      expect(rate).toBe(2n * 10n ** 18n);
      expect(chain.callView).toHaveBeenCalledWith(
        PRICE_ROUTER,
        priceRouterAbi,
        'calculatePriceOverRoute',
        [[POOL], [false]]
      );
    });

    it('should pass true for buy', async () => {
      vi.mocked(chain.callView).mockResolvedValue(1n);

      await engine.getExpectedRate(POOL, 'buy');

      expect(vi.mocked(chain.callView).mock.calls[0][3]).toEqual([[POOL], [true]]);
    });

    it('should reject a zero rate', async () => {
      vi.mocked(chain.callView).mockResolvedValue(0n);

      await expect(engine.getExpectedRate(POOL, 'sell')).rejects.toThrow(QuoteUnavailableError);
    });

    it('should convert a reverted call', async () => {
      vi.mocked(chain.callView).mockRejectedValue(new Error('execution reverted'));

      await expect(engine.getExpectedRate(POOL, 'sell')).rejects.toThrow(QuoteUnavailableError);
    });

    it('should keep network errors as they are', async () => {
      vi.mocked(chain.callView).mockRejectedValue(new NetworkError('RPC callView failed'));

      await expect(engine.getExpectedRate(POOL, 'sell')).rejects.toThrow(NetworkError);
    });
  });

  describe('quote', () => {
    it('should bundle rate and bounds using the configured tolerance', async () => {
      vi.mocked(chain.callView).mockResolvedValue(2n * 10n ** 18n);
      const tight = new QuoteEngine(chain, { priceRouterAddress: PRICE_ROUTER, toleranceBps: 500 });

      expect(await tight.quote(POOL, 1000n, 'sell')).toEqual({
        pool: POOL,
        rate: 2n * 10n ** 18n,
        inputAmount: 1000n,
        expectedOutput: 2000n,
        minOutput: 1900n,
        toleranceBps: 500
      });
    });
  });
});

import type { Address } from 'viem';
import type { ChainClient } from '../chain/ChainClient';
import { priceRouterAbi } from '../chain/abis';
import { NetworkError, QuoteUnavailableError, ValidationError, errorMessage } from '../errors';
import type { Quote, SwapDirection } from '../types';
import { logger } from '../utils/logger';

const RATE_SCALE = 10n ** 18n;
const BPS_DENOMINATOR = 10000n;

export const DEFAULT_TOLERANCE_BPS = 1500;

/**
 * Configuration for QuoteEngine
 */
export interface QuoteEngineConfig {
  priceRouterAddress: Address;
  toleranceBps?: number;
}

/**
 * Minimum acceptable output for a swap.
 *
 * expected = floor(amount * rate / 1e18)
 * min      = floor(expected * (10000 - toleranceBps) / 10000)
 */
export function computeMinOutput(
  inputAmount: bigint,
  rate: bigint,
  toleranceBps: number = DEFAULT_TOLERANCE_BPS
): { expectedOutput: bigint; minOutput: bigint } {
  if (!Number.isInteger(toleranceBps) || toleranceBps < 0 || toleranceBps > 10000) {
    throw new ValidationError('Tolerance must be an integer between 0 and 10000 basis points', { toleranceBps });
  }
  if (inputAmount < 0n || rate < 0n) {
    throw new ValidationError('Amount and rate must not be negative');
  }

  const expectedOutput = (inputAmount * rate) / RATE_SCALE;
  const minOutput = (expectedOutput * (BPS_DENOMINATOR - BigInt(toleranceBps))) / BPS_DENOMINATOR;

  return { expectedOutput, minOutput };
}

/**
 * Prices swaps through the exchange's on-chain price router
 */
export class QuoteEngine {
  private readonly priceRouterAddress: Address;
  private readonly toleranceBps: number;

  constructor(
    private readonly chain: ChainClient,
    config: QuoteEngineConfig
  ) {
    this.priceRouterAddress = config.priceRouterAddress;
    this.toleranceBps = config.toleranceBps ?? DEFAULT_TOLERANCE_BPS;
  }

  /**
   * Output units per one whole input unit, scaled by 1e18.
   * @throws QuoteUnavailableError if the call fails or the rate is not positive
   * @throws NetworkError if the RPC endpoint is unreachable
   */
  async getExpectedRate(pool: Address, direction: SwapDirection): Promise<bigint> {
    let result: unknown;

    try {
      result = await this.chain.callView(
        this.priceRouterAddress,
        priceRouterAbi,
        'calculatePriceOverRoute',
        [[pool], [direction === 'buy']]
      );
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }
      logger.warn({ pool, direction, error: errorMessage(error) }, 'Price route call failed');
      throw new QuoteUnavailableError('Price router call failed', { pool, direction });
    }

    if (typeof result !== 'bigint' || result <= 0n) {
      throw new QuoteUnavailableError('Price router returned no usable rate', { pool, direction });
    }

    return result;
  }

  async quote(pool: Address, amount: bigint, direction: SwapDirection): Promise<Quote> {
    const rate = await this.getExpectedRate(pool, direction);
    const { expectedOutput, minOutput } = computeMinOutput(amount, rate, this.toleranceBps);

    return {
      pool,
      rate,
      inputAmount: amount,
      expectedOutput,
      minOutput,
      toleranceBps: this.toleranceBps
    };
  }
}

import { getAddress, isAddress, type Address } from 'viem';
import { NetworkError, NoPoolError, errorMessage } from '../errors';
import { logger } from '../utils/logger';

/**
 * Configuration for PoolResolver
 */
export interface PoolResolverConfig {
  discoveryUrl: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

interface DiscoveryPair {
  baseToken: Address;
  quoteToken: Address;
}

/**
 * Finds the market (pool) for a token pair through the exchange's
 * discovery service. Pools are directional, so an unmatched pair is tried
 * once more with the tokens reversed.
 */
export class PoolResolver {
  private readonly discoveryUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: PoolResolverConfig) {
    this.discoveryUrl = config.discoveryUrl;
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = config.fetchFn ?? fetch;
  }

  /**
   * @throws NoPoolError if neither ordering has a market
   * @throws NetworkError on transport failure, timeout or malformed JSON
   */
  async resolve(tokenA: Address, tokenB: Address): Promise<Address> {
    const direct = await this.lookup({ baseToken: tokenA, quoteToken: tokenB });
    if (direct) {
      logger.info({ tokenA, tokenB, pool: direct }, 'Pool resolved');
      return direct;
    }

    const reversed = await this.lookup({ baseToken: tokenB, quoteToken: tokenA });
    if (reversed) {
      logger.info({ tokenA, tokenB, pool: reversed, reversed: true }, 'Pool resolved');
      return reversed;
    }

    throw new NoPoolError('No pool found for token pair', { tokenA, tokenB });
  }

  private async lookup(pair: DiscoveryPair): Promise<Address | null> {
    let response: Response;

    try {
      response = await this.fetchFn(this.discoveryUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ pairs: [pair] }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new NetworkError('Pool discovery request failed', { reason: errorMessage(error) });
    }

    // An error status counts as no market for this ordering
    if (!response.ok) {
      logger.warn({ ...pair, status: response.status }, 'Pool discovery returned an error status');
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new NetworkError('Pool discovery returned malformed JSON', { reason: errorMessage(error) });
    }

    return firstMarket(body);
  }
}

/**
 * Reads `data[0].market`, treating anything that is not an address as no match
 */
export function firstMarket(body: unknown): Address | null {
  if (typeof body !== 'object' || body === null || !('data' in body) || !Array.isArray(body.data)) {
    return null;
  }

  const first: unknown = body.data[0];
  if (typeof first !== 'object' || first === null || !('market' in first)) {
    return null;
  }

  const market = first.market;
  if (typeof market !== 'string' || !isAddress(market, { strict: false })) {
    return null;
  }

  return getAddress(market);
}

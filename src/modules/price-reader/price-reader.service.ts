import type { Container } from '../../infra/container.js';
import type { PoolReference } from '../../types/pool.js';
import { PriceUnavailableError } from '../../errors.js';
import { withRetry } from '../../utils/retry.js';
import { tokenPriceFromSqrtPrice } from './sqrt-price.js';

export class PriceReader {
  private readonly container: Container;
  private readonly token0Cache: Map<string, string> = new Map();

  constructor(container: Container) {
    this.container = container;
  }

  /**
   * Reads slot0 from the pool and returns the token's price in quote units.
   * Retries with exponential backoff; throws PriceUnavailableError once the
   * attempts are exhausted.
   */
  async readPrice(pool: PoolReference, tokenAddress: string, tokenDecimals: number): Promise<number> {
    const { logger, tradingParams } = this.container;
    const attempts = tradingParams.priceReadAttempts;

    try {
      return await withRetry(() => this.readOnce(pool, tokenAddress, tokenDecimals), {
        attempts,
        baseDelayMs: tradingParams.priceReadBackoffMs,
        onRetry: (err, attempt, delayMs) => {
          logger.warn({ err, pool: pool.poolAddress, attempt, delayMs }, 'Price read failed, retrying');
        },
      });
    } catch (err) {
      throw new PriceUnavailableError(pool.poolAddress, attempts, err);
    }
  }

  private async readOnce(pool: PoolReference, tokenAddress: string, tokenDecimals: number): Promise<number> {
    const { gateway } = this.container;

    const [sqrtPriceX96, token0] = await Promise.all([
      gateway.readSqrtPriceX96(pool.chainId, pool.poolAddress),
      this.token0(pool),
    ]);

    if (sqrtPriceX96 === 0n) {
      throw new Error(`Pool ${pool.poolAddress} reports zero sqrtPriceX96`);
    }

    const tokenIsToken0 = token0.toLowerCase() === tokenAddress.toLowerCase();
    return tokenPriceFromSqrtPrice(sqrtPriceX96, tokenIsToken0, tokenDecimals, pool.quoteDecimals);
  }

  private async token0(pool: PoolReference): Promise<string> {
    const key = `${pool.chainId}:${pool.poolAddress}`;
    const cached = this.token0Cache.get(key);
    if (cached) return cached;

    const token0 = await this.container.gateway.readToken0(pool.chainId, pool.poolAddress);
    this.token0Cache.set(key, token0);
    return token0;
  }
}

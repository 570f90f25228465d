import type { Container } from '../../infra/container.js';
import type { Registry } from '../registry/registry.service.js';
import type { PoolReference, QuoteSymbol } from '../../types/pool.js';
import { getChainConfig, quoteTokensFor, V3_FEE_TIERS, type ChainConfig } from '../../config/chains.js';
import { ChainNotConfiguredError } from '../../errors.js';

/**
 * Finds Uniswap V3 pools through the factory and records them in the
 * registry. Cached references are served without touching the chain.
 */
export class PoolDiscovery {
  private readonly container: Container;
  private readonly registry: Registry;

  constructor(container: Container, registry: Registry) {
    this.container = container;
    this.registry = registry;
  }

  /** Execution pool of a token on its own chain: WETH then USDC, fee tiers ascending. */
  async discover(tokenAddress: string, chainId: number): Promise<PoolReference | null> {
    const cached = this.registry.getPool(tokenAddress, chainId);
    if (cached) return cached;

    const chain = this.requireChain(chainId);
    const token = tokenAddress.toLowerCase();
    let found = false;

    for (const quote of quoteTokensFor(chain)) {
      if (quote.address.toLowerCase() === token) continue;

      for (const fee of V3_FEE_TIERS) {
        const pool = await this.lookup(chain, token, quote.address, fee);
        if (!pool) continue;

        this.registry.appendPool({
          chainId,
          tokenAddress: token,
          poolAddress: pool,
          feeTier: fee,
          quoteSymbol: quote.symbol,
          quoteAddress: quote.address,
          quoteDecimals: quote.decimals,
        });
        found = true;
      }
    }

    if (!found) {
      this.container.logger.info({ token, chainId }, 'No V3 pool found');
      return null;
    }
    return this.registry.getPool(token, chainId) ?? null;
  }

  /**
   * Pool that prices a position held on `chainId`. Mainnets price from their
   * own execution pool. Testnets price from the mainnet pool pairing the same
   * token with the mainnet counterpart of the quote token, at the same fee tier.
   */
  async pricingPool(tokenAddress: string, chainId: number): Promise<PoolReference | null> {
    const execution = await this.discover(tokenAddress, chainId);
    if (!execution) return null;

    const chain = this.requireChain(chainId);
    if (chain.pricingChainId === chainId) return execution;

    const pricingChain = this.requireChain(chain.pricingChainId);
    const quote = this.mapQuoteToPricingChain(execution.quoteSymbol, pricingChain);
    const token = tokenAddress.toLowerCase();

    const cached = this.registry
      .getPools(token, pricingChain.chainId)
      .find((p) => p.quoteAddress === quote.address.toLowerCase() && p.feeTier === execution.feeTier);
    if (cached) return cached;

    const pool = await this.lookup(pricingChain, token, quote.address, execution.feeTier);
    if (!pool) {
      this.container.logger.warn(
        { token, chainId, pricingChainId: pricingChain.chainId, fee: execution.feeTier },
        'No pricing pool on mainnet',
      );
      return null;
    }

    this.registry.appendPool({
      chainId: pricingChain.chainId,
      tokenAddress: token,
      poolAddress: pool,
      feeTier: execution.feeTier,
      quoteSymbol: quote.symbol,
      quoteAddress: quote.address,
      quoteDecimals: quote.decimals,
    });

    return (
      this.registry
        .getPools(token, pricingChain.chainId)
        .find((p) => p.poolAddress === pool.toLowerCase()) ?? null
    );
  }

  private mapQuoteToPricingChain(
    symbol: QuoteSymbol,
    pricingChain: ChainConfig,
  ): { symbol: QuoteSymbol; address: string; decimals: number } {
    const quote = quoteTokensFor(pricingChain).find((q) => q.symbol === symbol);
    if (!quote) {
      throw new Error(`No ${symbol} configured on chain ${pricingChain.chainId}`);
    }
    return quote;
  }

  /** Null only when the factory has no pool; RPC failures propagate. */
  private lookup(chain: ChainConfig, token: string, quote: string, fee: number): Promise<string | null> {
    return this.container.gateway.getV3Pool(chain.chainId, chain.v3Factory, token, quote, fee);
  }

  private requireChain(chainId: number): ChainConfig {
    const chain = getChainConfig(chainId);
    if (!chain) throw new ChainNotConfiguredError(chainId);
    return chain;
  }
}

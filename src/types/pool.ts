export type QuoteSymbol = 'WETH' | 'USDC';

export interface PoolReference {
  chainId: number;
  tokenAddress: string;
  poolAddress: string;
  dex: 'uniswap_v3';
  feeTier: number;
  quoteSymbol: QuoteSymbol;
  quoteAddress: string;
  quoteDecimals: number;
  discoveredAt: Date;
}

export interface TokenRecord {
  address: string;
  chainId: number;
  symbol: string | null;
  name: string | null;
  decimals: number | null;
  firstSeen: Date;
}

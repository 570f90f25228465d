const Q96 = 2 ** 96;

/** Price of token0 denominated in token1, decimal-adjusted. */
export function sqrtPriceX96ToPrice(sqrtPriceX96: bigint, decimals0: number, decimals1: number): number {
  if (sqrtPriceX96 <= 0n) {
    throw new RangeError('sqrtPriceX96 must be positive');
  }
  const ratio = Number(sqrtPriceX96) / Q96;
  return ratio * ratio * 10 ** (decimals0 - decimals1);
}

/**
 * Price of `token` in quote units from a pool's sqrtPriceX96. When the token
 * sorts second in the pool the pool price is inverted.
 */
export function tokenPriceFromSqrtPrice(
  sqrtPriceX96: bigint,
  tokenIsToken0: boolean,
  tokenDecimals: number,
  quoteDecimals: number,
): number {
  if (tokenIsToken0) {
    return sqrtPriceX96ToPrice(sqrtPriceX96, tokenDecimals, quoteDecimals);
  }
  return 1 / sqrtPriceX96ToPrice(sqrtPriceX96, quoteDecimals, tokenDecimals);
}
